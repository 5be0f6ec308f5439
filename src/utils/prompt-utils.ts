import * as readline from 'readline';
import chalk from 'chalk';

/**
 * Prompt user for input
 */
export function prompt(question: string, defaultValue?: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    const promptText = defaultValue
      ? `${chalk.yellow(question)} ${chalk.gray(`[${defaultValue}]`)}: `
      : `${chalk.yellow(question)} `;

    rl.question(promptText, (answer) => {
      rl.close();
      resolve(answer.trim() || defaultValue || '');
    });
  });
}

/**
 * Prompt user for yes/no confirmation
 */
export function confirm(question: string, defaultYes = false): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const suffix = defaultYes ? '[Y/n]' : '[y/N]';

  return new Promise((resolve) => {
    rl.question(`${chalk.yellow(question)} ${chalk.gray(suffix)}: `, (answer) => {
      rl.close();
      const input = answer.trim().toLowerCase();

      if (input === '') {
        resolve(defaultYes);
      } else {
        resolve(input.startsWith('y'));
      }
    });
  });
}

/**
 * Parse a 1-based menu answer; null when out of range or not a number
 */
export function parseChoice(answer: string, optionCount: number): number | null {
  if (!/^\d+$/.test(answer.trim())) return null;
  const choice = parseInt(answer, 10);
  if (choice < 1 || choice > optionCount) return null;
  return choice - 1;
}

/**
 * Parse a space-separated list of 1-based numbers (or "all")
 * Out-of-range and non-numeric entries are dropped, duplicates kept once
 */
export function parseMultiChoice(answer: string, optionCount: number): number[] {
  const trimmed = answer.trim();
  if (trimmed.toLowerCase() === 'all') {
    return Array.from({ length: optionCount }, (_, i) => i);
  }

  const indexes: number[] = [];
  for (const token of trimmed.split(/\s+/)) {
    const index = parseChoice(token, optionCount);
    if (index !== null && !indexes.includes(index)) {
      indexes.push(index);
    }
  }
  return indexes;
}

/**
 * Print a numbered option list and ask for one choice
 * Returns the 0-based index, or null on invalid input
 */
export async function choose(title: string, options: string[]): Promise<number | null> {
  console.log(chalk.cyan.bold(title));
  options.forEach((option, i) => {
    console.log(`${chalk.gray(`[${i + 1}]`)} ${option}`);
  });
  const answer = await prompt(`Select option ${chalk.gray(`[1-${options.length}]`)}:`);
  return parseChoice(answer, options.length);
}

export async function pressEnter(): Promise<void> {
  await prompt('\nPress Enter to continue...');
}
