import chalk from 'chalk';

export function printHeader(title: string): void {
  console.log(chalk.blue.bold(`\n==> ${title}`));
}

export function printSuccess(message: string): void {
  console.log(chalk.green(`✅ ${message}`));
}

export function printError(message: string): void {
  console.log(chalk.red(`❌ ${message}`));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`⚠️  ${message}`));
}

export function printInfo(message: string): void {
  console.log(chalk.cyan(`ℹ️  ${message}`));
}
