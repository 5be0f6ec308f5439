import chalk from 'chalk';
import Table from 'cli-table3';
import { usageLogger } from '../lib/usage-logger';
import { analyzeUsage } from '../lib/usage-analytics';
import { printHeader, printWarning } from '../utils/console-utils';

export async function analyticsCommand(): Promise<void> {
  printHeader('📊 Usage Analytics');

  if (!(await usageLogger.exists())) {
    printWarning('No usage data available');
    return;
  }

  const report = analyzeUsage(await usageLogger.readLines());

  console.log(chalk.cyan.bold('Most Used Models:'));
  if (report.mostUsed.length === 0) {
    console.log(chalk.gray('  No model switches recorded'));
  } else {
    const table = new Table({ head: ['MODEL', 'SESSIONS'], colWidths: [36, 10] });
    for (const entry of report.mostUsed) {
      table.push([entry.model, entry.count]);
    }
    console.log(table.toString());
  }

  console.log(chalk.cyan.bold('\nRecent Installations:'));
  if (report.recentInstalls.length === 0) {
    console.log(chalk.gray('  No installations recorded'));
  }
  for (const install of report.recentInstalls) {
    console.log(`  ${chalk.gray(install.date)}  ${install.model}`);
  }

  console.log(chalk.cyan.bold('\nStatistics:'));
  console.log(`  Model switches: ${chalk.bold(report.stats.switches)}`);
  console.log(`  Installations:  ${chalk.bold(report.stats.installs)}`);
  console.log(`  Updates:        ${chalk.bold(report.stats.updates)}`);
}
