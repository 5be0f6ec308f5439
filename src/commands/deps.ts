import chalk from 'chalk';
import { installer } from '../lib/installer';
import { systemDetector } from '../lib/system-detector';
import { confirm } from '../utils/prompt-utils';
import { printHeader, printSuccess, printWarning } from '../utils/console-utils';

export async function depsCommand(): Promise<void> {
  printHeader('🔧 Checking Dependencies');

  const report = await installer.checkDependencies();

  for (const tool of report.optional) {
    const mark = tool.available ? chalk.green('✓') : chalk.gray('✗');
    console.log(`  ${mark} ${tool.name} ${chalk.dim('(optional)')}`);
  }

  if (report.missingRecommended.length === 0) {
    printSuccess('All recommended dependencies are installed');
    return;
  }

  printWarning(`Missing recommended dependencies: ${report.missingRecommended.join(' ')}`);
  if (await confirm('Install them now?', true)) {
    const osId = await systemDetector.detectOs();
    await installer.installPackages(osId, report.missingRecommended);
    printSuccess('Dependencies installed');
  }
}
