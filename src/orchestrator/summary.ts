import chalk from 'chalk';
import { formatDuration } from '../lib/utils/format.js';
import { elapsedMs, type RunStatistics } from './statistics.js';

/** Lines of the end-of-run summary */
export function formatSummary(stats: RunStatistics): string[] {
  const lines = [
    chalk.cyan.bold('📊 Update Summary'),
    `   ${chalk.green('✅')} Total steps: ${stats.totalSteps}`,
    `   ${chalk.green('✅')} Completed: ${stats.completed}`,
  ];

  if (stats.skipped > 0) {
    lines.push(`   ${chalk.yellow('⏭️')} Skipped: ${stats.skipped}`);
  }
  if (stats.failed > 0) {
    lines.push(`   ${chalk.red('❌')} Failed: ${stats.failed}`);
    for (const step of stats.steps.filter((s) => s.status === 'failed')) {
      lines.push(chalk.dim(`      - ${step.name}`));
    }
  }

  lines.push(`   ${chalk.blue('⏱️')} Duration: ${formatDuration(elapsedMs(stats))}`);
  return lines;
}

/** Closing line printed after the summary */
export function closingLine(stats: RunStatistics): string {
  if (stats.failed > 0) {
    return chalk.yellow.bold(`⚠️ Maintenance finished with ${stats.failed} failed step${stats.failed === 1 ? '' : 's'}.`);
  }
  return chalk.green.bold('🎉 All updates complete! Your system is squeaky clean!');
}
