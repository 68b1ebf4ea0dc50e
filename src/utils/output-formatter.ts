import chalk from 'chalk';
import { type TableUserConfig, table } from 'table';

// Diagnostics always go to stderr; stdout carries only the tree.
let debugEnabled = false;

export function setDebugOutput(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugOutput(): boolean {
  return debugEnabled;
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), chalk.red(message));
}

export function printWarning(message: string): void {
  console.error(chalk.yellow('⚠'), chalk.yellow(message));
}

export function printDebug(message: string): void {
  if (!debugEnabled) return;
  console.error(chalk.gray('·'), chalk.gray(message));
}

// table refuses cells holding control characters
function cleanCell(cell: string): string {
  return cell.replace(/[\x00-\x1f\x7f]/g, ' ');
}

export function formatTable(headers: string[], rows: string[][]): string {
  const config: TableUserConfig = {
    border: {
      topBody: chalk.gray('─'),
      topJoin: chalk.gray('┬'),
      topLeft: chalk.gray('┌'),
      topRight: chalk.gray('┐'),
      bottomBody: chalk.gray('─'),
      bottomJoin: chalk.gray('┴'),
      bottomLeft: chalk.gray('└'),
      bottomRight: chalk.gray('┘'),
      bodyLeft: chalk.gray('│'),
      bodyRight: chalk.gray('│'),
      bodyJoin: chalk.gray('│'),
      joinBody: chalk.gray('─'),
      joinLeft: chalk.gray('├'),
      joinRight: chalk.gray('┤'),
      joinJoin: chalk.gray('┼'),
    },
    columnDefault: {
      truncate: 40,
    },
  };

  const formattedHeaders = headers.map((h) => chalk.bold.magenta(h));

  return table([formattedHeaders, ...rows.map((row) => row.map(cleanCell))], config);
}
