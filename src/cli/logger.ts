/**
 * Terminal output for the sqlsight CLI.
 */

import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';
import Table from 'cli-table3';
import type { CellValue } from '../types/utils.js';
import { tokenize } from '../services/sql-lexer.js';

const titleGradient = gradient(['#7F5AF0', '#2CB1BC']);
const errorGradient = gradient(['#ff4444', '#cc0000']);

const RULE_WIDTH = 60;
const MAX_CELL_WIDTH = 40;

const HIGHLIGHTED_KEYWORDS = new Set([
  'select', 'from', 'where', 'join', 'left', 'right', 'inner', 'outer', 'on',
  'group', 'order', 'by', 'having', 'limit', 'as', 'and', 'or', 'not', 'in',
  'with', 'union', 'all', 'distinct', 'case', 'when', 'then', 'else', 'end',
  'show', 'describe', 'use', 'desc', 'asc',
]);

export function printBanner(): void {
  console.log(`\n  ${titleGradient('sqlsight')} ${chalk.gray('· questions in, SQL and insight out')}\n`);
}

export function error(message: string, detail?: string): void {
  console.log(`${chalk.red('✖')} ${message}`);
  if (detail) {
    console.log(`  ${chalk.yellow('→')} ${chalk.dim(detail)}`);
  }
}

export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

export function spinner(text: string): ReturnType<typeof ora> {
  return ora({
    text,
    color: 'magenta',
    spinner: 'dots',
  }).start();
}

export function errorBox(message: string): void {
  console.log(
    boxen(errorGradient(message), {
      padding: 1,
      margin: 1,
      borderStyle: 'round',
      borderColor: 'red',
      title: 'Error',
      titleAlignment: 'center',
    })
  );
}

/**
 * Print a statement with its keywords highlighted.
 */
export function sql(statement: string): void {
  const colored = tokenize(statement)
    .map((token) => {
      if (token.kind === 'word' && HIGHLIGHTED_KEYWORDS.has(token.text.toLowerCase())) {
        return chalk.magenta.bold(token.text);
      }
      if (token.kind === 'string') return chalk.green(token.text);
      if (token.kind === 'comment') return chalk.gray(token.text);
      return chalk.cyan(token.text);
    })
    .join('');
  console.log(colored);
}

function formatCell(cell: CellValue | undefined): string {
  if (cell === null || cell === undefined) return 'NULL';
  const text = typeof cell === 'object' ? JSON.stringify(cell) : String(cell);
  return text.length > MAX_CELL_WIDTH ? `${text.slice(0, MAX_CELL_WIDTH - 1)}…` : text;
}

/**
 * Print result rows as a table.
 */
export function table(columns: string[], rows: CellValue[][]): void {
  const output = new Table({
    head: columns.map((column) => chalk.bold(column)),
    style: {
      head: ['cyan'],
      border: ['gray'],
    },
  });
  for (const row of rows) {
    output.push(columns.map((_, i) => formatCell(row[i])));
  }
  console.log(output.toString());
}

/**
 * Print the insight text in a box.
 */
export function insight(text: string): void {
  console.log(
    boxen(text, {
      padding: 1,
      borderStyle: 'round',
      borderColor: 'magenta',
      title: 'Insight',
      titleAlignment: 'left',
    })
  );
}

/**
 * Print a section header.
 */
export function section(title: string): void {
  console.log('');
  console.log(titleGradient(`▶ ${title}`));
  console.log(chalk.gray('─'.repeat(RULE_WIDTH)));
}

export function newline(): void {
  console.log('');
}
