import chalk from 'chalk';
import { PREPROCESSOR_NAME } from '@book-footnotes/core';

// The host prints the stderr of every preprocessor into one stream, so each
// line names where it came from. stdout carries the book.
const prefix = (label: string) => `[${label}] ${PREPROCESSOR_NAME}:`;

export function warn(message: string) {
  console.warn(`${chalk.yellow(prefix('warning'))} ${message}`);
}

export function debug(message: string) {
  console.error(chalk.dim(`${prefix('debug')} ${message}`));
}
