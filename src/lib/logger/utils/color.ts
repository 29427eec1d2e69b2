import chalk, { type ChalkInstance } from 'chalk';
import type { LogType } from '../types';

type ColoredLogType = Exclude<LogType, 'raw'>;

const chalkColors: Record<ColoredLogType, ChalkInstance> = {
  error: chalk.red,
  info: chalk.white,
  warn: chalk.yellow,
  success: chalk.green,
  notice: chalk.blue,
  debug: chalk.gray,
};

/**
 * Colorize text for terminal output
 */
export function colorize(type: ColoredLogType, text: string): string {
  return chalkColors[type](text);
}
