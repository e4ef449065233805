/**
 * livyscan CLI — Terminal formatting.
 * Colour tokens for stderr diagnostics and the console summary.
 */

import chalk from 'chalk';
import gradient from 'gradient-string';

// ─── Color tokens ────────────────────────────────────────────────────

export const C = {
  dim:      chalk.dim,
  bold:     chalk.bold,
  cyan:     chalk.hex('#2dd4a7'),
  gray:     chalk.gray,

  external: chalk.red.bold,
  trusted:  chalk.green,

  success:  chalk.green,
  warn:     chalk.yellow,
  error:    chalk.red,
  info:     chalk.blue,
};

const ASCII_LOGO = String.raw`
 _ _
| (_)_   ___   _ ___  ___ __ _ _ __
| | \ \ / / | | / __|/ __/ _' | '_ \
| | |\ V /| |_| \__ \ (_| (_| | | | |
|_|_| \_/  \__, |___/\___\__,_|_| |_|
           |___/
`;

export function banner(): string {
  return gradient(['#00ff41', '#00d4ff'])(ASCII_LOGO);
}

// ─── String helpers ──────────────────────────────────────────────────

export function header(title: string, width = 70): string[] {
  return ['', C.bold('='.repeat(width)), C.bold(title), C.bold('='.repeat(width))];
}
