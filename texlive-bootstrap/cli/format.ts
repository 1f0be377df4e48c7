// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import chalk from 'chalk';

export function heading(text: string) {
  return `${chalk.underline.bold(text)}`;
}

export function optional(text: string) {
  return chalk.gray(text);
}

export function cmdSwitch(text: string) {
  return optional(`--${text}`);
}

export function command(text: string) {
  return chalk.whiteBright.bold(text);
}

export function hint(text: string) {
  return chalk.green.dim(text);
}

export function location(text: string) {
  return chalk.cyan(text);
}
