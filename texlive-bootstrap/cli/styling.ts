// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import chalk from 'chalk';
import { i } from '../i18n';
import { Session } from '../session';

function formatTime(t: number) {
  return (
    t < 3600000 ? [Math.floor(t / 60000) % 60, Math.floor(t / 1000) % 60, t % 1000] :
      t < 86400000 ? [Math.floor(t / 3600000) % 24, Math.floor(t / 60000) % 60, Math.floor(t / 1000) % 60, t % 1000] :
        [Math.floor(t / 86400000), Math.floor(t / 3600000) % 24, Math.floor(t / 60000) % 60, Math.floor(t / 1000) % 60, t % 1000]).map(each => each.toString().padStart(2, '0')).join(':').replace(/(.*):(\d)/, '$1.$2');
}

/** where the styled text goes; messages go to `out`, errors and warnings to `err` */
export interface Output {
  out(text: string): void;
  err(text: string): void;
}

const consoleOutput: Output = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

let output = consoleOutput;
let debugEnabled = false;

export function setOutput(target: Output | undefined) {
  output = target ?? consoleOutput;
}

export function enableDebug(enabled: boolean) {
  debugEnabled = enabled;
}

export function indent(text: string): string
export function indent(text: Array<string>): Array<string>
export function indent(text: string | Array<string>): string | Array<string> {
  if (Array.isArray(text)) {
    return text.map(each => indent(each));
  }
  return `  ${text}`;
}

export const log = (message = '') => output.out(message);

export const error = (text: string) => {
  const errorLocalized = i`error:`;
  output.err(`${chalk.red.bold(errorLocalized)} ${text}`);
};

export const warning = (text: string) => {
  const warningLocalized = i`warning:`;
  output.err(`${chalk.yellow.bold(warningLocalized)} ${text}`);
};

/** unadorned text on the error stream */
export const detail = (text: string) => output.err(text);

export const debug = (text: string) => {
  if (debugEnabled) {
    output.err(`${chalk.cyan.bold('debug: ')}${text}`);
  }
};

export function writeException(e: unknown) {
  if (e instanceof Error) {
    debug(e.message);
    if (e.stack) {
      debug(e.stack);
    }
    return;
  }
  debug(String(e));
}

export function initStyling(session: Session) {

  session.channels.on('message', (text: string, _msec: number) => {
    log(text);
  });

  session.channels.on('debug', (text: string, msec: number) => {
    debug(`${chalk.cyan.bold(`[${formatTime(msec)}]`)} ${text}`);
  });

  session.channels.on('warning', (text: string, _msec: number) => {
    warning(text);
  });
}
