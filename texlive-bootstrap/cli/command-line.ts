// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Command } from './command';

export type switches = {
  [key: string]: Array<string>;
}

/** switches that are read before a command is chosen */
export const globalSwitches = ['debug', 'language'];

/** switches that never take a value */
const flags = ['debug'];

export class CommandLine {
  readonly commands = new Array<Command>();
  readonly inputs = new Array<string>();
  readonly switches: switches = {};

  get debug() {
    return this.isSet('debug');
  }

  get language() {
    const l = this.switches['language'] || [];
    return l[0];
  }

  isSet(sw: string) {
    const s = this.switches[sw];
    if (s && s[s.length - 1] !== 'false') {
      return true;
    }
    return false;
  }

  claim(sw: string) {
    const v = this.switches[sw];
    delete this.switches[sw];
    return v;
  }

  /** switches no command or global setting has claimed */
  get unclaimed() {
    return Object.keys(this.switches).filter(each => !globalSwitches.includes(each));
  }

  addCommand(command: Command) {
    this.commands.push(command);
  }

  /** parses the command line and returns the command that has been requested */
  get command() {
    return this.commands.find(cmd => cmd.command === this.inputs[0]);
  }

  constructor(args: Array<string>) {
    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      const [, name, separator, inline] = /^--([^=:]+)([=:])?(.*)?$/g.exec(arg) || [];
      if (name) {
        let value = inline;
        if (!separator) {
          if (!flags.includes(name) && i + 1 < args.length && !args[i + 1].startsWith('--')) {
            // if you say --foo bar then bar is the value
            value = args[++i];
          } else {
            // a bare flag
            value = 'true';
          }
        }
        this.switches[name] = this.switches[name] === undefined ? [] : this.switches[name];
        this.switches[name].push(value ?? '');
        continue;
      }
      this.inputs.push(arg);
    }
  }
}
