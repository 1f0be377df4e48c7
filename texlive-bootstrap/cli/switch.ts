// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { strict } from 'assert';
import { i } from '../i18n';
import { Command } from './command';
import { cmdSwitch } from './format';

/**
 * A `--name value` option of a command.
 *
 * Values are claimed from the command line the first time they are read, so
 * anything left unread afterwards was not understood by the command.
 */
export abstract class Switch {
  readonly abstract switch: string;
  abstract get help(): Array<string>;

  /** the environment variable that supplies the value when the switch is absent */
  readonly environmentVariable?: string;

  constructor(protected command: Command) {
    command.switches.push(this);
  }

  #values?: Array<string>;
  get values() {
    return this.#values || (this.#values = this.command.commandLine.claim(this.switch) || []);
  }

  get value(): string | undefined {
    const v = this.values;
    strict.ok(v.length < 2, i`Expected a single value for ${cmdSwitch(this.switch)} - found multiple`);
    return v[0];
  }
}
