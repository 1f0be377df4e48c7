// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { CommandLine } from './command-line';
import { Switch } from './switch';
import { Debug } from './switches/debug';

/** A verb of the command line, with the switches it understands. */
export abstract class Command {
  readonly abstract command: string;
  readonly abstract argumentsHelp: string;
  readonly abstract summary: string;

  readonly switches = new Array<Switch>();

  readonly debug = new Debug(this);

  constructor(public commandLine: CommandLine) {}

  get inputs() {
    return this.commandLine.inputs.slice(1);
  }

  abstract run(environment: NodeJS.ProcessEnv, cwd: string): Promise<boolean>;
}
