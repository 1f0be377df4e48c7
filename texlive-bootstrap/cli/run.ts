// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { setLocale } from '../i18n';
import { UsageError } from './bootstrap-command';
import { CommandLine } from './command-line';
import { GetInstallerCommand } from './commands/get-installer';
import { InstallCommand } from './commands/install';
import { enableDebug, error, writeException } from './styling';
import { printUsage } from './usage';

/**
 * Runs one invocation of the tool.
 *
 * @returns the process exit code: 0 on success, 1 on any failure
 */
export async function runCommandLine(args: Array<string>, environment: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): Promise<number> {
  const commandline = new CommandLine(args);
  setLocale(commandline.language);
  enableDebug(commandline.debug);

  commandline.addCommand(new GetInstallerCommand(commandline));
  commandline.addCommand(new InstallCommand(commandline));

  const command = commandline.command;
  if (!command) {
    if (commandline.inputs.length > 0) {
      error(`Unrecognized command '${commandline.inputs[0]}'`);
    } else {
      error('No command given');
    }
    printUsage(commandline.commands);
    return 1;
  }

  try {
    return await command.run(environment, cwd) ? 0 : 1;
  } catch (e) {
    // in --debug mode the stack trace is shown as well
    writeException(e);
    error(e instanceof Error ? e.message : String(e));
    if (e instanceof UsageError) {
      printUsage(commandline.commands);
    }
    return 1;
  }
}
