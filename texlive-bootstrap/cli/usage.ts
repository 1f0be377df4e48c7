// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { cli } from '../constants';
import { i } from '../i18n';
import { Command } from './command';
import { cmdSwitch, command, heading, hint } from './format';
import { indent, log } from './styling';

export function printUsage(commands: ReadonlyArray<Command>) {
  log(`${heading(i`usage`)}: ${cli} ${command('<command>')} <latest|YYYY> [--switches]`);
  log();
  log(heading(i`commands`));
  for (const each of commands) {
    log(indent(`${command(each.command)} ${each.argumentsHelp}`));
    log(indent(indent(hint(each.summary))));
  }
  log();

  // every command shares the same switches, so the first one describes them
  const switches = commands[0]?.switches ?? [];
  if (switches.length > 0) {
    log(heading(i`switches`));
    for (const each of switches) {
      log(indent(each.environmentVariable ? `${cmdSwitch(each.switch)} (${each.environmentVariable})` : cmdSwitch(each.switch)));
      for (const line of each.help) {
        log(indent(indent(line)));
      }
    }
  }
}
