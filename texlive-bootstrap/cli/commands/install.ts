// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { install, isSuccess } from '../../bootstrap';
import { i } from '../../i18n';
import { BootstrapCommand, UsageError } from '../bootstrap-command';
import { location } from '../format';
import { consoleEvents } from '../progress';
import { log } from '../styling';

export class InstallCommand extends BootstrapCommand {
  readonly command = 'install';
  readonly summary = i`Installs a release and makes its binaries reachable on the search path`;

  override async run(environment: NodeJS.ProcessEnv, cwd: string): Promise<boolean> {
    const token = this.versionToken;
    if (token === undefined) {
      throw new UsageError(i`'${this.command}' takes exactly one version argument`);
    }

    const session = await this.createSession(environment, cwd);
    const events = consoleEvents(session);
    const outcome = await install(session, token, events).finally(events.stop);
    if (!isSuccess(outcome)) {
      this.report(outcome.error);
      return false;
    }

    switch (outcome.kind) {
      case 'RegisteredViaTool':
        log(i`Registered ${location(outcome.directory)} with ${session.policy.pathHelper}`);
        break;
      case 'RegisteredViaLinks':
        log(i`Linked ${outcome.links.length} binaries from ${location(outcome.directory)} into ${location(session.policy.linkDirectory)}`);
        break;
    }
    log(i`TeX Live is ready: ${outcome.version}`);
    return true;
  }
}
