// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { fetchInstaller } from '../../bootstrap';
import { i } from '../../i18n';
import { BootstrapError } from '../../util/exceptions';
import { BootstrapCommand, UsageError } from '../bootstrap-command';
import { consoleEvents } from '../progress';

export class GetInstallerCommand extends BootstrapCommand {
  readonly command = 'get_installer';
  readonly summary = i`Downloads, verifies and unpacks the installer for a release`;

  override async run(environment: NodeJS.ProcessEnv, cwd: string) {
    const token = this.versionToken;
    if (token === undefined) {
      throw new UsageError(i`'${this.command}' takes exactly one version argument`);
    }

    const session = await this.createSession(environment, cwd);
    const events = consoleEvents(session);
    try {
      await fetchInstaller(session, token, events);
      return true;
    } catch (e) {
      if (e instanceof BootstrapError) {
        this.report(e);
        return false;
      }
      throw e;
    } finally {
      events.stop();
    }
  }
}
