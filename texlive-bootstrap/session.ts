// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { join, resolve } from 'path';
import { BootstrapPolicy } from './policy';
import { Channels, Stopwatch } from './util/channels';

/**
 * The Session class is used to hold a reference to the
 * message channels,
 * the policy in effect,
 * and the clock the version checks run against.
 *
 */
export class Session {
  /** @internal */
  readonly stopwatch = new Stopwatch();
  readonly channels: Channels;

  constructor(public readonly policy: BootstrapPolicy, private readonly clock: () => Date = () => new Date()) {
    this.channels = new Channels(this.stopwatch);
  }

  get now() {
    return this.clock();
  }

  /** the search path the verification and registration steps see */
  get searchPath(): string {
    return this.policy.environment['PATH'] ?? '';
  }

  get installerFolder() {
    return join(this.policy.workDirectory, this.policy.installerDirectory);
  }

  get archiveFile() {
    return resolve(this.policy.workDirectory, this.policy.output ?? this.policy.archiveName);
  }
}
