// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { resolve } from 'path';
import { i } from '../i18n';
import { createPolicy, defaultPolicy, environmentSettings, loadPolicyFile, PolicySettings } from '../policy';
import { Session } from '../session';
import { Command } from './command';
import { cmdSwitch } from './format';
import { BootstrapError } from '../util/exceptions';
import { detail, error, indent, initStyling } from './styling';
import { ArchiveMirror, ArchiveName, CacheBuster, Checksum, Mirror, Output, Retries } from './switches/download';
import { LinkDir, Profile, Root, WorkDir } from './switches/install';
import { PolicyFile } from './switches/policy-file';

/** relative work directories and archive destinations are taken from where the command was run */
function relativeTo(cwd: string, settings: PolicySettings): PolicySettings {
  return {
    ...settings,
    workDirectory: settings.workDirectory === undefined ? undefined : resolve(cwd, settings.workDirectory),
    output: settings.output === undefined ? undefined : resolve(cwd, settings.output),
  };
}

/** the command line is malformed; usage is printed */
export class UsageError extends Error {
}

/** A command that runs part of the bootstrap and so needs the full policy. */
export abstract class BootstrapCommand extends Command {
  readonly policyFile = new PolicyFile(this);
  readonly mirror = new Mirror(this);
  readonly archiveMirror = new ArchiveMirror(this);
  readonly archiveName = new ArchiveName(this);
  readonly cacheBuster = new CacheBuster(this);
  readonly checksum = new Checksum(this);
  readonly output = new Output(this);
  readonly retries = new Retries(this);
  readonly profile = new Profile(this);
  readonly root = new Root(this);
  readonly workDir = new WorkDir(this);
  readonly linkDir = new LinkDir(this);

  readonly argumentsHelp = '<latest|YYYY>';

  /** the settings given on the command line */
  protected get switchSettings(): PolicySettings {
    return {
      mirror: this.mirror.value,
      archiveMirror: this.archiveMirror.value,
      archiveName: this.archiveName.value,
      cacheBuster: this.cacheBuster.value,
      checksum: this.checksum.value,
      output: this.output.value,
      attempts: this.retries.count,
      profile: this.profile.value,
      installRoot: this.root.value,
      workDirectory: this.workDir.value,
      linkDirectory: this.linkDir.value,
    };
  }

  /**
   * Builds the session: defaults, then the policy file, then the environment,
   * then the command line.
   */
  async createSession(environment: NodeJS.ProcessEnv, cwd: string, clock?: () => Date): Promise<Session> {
    const policyFile = this.policyFile.resolvedValue(cwd, environment);
    const fromFile = policyFile ? await loadPolicyFile(policyFile) : {};
    const fromSwitches = this.switchSettings;

    const unclaimed = this.commandLine.unclaimed;
    if (unclaimed.length > 0) {
      throw new Error(i`Unrecognized switch ${cmdSwitch(unclaimed[0])}`);
    }

    const policy = createPolicy(defaultPolicy(environment, cwd), ...[fromFile, environmentSettings(environment), fromSwitches].map(each => relativeTo(cwd, each)));
    const session = new Session(policy, clock);
    initStyling(session);
    return session;
  }

  /** the single version argument, or undefined if the argument count is wrong */
  get versionToken(): string | undefined {
    return this.inputs.length === 1 ? this.inputs[0] : undefined;
  }

  /** prints a stage failure with everything it carries */
  protected report(failure: BootstrapError) {
    error(i`${failure.stage} failed (${failure.kind}): ${failure.message}`);
    for (const [key, value] of Object.entries(failure.context)) {
      if (value === undefined || key === 'output') {
        continue;
      }
      if (Array.isArray(value)) {
        detail(indent(`${key}:`));
        detail(indent(indent(value)).join('\n'));
      } else {
        detail(indent(`${key}: ${value}`));
      }
    }
    const output = failure.context['output'];
    if (typeof output === 'string' && output.length > 0) {
      detail(indent(i`installer output:`));
      detail(output.trimEnd());
    }
  }
}
