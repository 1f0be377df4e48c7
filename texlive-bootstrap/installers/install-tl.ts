// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { stat } from 'fs/promises';
import { join, resolve } from 'path';
import { installerName } from '../constants';
import { i } from '../i18n';
import { InstallEvents } from '../interfaces/events';
import { Session } from '../session';
import { execute, findOnPath, isExecutableFile } from '../util/exec-cmd';
import { InstallationFailed, InstallerMissing, ProfileMissing } from '../util/exceptions';
import { SourceLocation } from '../version';

async function isFile(path: string) {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/** the places an extracted installer may be found, most likely first */
export function installerCandidates(session: Session): Array<string> {
  return [
    join(session.installerFolder, installerName),
    join(session.policy.workDirectory, installerName),
  ];
}

/** finds the extracted installer script, or undefined when it has not been unpacked yet */
export async function locateInstaller(session: Session): Promise<string | undefined> {
  for (const candidate of installerCandidates(session)) {
    if (await isFile(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

export function installerArguments(installer: string, profile: string, source: SourceLocation): Array<string> {
  return [installer, `--profile=${profile}`, `--location=${source.repository}`];
}

/**
 * Runs the vendor installer non-interactively against the profile and source.
 *
 * The installer's exit status is authoritative; its output is kept for the
 * error report but not interpreted.
 */
export async function runInstaller(session: Session, source: SourceLocation, events: Partial<InstallEvents>): Promise<void> {
  const { policy } = session;
  const profile = resolve(policy.workDirectory, policy.profile);
  if (!await isFile(profile)) {
    throw new ProfileMissing(profile);
  }

  const installer = await locateInstaller(session);
  if (!installer) {
    throw new InstallerMissing(i`The installer '${installerName}' was not found in '${policy.workDirectory}'`, installerCandidates(session));
  }

  let command: string;
  let args: Array<string>;
  if (policy.interpreter) {
    const interpreter = await findOnPath(policy.interpreter, session.searchPath);
    if (!interpreter) {
      throw new InstallerMissing(i`Required dependency '${policy.interpreter}' was not found on the search path`, [policy.interpreter]);
    }
    command = interpreter;
    args = installerArguments(installer, profile, source);
  } else {
    if (!await isExecutableFile(installer)) {
      throw new InstallerMissing(i`The installer '${installer}' is not executable`, [installer]);
    }
    command = installer;
    [, ...args] = installerArguments(installer, profile, source);
  }

  session.channels.message(i`Starting installation from ${source.repository}`);
  events.installerStart?.(command, args);
  const result = await execute(command, args, {
    cwd: policy.workDirectory,
    env: { ...policy.environment },
    onStdOutData: (chunk) => events.installerOutput?.(chunk),
    onStdErrData: (chunk) => events.installerOutput?.(chunk),
  });

  if (result.error) {
    throw new InstallationFailed(null, result.log, i`Unable to start '${command}': ${result.error.message}`);
  }
  if (result.code !== 0) {
    throw new InstallationFailed(result.code, result.log);
  }
  session.channels.message(i`Base installation completed`);
}
