// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Session } from '../session';
import { execute } from '../util/exec-cmd';

export type Verification =
  { readonly verified: true, readonly version: string } |
  { readonly verified: false, readonly reason: string };

/**
 * Runs `<entryPoint> <versionArgument>` through the search path.
 *
 * Not finding the command, a non-zero exit or empty output all mean "not
 * verified"; none of them is an error. Safe to call repeatedly.
 */
export async function verifyEntryPoint(session: Session): Promise<Verification> {
  const { entryPoint, versionArgument, environment } = session.policy;
  const result = await execute(entryPoint, [versionArgument], { env: { ...environment } });

  if (result.error) {
    session.channels.debug(`'${entryPoint}' could not be run: ${result.error.message}`);
    return { verified: false, reason: result.error.message };
  }
  if (result.code !== 0) {
    session.channels.debug(`'${entryPoint} ${versionArgument}' exited with ${result.code}`);
    return { verified: false, reason: `exit status ${result.code}` };
  }

  const version = result.stdout.split(/\r?\n/).map(each => each.trim()).find(each => each.length > 0);
  if (!version) {
    return { verified: false, reason: 'no version output' };
  }

  session.channels.debug(`'${entryPoint}' reports: ${version}`);
  return { verified: true, version };
}
