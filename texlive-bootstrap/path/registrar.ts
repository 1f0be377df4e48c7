// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { lstat, mkdir, readdir, symlink } from 'fs/promises';
import { delimiter, join, resolve } from 'path';
import { i } from '../i18n';
import { Session } from '../session';
import { execute, isExecutableFile, splitSearchPath } from '../util/exec-cmd';
import { PathMisconfigured, PathRegistrationFailed } from '../util/exceptions';
import { verifyEntryPoint } from './verifier';

export type Registration =
  { readonly kind: 'tool', readonly directory: string, readonly version: string } |
  { readonly kind: 'links', readonly directory: string, readonly version: string, readonly links: ReadonlyArray<string> };

export interface LinkReport {
  created: Array<string>;
  existing: Array<string>;
  failed: Array<string>;
}

/**
 * Asks the toolchain's own helper to register its binaries (`tlmgr path add`).
 *
 * @returns false when the helper is absent or fails; that is not fatal
 */
export async function registerWithTool(session: Session, directory: string): Promise<boolean> {
  const { pathHelper, environment } = session.policy;
  const helper = join(directory, pathHelper);
  if (!await isExecutableFile(helper)) {
    session.channels.warning(i`'${helper}' is not available; skipping tool-assisted registration`);
    return false;
  }

  session.channels.message(i`Registering binaries with ${pathHelper}`);
  const searchPath = environment['PATH'];
  const result = await execute(helper, ['path', 'add'], {
    env: { ...environment, PATH: searchPath ? `${directory}${delimiter}${searchPath}` : directory },
  });
  if (result.error || result.code !== 0) {
    session.channels.warning(i`'${pathHelper} path add' failed (${result.error?.message ?? `exit status ${result.code}`})`);
    session.channels.debug(result.log);
    return false;
  }
  return true;
}

/**
 * Links every entry of `directory` into the policy's link directory.
 *
 * The link directory must be on the search path. Entries that already exist
 * at the target are left alone; a link that cannot be created is reported
 * and skipped.
 */
export async function createLinks(session: Session, directory: string): Promise<LinkReport> {
  const linkDirectory = resolve(session.policy.linkDirectory);
  if (!splitSearchPath(session.searchPath).includes(linkDirectory)) {
    throw new PathMisconfigured(linkDirectory, session.searchPath);
  }

  try {
    await mkdir(linkDirectory, { recursive: true });
  } catch (e) {
    throw new PathRegistrationFailed(directory, e instanceof Error ? e.message : String(e), { linkDirectory }, { cause: e });
  }
  const report: LinkReport = { created: [], existing: [], failed: [] };
  session.channels.message(i`Creating symlinks in ${linkDirectory}`);

  const entries = (await readdir(directory, { withFileTypes: true })).sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    if (entry.isDirectory()) {
      continue;
    }
    const source = join(directory, entry.name);
    const target = join(linkDirectory, entry.name);
    if (await lstat(target).then(() => true, () => false)) {
      report.existing.push(target);
      continue;
    }
    try {
      await symlink(source, target);
      report.created.push(target);
    } catch (e) {
      session.channels.warning(i`Failed to symlink ${source} -> ${target}: ${e instanceof Error ? e.message : String(e)}`);
      report.failed.push(target);
    }
  }

  session.channels.debug(`links: ${report.created.length} created, ${report.existing.length} already present, ${report.failed.length} failed`);
  return report;
}

/**
 * Makes the binaries in `directory` reachable: first through the helper tool,
 * then through manual links, verifying after each.
 */
export async function registerBinaries(session: Session, directory: string): Promise<Registration> {
  if (await registerWithTool(session, directory)) {
    const check = await verifyEntryPoint(session);
    if (check.verified) {
      return { kind: 'tool', directory, version: check.version };
    }
    session.channels.warning(i`${session.policy.pathHelper} reported success but the entry point is still unreachable (${check.reason})`);
  }

  const report = await createLinks(session, directory);
  const check = await verifyEntryPoint(session);
  if (check.verified) {
    return { kind: 'links', directory, version: check.version, links: [...report.created, ...report.existing] };
  }

  throw new PathRegistrationFailed(directory);
}
