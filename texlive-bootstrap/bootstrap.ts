// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { unpackTarGz } from './archivers/tar';
import { acquireInstallerArchive } from './fs/acquire';
import { i } from './i18n';
import { locateInstaller, runInstaller } from './installers/install-tl';
import { InstallEvents } from './interfaces/events';
import { locateBinaries } from './path/locator';
import { registerBinaries } from './path/registrar';
import { verifyEntryPoint } from './path/verifier';
import { Session } from './session';
import { BootstrapError } from './util/exceptions';
import { parseHash } from './util/hash';
import { formatVersion, parseVersion, resolveSource, SourceLocation, VersionSpec } from './version';

export type ResolutionOutcome =
  { readonly kind: 'Verified', readonly version: string } |
  { readonly kind: 'RegisteredViaTool', readonly version: string, readonly directory: string } |
  { readonly kind: 'RegisteredViaLinks', readonly version: string, readonly directory: string, readonly links: ReadonlyArray<string> } |
  { readonly kind: 'Failed', readonly error: BootstrapError };

export function isSuccess(outcome: ResolutionOutcome): outcome is Exclude<ResolutionOutcome, { kind: 'Failed' }> {
  return outcome.kind !== 'Failed';
}

/** fetches, verifies and unpacks the installer into the session's installer folder */
export async function getInstaller(session: Session, source: SourceLocation, events: Partial<InstallEvents> = {}): Promise<string> {
  // a malformed checksum is rejected before anything is downloaded
  const hash = parseHash(session.policy.checksum);
  session.channels.enter('fetch');
  const archive = await acquireInstallerArchive(session, source, session.archiveFile, events, { hash });
  session.channels.enter('extract');
  await unpackTarGz(session, archive, session.installerFolder, events, { strip: 1 });
  session.channels.message(i`Installer unpacked to ${session.installerFolder}`);
  return session.installerFolder;
}

/** the part of the pipeline after the installer ran: verify, then locate and register */
export async function exposeToolchain(session: Session, version: VersionSpec): Promise<ResolutionOutcome> {
  session.channels.enter('locate');
  const check = await verifyEntryPoint(session);
  if (check.verified) {
    session.channels.message(i`Installation verified: ${check.version}`);
    return { kind: 'Verified', version: check.version };
  }

  session.channels.warning(i`'${session.policy.entryPoint}' is not reachable after installation (${check.reason}); attempting fallback methods`);
  const directory = await locateBinaries(session, version);
  session.channels.message(i`Found binaries at: ${directory}`);

  session.channels.enter('register');
  const registration = await registerBinaries(session, directory);
  session.channels.message(i`Installation verified: ${registration.version}`);
  return registration.kind === 'tool' ?
    { kind: 'RegisteredViaTool', version: registration.version, directory } :
    { kind: 'RegisteredViaLinks', version: registration.version, directory, links: registration.links };
}

/**
 * The whole bootstrap: resolve the version, make sure an installer is
 * present, run it, then make the entry point reachable.
 *
 * Stage failures come back as a `Failed` outcome; anything that is not a
 * bootstrap error propagates.
 */
export async function install(session: Session, token: string, events: Partial<InstallEvents> = {}): Promise<ResolutionOutcome> {
  try {
    session.channels.enter('resolve');
    const version = parseVersion(token, session.now);
    const source = resolveSource(version, session.policy);
    session.channels.debug(`version ${formatVersion(version)} => repository ${source.repository}`);

    if (await locateInstaller(session)) {
      session.channels.debug(`Installer already present in ${session.policy.workDirectory}; skipping download`);
    } else {
      await getInstaller(session, source, events);
    }

    session.channels.enter('install');
    await runInstaller(session, source, events);
    return await exposeToolchain(session, version);
  } catch (e) {
    if (e instanceof BootstrapError) {
      return { kind: 'Failed', error: e };
    }
    throw e;
  }
}

/** resolves the version and fetches the installer, without running it */
export async function fetchInstaller(session: Session, token: string, events: Partial<InstallEvents> = {}): Promise<string> {
  session.channels.enter('resolve');
  const version = parseVersion(token, session.now);
  return getInstaller(session, resolveSource(version, session.policy), events);
}
