// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { i } from '../i18n';

/** the pipeline stage an error was raised from */
export type Stage = 'resolve' | 'fetch' | 'extract' | 'install' | 'locate' | 'register';

export type ErrorKind =
  'InvalidVersion' |
  'FetchFailed' |
  'IntegrityMismatch' |
  'ExtractFailed' |
  'ProfileMissing' |
  'InstallerMissing' |
  'InstallationFailed' |
  'BinaryNotFound' |
  'PathMisconfigured' |
  'PathRegistrationFailed';

export type ErrorContext = Record<string, string | number | boolean | Array<string> | undefined>;

/** A fatal failure of one bootstrap stage. */
export abstract class BootstrapError extends Error {
  constructor(readonly kind: ErrorKind, readonly stage: Stage, message: string, readonly context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
  }
}

export class InvalidVersion extends BootstrapError {
  constructor(public token: string, reason: string) {
    super('InvalidVersion', 'resolve', i`'${token}' is not a valid version: ${reason}`, { version: token });
  }
}

export class FetchFailed extends BootstrapError {
  constructor(public url: string, public attempts: number, reason: string, options?: { cause?: unknown }) {
    super('FetchFailed', 'fetch', i`Unable to download '${url}' after ${attempts} attempt(s): ${reason}`, { url, attempts }, options);
  }
}

export class IntegrityMismatch extends BootstrapError {
  constructor(public file: string, public algorithm: string, public expected: string, public actual: string) {
    super('IntegrityMismatch', 'fetch', i`Downloaded file '${file}' did not have the correct hash (${algorithm}: expected ${expected}, got ${actual})`, { file, algorithm, expected, actual });
  }
}

export class ExtractFailed extends BootstrapError {
  constructor(public archive: string, public destination: string, reason: string, options?: { cause?: unknown }) {
    super('ExtractFailed', 'extract', i`Unable to unpack '${archive}' into '${destination}': ${reason}`, { archive, destination }, options);
  }
}

export class ProfileMissing extends BootstrapError {
  constructor(public profile: string) {
    super('ProfileMissing', 'install', i`Installation profile '${profile}' does not exist`, { profile });
  }
}

export class InstallerMissing extends BootstrapError {
  constructor(message: string, public attempted: Array<string>) {
    super('InstallerMissing', 'install', message, { attempted });
  }
}

export class InstallationFailed extends BootstrapError {
  constructor(public exitCode: number | null, public output: string, reason?: string) {
    super('InstallationFailed', 'install', reason ?? i`The installer exited with status ${exitCode === null ? 'unknown' : exitCode}`, { exitCode: exitCode ?? undefined, output });
  }
}

export class BinaryNotFound extends BootstrapError {
  constructor(public version: string, public attempted: Array<string>) {
    super('BinaryNotFound', 'locate', i`No directory containing an executable entry point was found for version '${version}' (searched ${attempted.length} location(s))`, { version, attempted });
  }
}

export class PathMisconfigured extends BootstrapError {
  constructor(public directory: string, public searchPath: string) {
    super('PathMisconfigured', 'register', i`Link directory '${directory}' is not on the search path (${searchPath})`, { directory, searchPath });
  }
}

export class PathRegistrationFailed extends BootstrapError {
  constructor(public directory: string, reason?: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super('PathRegistrationFailed', 'register', reason === undefined ?
      i`Binaries were found in '${directory}' but could not be made reachable through the search path; add it to PATH manually` :
      i`Binaries were found in '${directory}' but could not be linked: ${reason}`, { directory, ...context }, options);
  }
}
