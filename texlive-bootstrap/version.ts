// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { archiveRepositoryTemplate, firstArchivedYear, latestVersion } from './constants';
import { i } from './i18n';
import { BootstrapPolicy } from './policy';
import { InvalidVersion } from './util/exceptions';

export type VersionSpec =
  { readonly kind: 'latest' } |
  { readonly kind: 'year', readonly year: number };

export interface SourceLocation {
  readonly version: VersionSpec;
  /** the package repository handed to the installer */
  readonly repository: string;
  /** where the installer archive is downloaded from */
  readonly archiveUrl: string;
}

export function formatVersion(version: VersionSpec) {
  return version.kind === 'latest' ? latestVersion : `${version.year}`;
}

/**
 * Validates a version token. Only `latest` or a four digit year between the
 * first archived release and the current year are accepted.
 */
export function parseVersion(token: string, now = new Date()): VersionSpec {
  if (token === latestVersion) {
    const latest: VersionSpec = { kind: 'latest' };
    return Object.freeze(latest);
  }

  if (!/^[0-9]{4}$/.test(token)) {
    throw new InvalidVersion(token, i`expected '${latestVersion}' or a four digit year`);
  }

  const year = Number.parseInt(token, 10);
  const currentYear = now.getFullYear();
  if (year < firstArchivedYear || year > currentYear) {
    throw new InvalidVersion(token, i`the year must be between ${firstArchivedYear} and ${currentYear}`);
  }

  const spec: VersionSpec = { kind: 'year', year };
  return Object.freeze(spec);
}

function join(base: string, path: string) {
  return `${base.replace(/\/+$/, '')}/${path}`;
}

/** appends the cache-busting query parameter, unless the token is empty or `0` */
export function appendCacheBuster(url: string, token: string) {
  if (!token || token === '0') {
    return url;
  }
  return `${url}${url.includes('?') ? '&' : '?'}ts=${encodeURIComponent(token)}`;
}

/** derives the repository and archive location for a version; no network access happens here. */
export function resolveSource(version: VersionSpec, policy: Pick<BootstrapPolicy, 'mirror' | 'archiveMirror' | 'archiveName' | 'cacheBuster'>): SourceLocation {
  const repository = version.kind === 'latest' ?
    policy.mirror.replace(/\/+$/, '') :
    join(policy.archiveMirror, archiveRepositoryTemplate.replace('{year}', `${version.year}`));

  const source: SourceLocation = {
    version,
    repository,
    archiveUrl: appendCacheBuster(join(repository, policy.archiveName), policy.cacheBuster),
  };
  return Object.freeze(source);
}
