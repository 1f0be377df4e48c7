// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Dirent } from 'fs';
import { readdir, realpath, stat } from 'fs/promises';
import { isAbsolute, join, relative, resolve } from 'path';
import { isMatch } from 'micromatch';
import { homeInstallRoots } from '../constants';
import { i } from '../i18n';
import { Session } from '../session';
import { isExecutableFile } from '../util/exec-cmd';
import { BinaryNotFound } from '../util/exceptions';
import { formatVersion, VersionSpec } from '../version';

async function isDirectory(path: string) {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function listDirectory(path: string): Promise<Array<Dirent>> {
  try {
    return await readdir(path, { withFileTypes: true });
  } catch {
    return [];
  }
}

/** a candidate qualifies only if it is a directory AND holds an executable entry point */
export async function isValidBinDirectory(session: Session, path: string): Promise<boolean> {
  return await isDirectory(path) && await isExecutableFile(join(path, session.policy.entryPoint));
}

/** installation roots in search order: the override first, then the known roots, then home-folder variants */
export function installRoots(session: Session): Array<string> {
  const { installRoot, knownRoots, homeFolder } = session.policy;
  const roots = [
    ...(installRoot ? [installRoot] : []),
    ...knownRoots,
    ...(homeFolder ? homeInstallRoots.map(each => join(homeFolder, each)) : []),
  ].map(each => resolve(each));
  return [...new Set(roots)];
}

/** year-named subdirectories of a root, newest first */
async function releaseYears(root: string): Promise<Array<number>> {
  return (await listDirectory(root))
    .filter(each => yearName.test(each.name))
    .map(each => Number.parseInt(each.name, 10))
    .sort((a, b) => b - a);
}

/** `<root>/<year>/bin/<arch>` directories, architectures in name order */
async function archDirectories(root: string, year: number): Promise<Array<string>> {
  const bin = join(root, `${year}`, 'bin');
  return (await listDirectory(bin))
    .map(each => each.name)
    .sort()
    .map(each => join(bin, each));
}

/**
 * Builds the ranked candidate list from the known installation roots.
 *
 * A specific year narrows each root to that year. For `latest`, year-named
 * folders are ordered by the year in their name, descending.
 */
export async function candidateDirectories(session: Session, version: VersionSpec): Promise<Array<string>> {
  const candidates = new Array<string>();
  for (const root of installRoots(session)) {
    const years = version.kind === 'year' ? [version.year] : await releaseYears(root);
    for (const year of years) {
      candidates.push(...await archDirectories(root, year));
    }
  }
  return candidates;
}

export function searchPattern(version: VersionSpec) {
  const year = version.kind === 'year' ? `${version.year}` : '[0-9][0-9][0-9][0-9]';
  return `**/texlive/${year}/bin/*`;
}

const yearName = /^[0-9]{4}$/;

/** name order, except that for `latest` year-named folders come newest first */
function siblingOrder(version: VersionSpec, a: string, b: string) {
  if (version.kind === 'latest' && yearName.test(a) && yearName.test(b)) {
    return Number.parseInt(b, 10) - Number.parseInt(a, 10);
  }
  return a.localeCompare(b);
}

function isExcluded(path: string, excludes: ReadonlyArray<string>) {
  return excludes.some(each => {
    const rel = relative(resolve(each), path);
    return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
  });
}

/**
 * Walks the filesystem below the search root looking for a directory laid out
 * like an installation. The walk is depth-first in name order (newest year
 * first for `latest`), bounded by the
 * policy's depth and directory budget, does not follow symlinked folders, and
 * stops at the first valid match.
 */
export async function searchFilesystem(session: Session, version: VersionSpec): Promise<string | undefined> {
  const { searchRoot, searchDepth, searchBudget, searchExcludes } = session.policy;
  const root = resolve(searchRoot);
  const pattern = searchPattern(version);
  let visited = 0;
  let exhausted = false;

  const visit = async (folder: string, depth: number): Promise<string | undefined> => {
    if (depth >= searchDepth) {
      return undefined;
    }
    const entries = (await listDirectory(folder)).filter(each => each.isDirectory()).sort((a, b) => siblingOrder(version, a.name, b.name));
    for (const entry of entries) {
      if (visited >= searchBudget) {
        exhausted = true;
        return undefined;
      }
      visited++;
      const path = join(folder, entry.name);
      if (isExcluded(path, searchExcludes)) {
        continue;
      }
      if (isMatch(relative(root, path), pattern, { dot: true }) && await isValidBinDirectory(session, path)) {
        return path;
      }
      const found = await visit(path, depth + 1);
      if (found) {
        return found;
      }
    }
    return undefined;
  };

  session.channels.debug(`Searching ${root} (depth ${searchDepth}) for ${pattern}`);
  const found = await visit(root, 0);
  if (exhausted) {
    session.channels.warning(i`Filesystem search stopped after visiting ${searchBudget} directories`);
  }
  return found;
}

/**
 * Finds the folder holding the installed executables.
 *
 * @returns the canonical (symlink-resolved) path of the first valid candidate
 */
export async function locateBinaries(session: Session, version: VersionSpec): Promise<string> {
  const attempted = new Array<string>();
  for (const candidate of await candidateDirectories(session, version)) {
    attempted.push(candidate);
    if (await isValidBinDirectory(session, candidate)) {
      session.channels.debug(`Found binaries in known location ${candidate}`);
      return realpath(candidate);
    }
  }

  session.channels.warning(i`No binaries found in the known installation roots; searching the filesystem`);
  attempted.push(join(resolve(session.policy.searchRoot), searchPattern(version)));
  const found = await searchFilesystem(session, version);
  if (found) {
    session.channels.debug(`Found binaries by searching: ${found}`);
    return realpath(found);
  }

  throw new BinaryNotFound(formatVersion(version), attempted);
}
