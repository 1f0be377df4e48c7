// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { resolve } from 'path';
import { parseDocument } from 'yaml';
import * as constants from './constants';
import { i } from './i18n';

/**
 * The immutable configuration every stage of the bootstrap reads from.
 *
 * Built once per invocation from the defaults, an optional policy file,
 * the environment and the command line (in increasing precedence).
 */
export interface BootstrapPolicy {
  /** rolling mirror for the current release */
  readonly mirror: string;
  /** root of the year-keyed historic archive */
  readonly archiveMirror: string;
  readonly archiveName: string;
  /** appended as `ts=<token>` to download URLs unless empty or `0` */
  readonly cacheBuster: string;
  readonly attempts: number;
  readonly retryDelay: number;
  readonly requestTimeout: number;
  /** expected archive digest; empty means the check is skipped */
  readonly checksum: string;
  /** where the archive is written; defaults to `<workDirectory>/<archiveName>` */
  readonly output?: string;

  readonly profile: string;
  readonly workDirectory: string;
  readonly installerDirectory: string;
  /** interpreter the installer script is run with; empty runs it directly */
  readonly interpreter: string;

  /** installation-root override, searched before the known roots */
  readonly installRoot?: string;
  readonly knownRoots: ReadonlyArray<string>;
  readonly homeFolder?: string;
  readonly searchRoot: string;
  readonly searchDepth: number;
  readonly searchBudget: number;
  readonly searchExcludes: ReadonlyArray<string>;

  readonly entryPoint: string;
  readonly versionArgument: string;
  readonly pathHelper: string;
  readonly linkDirectory: string;

  readonly environment: Readonly<NodeJS.ProcessEnv>;
}

export type PolicySettings = { -readonly [K in keyof BootstrapPolicy]?: BootstrapPolicy[K] };

const stringSettings = ['mirror', 'archiveMirror', 'archiveName', 'cacheBuster', 'checksum', 'output', 'profile', 'workDirectory', 'installerDirectory', 'interpreter', 'installRoot', 'homeFolder', 'searchRoot', 'entryPoint', 'versionArgument', 'pathHelper', 'linkDirectory'] as const;
const numberSettings = ['attempts', 'retryDelay', 'requestTimeout', 'searchDepth', 'searchBudget'] as const;
const listSettings = ['knownRoots', 'searchExcludes'] as const;

export function defaultPolicy(environment: Readonly<NodeJS.ProcessEnv> = process.env, cwd = process.cwd()): BootstrapPolicy {
  return {
    mirror: constants.defaultMirror,
    archiveMirror: constants.defaultArchiveMirror,
    archiveName: constants.defaultArchiveName,
    cacheBuster: constants.defaultCacheBuster,
    attempts: constants.downloadAttempts,
    retryDelay: constants.retryDelay,
    requestTimeout: constants.requestTimeout,
    checksum: '',
    profile: constants.defaultProfile,
    workDirectory: cwd,
    installerDirectory: constants.installerDirectory,
    interpreter: constants.installerInterpreter,
    knownRoots: constants.knownInstallRoots,
    homeFolder: environment['HOME'] || homedir(),
    searchRoot: constants.searchRoot,
    searchDepth: constants.searchDepth,
    searchBudget: constants.searchBudget,
    searchExcludes: constants.searchExcludes,
    entryPoint: constants.entryPoint,
    versionArgument: constants.versionArgument,
    pathHelper: constants.pathHelper,
    linkDirectory: constants.linkDirectory,
    environment,
  };
}

/** settings taken from the `TL_*` environment variables */
export function environmentSettings(environment: Readonly<NodeJS.ProcessEnv>): PolicySettings {
  const settings: PolicySettings = {};
  const text = (name: string) => {
    const value = environment[name];
    return value === undefined || value === '' ? undefined : value;
  };

  settings.profile = text('TL_PROFILE');
  settings.installRoot = text('TL_ROOT');
  settings.mirror = text('TL_MIRROR');
  settings.archiveMirror = text('TL_ARCHIVE_MIRROR');
  settings.archiveName = text('TL_INSTALL_ARCHIVE');
  settings.cacheBuster = text('TL_CACHE_BUSTER');
  settings.workDirectory = text('TL_WORKDIR');
  settings.linkDirectory = text('TL_LINK_DIR');
  // an empty checksum is meaningful: it disables verification
  settings.checksum = environment['TL_CHECKSUM'];
  const retries = text('TL_RETRIES');
  if (retries !== undefined) {
    settings.attempts = parseCount('TL_RETRIES', retries);
  }
  return settings;
}

export function parseCount(name: string, value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || n < 1) {
    throw new Error(i`${name} must be a positive whole number (got '${value}')`);
  }
  return n;
}

/** parses a YAML policy file; unknown keys and mistyped values are rejected */
export function parsePolicy(text: string, filename: string): PolicySettings {
  const document = parseDocument(text);
  if (document.errors.length > 0) {
    throw new Error(i`Unable to parse policy file '${filename}': ${document.errors[0].message}`);
  }

  const content: unknown = document.toJS();
  if (content === null || content === undefined) {
    return {};
  }
  if (typeof content !== 'object' || Array.isArray(content)) {
    throw new Error(i`Policy file '${filename}' must contain a mapping`);
  }

  const settings: PolicySettings = {};
  for (const [key, value] of Object.entries(content)) {
    if (isOneOf(key, stringSettings)) {
      if (typeof value !== 'string') {
        throw new Error(i`${key} in '${filename}' must be a string`);
      }
      settings[key] = value;
    } else if (isOneOf(key, numberSettings)) {
      if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
        throw new Error(i`${key} in '${filename}' must be a non-negative integer`);
      }
      settings[key] = value;
    } else if (isOneOf(key, listSettings)) {
      if (!Array.isArray(value) || !value.every((each): each is string => typeof each === 'string')) {
        throw new Error(i`${key} in '${filename}' must be an array of strings`);
      }
      settings[key] = value;
    } else {
      throw new Error(i`Unknown setting '${key}' in '${filename}'`);
    }
  }
  return settings;
}

export async function loadPolicyFile(filename: string): Promise<PolicySettings> {
  return parsePolicy(await readFile(filename, 'utf8'), filename);
}

function isOneOf<T extends string>(key: string, keys: ReadonlyArray<T>): key is T {
  return keys.some(each => each === key);
}

/** layers settings over a base policy; undefined values do not override */
export function createPolicy(base: BootstrapPolicy, ...layers: Array<PolicySettings>): BootstrapPolicy {
  const result: PolicySettings = { ...base };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(result, { [key]: value });
      }
    }
  }
  const policy = { ...base, ...result };
  if (policy.attempts < 1) {
    throw new Error(i`attempts must be at least 1`);
  }
  return Object.freeze({
    ...policy,
    workDirectory: resolve(policy.workDirectory),
    knownRoots: Object.freeze([...policy.knownRoots]),
    searchExcludes: Object.freeze([...policy.searchExcludes]),
  });
}
