// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { ChildProcessByStdio, spawn, SpawnOptions } from 'child_process';
import { constants } from 'fs';
import { access, stat } from 'fs/promises';
import { delimiter, isAbsolute, join, resolve } from 'path';
import { Readable } from 'stream';

export interface ExecOptions extends Pick<SpawnOptions, 'cwd' | 'env'> {
  onStdOutData?(chunk: string): void;
  onStdErrData?(chunk: string): void;
}

export interface ExecResult {
  stdout: string;
  stderr: string;

  /**
   * Union of stdout and stderr.
   */
  log: string;
  /** set when the process could not be started at all */
  error: Error | null;
  code: number | null;
  command: string,
  args: Array<string>,
}

/**
 * Runs a command to completion, collecting its output.
 *
 * Never rejects: a command that cannot be spawned resolves with `error` set
 * and a null `code`. Bare command names are looked up on `options.env.PATH`.
 */
export function execute(command: string, args: Array<string>, options: ExecOptions = {}): Promise<ExecResult> {
  return new Promise((resolvePromise) => {
    let err = '';
    let out = '';
    let all = '';
    let settled = false;
    const finish = (code: number | null, error: Error | null) => {
      if (!settled) {
        settled = true;
        resolvePromise({ stdout: out, stderr: err, log: all, error, code, command, args });
      }
    };

    let cp: ChildProcessByStdio<null, Readable, Readable>;
    try {
      cp = spawn(command, args, { cwd: options.cwd, env: options.env, stdio: ['ignore', 'pipe', 'pipe'] });
    } catch (e) {
      // some lookup failures (e.g. ENOTDIR) are thrown rather than emitted
      finish(null, e instanceof Error ? e : new Error(String(e)));
      return;
    }
    cp.stdout.setEncoding('utf8');
    cp.stderr.setEncoding('utf8');
    cp.stderr.on('data', (chunk: string) => {
      err += chunk;
      all += chunk;
      options.onStdErrData?.(chunk);
    });
    cp.stdout.on('data', (chunk: string) => {
      out += chunk;
      all += chunk;
      options.onStdOutData?.(chunk);
    });

    cp.on('error', (error) => finish(null, error));
    cp.on('close', (code) => finish(code, null));
  });
}

/** true if `path` is a regular file (following symlinks) with an execute bit we may use */
export async function isExecutableFile(path: string): Promise<boolean> {
  try {
    const s = await stat(path);
    if (!s.isFile()) {
      return false;
    }
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export function splitSearchPath(searchPath: string): Array<string> {
  return searchPath.split(delimiter).filter(each => each.length > 0).map(each => resolve(each));
}

/** finds a command the way the shell would, returning its full path */
export async function findOnPath(name: string, searchPath: string): Promise<string | undefined> {
  if (isAbsolute(name) || name.includes('/')) {
    return await isExecutableFile(name) ? resolve(name) : undefined;
  }
  for (const folder of splitSearchPath(searchPath)) {
    const candidate = join(folder, name);
    if (await isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return undefined;
}
