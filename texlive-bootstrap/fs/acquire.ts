// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { createWriteStream } from 'fs';
import { mkdir, rename, rm } from 'fs/promises';
import { dirname } from 'path';
import { pipeline } from 'stream/promises';
import { setTimeout as delay } from 'timers/promises';
import { i } from '../i18n';
import { DownloadEvents } from '../interfaces/events';
import { Session } from '../session';
import { FetchFailed, IntegrityMismatch } from '../util/exceptions';
import { Hash, hashFile } from '../util/hash';
import { SourceLocation } from '../version';
import { describeFailure, getStream, isTransient } from './https';

export interface AcquireOptions {
  /** when present, the download must match this digest */
  hash?: Hash;
}

function checkScheme(url: string, attempts: number) {
  let protocol: string;
  try {
    protocol = new URL(url).protocol;
  } catch (e) {
    throw new FetchFailed(url, attempts, i`the address is not a valid URL`, { cause: e });
  }
  // https is all that we know at the moment (plain http is tolerated for local mirrors).
  if (protocol !== 'https:' && protocol !== 'http:') {
    throw new FetchFailed(url, attempts, i`the '${protocol}' scheme is not supported`);
  }
}

async function download(session: Session, url: string, target: string, events: Partial<DownloadEvents>) {
  const { attempts, retryDelay, requestTimeout } = session.policy;
  for (let attempt = 1; ; attempt++) {
    try {
      session.channels.debug(`Download '${url}' attempt ${attempt}/${attempts}`);
      const stream = getStream(url, { timeout: requestTimeout });
      stream.on('downloadProgress', (progress: { percent: number }) => events.downloadProgress?.(url, target, Math.round(progress.percent * 1000) / 10));
      await pipeline(stream, createWriteStream(target));
      return;
    } catch (e) {
      await rm(target, { force: true });
      const reason = describeFailure(e);
      if (!isTransient(e) || attempt >= attempts) {
        throw new FetchFailed(url, attempt, reason, { cause: e });
      }
      session.channels.warning(i`Download of '${url}' failed (${reason}); retrying (${attempt + 1}/${attempts})`);
      events.downloadRetry?.(url, attempt + 1, reason);
      await delay(retryDelay);
    }
  }
}

async function verify(session: Session, file: string, destination: string, events: Partial<DownloadEvents>, hash?: Hash) {
  if (!hash) {
    session.channels.warning(i`No checksum supplied; assuming '${destination}' is correct`);
    return;
  }

  events.hashVerifyStart?.(destination);
  const actual = await hashFile(file, hash.algorithm);
  if (actual !== hash.value) {
    await rm(file, { force: true });
    throw new IntegrityMismatch(destination, hash.algorithm, hash.value, actual);
  }
  session.channels.debug(`Acquire '${destination}': downloaded file hash matches specified hash`);
  events.hashVerifyComplete?.(destination);
}

/**
 * Downloads the installer archive for a source location to `destination`.
 *
 * Transient failures are retried up to the policy's attempt count. The file is
 * only moved to `destination` once it has been downloaded completely and, if a
 * hash was given, verified.
 */
export async function acquireInstallerArchive(session: Session, source: SourceLocation, destination: string, events: Partial<DownloadEvents>, options: AcquireOptions = {}): Promise<string> {
  const url = source.archiveUrl;
  checkScheme(url, 0);

  await mkdir(dirname(destination), { recursive: true });
  const partial = `${destination}.partial`;

  session.channels.message(i`Fetching installer from ${url}`);
  events.downloadStart?.(url, destination);
  await download(session, url, partial, events);
  await verify(session, partial, destination, events, options.hash);

  await rename(partial, destination);
  events.downloadComplete?.(destination);
  session.channels.debug(`Acquire '${destination}': downloading file successful`);
  return destination;
}
