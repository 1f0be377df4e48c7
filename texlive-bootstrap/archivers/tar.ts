// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { createReadStream, createWriteStream } from 'fs';
import { chmod, mkdir, realpath, rm, stat, symlink, utimes } from 'fs/promises';
import { dirname, isAbsolute, join, normalize, relative, resolve, sep } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { extract as tarExtract, Headers } from 'tar-stream';
import { createGunzip } from 'zlib';
import { ProgressTrackingStream } from '../fs/streams';
import { i } from '../i18n';
import { UnpackEvents } from '../interfaces/events';
import { Session } from '../session';
import { ExtractFailed } from '../util/exceptions';

export interface UnpackOptions {
  /**
   * Strip # directories from the path
   *
   * The installer archive wraps everything in an `install-tl-YYYYMMDD` folder.
  */
  strip?: number;
}

/**
 * Returns the path with prefixCount path elements removed, and directory
 * separators normalized to a single forward slash.
 * If nothing is left after stripping, undefined is returned.
 */
export function stripPath(path: string, prefixCount: number): string | undefined {
  const elements = path.split(/[\\/]+/).filter(each => each.length > 0);
  if (elements.length <= prefixCount) {
    return undefined;
  }
  return elements.slice(prefixCount).join('/');
}

/** resolves an entry name below the output folder; entries escaping it are rejected */
function destinationOf(output: string, name: string, options: UnpackOptions): string | undefined {
  const stripped = stripPath(name, options.strip ?? 0);
  if (stripped === undefined) {
    return undefined;
  }
  const relative = normalize(stripped);
  if (isAbsolute(relative) || relative === '..' || relative.startsWith(`..${sep}`)) {
    throw new Error(i`entry '${name}' points outside of the destination`);
  }
  return join(output, relative);
}

function isInside(root: string, path: string) {
  const rel = relative(root, path);
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

/**
 * Creates the folder an entry goes into and returns its real path; a folder
 * reached through an earlier link that leaves `root` is rejected.
 */
async function parentOf(root: string, name: string, destination: string): Promise<string> {
  const parent = dirname(destination);
  await mkdir(parent, { recursive: true });
  const real = await realpath(parent);
  if (!isInside(root, real)) {
    throw new Error(i`entry '${name}' points outside of the destination`);
  }
  return real;
}

/** `root` is the real path of `output` */
async function unpackEntry(session: Session, archive: string, output: string, root: string, events: Partial<UnpackEvents>, options: UnpackOptions, header: Headers, stream: Readable): Promise<boolean> {
  const destination = destinationOf(output, header.name, options);
  if (!destination) {
    stream.resume();
    return false;
  }

  switch (header.type) {
    case 'directory':
      await parentOf(root, header.name, destination);
      await mkdir(destination, { recursive: true });
      stream.resume();
      return false;

    case 'symlink':
      if (header.linkname) {
        if (!isInside(root, resolve(await parentOf(root, header.name, destination), header.linkname))) {
          throw new Error(i`link '${header.name}' points outside of the destination (${header.linkname})`);
        }
        await rm(destination, { force: true });
        await symlink(header.linkname, destination);
      }
      stream.resume();
      return true;

    case 'file':
    case 'contiguous-file':
      break;

    default:
      session.channels.warning(i`in ${archive} skipping ${header.name} because it is a ${header.type ?? ''}`);
      stream.resume();
      return false;
  }

  await parentOf(root, header.name, destination);
  await pipeline(stream, createWriteStream(destination, { mode: header.mode }));
  if (header.mode !== undefined) {
    // the umask applies at creation time; restore the archived permission bits.
    await chmod(destination, header.mode & 0o7777);
  }
  if (header.mtime) {
    await utimes(destination, header.mtime, header.mtime);
  }
  events.unpackFileComplete?.({ archive, destination, path: header.name });
  return true;
}

/**
 * Expands a gzip-compressed tar archive into `output`.
 *
 * @returns the number of files and links written
 */
export async function unpackTarGz(session: Session, archive: string, output: string, events: Partial<UnpackEvents>, options: UnpackOptions = {}): Promise<number> {
  session.channels.debug(`unpacking TAR.GZ ${archive} => ${output}`);
  events.unpackArchiveStart?.(archive, output);

  let written = 0;
  try {
    const archiveSize = (await stat(archive)).size;
    const archiveProgress = new ProgressTrackingStream(archiveSize);
    const extractor = tarExtract();
    await mkdir(output, { recursive: true });
    const root = await realpath(output);

    extractor.on('entry', (header, stream, next) => {
      void unpackEntry(session, archive, output, root, events, options, header, stream).then((wrote) => {
        if (wrote) {
          written++;
        }
        next();
      }, next);
    });

    await pipeline(createReadStream(archive), archiveProgress, createGunzip(), extractor);
    session.channels.debug(`unpacked ${written} entries (${archiveProgress.currentPercentage}% of ${archive})`);
  } catch (e) {
    throw new ExtractFailed(archive, output, e instanceof Error ? e.message : String(e), { cause: e });
  }

  if (written === 0) {
    throw new ExtractFailed(archive, output, i`the archive contains no files`);
  }
  return written;
}
