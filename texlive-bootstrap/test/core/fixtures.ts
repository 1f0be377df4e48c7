// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { createHash } from 'crypto';
import { createServer, IncomingMessage, ServerResponse } from 'http';
import { Headers, pack as tarPack } from 'tar-stream';
import { gzipSync } from 'zlib';

export interface TarEntry {
  name: string;
  content?: string;
  mode?: number;
  type?: Headers['type'];
  linkname?: string;
}

/** builds a gzip-compressed tar archive in memory */
export async function tarGz(entries: Array<TarEntry>): Promise<Buffer> {
  const pack = tarPack();
  for (const each of entries) {
    pack.entry({ name: each.name, mode: each.mode ?? 0o644, type: each.type ?? 'file', linkname: each.linkname, mtime: new Date(1700000000000) }, each.content ?? '');
  }
  pack.finalize();

  const chunks = new Array<Buffer>();
  for await (const chunk of pack) {
    chunks.push(Buffer.from(chunk));
  }
  return gzipSync(Buffer.concat(chunks));
}

export function sha256(content: Buffer) {
  return createHash('sha256').update(content).digest('hex');
}

/** an installer archive laid out the way the vendor ships it */
export function installerArchive(installerBody = 'echo installing') {
  return tarGz([
    { name: 'install-tl-20240312/', type: 'directory', mode: 0o755 },
    { name: 'install-tl-20240312/install-tl', content: `#!/bin/sh\n${installerBody}\n`, mode: 0o755 },
    { name: 'install-tl-20240312/LICENSE.TL', content: 'license text\n' },
  ]);
}

export type Handler = (request: IncomingMessage, response: ServerResponse) => void;

export interface LocalServer {
  /** `http://127.0.0.1:<port>` */
  readonly url: string;
  /** request paths in the order they arrived */
  readonly requests: Array<string>;
  close(): Promise<void>;
}

/** an in-process http server standing in for a mirror */
export function serve(handler: Handler): Promise<LocalServer> {
  const requests = new Array<string>();
  const server = createServer((request, response) => {
    requests.push(request.url ?? '');
    handler(request, response);
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('server is not listening on a TCP port'));
        return;
      }
      resolve({
        url: `http://127.0.0.1:${address.port}`,
        requests,
        close: () => new Promise<void>((done, fail) => {
          server.closeAllConnections();
          server.close((err) => err ? fail(err) : done());
        }),
      });
    });
  });
}

/** answers every request with the given status codes in turn, then with the body */
export function respondWith(body: Buffer, ...failures: Array<number>): Handler {
  return (_request, response) => {
    const status = failures.shift();
    if (status !== undefined) {
      response.writeHead(status);
      response.end();
      return;
    }
    response.writeHead(200, { 'content-type': 'application/gzip', 'content-length': body.length });
    response.end(body);
  };
}
