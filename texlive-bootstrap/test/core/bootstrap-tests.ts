// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { rejects, strict } from 'assert';
import { existsSync, mkdirSync, realpathSync } from 'fs';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { install } from '../../bootstrap';
import { PolicySettings } from '../../policy';
import { BinaryNotFound, InstallationFailed, IntegrityMismatch, InvalidVersion } from '../../util/exceptions';
import { installerArchive, LocalServer, respondWith, serve } from './fixtures';
import { SuiteLocal } from './SuiteLocal';

describe('Bootstrap', () => {
  const local = new SuiteLocal();
  const servers = new Array<LocalServer>();

  after(async () => {
    await Promise.all(servers.map(each => each.close()));
    await local.after();
  });

  async function mirror(installerBody?: string) {
    const server = await serve(respondWith(await installerArchive(installerBody)));
    servers.push(server);
    return server;
  }

  /** a sandbox with a profile in its work folder */
  async function sandbox(name: string, server: LocalServer, settings: PolicySettings = {}) {
    const root = local.folder(name);
    const session = local.session(root, { mirror: server.url, archiveMirror: server.url, ...settings });
    await writeFile(join(session.policy.workDirectory, 'texlive.profile'), 'selected_scheme scheme-basic\n');
    return { root, session };
  }

  it('verifies an entry point that is reachable right after installation', async () => {
    const server = await mirror();
    const { root, session } = await sandbox('scenario-a', server);
    local.fakeTex(join(root, 'links'));

    const outcome = await install(session, 'latest');

    strict.deepEqual(outcome, { kind: 'Verified', version: 'TeX 3.141592653 (TeX Live 2024)' });
    strict.deepEqual(server.requests, ['/install-tl-unx.tar.gz']);
    strict.ok(existsSync(join(session.installerFolder, 'install-tl')));
  });

  it('links the located binaries when the entry point is not reachable', async () => {
    const server = await mirror();
    const texlive = join(local.tempFolder, 'scenario-b-root');
    const bin = join(texlive, '2021', 'bin', 'x86_64-linux');
    local.fakeTex(bin);
    const { root, session } = await sandbox('scenario-b', server, { installRoot: texlive });
    mkdirSync(join(root, 'links'));

    const outcome = await install(session, '2021');

    strict.deepEqual(outcome, {
      kind: 'RegisteredViaLinks',
      version: 'TeX 3.141592653 (TeX Live 2024)',
      directory: realpathSync(bin),
      links: [join(root, 'links', 'tex')],
    });
    strict.deepEqual(server.requests, ['/2021/tlnet-final/install-tl-unx.tar.gz']);
  });

  it('fails when no installation can be found', async () => {
    const server = await mirror();
    const { session } = await sandbox('scenario-c', server);

    const outcome = await install(session, '2021');

    strict.equal(outcome.kind, 'Failed');
    strict.ok(outcome.kind === 'Failed' && outcome.error instanceof BinaryNotFound);
    strict.equal(session.channels.stage, 'locate');
  });

  it('rejects an invalid version before fetching anything', async () => {
    const server = await mirror();
    const { session } = await sandbox('scenario-d', server);

    const outcome = await install(session, '1999');

    strict.ok(outcome.kind === 'Failed' && outcome.error instanceof InvalidVersion && outcome.error.token === '1999');
    strict.deepEqual(server.requests, []);
  });

  it('uses an installer that is already unpacked', async () => {
    const server = await mirror();
    const { root, session } = await sandbox('present', server);
    local.script(join(session.installerFolder, 'install-tl'), 'exit 0');
    local.fakeTex(join(root, 'links'));

    const outcome = await install(session, 'latest');

    strict.equal(outcome.kind, 'Verified');
    strict.deepEqual(server.requests, []);
  });

  it('does not unpack an archive with the wrong digest', async () => {
    const server = await mirror();
    const { session } = await sandbox('mismatch', server, { checksum: `sha256:${'1'.repeat(64)}` });

    const outcome = await install(session, 'latest');

    strict.ok(outcome.kind === 'Failed' && outcome.error instanceof IntegrityMismatch);
    strict.equal(existsSync(session.installerFolder), false);
    strict.equal(existsSync(session.archiveFile), false);
  });

  it('rejects a malformed checksum before downloading', async () => {
    const server = await mirror();
    const { session } = await sandbox('malformed', server, { checksum: 'md5:abc' });

    await rejects(install(session, 'latest'), {
      message: `'md5:abc' is not a valid checksum; expected <sha256|sha384|sha512>:<hex> or a sha256 hex digest`,
    });
    strict.deepEqual(server.requests, []);
  });

  it('reports a failing installer', async () => {
    const server = await mirror('echo "cannot reach repository"\nexit 1');
    const { session } = await sandbox('installer-fails', server);

    const outcome = await install(session, 'latest');

    strict.ok(outcome.kind === 'Failed' && outcome.error instanceof InstallationFailed && outcome.error.exitCode === 1 && outcome.error.output === 'cannot reach repository\n');
  });
});
