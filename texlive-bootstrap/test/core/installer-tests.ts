// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { rejects, strict } from 'assert';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { installerArguments, locateInstaller, runInstaller } from '../../installers/install-tl';
import { Session } from '../../session';
import { InstallationFailed, InstallerMissing, ProfileMissing } from '../../util/exceptions';
import { SourceLocation } from '../../version';
import { SuiteLocal } from './SuiteLocal';

const source: SourceLocation = {
  version: { kind: 'year', year: 2019 },
  repository: 'https://archive.example/historic/systems/texlive/2019/tlnet-final',
  archiveUrl: 'https://archive.example/historic/systems/texlive/2019/tlnet-final/install-tl-unx.tar.gz',
};

describe('InstallerDriver', () => {
  const local = new SuiteLocal();
  after(local.after.bind(local));

  async function withProfile(session: Session) {
    const profile = join(session.policy.workDirectory, 'texlive.profile');
    await writeFile(profile, 'selected_scheme scheme-basic\n');
    return profile;
  }

  function installer(session: Session, body: string) {
    return local.script(join(session.installerFolder, 'install-tl'), body);
  }

  it('builds the non-interactive argument list', () => {
    strict.deepEqual(installerArguments('/w/install-tl/install-tl', '/w/texlive.profile', source), [
      '/w/install-tl/install-tl',
      '--profile=/w/texlive.profile',
      '--location=https://archive.example/historic/systems/texlive/2019/tlnet-final',
    ]);
  });

  it('requires the profile', async () => {
    const session = local.session(local.folder('no-profile'));
    installer(session, 'exit 0');

    await rejects(runInstaller(session, source, {}), (e: unknown) =>
      e instanceof ProfileMissing && e.profile === join(session.policy.workDirectory, 'texlive.profile') && e.stage === 'install');
  });

  it('requires the installer', async () => {
    const session = local.session(local.folder('no-installer'));
    await withProfile(session);

    strict.equal(await locateInstaller(session), undefined);
    await rejects(runInstaller(session, source, {}), (e: unknown) =>
      e instanceof InstallerMissing && e.attempted.length === 2 && e.attempted[0] === join(session.installerFolder, 'install-tl'));
  });

  it('requires the interpreter', async () => {
    const session = local.session(local.folder('no-perl'), { interpreter: 'perl' });
    await withProfile(session);
    installer(session, 'exit 0');

    await rejects(runInstaller(session, source, {}), {
      name: 'InstallerMissing',
      message: `Required dependency 'perl' was not found on the search path`,
    });
  });

  it('runs the installer with the profile and repository', async () => {
    const session = local.session(local.folder('runs'));
    const profile = await withProfile(session);
    const script = installer(session, 'echo "$@" > args.txt\necho "installing"');
    const output = new Array<string>();
    local.messages.length = 0;

    await runInstaller(session, source, { installerOutput: (chunk) => output.push(chunk) });

    strict.equal(await readFile(join(session.policy.workDirectory, 'args.txt'), 'utf8'), `--profile=${profile} --location=${source.repository}\n`);
    strict.equal(output.join(''), 'installing\n');
    strict.equal(await locateInstaller(session), script);
    strict.deepEqual(local.messages, [`Starting installation from ${source.repository}`, 'Base installation completed']);
  });

  it('runs an executable installer directly when there is no interpreter', async () => {
    const session = local.session(local.folder('direct'), { interpreter: '' });
    await withProfile(session);
    installer(session, 'echo "$@" > args.txt');

    await runInstaller(session, source, {});
    strict.match(await readFile(join(session.policy.workDirectory, 'args.txt'), 'utf8'), /^--profile=.*texlive\.profile --location=https:\/\/archive\.example\//);
  });

  it('reports the exit status and output of a failed installation', async () => {
    const session = local.session(local.folder('fails'));
    await withProfile(session);
    installer(session, 'echo "mirror unreachable" >&2\nexit 3');

    await rejects(runInstaller(session, source, {}), (e: unknown) =>
      e instanceof InstallationFailed && e.exitCode === 3 && e.output === 'mirror unreachable\n' && e.message === 'The installer exited with status 3');
  });
});
