// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { strict } from 'assert';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { createPolicy, defaultPolicy, environmentSettings, loadPolicyFile, parseCount, parsePolicy } from '../../policy';
import { parseHash } from '../../util/hash';
import { SuiteLocal } from './SuiteLocal';

describe('Policy', () => {
  const local = new SuiteLocal();
  after(local.after.bind(local));

  it('has the documented defaults', () => {
    const policy = defaultPolicy({ HOME: '/home/tester' }, '/work');
    strict.equal(policy.mirror, 'https://mirror.ctan.org/systems/texlive/tlnet');
    strict.equal(policy.archiveName, 'install-tl-unx.tar.gz');
    strict.equal(policy.profile, 'texlive.profile');
    strict.equal(policy.attempts, 3);
    strict.equal(policy.checksum, '');
    strict.equal(policy.homeFolder, '/home/tester');
    strict.equal(policy.workDirectory, '/work');
    strict.deepEqual(policy.knownRoots, ['/usr/local/texlive', '/opt/texlive']);
  });

  it('reads the TL_ environment variables', () => {
    const settings = environmentSettings({
      TL_PROFILE: 'custom.profile',
      TL_ROOT: '/srv/texlive',
      TL_MIRROR: 'https://mirror.example/tlnet',
      TL_RETRIES: '5',
      TL_CHECKSUM: '',
      TL_WORKDIR: '',
    });
    strict.equal(settings.profile, 'custom.profile');
    strict.equal(settings.installRoot, '/srv/texlive');
    strict.equal(settings.mirror, 'https://mirror.example/tlnet');
    strict.equal(settings.attempts, 5);
    strict.equal(settings.checksum, '');
    strict.equal(settings.workDirectory, undefined);
  });

  it('rejects a retry count that is not a positive whole number', () => {
    strict.throws(() => environmentSettings({ TL_RETRIES: 'three' }), { message: `TL_RETRIES must be a positive whole number (got 'three')` });
    strict.throws(() => parseCount('--retries', '0'), { message: `--retries must be a positive whole number (got '0')` });
    strict.equal(parseCount('--retries', '2'), 2);
  });

  it('layers settings in order, ignoring undefined values', () => {
    const policy = createPolicy(defaultPolicy({}, '/work'), { mirror: 'https://one.example', attempts: 4 }, { mirror: 'https://two.example', attempts: undefined });
    strict.equal(policy.mirror, 'https://two.example');
    strict.equal(policy.attempts, 4);
    strict.ok(Object.isFrozen(policy));
  });

  it('requires at least one attempt', () => {
    strict.throws(() => createPolicy(defaultPolicy({}, '/work'), { attempts: 0 }), { message: 'attempts must be at least 1' });
  });

  it('loads a policy file', async () => {
    const file = join(local.folder('policy'), 'policy.yaml');
    await writeFile(file, 'mirror: https://mirror.example/tlnet\nattempts: 2\nknownRoots:\n  - /srv/texlive\n');
    const settings = await loadPolicyFile(file);
    strict.deepEqual(settings, { mirror: 'https://mirror.example/tlnet', attempts: 2, knownRoots: ['/srv/texlive'] });
  });

  it('rejects unknown and mistyped settings', () => {
    strict.throws(() => parsePolicy('mirrors: x\n', 'p.yaml'), { message: `Unknown setting 'mirrors' in 'p.yaml'` });
    strict.throws(() => parsePolicy('attempts: many\n', 'p.yaml'), { message: `attempts in 'p.yaml' must be a non-negative integer` });
    strict.throws(() => parsePolicy('knownRoots: /opt\n', 'p.yaml'), { message: `knownRoots in 'p.yaml' must be an array of strings` });
    strict.throws(() => parsePolicy('- a\n- b\n', 'p.yaml'), { message: `Policy file 'p.yaml' must contain a mapping` });
    strict.deepEqual(parsePolicy('', 'p.yaml'), {});
  });
});

describe('Checksums', () => {
  it('skips verification when empty', () => {
    strict.equal(parseHash(''), undefined);
    strict.equal(parseHash('  '), undefined);
    strict.equal(parseHash(undefined), undefined);
  });

  it('treats a bare digest as sha256', () => {
    strict.deepEqual(parseHash('AB'.repeat(32)), { algorithm: 'sha256', value: 'ab'.repeat(32) });
  });

  it('accepts an algorithm prefix', () => {
    strict.deepEqual(parseHash(`sha512:${'0'.repeat(128)}`), { algorithm: 'sha512', value: '0'.repeat(128) });
  });

  it('rejects malformed digests', () => {
    strict.throws(() => parseHash('not-a-hash'));
    strict.throws(() => parseHash(`sha384:${'0'.repeat(64)}`), { message: `'sha384:${'0'.repeat(64)}' is not a valid sha384 checksum; expected 96 hex digits` });
  });
});
