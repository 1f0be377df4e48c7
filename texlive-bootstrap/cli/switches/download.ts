// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { i } from '../../i18n';
import { parseCount } from '../../policy';
import { Switch } from '../switch';

export class Mirror extends Switch {
  switch = 'mirror';
  environmentVariable = 'TL_MIRROR';
  get help() {
    return [i`the mirror the current release is fetched from`];
  }
}

export class ArchiveMirror extends Switch {
  switch = 'archive-mirror';
  environmentVariable = 'TL_ARCHIVE_MIRROR';
  get help() {
    return [i`the historic archive past releases are fetched from`];
  }
}

export class ArchiveName extends Switch {
  switch = 'archive-name';
  environmentVariable = 'TL_INSTALL_ARCHIVE';
  get help() {
    return [i`the file name of the installer archive`];
  }
}

export class CacheBuster extends Switch {
  switch = 'cache-buster';
  environmentVariable = 'TL_CACHE_BUSTER';
  get help() {
    return [i`a token appended to download URLs to bypass caches ('0' disables it)`];
  }
}

export class Checksum extends Switch {
  switch = 'checksum';
  environmentVariable = 'TL_CHECKSUM';
  get help() {
    return [i`the expected digest of the archive (sha256 hex, or <algorithm>:<hex>); empty skips the check`];
  }
}

export class Output extends Switch {
  switch = 'output';
  get help() {
    return [i`where the downloaded archive is written`];
  }
}

export class Retries extends Switch {
  switch = 'retries';
  environmentVariable = 'TL_RETRIES';
  get help() {
    return [i`how many times a download is attempted`];
  }

  get count(): number | undefined {
    const v = this.value;
    return v === undefined ? undefined : parseCount(`--${this.switch}`, v);
  }
}
