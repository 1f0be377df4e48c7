// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { i } from '../../i18n';
import { Switch } from '../switch';

export class Profile extends Switch {
  switch = 'profile';
  environmentVariable = 'TL_PROFILE';
  get help() {
    return [i`the installation profile handed to the installer`];
  }
}

export class Root extends Switch {
  switch = 'root';
  environmentVariable = 'TL_ROOT';
  get help() {
    return [i`an installation root searched before the well-known ones`];
  }
}

export class WorkDir extends Switch {
  switch = 'workdir';
  environmentVariable = 'TL_WORKDIR';
  get help() {
    return [i`the working directory the installer is unpacked into and run from`];
  }
}

export class LinkDir extends Switch {
  switch = 'link-dir';
  environmentVariable = 'TL_LINK_DIR';
  get help() {
    return [i`the directory on the search path that links are created in`];
  }
}
