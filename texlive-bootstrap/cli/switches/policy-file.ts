// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { resolve } from 'path';
import { i } from '../../i18n';
import { Switch } from '../switch';

export class PolicyFile extends Switch {
  switch = 'policy';
  environmentVariable = 'TL_POLICY';
  get help() {
    return [
      i`a YAML file with policy settings (mirrors, retries, search roots, ...)`
    ];
  }

  resolvedValue(cwd: string, environment: NodeJS.ProcessEnv): string | undefined {
    const v = this.value || environment[this.environmentVariable];
    return v ? resolve(cwd, v) : undefined;
  }
}
