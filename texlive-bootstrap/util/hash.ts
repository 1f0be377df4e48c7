// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { i } from '../i18n';

// sha256, sha512, sha384
export type Algorithm = 'sha256' | 'sha384' | 'sha512'

export interface Hash {
  value: string;
  algorithm: Algorithm;
}

const hexLength: Record<Algorithm, number> = { sha256: 64, sha384: 96, sha512: 128 };

/**
 * Parses an expected digest. Accepts `<algorithm>:<hex>` or a bare sha256 hex string.
 *
 * @returns undefined when the value is empty (verification is skipped)
 */
export function parseHash(text: string | undefined): Hash | undefined {
  const trimmed = text?.trim();
  if (!trimmed) {
    return undefined;
  }

  const [, prefix, hex] = /^(?:(sha256|sha384|sha512):)?([0-9a-fA-F]+)$/.exec(trimmed) ?? [];
  if (!hex) {
    throw new Error(i`'${trimmed}' is not a valid checksum; expected <sha256|sha384|sha512>:<hex> or a sha256 hex digest`);
  }

  const algorithm: Algorithm = prefix === 'sha384' || prefix === 'sha512' ? prefix : 'sha256';
  if (hex.length !== hexLength[algorithm]) {
    throw new Error(i`'${trimmed}' is not a valid ${algorithm} checksum; expected ${hexLength[algorithm]} hex digits`);
  }
  return { algorithm, value: hex.toLowerCase() };
}

export async function hashFile(file: string, algorithm: Algorithm = 'sha256'): Promise<string> {
  const hasher = createHash(algorithm);
  for await (const chunk of createReadStream(file)) {
    hasher.update(chunk);
  }
  return hasher.digest('hex');
}
