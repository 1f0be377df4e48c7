// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { readFileSync } from 'fs';

let currentLocale: Record<string, string> = {};

/** loads a message table (a flat JSON object of key => template) */
export function setLocale(newLocale: string | undefined) {
  if (newLocale) {
    const parsed: unknown = JSON.parse(readFileSync(newLocale, 'utf8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Message table '${newLocale}' must be a JSON object`);
    }
    currentLocale = Object.fromEntries(Object.entries(parsed).filter((entry): entry is [string, string] => typeof entry[1] === 'string'));
  } else {
    currentLocale = {};
  }
}

/**
 * generates the translation key for a given message
 *
 * @returns the key
 */
export function indexOf(literals: TemplateStringsArray) {
  const content = literals.flatMap((k) => [k, '$']);
  content.length--; // drop the trailing placeholder.
  return content.join('').trim().replace(/ [a-z]/g, ([, b]) => b.toUpperCase()).replace(/[^a-zA-Z$]/g, '');
}

/**
 * Support for tagged template literals for i18n.
 *
 * Translated templates refer to the inserted values as ${p0}, ${p1}, ...
 *
 * @translator
 */
export function i(literals: TemplateStringsArray, ...values: Array<string | number | boolean | undefined>): string {
  const key = indexOf(literals);
  if (key) {
    const str = currentLocale[key];
    if (str) {
      return str.replace(/\$\{p(\d+)\}/g, (_match, index: string) => String(values[Number(index)]));
    }
  }
  // if the translation isn't available, just resolve the string template normally.
  return String.raw(literals, ...values);
}
