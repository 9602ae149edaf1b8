/**
 * Parsing and formatting of `key:value,key:value` label selector strings.
 */

import type { LabelRequirement, LabelSelector } from '@shared/types';
import { ConfigValidationError } from '../core/errors';

/**
 * Parse a comma-separated selector string.
 *
 * Each entry is split on its first ':' so values may contain colons.
 * Entries without a ':' are ignored.
 *
 * @example
 * parseLabelSelector('auto-schedule:true, env:dev')
 * // → [{ key: 'auto-schedule', value: 'true' }, { key: 'env', value: 'dev' }]
 *
 * @throws {ConfigValidationError} If an entry has an empty key
 */
export function parseLabelSelector(raw: string): LabelSelector {
  const requirements: LabelRequirement[] = [];

  for (const entry of raw.split(',')) {
    const separator = entry.indexOf(':');
    if (separator === -1) {
      continue;
    }

    const key = entry.slice(0, separator).trim();
    const value = entry.slice(separator + 1).trim();

    if (!key) {
      throw new ConfigValidationError(`Invalid label selector entry '${entry.trim()}': empty key`);
    }

    requirements.push({ key, value });
  }

  return requirements;
}

export function formatLabelSelector(selector: LabelSelector): string {
  return selector.map(({ key, value }) => `${key}:${value}`).join(',');
}
