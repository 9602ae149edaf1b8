/**
 * Label predicate used by instance discovery.
 */

import type { LabelSelector } from '@shared/types';

/**
 * Check whether an instance's labels satisfy every requirement of a selector.
 *
 * An empty selector matches by convention; InstanceDirectory refuses empty
 * selectors before they get here.
 *
 * @param instanceLabels - Labels attached to the instance, if any
 * @param selector - Requirements that must all hold
 */
export function matchesLabels(
  instanceLabels: Readonly<Record<string, string>> | null | undefined,
  selector: LabelSelector
): boolean {
  if (selector.length === 0) {
    return true;
  }

  if (!instanceLabels || Object.keys(instanceLabels).length === 0) {
    return false;
  }

  return selector.every(
    ({ key, value }) => Object.hasOwn(instanceLabels, key) && instanceLabels[key] === value
  );
}
