/**
 * Label-based instance discovery across zones.
 *
 * Lists instances from the compute control plane zone by zone and keeps the
 * ones whose labels satisfy the selector.
 */

import type {
  ComputeControlPlane,
  InstanceRef,
  InstanceState,
  LabelSelector,
  ListedInstance,
} from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { ZoneDiscoveryError } from '../core/errors';
import { formatLabelSelector } from './labelSelector';
import { matchesLabels } from './labelMatcher';

const logger = setupLogger('vm-scheduler:instance-directory');

const KNOWN_STATES: ReadonlySet<string> = new Set<InstanceState>([
  'RUNNING',
  'STOPPED',
  'TERMINATED',
  'SUSPENDED',
  'SUSPENDING',
  'STOPPING',
  'PROVISIONING',
]);

/**
 * Normalize a control-plane status string. STAGING, REPAIRING and anything
 * unrecognized become OTHER.
 */
export function toInstanceState(status: string): InstanceState {
  return isKnownState(status) ? status : 'OTHER';
}

function isKnownState(status: string): status is Exclude<InstanceState, 'OTHER'> {
  return KNOWN_STATES.has(status);
}

export class InstanceDirectory {
  private readonly controlPlane: ComputeControlPlane;
  private readonly projectId: string;

  constructor(controlPlane: ComputeControlPlane, projectId: string) {
    this.controlPlane = controlPlane;
    this.projectId = projectId;
  }

  /**
   * Discover instances matching the selector in the given zones.
   *
   * Zones are listed concurrently, but results keep the zone order given and
   * the listing order within each zone. A zone that fails to list contributes
   * nothing.
   */
  async discover(zones: readonly string[], selector: LabelSelector): Promise<InstanceRef[]> {
    if (selector.length === 0) {
      logger.warn('Empty label selector; refusing to match every instance');
      return [];
    }

    if (zones.length === 0) {
      logger.warn('No zones configured for discovery');
      return [];
    }

    logger.info(
      {
        project: this.projectId,
        zones,
        selector: formatLabelSelector(selector),
      },
      'Starting label-based instance discovery'
    );

    const zoneResults = await Promise.all(zones.map((zone) => this.discoverInZone(zone, selector)));
    const instances = zoneResults.flat();

    logger.info(`Discovered ${instances.length} matching instances across ${zones.length} zone(s)`);
    return instances;
  }

  private async discoverInZone(zone: string, selector: LabelSelector): Promise<InstanceRef[]> {
    let listed: ListedInstance[];
    try {
      listed = await this.controlPlane.list(this.projectId, zone);
    } catch (error) {
      const cause = error instanceof ZoneDiscoveryError ? error.cause : error;
      logger.error(
        { zone, error: cause instanceof Error ? cause.message : String(cause) },
        `Error listing instances in zone ${zone}`
      );
      return [];
    }

    const matched = listed
      .filter((instance) => matchesLabels(instance.labels, selector))
      .map((instance) => ({
        name: instance.name,
        zone,
        state: toInstanceState(instance.status),
      }));

    logger.debug(`Found ${matched.length} of ${listed.length} instances matching in ${zone}`);
    return matched;
  }
}
