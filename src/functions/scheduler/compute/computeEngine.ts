/**
 * Compute Engine implementation of the control plane.
 *
 * Wraps the zonal InstancesClient from @google-cloud/compute. Power operations
 * are fire-and-forget: the call returns once Compute Engine has accepted the
 * operation, and the operation name is reported back without polling it.
 */

import { InstancesClient } from '@google-cloud/compute';
import type { Logger } from 'pino';
import type { ComputeControlPlane, ListedInstance, PowerOperation } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { InstanceActionError, ZoneDiscoveryError } from '../core/errors';

/**
 * The subset of InstancesClient used here. Tests inject a fake.
 */
export type InstancesApi = Pick<InstancesClient, 'listAsync' | 'start' | 'stop' | 'suspend' | 'resume'>;

const PROGRESS_VERBS: Record<PowerOperation, string> = {
  start: 'Starting',
  stop: 'Stopping',
  suspend: 'Suspending',
  resume: 'Resuming',
};

/**
 * Read the operation name from a long-running operation response.
 *
 * The client resolves to an LROperation whose `latestResponse` is the zonal
 * Operation resource; plain Operation objects are accepted as well.
 */
export function extractOperationName(response: unknown): string {
  if (typeof response !== 'object' || response === null) {
    return 'unknown';
  }

  const operation = 'latestResponse' in response ? response.latestResponse : response;
  if (typeof operation === 'object' && operation !== null && 'name' in operation) {
    return typeof operation.name === 'string' && operation.name ? operation.name : 'unknown';
  }

  return 'unknown';
}

export class ComputeEngineControlPlane implements ComputeControlPlane {
  private readonly client: InstancesApi;
  private readonly logger: Logger;

  constructor(client?: InstancesApi) {
    this.client = client ?? new InstancesClient();
    this.logger = setupLogger('vm-scheduler:compute-engine');
  }

  /**
   * List every instance in a zone, following pagination.
   *
   * @throws {ZoneDiscoveryError} If the listing fails
   */
  async list(project: string, zone: string): Promise<ListedInstance[]> {
    const instances: ListedInstance[] = [];

    try {
      for await (const instance of this.client.listAsync({ project, zone })) {
        if (!instance.name) {
          continue;
        }
        instances.push({
          name: instance.name,
          labels: { ...(instance.labels ?? {}) },
          status: String(instance.status ?? 'OTHER'),
        });
      }
    } catch (error) {
      throw new ZoneDiscoveryError(zone, { cause: error });
    }

    this.logger.debug({ project, zone, count: instances.length }, 'Listed instances');
    return instances;
  }

  start(project: string, zone: string, name: string): Promise<string> {
    return this.runOperation('start', project, zone, name);
  }

  stop(project: string, zone: string, name: string): Promise<string> {
    return this.runOperation('stop', project, zone, name);
  }

  suspend(project: string, zone: string, name: string): Promise<string> {
    return this.runOperation('suspend', project, zone, name);
  }

  resume(project: string, zone: string, name: string): Promise<string> {
    return this.runOperation('resume', project, zone, name);
  }

  /**
   * @throws {InstanceActionError} If Compute Engine rejects the operation
   */
  private async runOperation(
    operation: PowerOperation,
    project: string,
    zone: string,
    instance: string
  ): Promise<string> {
    const request = { project, zone, instance };

    let response: unknown;
    try {
      switch (operation) {
        case 'start':
          [response] = await this.client.start(request);
          break;
        case 'stop':
          [response] = await this.client.stop(request);
          break;
        case 'suspend':
          [response] = await this.client.suspend(request);
          break;
        case 'resume':
          [response] = await this.client.resume(request);
          break;
      }
    } catch (error) {
      const actionError = new InstanceActionError(operation, zone, instance, { cause: error });
      this.logger.error({ instance, zone, operation, error: String(error) }, actionError.message);
      throw actionError;
    }

    const operationName = extractOperationName(response);
    this.logger.info(
      { instance, zone, operation: operationName },
      `${PROGRESS_VERBS[operation]} instance ${instance} in zone ${zone}`
    );
    return operationName;
  }
}
