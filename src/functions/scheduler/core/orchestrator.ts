/**
 * Orchestrator for the VM power scheduler.
 *
 * Coordinates instance discovery, per-instance decisions and control-plane
 * actions. A failing instance never interrupts the rest of the run.
 */

import type {
  ActionOutcome,
  ComputeControlPlane,
  InstanceRef,
  PowerOperation,
  ScaleRequest,
  ScaleResponse,
  ScaleResult,
  SchedulerConfig,
} from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { InstanceDirectory } from '../discovery/instanceDirectory';
import { decide } from './actionPolicy';
import { ConfigurationError } from './errors';

const logger = setupLogger('vm-scheduler:orchestrator');

export const NO_INSTANCES_MESSAGE = 'no instances found';

export class ScaleOrchestrator {
  private readonly config: SchedulerConfig;
  private readonly controlPlane: ComputeControlPlane;

  constructor(config: SchedulerConfig, controlPlane: ComputeControlPlane) {
    this.config = config;
    this.controlPlane = controlPlane;
  }

  /**
   * Run one scale request against the matching fleet.
   *
   * Returns a ScaleFailure, without touching the control plane, when no
   * project id can be resolved.
   */
  async run(request: ScaleRequest): Promise<ScaleResponse> {
    const projectId = request.projectId || this.config.defaultProjectId;
    if (!projectId) {
      const error = new ConfigurationError('Project ID not configured');
      logger.error({ intent: request.intent }, error.message);
      return { error: error.message, errorType: error.name };
    }

    const selector =
      request.selector && request.selector.length > 0 ? request.selector : this.config.defaultSelector;
    const zones = request.zones && request.zones.length > 0 ? request.zones : this.config.defaultZones;

    logger.info({ intent: request.intent, projectId }, 'Starting orchestration');

    const directory = new InstanceDirectory(this.controlPlane, projectId);
    const instances = await directory.discover(zones, selector);

    if (instances.length === 0) {
      logger.warn('No instances found matching the specified labels');
      return { processedCount: 0, outcomes: [], message: NO_INSTANCES_MESSAGE };
    }

    logger.info(
      { strategy: this.config.executionStrategy },
      `Processing ${instances.length} instances`
    );

    const outcomes =
      this.config.executionStrategy === 'parallel'
        ? await this.executeParallel(instances, request.intent, projectId)
        : await this.executeSequential(instances, request.intent, projectId);

    const result: ScaleResult = {
      processedCount: outcomes.filter((o) => o.status !== 'SKIPPED').length,
      outcomes,
    };

    logger.info(
      {
        processedCount: result.processedCount,
        succeeded: outcomes.filter((o) => o.status === 'SUCCESS').length,
        failed: outcomes.filter((o) => o.status === 'ERROR').length,
        skipped: outcomes.filter((o) => o.status === 'SKIPPED').length,
      },
      'Orchestration completed'
    );

    return result;
  }

  /**
   * Process instances one by one, in discovery order.
   */
  private async executeSequential(
    instances: InstanceRef[],
    intent: string,
    projectId: string
  ): Promise<ActionOutcome[]> {
    const outcomes: ActionOutcome[] = [];

    for (const instance of instances) {
      outcomes.push(await this.processInstance(instance, intent, projectId));
    }

    return outcomes;
  }

  /**
   * Process all instances simultaneously.
   */
  private async executeParallel(
    instances: InstanceRef[],
    intent: string,
    projectId: string
  ): Promise<ActionOutcome[]> {
    return Promise.all(instances.map((instance) => this.processInstance(instance, intent, projectId)));
  }

  /**
   * Decide and act on a single instance. Never throws.
   */
  private async processInstance(
    instance: InstanceRef,
    intent: string,
    projectId: string
  ): Promise<ActionOutcome> {
    const base = { instance: instance.name, zone: instance.zone, intent };
    const decision = decide(intent, instance.state, this.config.scale);

    switch (decision.kind) {
      case 'skip':
        logger.info(
          { instance: instance.name, zone: instance.zone, state: instance.state },
          `Instance ${instance.name} skipped: ${decision.reason}`
        );
        return { ...base, status: 'SKIPPED', detail: decision.reason };

      case 'unknown':
        logger.error({ instance: instance.name, intent }, decision.message);
        return { ...base, status: 'ERROR', detail: decision.message };

      case 'perform':
        try {
          const operationId = await this.invoke(decision.operation, projectId, instance);
          return { ...base, status: 'SUCCESS', detail: operationId, operation: decision.operation };
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.error(
            {
              instance: instance.name,
              zone: instance.zone,
              operation: decision.operation,
              error: message,
            },
            'Failed to process instance'
          );
          return { ...base, status: 'ERROR', detail: message, operation: decision.operation };
        }
    }
  }

  private invoke(operation: PowerOperation, projectId: string, instance: InstanceRef): Promise<string> {
    switch (operation) {
      case 'start':
        return this.controlPlane.start(projectId, instance.zone, instance.name);
      case 'stop':
        return this.controlPlane.stop(projectId, instance.zone, instance.name);
      case 'suspend':
        return this.controlPlane.suspend(projectId, instance.zone, instance.name);
      case 'resume':
        return this.controlPlane.resume(projectId, instance.zone, instance.name);
    }
  }
}
