/**
 * Cloud Function entry point for the VM power scheduler.
 *
 * Triggered by Pub/Sub messages (typically published by Cloud Scheduler).
 * Decodes the request, loads configuration, runs the orchestrator against
 * Compute Engine and returns the result.
 */

import { cloudEvent } from '@google-cloud/functions-framework';
import type { CloudEvent } from '@google-cloud/functions-framework';
import type { ScaleResponse } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { ComputeEngineControlPlane } from './compute/computeEngine';
import { loadSchedulerConfig } from './core/config';
import { ScaleOrchestrator } from './core/orchestrator';
import { decodeScaleRequest } from './core/request';

const logger = setupLogger('vm-scheduler:main');

/**
 * Handle one Pub/Sub CloudEvent.
 *
 * Never throws: configuration problems and unexpected failures are returned
 * as `{ error, errorType }`.
 *
 * @example
 * Message body (before base64 encoding):
 * {
 *   "action": "scale_up",
 *   "vm_labels": [{ "key": "env", "value": "dev" }],
 *   "zones": ["europe-west1-b"]
 * }
 */
export async function vmScheduler(event: CloudEvent<unknown>): Promise<ScaleResponse> {
  const eventId = event.id;
  const request = decodeScaleRequest(event.data);

  logger.info({ action: request.intent, eventId }, `Processing action: ${request.intent}`);

  try {
    const config = loadSchedulerConfig();
    const orchestrator = new ScaleOrchestrator(config, new ComputeEngineControlPlane());
    const result = await orchestrator.run(request);

    logger.info({ eventId, result }, 'Action completed');
    return result;
  } catch (error) {
    const failure = {
      error: error instanceof Error ? error.message : String(error),
      errorType: error instanceof Error ? error.name : 'Error',
    };

    logger.error({ action: request.intent, eventId, ...failure }, 'Action failed');
    return failure;
  }
}

cloudEvent('vmScheduler', vmScheduler);
