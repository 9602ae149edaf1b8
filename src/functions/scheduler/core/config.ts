/**
 * Configuration loader for the VM power scheduler.
 *
 * Reads process-wide defaults from environment variables, validates them and
 * returns an immutable SchedulerConfig. Decision logic receives this value
 * and never reads the environment itself.
 */

import { z } from 'zod';
import type { SchedulerConfig } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { parseLabelSelector } from '../discovery/labelSelector';
import { ConfigValidationError } from './errors';

const logger = setupLogger('vm-scheduler:config');

export const DEFAULT_VM_LABELS = 'auto-schedule:true';
export const DEFAULT_VM_ZONES = 'us-central1-a,us-central1-b';

/**
 * Environment schema validation using Zod. Blank strings count as unset.
 */
const blankAsUnset = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const EnvSchema = z.object({
  GCP_PROJECT: z.preprocess(blankAsUnset, z.string().optional()),
  GOOGLE_CLOUD_PROJECT: z.preprocess(blankAsUnset, z.string().optional()),
  VM_LABELS: z.preprocess(blankAsUnset, z.string().default(DEFAULT_VM_LABELS)),
  VM_ZONES: z.preprocess(blankAsUnset, z.string().default(DEFAULT_VM_ZONES)),
  SCALE_DOWN_ACTION: z.preprocess(blankAsUnset, z.enum(['STOP', 'SUSPEND']).default('STOP')),
  SCALE_UP_ACTION: z.preprocess(blankAsUnset, z.enum(['START', 'RESUME']).default('START')),
  EXECUTION_STRATEGY: z.preprocess(
    blankAsUnset,
    z.enum(['sequential', 'parallel']).default('sequential')
  ),
});

/**
 * Split a comma-separated zone list, dropping blank entries.
 */
export function parseZones(raw: string): string[] {
  return raw
    .split(',')
    .map((zone) => zone.trim())
    .filter((zone) => zone.length > 0);
}

/**
 * Load scheduler configuration from environment variables.
 *
 * @param env - Environment to read (defaults to process.env)
 * @returns Frozen configuration object
 *
 * @throws {ConfigValidationError} If a variable holds an unsupported value
 */
export function loadSchedulerConfig(env: NodeJS.ProcessEnv = process.env): SchedulerConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const invalidFields = parsed.error.errors.map((e) => e.path.join('.'));
    throw new ConfigValidationError(
      `Configuration validation failed. Invalid environment variables: ${invalidFields.join(', ')}`,
      { cause: parsed.error }
    );
  }

  const vars = parsed.data;
  const config: SchedulerConfig = Object.freeze({
    defaultProjectId: vars.GCP_PROJECT ?? vars.GOOGLE_CLOUD_PROJECT,
    defaultSelector: Object.freeze(parseLabelSelector(vars.VM_LABELS)),
    defaultZones: Object.freeze(parseZones(vars.VM_ZONES)),
    scale: Object.freeze({
      scaleDownOperation: vars.SCALE_DOWN_ACTION,
      scaleUpOperation: vars.SCALE_UP_ACTION,
    }),
    executionStrategy: vars.EXECUTION_STRATEGY,
  });

  logger.debug(
    {
      defaultProjectId: config.defaultProjectId,
      defaultZones: config.defaultZones,
      scale: config.scale,
      executionStrategy: config.executionStrategy,
    },
    'Scheduler config loaded'
  );

  return config;
}
