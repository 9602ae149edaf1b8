/**
 * Test fixtures and mock data factories.
 */

import { CloudEvent } from 'cloudevents';
import type { ListedInstance, SchedulerConfig } from '@shared/types';

/**
 * Creates a SchedulerConfig with test defaults.
 *
 * @param overrides - Optional overrides for specific config properties
 */
export function createMockConfig(overrides: Partial<SchedulerConfig> = {}): SchedulerConfig {
  const defaultConfig: SchedulerConfig = {
    defaultProjectId: 'test-project',
    defaultSelector: [{ key: 'auto-schedule', value: 'true' }],
    defaultZones: ['us-central1-a'],
    scale: {
      scaleDownOperation: 'STOP',
      scaleUpOperation: 'START',
    },
    executionStrategy: 'sequential',
  };

  return { ...defaultConfig, ...overrides };
}

/**
 * Creates a listed instance carrying the default schedule label.
 */
export function createMockInstance(
  name: string,
  status: string,
  labels: Record<string, string> = { 'auto-schedule': 'true' }
): ListedInstance {
  return { name, status, labels };
}

/**
 * Wraps a JSON body the way Pub/Sub delivers it inside a CloudEvent.
 */
export function createPubSubData(body: unknown): { message: { data: string } } {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return { message: { data: Buffer.from(text, 'utf-8').toString('base64') } };
}

/**
 * Creates a Pub/Sub CloudEvent carrying the given data.
 */
export function createPubSubEvent(data: unknown, id = 'event-1'): CloudEvent<unknown> {
  return new CloudEvent<unknown>({
    id,
    type: 'google.cloud.pubsub.topic.v1.messagePublished',
    source: '//pubsub.googleapis.com/projects/test-project/topics/vm-scheduler',
    data,
  });
}
