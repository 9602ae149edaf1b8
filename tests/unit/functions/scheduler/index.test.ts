/**
 * Unit tests for the Cloud Function entry point.
 *
 * Replaces the Compute Engine client and the functions framework so the
 * handler runs end to end in process.
 */

import { describe, it, expect, beforeAll, beforeEach, vi } from 'vitest';
import { createPubSubData, createPubSubEvent } from '../../../helpers/fixtures';

const { listAsyncMock, startMock, stopMock, suspendMock, resumeMock, cloudEventMock } = vi.hoisted(
  () => ({
    listAsyncMock: vi.fn(),
    startMock: vi.fn(),
    stopMock: vi.fn(),
    suspendMock: vi.fn(),
    resumeMock: vi.fn(),
    cloudEventMock: vi.fn(),
  })
);

vi.mock('@google-cloud/compute', () => ({
  InstancesClient: class {
    listAsync = listAsyncMock;
    start = startMock;
    stop = stopMock;
    suspend = suspendMock;
    resume = resumeMock;
  },
}));

vi.mock('@google-cloud/functions-framework', () => ({
  cloudEvent: cloudEventMock,
}));

vi.mock('@shared/utils/logger', () => ({
  setupLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

// Import AFTER mocks are defined
import { vmScheduler } from '@functions/scheduler/index';

const labelled = { 'auto-schedule': 'true' };

async function* yieldAll<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

describe('vmScheduler', () => {
  let registrations: unknown[][];

  beforeAll(() => {
    registrations = [...cloudEventMock.mock.calls];
  });

  beforeEach(() => {
    vi.clearAllMocks();
    process.env.GCP_PROJECT = 'test-project';
    process.env.VM_ZONES = 'us-central1-a';

    listAsyncMock.mockImplementation(() =>
      yieldAll([
        { name: 'web-1', labels: labelled, status: 'RUNNING' },
        { name: 'web-2', labels: labelled, status: 'TERMINATED' },
        { name: 'db-1', labels: { role: 'db' }, status: 'RUNNING' },
      ])
    );
    stopMock.mockResolvedValue([{ latestResponse: { name: 'operation-stop-web-1' } }]);
  });

  it('should register itself with the functions framework', () => {
    expect(registrations).toEqual([['vmScheduler', vmScheduler]]);
  });

  it('should scale down the labelled fleet', async () => {
    const result = await vmScheduler(createPubSubEvent(createPubSubData({ action: 'scale_down' })));

    expect(result).toEqual({
      processedCount: 1,
      outcomes: [
        {
          instance: 'web-1',
          zone: 'us-central1-a',
          intent: 'scale_down',
          status: 'SUCCESS',
          detail: 'operation-stop-web-1',
          operation: 'stop',
        },
        {
          instance: 'web-2',
          zone: 'us-central1-a',
          intent: 'scale_down',
          status: 'SKIPPED',
          detail: 'Instance already TERMINATED',
        },
      ],
    });
    expect(listAsyncMock).toHaveBeenCalledWith({ project: 'test-project', zone: 'us-central1-a' });
    expect(stopMock).toHaveBeenCalledTimes(1);
    expect(stopMock).toHaveBeenCalledWith({
      project: 'test-project',
      zone: 'us-central1-a',
      instance: 'web-1',
    });
  });

  it('should scale up with resume when configured to', async () => {
    process.env.SCALE_UP_ACTION = 'RESUME';
    resumeMock.mockResolvedValue([{ latestResponse: { name: 'operation-resume-web-2' } }]);

    const result = await vmScheduler(createPubSubEvent(createPubSubData({ action: 'scale_up' })));

    expect(result).toEqual({
      processedCount: 1,
      outcomes: [
        {
          instance: 'web-1',
          zone: 'us-central1-a',
          intent: 'scale_up',
          status: 'SKIPPED',
          detail: 'Instance already RUNNING',
        },
        {
          instance: 'web-2',
          zone: 'us-central1-a',
          intent: 'scale_up',
          status: 'SUCCESS',
          detail: 'operation-resume-web-2',
          operation: 'resume',
        },
      ],
    });
    expect(startMock).not.toHaveBeenCalled();
  });

  it('should fall back to scale_down for an undecodable message', async () => {
    const result = await vmScheduler(createPubSubEvent({ message: { data: '%%%' } }, 'event-2'));

    expect(result).toMatchObject({ processedCount: 1 });
    expect(stopMock).toHaveBeenCalledTimes(1);
  });

  it('should keep an explicit scale_up when the message carries an invalid zone list', async () => {
    startMock.mockResolvedValue([{ latestResponse: { name: 'operation-start-web-2' } }]);

    const result = await vmScheduler(
      createPubSubEvent(createPubSubData({ action: 'scale_up', zones: ['europe-west1-b', ''] }))
    );

    expect(result).toEqual({
      processedCount: 1,
      outcomes: [
        {
          instance: 'web-1',
          zone: 'us-central1-a',
          intent: 'scale_up',
          status: 'SKIPPED',
          detail: 'Instance already RUNNING',
        },
        {
          instance: 'web-2',
          zone: 'us-central1-a',
          intent: 'scale_up',
          status: 'SUCCESS',
          detail: 'operation-start-web-2',
          operation: 'start',
        },
      ],
    });
    expect(listAsyncMock).toHaveBeenCalledWith({ project: 'test-project', zone: 'us-central1-a' });
    expect(stopMock).not.toHaveBeenCalled();
  });

  it('should report a null action as unknown without acting', async () => {
    const result = await vmScheduler(createPubSubEvent(createPubSubData({ action: null })));

    expect(result).toMatchObject({
      processedCount: 2,
      outcomes: [
        { instance: 'web-1', status: 'ERROR', detail: 'Unknown action: null' },
        { instance: 'web-2', status: 'ERROR', detail: 'Unknown action: null' },
      ],
    });
    expect(stopMock).not.toHaveBeenCalled();
    expect(startMock).not.toHaveBeenCalled();
  });

  it('should return a configuration error when no project is configured', async () => {
    delete process.env.GCP_PROJECT;

    const result = await vmScheduler(createPubSubEvent(createPubSubData({ action: 'scale_up' })));

    expect(result).toEqual({
      error: 'Project ID not configured',
      errorType: 'ConfigurationError',
    });
    expect(listAsyncMock).not.toHaveBeenCalled();
  });

  it('should use the project from the message over the environment', async () => {
    await vmScheduler(
      createPubSubEvent(createPubSubData({ action: 'scale_down', project_id: 'message-project' }))
    );

    expect(listAsyncMock).toHaveBeenCalledWith({ project: 'message-project', zone: 'us-central1-a' });
  });

  it('should return a validation error for unsupported environment values', async () => {
    process.env.SCALE_DOWN_ACTION = 'HIBERNATE';

    const result = await vmScheduler(createPubSubEvent(createPubSubData({ action: 'scale_down' })));

    expect(result).toEqual({
      error: 'Configuration validation failed. Invalid environment variables: SCALE_DOWN_ACTION',
      errorType: 'ConfigValidationError',
    });
    expect(listAsyncMock).not.toHaveBeenCalled();
  });

  it('should keep acting in healthy zones when one zone fails', async () => {
    process.env.VM_ZONES = 'us-central1-a,us-central1-b';
    listAsyncMock.mockImplementation((request: { zone: string }) => {
      if (request.zone === 'us-central1-b') {
        throw new Error('zone unavailable');
      }
      return yieldAll([{ name: 'web-1', labels: labelled, status: 'RUNNING' }]);
    });

    const result = await vmScheduler(createPubSubEvent(createPubSubData({ action: 'scale_down' })));

    expect(result).toEqual({
      processedCount: 1,
      outcomes: [
        {
          instance: 'web-1',
          zone: 'us-central1-a',
          intent: 'scale_down',
          status: 'SUCCESS',
          detail: 'operation-stop-web-1',
          operation: 'stop',
        },
      ],
    });
  });
});
