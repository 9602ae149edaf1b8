/**
 * Decoding of Pub/Sub scale requests.
 *
 * Messages arrive as a CloudEvent whose data carries a base64-encoded JSON
 * body. A message that cannot be decoded into a JSON object becomes an empty
 * request, which scales down the default fleet. Once the body is an object,
 * its action is always kept and each other field is validated on its own: an
 * invalid field is dropped so its default applies.
 */

import { z } from 'zod';
import type { LabelRequirement, ScaleIntent, ScaleRequest } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { DecodeError } from './errors';

const logger = setupLogger('vm-scheduler:request');

/**
 * Action used when the message does not name one.
 */
export const DEFAULT_ACTION: ScaleIntent = 'scale_down';

const PubSubEnvelopeSchema = z.object({
  message: z.object({
    data: z.string(),
  }),
});

const MessageBodySchema = z.record(z.unknown());

const ProjectIdSchema = z.string();

const LabelsSchema = z.array(
  z.object({
    key: z.string().min(1),
    value: z.string(),
  })
);

const ZonesSchema = z.array(z.string().min(1));

/**
 * Fields of a decoded message body. Absent fields fall back to defaults.
 */
export interface ScalePayload {
  action?: string;
  project_id?: string;
  vm_labels?: LabelRequirement[];
  zones?: string[];
}

/**
 * Render an action the way it was sent. Non-string actions keep their JSON
 * form so they surface as unknown actions.
 */
function toActionText(action: unknown): string {
  return typeof action === 'string' ? action : JSON.stringify(action);
}

/**
 * Decode the JSON body of a Pub/Sub CloudEvent.
 *
 * Invalid `project_id`, `vm_labels` or `zones` fields are dropped and logged;
 * `action` is kept whatever its type.
 *
 * @param data - CloudEvent data (`{ message: { data: "<base64>" } }`)
 * @returns Payload holding the fields that passed validation
 *
 * @throws {DecodeError} If the envelope, base64 body or JSON is invalid, or the body is not an object
 */
export function decodePubSubPayload(data: unknown): ScalePayload {
  const envelope = PubSubEnvelopeSchema.safeParse(data);
  if (!envelope.success) {
    throw new DecodeError('CloudEvent data does not contain a Pub/Sub message body', {
      cause: envelope.error,
    });
  }

  const text = Buffer.from(envelope.data.message.data, 'base64').toString('utf-8');

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new DecodeError(`Message body is not valid JSON: ${String(error)}`, { cause: error });
  }

  const body = MessageBodySchema.safeParse(json);
  if (!body.success) {
    throw new DecodeError('Message body is not a JSON object', { cause: body.error });
  }

  const fields = body.data;
  const payload: ScalePayload = {};
  const invalidFields: string[] = [];

  if (fields.action !== undefined) {
    payload.action = toActionText(fields.action);
  }

  if (fields.project_id !== undefined && fields.project_id !== null) {
    const projectId = ProjectIdSchema.safeParse(fields.project_id);
    if (projectId.success) {
      payload.project_id = projectId.data;
    } else {
      invalidFields.push('project_id');
    }
  }

  if (fields.vm_labels !== undefined && fields.vm_labels !== null) {
    const labels = LabelsSchema.safeParse(fields.vm_labels);
    if (labels.success) {
      payload.vm_labels = labels.data;
    } else {
      invalidFields.push('vm_labels');
    }
  }

  if (fields.zones !== undefined && fields.zones !== null) {
    const zones = ZonesSchema.safeParse(fields.zones);
    if (zones.success) {
      payload.zones = zones.data;
    } else {
      invalidFields.push('zones');
    }
  }

  if (invalidFields.length > 0) {
    logger.warn({ invalidFields }, `Ignoring invalid scale request fields: ${invalidFields.join(', ')}`);
  }

  return payload;
}

/**
 * Convert a decoded payload to a ScaleRequest. Empty lists count as absent.
 */
export function toScaleRequest(payload: ScalePayload): ScaleRequest {
  const request: ScaleRequest = {
    intent: payload.action ?? DEFAULT_ACTION,
  };

  if (payload.project_id) {
    request.projectId = payload.project_id;
  }
  if (payload.vm_labels && payload.vm_labels.length > 0) {
    request.selector = payload.vm_labels.map(({ key, value }) => ({ key, value }));
  }
  if (payload.zones && payload.zones.length > 0) {
    request.zones = [...payload.zones];
  }

  return request;
}

/**
 * Decode a scale request, substituting an empty request when the message
 * cannot be decoded.
 */
export function decodeScaleRequest(data: unknown): ScaleRequest {
  try {
    return toScaleRequest(decodePubSubPayload(data));
  } catch (error) {
    if (!(error instanceof DecodeError)) {
      throw error;
    }
    logger.error({ error: error.message }, 'Error decoding message; using defaults');
    return { intent: DEFAULT_ACTION };
  }
}
