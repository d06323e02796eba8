import { z } from 'zod';
import { MalformedResponseError, RemoteRequestError } from '../errors';

// Clock events and photo uploads: the remote id plus an acceptance status
export const acceptedEntitySchema = z.object({
  id: z.string().nullish(),
  status: z.string(),
});

export const locationBatchResponseSchema = z.object({
  syncedIds: z.array(z.string()),
  failedIds: z.array(z.string()).optional(),
  // Remote ids keyed by local id, when the server assigns its own
  remoteIds: z.record(z.string()).optional(),
});

export const reportResponseSchema = z.object({
  id: z.string().nullish(),
});

const ACCEPTED_STATUSES = new Set(['success', 'ok', 'created', 'accepted']);

export function parseResponse<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.infer<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    throw new MalformedResponseError(`Unexpected ${what} response: ${details}`);
  }
  return parsed.data;
}

/**
 * The remote id of an accepted clock event or photo upload. A rejected status
 * is a remote failure; an accepted one without an id cannot be trusted.
 */
export function requireAcceptedId(data: unknown, what: string): string {
  const response = parseResponse(acceptedEntitySchema, data, what);
  if (!ACCEPTED_STATUSES.has(response.status.toLowerCase())) {
    throw new RemoteRequestError(`${what} rejected with status "${response.status}"`);
  }
  if (!response.id) {
    throw new MalformedResponseError(`${what} response is missing an id`);
  }
  return response.id;
}
