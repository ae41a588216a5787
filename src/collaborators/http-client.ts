import type { z } from 'zod';
import { CollaboratorCallError } from './call-collaborator.js';

export interface HttpServiceConfig {
  baseUrl: string;
  apiKey?: string;
}

/**
 * POSTs JSON and validates the reply. Status codes map onto collaborator
 * error kinds: 429 is quota, anything else non-2xx is unavailable, and a body
 * that fails the schema is malformed.
 */
export async function postJson<S extends z.ZodTypeAny>(
  config: HttpServiceConfig,
  path: string,
  body: unknown,
  schema: S,
  signal: AbortSignal,
): Promise<z.infer<S>> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (config.apiKey) headers.Authorization = `Bearer ${config.apiKey}`;

  const response = await fetch(`${config.baseUrl.replace(/\/+$/, '')}${path}`, {
    method: 'POST',
    headers,
    body: JSON.stringify(body),
    signal,
  });

  if (response.status === 429) {
    throw new CollaboratorCallError('quota', `${path} rate limited (429)`);
  }
  if (!response.ok) {
    throw new CollaboratorCallError('unavailable', `${path} returned ${response.status}`);
  }

  let json: unknown;
  try {
    json = await response.json();
  } catch {
    throw new CollaboratorCallError('malformed_response', `${path} returned a non-JSON body`);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join('.') || '(root)').join(', ');
    throw new CollaboratorCallError('malformed_response', `${path} response failed validation: ${fields}`);
  }
  return parsed.data;
}
