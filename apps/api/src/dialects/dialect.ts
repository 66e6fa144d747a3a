import type { z } from 'zod';
import { GatewayError } from '@ai-relay/domain';
import type { CanonicalRequest, CanonicalResponse, Dialect, StreamEvent } from '@ai-relay/domain';

/** One Server-Sent Events frame before it is rendered to text. */
export interface SseFrame {
  readonly event?: string;
  readonly data: string;
}

export const DONE_FRAME = 'data: [DONE]\n\n';

export function renderFrame(frame: SseFrame): string {
  return frame.event === undefined
    ? `data: ${frame.data}\n\n`
    : `event: ${frame.event}\ndata: ${frame.data}\n\n`;
}

/** Stateful renderer for the events of a single stream. */
export interface StreamEncoder {
  encodeStreamEvent(event: StreamEvent): SseFrame[];
}

export interface DialectAdapter {
  readonly dialect: Dialect;
  /** Throws a `bad_request` GatewayError when the payload does not fit the dialect. */
  decode(payload: unknown): CanonicalRequest;
  encode(response: CanonicalResponse, request: CanonicalRequest): unknown;
  createStreamEncoder(request: CanonicalRequest): StreamEncoder;
}

function describeIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/** Validates a client payload, turning the first zod issue into a `bad_request`. */
export function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): T {
  const result = schema.safeParse(payload);
  if (result.success) return result.data;
  const [issue] = result.error.issues;
  throw GatewayError.badRequest(
    issue ? `Invalid request body: ${describeIssue(issue)}` : 'Invalid request body',
    result.error,
  );
}

/** Copies the listed keys that are present in `source`. */
export function pickOptions(
  source: Readonly<Record<string, unknown>>,
  keys: readonly string[],
): Record<string, unknown> {
  const picked: Record<string, unknown> = {};
  for (const key of keys) {
    if (source[key] !== undefined) picked[key] = source[key];
  }
  return picked;
}
