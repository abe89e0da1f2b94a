// MCP response envelope shared by every tool

import { isUpstreamError } from '../errors.js';

export function wrapResponse(data: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(data, null, 2) }] };
}

export function wrapError(err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  return {
    content: [{ type: 'text' as const, text: JSON.stringify({ error: message, upstream: isUpstreamError(err) }) }],
    isError: true,
  };
}

/** Run a tool body, turning thrown errors into an isError response */
export async function respond(run: () => Promise<unknown>) {
  try {
    return wrapResponse(await run());
  } catch (err) {
    return wrapError(err);
  }
}
