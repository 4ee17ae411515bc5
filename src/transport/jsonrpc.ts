export interface ChannelReply {
  /** HTTP status, or 200 for duplex channels where every reply is delivered in-band. */
  status: number;
  /** Parsed JSON body, undefined when the body was empty or not JSON. */
  body: unknown;
  raw: string;
}

export type JsonRpcId = string | number;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function buildRequest(
  method: string,
  params: Record<string, unknown>,
  id: JsonRpcId
) {
  return { jsonrpc: '2.0', method, params, id } as const;
}

export function hasResult(body: unknown): body is { result: unknown } {
  return isRecord(body) && 'result' in body;
}

export function hasError(body: unknown): body is { error: unknown } {
  return isRecord(body) && 'error' in body;
}

export function getResult(body: unknown): Record<string, unknown> | undefined {
  if (!hasResult(body)) {
    return undefined;
  }
  return isRecord(body.result) ? body.result : undefined;
}

export function getErrorCode(body: unknown): number | undefined {
  if (!hasError(body) || !isRecord(body.error)) {
    return undefined;
  }
  return typeof body.error.code === 'number' ? body.error.code : undefined;
}

export function getErrorMessage(body: unknown): string {
  if (hasError(body) && isRecord(body.error)) {
    const { message } = body.error;
    if (typeof message === 'string') {
      return message;
    }
  }
  return 'Unknown error';
}

/**
 * A reply to something we sent, as opposed to a request or notification the
 * server initiated on a duplex channel.
 */
export function isResponse(message: unknown): boolean {
  return isRecord(message) && !('method' in message);
}

export function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
