export const HARNESS_NAME = 'mcp-ecosystem-validator';
export const HARNESS_VERSION = '0.1.0';

/** Protocol version sent in every handshake. Never negotiated. */
export const PROTOCOL_VERSION = '2024-11-05';

export const DEFAULT_TIMEOUT_SECONDS = 30;
export const DEFAULT_MAX_CONCURRENT = 3;

/** Share of adversarial requests the error-handling probe must see rejected correctly. */
export const DEFAULT_PASS_THRESHOLD = 0.8;

export const DEFAULT_SSE_PATH = '/sse';
