import { fileURLToPath } from 'url';
import type { Logger } from '../logger.js';
import type { TestRequest } from '../types.js';

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function probeRequest(
  serverUrl: string,
  testType: string,
  params: Record<string, unknown> = {},
  timeout = 5
): TestRequest {
  return {
    server_url: serverUrl,
    test_type: testType,
    config: { timeout, transport: 'http', verbose: false, params }
  };
}

export interface RecordingLogger extends Logger {
  lines: string[];
}

/** Logger that keeps `<level> <message>` lines instead of printing. */
export function recordingLogger(): RecordingLogger {
  const lines: string[] = [];
  return {
    lines,
    debug: (message) => lines.push(`debug ${message}`),
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`)
  };
}
