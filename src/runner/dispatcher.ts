import {
  ConnectionClosedError,
  ProbeError,
  RequestTimeoutError,
  errorMessage
} from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import {
  ProbeContext,
  ProbeRecorder,
  emptyCounters,
  getProbe,
  type ProbeVerdict
} from '../probes/index.js';
import type { ProbeSettings } from '../probes/probe.js';
import { TestRequestSchema, resolveProbeParams } from '../schemas.js';
import { classifyTransport } from '../transport/index.js';
import type { ProbeConfig, TestRequest, TestResult } from '../types.js';

export interface RunProbeOptions {
  logger?: Logger;
}

export type ParsedTestRequest =
  | { ok: true; request: TestRequest }
  | { ok: false; error: string };

/** Parses and validates a TestRequest document, filling in config defaults. */
export function parseTestRequest(raw: string): ParsedTestRequest {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return { ok: false, error: `Invalid JSON input: ${errorMessage(error)}` };
  }
  const parsed = TestRequestSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error: `Invalid test request: ${details}` };
  }
  return { ok: true, request: parsed.data };
}

function resolveSettings(config: ProbeConfig, logger: Logger): ProbeSettings {
  return {
    timeoutMs: Math.round(config.timeout * 1000),
    transportHint: config.transport,
    verbose: config.verbose,
    params: resolveProbeParams(config.params, logger)
  };
}

/** Converts anything a probe threw into exactly one counted issue. */
function recordFault(recorder: ProbeRecorder, error: unknown): void {
  if (error instanceof ProbeError) {
    recorder.fail(error.category, error.message, error.severity);
  } else if (error instanceof RequestTimeoutError) {
    recorder.fail('timeout', `Connection timed out: ${error.message}`);
  } else if (error instanceof ConnectionClosedError) {
    recorder.fail('connection', error.message);
  } else {
    recorder.fail(
      'execution',
      errorMessage(error),
      'error',
      error instanceof Error ? error.stack : undefined
    );
  }
}

function failedResult(
  error: string,
  issue: TestResult['issues'][number],
  recorder = new ProbeRecorder()
): TestResult {
  return {
    success: false,
    duration_ms: 0,
    results: emptyCounters(),
    error,
    issues: [issue],
    compatibility: recorder.compatibility()
  };
}

/**
 * Runs the probe registered for `request.test_type`. Never throws: unknown
 * test types, missing probes and probe faults all come back as a failed
 * TestResult.
 */
export async function runProbe(
  request: TestRequest,
  options: RunProbeOptions = {}
): Promise<TestResult> {
  const logger = options.logger ?? createLogger('probe');
  const probe = getProbe(request.test_type);

  if (probe === undefined) {
    return failedResult(`Unknown test type: ${request.test_type}`, {
      severity: 'error',
      category: 'test_runner',
      description: `Test type '${request.test_type}' not found`
    });
  }

  if (probe === null) {
    const result = failedResult(`No probe implemented for ${request.test_type}`, {
      severity: 'warning',
      category: 'test_runner',
      description: `Test ${request.test_type} not implemented yet`
    });
    result.results.errors_encountered = 1;
    return result;
  }

  const started = performance.now();
  const settings = resolveSettings(request.config, logger);
  const scheme = classifyTransport(request.server_url);
  if (scheme !== 'unknown' && scheme !== settings.transportHint) {
    logger.debug(
      `Transport hint '${settings.transportHint}' ignored; ${request.server_url} selects ${scheme}`
    );
  }

  const context = new ProbeContext(request.server_url, settings, logger);
  const { recorder } = context;
  let verdict: ProbeVerdict = { requirementsMet: false };

  logger.debug(`Running ${probe.name} against ${request.server_url}`);
  try {
    verdict = await probe.run(context);
  } catch (error) {
    logger.debug(`${probe.name} aborted: ${errorMessage(error)}`);
    recordFault(recorder, error);
  } finally {
    await context.closeAll();
  }

  const success = verdict.requirementsMet && !recorder.hasErrors();
  return {
    success,
    duration_ms: Math.round(performance.now() - started),
    results: { ...recorder.results },
    ...(!success && { error: `${probe.title} test failed` }),
    issues: [...recorder.issues],
    compatibility: recorder.compatibility(),
    ...(recorder.serverInfo && { server_info: recorder.serverInfo })
  };
}
