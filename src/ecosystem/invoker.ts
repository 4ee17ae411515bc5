import { promises as fs } from 'fs';
import { DEFAULT_TIMEOUT_SECONDS } from '../constants.js';
import { errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { listImplementedProbes } from '../probes/index.js';
import { runCommand, type CommandResult } from '../process.js';
import { runProbe } from '../runner/dispatcher.js';
import { EngineReportSchema, ValidationStatusSchema } from '../schemas.js';
import { parseJson } from '../transport/index.js';
import type { TestType, ValidationOutcome } from '../types.js';

/** Validates one live server reachable at `serverUrl`. */
export interface Validator {
  validate(serverUrl: string): Promise<ValidationOutcome>;
}

function outcome(
  status: ValidationOutcome['status'],
  errorMessageText?: string
): ValidationOutcome {
  return {
    status,
    compliance_score: null,
    protocol_version: null,
    capabilities: [],
    issues: [],
    ...(errorMessageText !== undefined && { error_message: errorMessageText })
  };
}

export interface ProbeSuiteOptions {
  timeoutSeconds?: number;
  testTypes?: TestType[];
  logger?: Logger;
}

/** Runs the probes in-process, one after another, and scores the pass rate. */
export class ProbeSuiteValidator implements Validator {
  private readonly timeoutSeconds: number;
  private readonly testTypes: TestType[];
  private readonly logger: Logger;

  constructor(options: ProbeSuiteOptions = {}) {
    this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    this.testTypes = options.testTypes ?? listImplementedProbes();
    this.logger = options.logger ?? createLogger('probe-suite');
  }

  async validate(serverUrl: string): Promise<ValidationOutcome> {
    const result = outcome('unknown');
    let passed = 0;

    for (const testType of this.testTypes) {
      const probeResult = await runProbe(
        {
          server_url: serverUrl,
          test_type: testType,
          config: {
            timeout: this.timeoutSeconds,
            transport: 'http',
            verbose: false,
            params: {}
          }
        },
        { logger: this.logger }
      );
      this.logger.debug(
        `${testType} ${probeResult.success ? 'passed' : 'failed'} for ${serverUrl}`
      );

      if (probeResult.success) {
        passed += 1;
      }
      for (const issue of probeResult.issues) {
        result.issues.push({ ...issue, category: `${testType}:${issue.category}` });
      }
      const info = probeResult.server_info;
      if (info && result.protocol_version === null) {
        result.protocol_version = info.protocol_version ?? null;
        result.capabilities = [...info.capabilities];
      }
    }

    const total = this.testTypes.length;
    result.compliance_score = total > 0 ? (passed * 100) / total : null;
    result.status = total > 0 && passed === total ? 'compliant' : 'failed';
    if (result.status === 'failed') {
      result.error_message = `${total - passed} of ${total} probes failed`;
    }
    return result;
  }
}

export interface EngineOptions {
  /** Argv prefix of the engine, e.g. `['/usr/local/bin/mcp-validate']`. */
  command: string[];
  timeoutSeconds?: number;
  /** Run once when the engine executable is missing. */
  buildCommand?: string[];
  buildCwd?: string;
  logger?: Logger;
}

const ENGINE_GRACE_MS = 10_000;
const BUILD_TIMEOUT_MS = 600_000;

function trimmed(text: string, max = 500): string {
  const value = text.trim();
  return value.length > max ? `${value.slice(0, max)}...` : value;
}

/**
 * Delegates to an external validation engine and maps each way it can fail
 * to its own status.
 */
export class EngineValidator implements Validator {
  private readonly command: string[];
  private readonly timeoutSeconds: number;
  private readonly logger: Logger;
  private build: Promise<string | undefined> | undefined;

  constructor(private readonly options: EngineOptions) {
    this.command = options.command;
    this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    this.logger = options.logger ?? createLogger('engine');
  }

  async validate(serverUrl: string): Promise<ValidationOutcome> {
    const buildFailure = await this.ensureBuilt();
    if (buildFailure) {
      return outcome('build_failed', buildFailure);
    }

    const argv = [
      ...this.command,
      serverUrl,
      '--all',
      '--timeout',
      String(this.timeoutSeconds),
      '--format',
      'json'
    ];
    this.logger.info(`Running validation engine: ${argv.join(' ')}`);

    let result: CommandResult;
    try {
      result = await runCommand(argv, {
        timeoutMs: this.timeoutSeconds * 1000 + ENGINE_GRACE_MS
      });
    } catch (error) {
      return outcome(
        'build_failed',
        `Validation engine could not be started: ${errorMessage(error)}`
      );
    }

    return this.interpret(result);
  }

  interpret(result: CommandResult): ValidationOutcome {
    if (result.timedOut) {
      return outcome('timeout', 'Validation engine exceeded its timeout');
    }

    if (!result.stdout.trim()) {
      if (result.exitCode !== 0) {
        return outcome(
          'error',
          `Validation engine exited with code ${result.exitCode ?? 'none'}${
            result.stderr.trim() ? `: ${trimmed(result.stderr)}` : ''
          }`
        );
      }
      return outcome(
        'no_output',
        result.stderr.trim() ? trimmed(result.stderr) : 'Validation engine printed nothing'
      );
    }

    const json = parseJson(result.stdout);
    if (json === undefined) {
      return outcome(
        'parse_error',
        `Validation engine output is not JSON: ${trimmed(result.stdout, 200)}`
      );
    }

    const parsed = EngineReportSchema.safeParse(json);
    if (!parsed.success) {
      return outcome(
        'parse_error',
        `Validation engine output does not match the report format: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ')}`
      );
    }

    const report = parsed.data;
    const status = ValidationStatusSchema.safeParse(report.status);
    if (report.status !== undefined && !status.success) {
      this.logger.warn(`Engine reported unrecognized status '${report.status}'`);
    }

    return {
      status: status.success ? status.data : 'unknown',
      compliance_score: report.compliance_score ?? null,
      protocol_version: report.protocol_version ?? null,
      capabilities: report.capabilities,
      issues: report.issues
    };
  }

  /** Resolves to a failure message, or undefined when the engine is ready. */
  private ensureBuilt(): Promise<string | undefined> {
    this.build ??= this.buildIfMissing();
    return this.build;
  }

  private async buildIfMissing(): Promise<string | undefined> {
    const { buildCommand, buildCwd } = this.options;
    const executable = this.command[0];
    if (!buildCommand || !executable) {
      return undefined;
    }

    try {
      await fs.access(executable);
      return undefined;
    } catch {
      this.logger.info(`Building validation engine: ${buildCommand.join(' ')}`);
    }

    try {
      const result = await runCommand(buildCommand, {
        cwd: buildCwd,
        timeoutMs: BUILD_TIMEOUT_MS
      });
      if (result.timedOut || result.exitCode !== 0) {
        const detail = trimmed(result.stderr) || `exit code ${result.exitCode ?? 'none'}`;
        return `Engine build failed: ${detail}`;
      }
    } catch (error) {
      return `Engine build could not run: ${errorMessage(error)}`;
    }
    return undefined;
  }
}
