import { DEFAULT_MAX_CONCURRENT } from '../constants.js';
import { errorMessage } from '../errors.js';
import { terminateActiveCommands } from '../process.js';
import { createLogger, type Logger } from '../logger.js';
import type {
  Issue,
  ProvisionConfig,
  Target,
  ValidationOutcome,
  ValidationResult
} from '../types.js';
import type { DiscoverySource } from './discovery.js';
import { ConcurrencyGate } from './gate.js';
import type { Provisioner } from './provisioner.js';
import { DEFAULT_SERVER_PORT, type ServerSupervisor } from './supervisor.js';
import type { Validator } from './invoker.js';

const STARTUP_OUTPUT_TAIL = 2000;

export interface OrchestratorOptions {
  sources: DiscoverySource[];
  provisioner: Provisioner;
  supervisor: ServerSupervisor;
  validator: Validator;
  maxConcurrent?: number;
  logger?: Logger;
}

function tail(text: string, max = STARTUP_OUTPUT_TAIL): string {
  const value = text.trim();
  return value.length > max ? value.slice(value.length - max) : value;
}

/**
 * Validates many targets under one concurrency gate. A slot is taken before
 * provisioning and given back after teardown, so a slow teardown still
 * counts against the width. Servers that would listen on the same port run
 * one at a time.
 */
export class BatchOrchestrator {
  private readonly gate: ConcurrencyGate;
  private readonly portGates = new Map<number, ConcurrencyGate>();
  private readonly logger: Logger;

  constructor(private readonly options: OrchestratorOptions) {
    this.gate = new ConcurrencyGate(
      options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT
    );
    this.logger = options.logger ?? createLogger('orchestrator');
  }

  get concurrency(): number {
    return this.gate.width;
  }

  async discover(): Promise<Target[]> {
    const targets = new Map<string, Target>();
    for (const source of this.options.sources) {
      let found: Target[];
      try {
        found = await source.discover();
      } catch (error) {
        this.logger.error(
          `Discovery source ${source.name} failed: ${errorMessage(error)}`
        );
        continue;
      }
      for (const target of found) {
        if (targets.has(target.name)) {
          this.logger.warn(`Duplicate target ${target.name} from ${source.name} ignored`);
          continue;
        }
        targets.set(target.name, target);
      }
    }
    this.logger.info(`Discovered ${targets.size} implementations to validate`);
    return [...targets.values()];
  }

  /**
   * Validates every discovered target. A target whose validation faults is
   * logged and left out of the returned list.
   */
  async run(targets?: Target[]): Promise<ValidationResult[]> {
    const queue = targets ?? (await this.discover());
    const settled = await Promise.allSettled(
      queue.map((target) => this.validateTarget(target))
    );

    const results: ValidationResult[] = [];
    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        results.push(outcome.value);
      } else {
        this.logger.error(
          `Validation of ${queue[index]?.name ?? `target ${index}`} failed with exception: ${errorMessage(outcome.reason)}`
        );
      }
    });
    return results;
  }

  validateTarget(target: Target): Promise<ValidationResult> {
    return this.gate.run(() => this.validateInSlot(target));
  }

  private async validateInSlot(target: Target): Promise<ValidationResult> {
    const { provisioner } = this.options;
    const startedAt = Date.now();
    this.logger.info(`Validating ${target.name} from ${target.source}`);

    const config = await provisioner.provision(target);
    if (!config) {
      return this.result(target, target.source, startedAt, {
        status: 'setup_failed',
        error_message: 'Failed to setup test environment'
      });
    }

    try {
      return await this.startAndValidate(target, config, startedAt);
    } finally {
      await provisioner.teardown(config);
    }
  }

  /**
   * Ends everything a batch still holds: running commands, then servers,
   * then workspaces. Pending validations finish with whatever they observe.
   */
  async shutdown(): Promise<void> {
    const { provisioner, supervisor } = this.options;
    await terminateActiveCommands();
    await supervisor.stopAll();
    await provisioner.teardownAll();
  }

  private portGate(port: number): ConcurrencyGate {
    let gate = this.portGates.get(port);
    if (!gate) {
      gate = new ConcurrencyGate(1);
      this.portGates.set(port, gate);
    }
    return gate;
  }

  private startAndValidate(
    target: Target,
    config: ProvisionConfig,
    startedAt: number
  ): Promise<ValidationResult> {
    const port = config.port ?? DEFAULT_SERVER_PORT;
    return this.portGate(port).run(() =>
      this.startOnPort(target, config, startedAt)
    );
  }

  private async startOnPort(
    target: Target,
    config: ProvisionConfig,
    startedAt: number
  ): Promise<ValidationResult> {
    const { supervisor, validator } = this.options;

    const started = await supervisor.start(config);
    if (!started.ok) {
      const output = tail(started.stderr) || tail(started.stdout);
      const issue: Issue = {
        severity: 'error',
        category: 'startup',
        description: output ? `${started.reason}\n${output}` : started.reason
      };
      return this.result(target, target.source, startedAt, {
        status: 'failed_to_start',
        issues: [issue],
        error_message: 'Server process failed to start'
      });
    }

    const { server } = started;
    try {
      const outcome = await validator.validate(server.address);
      this.logger.info(`${target.name}: ${outcome.status}`);
      return this.result(target, server.address, startedAt, outcome);
    } finally {
      await supervisor.stop(server);
    }
  }

  private result(
    target: Target,
    serverUrl: string,
    startedAt: number,
    outcome: Partial<ValidationOutcome> & Pick<ValidationOutcome, 'status'>
  ): ValidationResult {
    return {
      server_name: target.name,
      server_url: serverUrl,
      status: outcome.status,
      compliance_score: outcome.compliance_score ?? null,
      protocol_version: outcome.protocol_version ?? null,
      capabilities: outcome.capabilities ?? [],
      issues: outcome.issues ?? [],
      duration_ms: Date.now() - startedAt,
      timestamp: new Date().toISOString(),
      ...(outcome.error_message !== undefined && {
        error_message: outcome.error_message
      })
    };
  }
}
