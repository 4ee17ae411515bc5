import { describe, expect, it, vi } from 'vitest';
import { recordingLogger } from '../test-utils/requests.js';
import type { ProvisionConfig, Target, ValidationOutcome } from '../types.js';
import { StaticTargetSource, type DiscoverySource } from './discovery.js';
import type { Validator } from './invoker.js';
import { BatchOrchestrator } from './orchestrator.js';
import type { Provisioner } from './provisioner.js';
import type { ServerSupervisor, StartResult, SupervisedServer } from './supervisor.js';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const targets = (...names: string[]): Target[] =>
  names.map((name) => ({ name, source: `https://git.example.test/${name}.git` }));

/** Tracks how many targets hold a workspace at once. */
class FakeProvisioner implements Provisioner {
  active = 0;
  peak = 0;
  readonly tornDown: string[] = [];

  constructor(
    private readonly failing: string[] = [],
    private readonly ports: Record<string, number> = {}
  ) {}

  async provision(target: Target): Promise<ProvisionConfig | null> {
    this.active += 1;
    this.peak = Math.max(this.peak, this.active);
    await delay(10);
    if (this.failing.includes(target.name)) {
      this.active -= 1;
      return null;
    }
    return {
      path: `/workspaces/${target.name}`,
      ecosystem: 'node',
      startCommand: ['npm', 'start'],
      port: this.ports[target.name] ?? 3000
    };
  }

  async teardown(config: ProvisionConfig): Promise<void> {
    await delay(10);
    this.tornDown.push(config.path);
    this.active -= 1;
  }

  async teardownAll(): Promise<void> {}
}

class FakeSupervisor implements ServerSupervisor {
  readonly stopped: string[] = [];
  live = 0;
  peakLive = 0;

  constructor(private readonly failing: Record<string, string> = {}) {}

  async start(config: ProvisionConfig): Promise<StartResult> {
    const name = config.path.replace('/workspaces/', '');
    const stderr = this.failing[name];
    if (stderr !== undefined) {
      return { ok: false, reason: 'Server exited during startup (code 1, signal none)', stdout: '', stderr };
    }
    this.live += 1;
    this.peakLive = Math.max(this.peakLive, this.live);
    return {
      ok: true,
      server: { address: `http://localhost/${name}`, pid: 1, stdout: '', stderr: '' }
    };
  }

  async stop(server: SupervisedServer): Promise<void> {
    this.live -= 1;
    this.stopped.push(server.address);
  }

  async stopAll(): Promise<void> {}
}

class FakeValidator implements Validator {
  constructor(private readonly throwing: string[] = []) {}

  async validate(serverUrl: string): Promise<ValidationOutcome> {
    await delay(5);
    if (this.throwing.some((name) => serverUrl.endsWith(`/${name}`))) {
      throw new Error(`validator crashed on ${serverUrl}`);
    }
    return {
      status: 'compliant',
      compliance_score: 100,
      protocol_version: '2024-11-05',
      capabilities: ['tools'],
      issues: []
    };
  }
}

function orchestrator(options: {
  sources?: DiscoverySource[];
  provisioner?: FakeProvisioner;
  supervisor?: FakeSupervisor;
  validator?: FakeValidator;
  maxConcurrent?: number;
}) {
  return new BatchOrchestrator({
    sources: options.sources ?? [],
    provisioner: options.provisioner ?? new FakeProvisioner(),
    supervisor: options.supervisor ?? new FakeSupervisor(),
    validator: options.validator ?? new FakeValidator(),
    maxConcurrent: options.maxConcurrent,
    logger: recordingLogger()
  });
}

describe('BatchOrchestrator', () => {
  it('holds at most maxConcurrent targets from provisioning to teardown', async () => {
    const provisioner = new FakeProvisioner();
    const batch = orchestrator({ provisioner, maxConcurrent: 2 });

    const results = await batch.run(targets('a', 'b', 'c', 'd', 'e'));

    expect(results).toHaveLength(5);
    expect(provisioner.peak).toBe(2);
    expect(provisioner.tornDown).toHaveLength(5);
  });

  it('defaults to a concurrency of three', () => {
    expect(orchestrator({}).concurrency).toBe(3);
  });

  it('fills a result for a validated target', async () => {
    const [result] = await orchestrator({}).run(targets('a'));

    expect(result).toMatchObject({
      server_name: 'a',
      server_url: 'http://localhost/a',
      status: 'compliant',
      compliance_score: 100,
      protocol_version: '2024-11-05',
      capabilities: ['tools'],
      issues: []
    });
    expect(result?.duration_ms).toBeGreaterThanOrEqual(0);
    expect(result?.error_message).toBeUndefined();
  });

  it('isolates each target from the others', async () => {
    const provisioner = new FakeProvisioner(['b']);
    const supervisor = new FakeSupervisor({ c: 'Error: Cannot find module ./dist/index.js' });
    const validator = new FakeValidator(['d']);
    const logger = recordingLogger();
    const batch = new BatchOrchestrator({
      sources: [],
      provisioner,
      supervisor,
      validator,
      maxConcurrent: 2,
      logger
    });

    const results = await batch.run(targets('a', 'b', 'c', 'd', 'e'));

    expect(results.map((r) => [r.server_name, r.status])).toEqual([
      ['a', 'compliant'],
      ['b', 'setup_failed'],
      ['c', 'failed_to_start'],
      ['e', 'compliant']
    ]);

    const setupFailed = results[1];
    expect(setupFailed?.server_url).toBe('https://git.example.test/b.git');
    expect(setupFailed?.error_message).toBe('Failed to setup test environment');

    const startFailed = results[2];
    expect(startFailed?.error_message).toBe('Server process failed to start');
    expect(startFailed?.issues).toEqual([
      {
        severity: 'error',
        category: 'startup',
        description:
          'Server exited during startup (code 1, signal none)\nError: Cannot find module ./dist/index.js'
      }
    ]);

    expect(provisioner.tornDown.sort()).toEqual([
      '/workspaces/a',
      '/workspaces/c',
      '/workspaces/d',
      '/workspaces/e'
    ]);
    expect(supervisor.stopped.sort()).toEqual([
      'http://localhost/a',
      'http://localhost/d',
      'http://localhost/e'
    ]);
    expect(logger.lines).toContain(
      'error Validation of d failed with exception: validator crashed on http://localhost/d'
    );
  });

  it('merges sources, keeping the first target of each name', async () => {
    const failing: DiscoverySource = {
      name: 'registry',
      discover: async () => {
        throw new Error('registry unavailable');
      }
    };
    const batch = orchestrator({
      sources: [
        new StaticTargetSource(targets('a', 'b'), 'first'),
        failing,
        new StaticTargetSource(
          [{ name: 'b', source: 'https://git.example.test/other-b.git' }, ...targets('c')],
          'second'
        )
      ]
    });

    const discovered = await batch.discover();

    expect(discovered).toEqual([
      { name: 'a', source: 'https://git.example.test/a.git' },
      { name: 'b', source: 'https://git.example.test/b.git' },
      { name: 'c', source: 'https://git.example.test/c.git' }
    ]);
  });

  it('discovers targets when none are given', async () => {
    const batch = orchestrator({ sources: [new StaticTargetSource(targets('x', 'y'))] });
    const results = await batch.run();

    expect(results.map((r) => r.server_name)).toEqual(['x', 'y']);
  });
  it('runs servers that share a port one at a time', async () => {
    const supervisor = new FakeSupervisor();
    const batch = orchestrator({ supervisor, maxConcurrent: 3 });

    const results = await batch.run(targets('a', 'b', 'c'));

    expect(results.map((r) => r.status)).toEqual(['compliant', 'compliant', 'compliant']);
    expect(supervisor.peakLive).toBe(1);
  });

  it('runs servers on different ports side by side', async () => {
    const supervisor = new FakeSupervisor();
    const provisioner = new FakeProvisioner([], { a: 4001, b: 4002, c: 4003 });
    const batch = orchestrator({ supervisor, provisioner, maxConcurrent: 3 });

    await batch.run(targets('a', 'b', 'c'));

    expect(supervisor.peakLive).toBeGreaterThan(1);
  });

  it('stops servers before removing workspaces on shutdown', async () => {
    const provisioner = new FakeProvisioner();
    const supervisor = new FakeSupervisor();
    let release: () => void = () => undefined;
    const blocked = new Promise<void>((resolve) => {
      release = resolve;
    });
    let validating = 0;
    const validator: Validator = {
      validate: async () => {
        validating += 1;
        await blocked;
        return {
          status: 'failed',
          compliance_score: null,
          protocol_version: null,
          capabilities: [],
          issues: []
        };
      }
    };
    const batch = new BatchOrchestrator({
      sources: [],
      provisioner,
      supervisor,
      validator,
      logger: recordingLogger()
    });
    const stopAll = vi.spyOn(supervisor, 'stopAll');
    const teardownAll = vi.spyOn(provisioner, 'teardownAll');

    const running = batch.run(targets('a'));
    await vi.waitFor(() => expect(validating).toBe(1));
    await batch.shutdown();

    expect(stopAll).toHaveBeenCalledTimes(1);
    expect(teardownAll).toHaveBeenCalledTimes(1);
    expect(stopAll.mock.invocationCallOrder[0]).toBeLessThan(
      teardownAll.mock.invocationCallOrder[0]
    );

    release();
    await expect(running).resolves.toHaveLength(1);
  });
});
