import { spawn, type ChildProcess } from 'child_process';
import { errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import {
  OWN_PROCESS_GROUP,
  OutputBuffer,
  terminate,
  waitForExit
} from '../process.js';
import type { ProvisionConfig } from '../types.js';

export const DEFAULT_SERVER_PORT = 8080;

const OUTPUT_DRAIN_MS = 1000;

const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export interface SupervisorOptions {
  /** How long a freshly spawned server gets before its liveness is checked. */
  startupGraceMs?: number;
  /** How long SIGTERM gets before SIGKILL. */
  shutdownTimeoutMs?: number;
  portFlag?: string;
  logger?: Logger;
}

export interface SupervisedServer {
  readonly address: string;
  readonly pid: number | undefined;
  readonly stdout: string;
  readonly stderr: string;
}

export type StartResult =
  | { ok: true; server: SupervisedServer }
  | { ok: false; reason: string; stdout: string; stderr: string };

export interface ServerSupervisor {
  start(config: ProvisionConfig): Promise<StartResult>;
  stop(server: SupervisedServer): Promise<void>;
  /** Stops every server started and not yet stopped. */
  stopAll(): Promise<void>;
}

class RunningServer implements SupervisedServer {
  private readonly out = new OutputBuffer();
  private readonly err = new OutputBuffer();

  constructor(
    readonly child: ChildProcess,
    readonly address: string
  ) {
    child.stdout?.on('data', (chunk: Buffer) => this.out.append(chunk));
    child.stderr?.on('data', (chunk: Buffer) => this.err.append(chunk));
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get stdout(): string {
    return this.out.toString();
  }

  get stderr(): string {
    return this.err.toString();
  }
}

export function buildServerCommand(
  config: ProvisionConfig,
  portFlag = '--port'
): string[] | null {
  if (!config.startCommand || config.startCommand.length === 0) {
    return null;
  }
  return config.port !== null
    ? [...config.startCommand, portFlag, String(config.port)]
    : [...config.startCommand];
}

/**
 * Owns server subprocesses from spawn to exit. Every server handed out by
 * `start` must be passed to `stop`, which always ends the process.
 */
export class ProcessSupervisor implements ServerSupervisor {
  private readonly startupGraceMs: number;
  private readonly shutdownTimeoutMs: number;
  private readonly portFlag: string;
  private readonly logger: Logger;
  private readonly running = new Set<RunningServer>();

  constructor(options: SupervisorOptions = {}) {
    this.startupGraceMs = options.startupGraceMs ?? 3000;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 5000;
    this.portFlag = options.portFlag ?? '--port';
    this.logger = options.logger ?? createLogger('supervisor');
  }

  async start(config: ProvisionConfig): Promise<StartResult> {
    const command = buildServerCommand(config, this.portFlag);
    if (!command) {
      return {
        ok: false,
        reason: `No start command found for ${config.ecosystem} project`,
        stdout: '',
        stderr: ''
      };
    }

    const [file, ...args] = command;
    this.logger.info(`Starting server with command: ${command.join(' ')}`);
    const child = spawn(file, args, {
      cwd: config.path,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: OWN_PROCESS_GROUP
    });
    const closed = new Promise<void>((resolve) => {
      child.once('close', () => resolve());
    });
    const server = new RunningServer(
      child,
      `http://localhost:${config.port ?? DEFAULT_SERVER_PORT}`
    );

    const spawnError = await new Promise<Error | undefined>((resolve) => {
      child.once('spawn', () => resolve(undefined));
      child.once('error', resolve);
    });
    if (spawnError) {
      const reason = `Failed to spawn ${file}: ${errorMessage(spawnError)}`;
      this.logger.error(reason);
      return { ok: false, reason, stdout: '', stderr: '' };
    }
    child.on('error', (error) => {
      this.logger.warn(`Server pid ${child.pid}: ${errorMessage(error)}`);
    });

    if (await waitForExit(child, this.startupGraceMs)) {
      const reason = `Server exited during startup (code ${child.exitCode ?? 'none'}, signal ${child.signalCode ?? 'none'})`;
      // Output can still be in the pipes when 'exit' fires
      await Promise.race([closed, delay(OUTPUT_DRAIN_MS)]);
      // Anything the start command left running in its group
      await terminate(child, this.shutdownTimeoutMs);
      this.logger.error(`${reason}${server.stderr ? `\n${server.stderr}` : ''}`);
      return { ok: false, reason, stdout: server.stdout, stderr: server.stderr };
    }

    this.running.add(server);
    this.logger.debug(`Server pid ${child.pid} listening at ${server.address}`);
    return { ok: true, server };
  }

  async stop(server: SupervisedServer): Promise<void> {
    if (!(server instanceof RunningServer) || !this.running.has(server)) {
      return;
    }
    this.running.delete(server);
    await terminate(server.child, this.shutdownTimeoutMs);
    this.logger.debug(`Server pid ${server.pid} stopped`);
  }

  async stopAll(): Promise<void> {
    await Promise.all([...this.running].map((server) => this.stop(server)));
  }

  /** Servers started and not yet stopped. */
  get activeCount(): number {
    return this.running.size;
  }
}
