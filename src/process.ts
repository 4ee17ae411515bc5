import { spawn, type ChildProcess } from 'child_process';
import { setTimeout as delay } from 'timers/promises';
import { RequestTimeoutError } from './errors.js';

/** Output kept per stream; older bytes are dropped first. */
const MAX_CAPTURED_OUTPUT = 64 * 1024;

/** How long a timed-out command gets between SIGTERM and SIGKILL. */
const KILL_GRACE_MS = 2000;

export class OutputBuffer {
  private text = '';

  append(chunk: Buffer | string): void {
    this.text += chunk.toString();
    if (this.text.length > MAX_CAPTURED_OUTPUT) {
      this.text = this.text.slice(this.text.length - MAX_CAPTURED_OUTPUT);
    }
  }

  toString(): string {
    return this.text;
  }
}

export function hasExited(child: ChildProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

/**
 * Spawn option that makes a child the leader of its own process group, so
 * `terminate` reaches the processes it starts as well.
 */
export const OWN_PROCESS_GROUP = process.platform !== 'win32';

const GROUP_POLL_MS = 50;

/** Commands started by `runCommand` that have not finished yet. */
const activeCommands = new Set<ChildProcess>();

function isMissingProcess(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ESRCH'
  );
}

function groupOf(child: ChildProcess): number | undefined {
  return OWN_PROCESS_GROUP ? child.pid : undefined;
}

function groupAlive(group: number): boolean {
  try {
    process.kill(-group, 0);
    return true;
  } catch {
    return false;
  }
}

/** Signals the child's process group, or the child alone when it leads none. */
function signal(child: ChildProcess, name: NodeJS.Signals): void {
  const group = groupOf(child);
  if (group !== undefined) {
    try {
      process.kill(-group, name);
      return;
    } catch (error) {
      if (!isMissingProcess(error)) {
        throw error;
      }
    }
  }
  if (!hasExited(child)) {
    child.kill(name);
  }
}

/** Resolves true once the child exits, false if it is still running after `timeoutMs`. */
export function waitForExit(
  child: ChildProcess,
  timeoutMs: number
): Promise<boolean> {
  if (hasExited(child)) {
    return Promise.resolve(true);
  }
  return new Promise((resolve) => {
    const onExit = () => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      child.off('exit', onExit);
      resolve(false);
    }, timeoutMs);
    child.once('exit', onExit);
  });
}

/** Waits for the child and every other member of its process group. */
async function waitForGroupExit(
  child: ChildProcess,
  timeoutMs: number
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  if (!(await waitForExit(child, timeoutMs))) {
    return false;
  }
  const group = groupOf(child);
  while (group !== undefined && groupAlive(group)) {
    if (Date.now() >= deadline) {
      return false;
    }
    await delay(GROUP_POLL_MS);
  }
  return true;
}

/**
 * Two-phase shutdown of the child and its process group: SIGTERM, wait up to
 * `timeoutMs`, then SIGKILL and wait for the child's exit to be observed.
 */
export async function terminate(
  child: ChildProcess,
  timeoutMs: number
): Promise<void> {
  const group = groupOf(child);
  if (hasExited(child) && (group === undefined || !groupAlive(group))) {
    return;
  }
  signal(child, 'SIGTERM');
  if (await waitForGroupExit(child, timeoutMs)) {
    return;
  }
  signal(child, 'SIGKILL');
  await waitForExit(child, timeoutMs);
}

export interface CommandOptions {
  cwd?: string;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Runs an external command to completion. Rejects only when the command
 * cannot be spawned; a timeout kills the command and resolves with
 * `timedOut` set.
 */
export function runCommand(
  command: readonly string[],
  options: CommandOptions
): Promise<CommandResult> {
  const [file, ...args] = command;
  if (!file) {
    return Promise.reject(new Error('Empty command'));
  }

  return new Promise((resolve, reject) => {
    const child = spawn(file, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: OWN_PROCESS_GROUP
    });
    activeCommands.add(child);
    const stdout = new OutputBuffer();
    const stderr = new OutputBuffer();
    let timedOut = false;
    let settled = false;

    child.stdout?.on('data', (chunk: Buffer) => stdout.append(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.append(chunk));

    const finish = (
      exitCode: number | null,
      signalCode: NodeJS.Signals | null
    ) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      activeCommands.delete(child);
      // A process that escaped the group can keep the pipes open
      child.stdout?.destroy();
      child.stderr?.destroy();
      resolve({
        exitCode,
        signal: signalCode,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        timedOut
      });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      terminate(child, KILL_GRACE_MS).then(
        () => finish(child.exitCode, child.signalCode),
        reject
      );
    }, options.timeoutMs);

    child.once('error', (error) => {
      clearTimeout(timer);
      activeCommands.delete(child);
      settled = true;
      reject(error);
    });

    child.once('exit', (exitCode, signalCode) => {
      if (timedOut) {
        finish(exitCode, signalCode);
      }
    });
    child.once('close', finish);
  });
}

/**
 * Terminates every command `runCommand` is still waiting on. Each pending
 * call then resolves with the signal that ended it.
 */
export async function terminateActiveCommands(
  timeoutMs = KILL_GRACE_MS
): Promise<void> {
  await Promise.all(
    [...activeCommands].map((child) => terminate(child, timeoutMs))
  );
}

/** Rejects with RequestTimeoutError when `promise` has not settled in time. */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => void,
  what?: string
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout();
      reject(new RequestTimeoutError(timeoutMs, what));
    }, timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
