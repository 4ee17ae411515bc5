import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { runCommand, type CommandResult } from '../process.js';
import { isRecord } from '../transport/index.js';
import type { EcosystemKind, ProvisionConfig, Target } from '../types.js';

export const DEFAULT_PORTS: Record<EcosystemKind, number | null> = {
  node: 3000,
  python: 8080,
  unknown: null
};

const NODE_SCRIPTS = ['start', 'dev', 'serve'];
const NODE_ENTRY_FILES = ['dist/index.js', 'build/index.js', 'index.js', 'server.js'];
const PYTHON_ENTRY_FILES = ['server.py', 'main.py'];

const CLONE_TIMEOUT_MS = 60_000;
const INSTALL_TIMEOUT_MS = 300_000;

/** Materializes a target's source into an empty directory. */
export interface SourceFetcher {
  fetch(source: string, destination: string): Promise<void>;
}

/** Installs a workspace's dependencies. Rejects when installation fails. */
export interface DependencyInstaller {
  install(workspace: string, ecosystem: EcosystemKind): Promise<void>;
}

export interface Provisioner {
  provision(target: Target): Promise<ProvisionConfig | null>;
  teardown(config: ProvisionConfig): Promise<void>;
  /** Removes every workspace still on disk. */
  teardownAll(): Promise<void>;
}

function describeFailure(what: string, result: CommandResult): string {
  if (result.timedOut) {
    return `${what} timed out`;
  }
  const stderr = result.stderr.trim();
  return `${what} exited with code ${result.exitCode ?? 'none'}${stderr ? `: ${stderr}` : ''}`;
}

export class GitSourceFetcher implements SourceFetcher {
  async fetch(source: string, destination: string): Promise<void> {
    const result = await runCommand(
      ['git', 'clone', '--depth', '1', source, destination],
      { timeoutMs: CLONE_TIMEOUT_MS }
    );
    if (result.timedOut || result.exitCode !== 0) {
      throw new Error(describeFailure(`git clone ${source}`, result));
    }
  }
}

export class CommandInstaller implements DependencyInstaller {
  constructor(private readonly python = 'python3') {}

  installCommand(ecosystem: EcosystemKind): string[] | null {
    switch (ecosystem) {
      case 'node':
        return ['npm', 'install'];
      case 'python':
        return [this.python, '-m', 'pip', 'install', '-e', '.'];
      case 'unknown':
        return null;
    }
  }

  async install(workspace: string, ecosystem: EcosystemKind): Promise<void> {
    const command = this.installCommand(ecosystem);
    if (!command) {
      return;
    }
    const result = await runCommand(command, {
      cwd: workspace,
      timeoutMs: INSTALL_TIMEOUT_MS
    });
    if (result.timedOut || result.exitCode !== 0) {
      throw new Error(describeFailure(command.join(' '), result));
    }
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

async function listDirectory(dir: string): Promise<string[]> {
  try {
    return (await fs.readdir(dir)).sort();
  } catch {
    return [];
  }
}

export async function detectEcosystem(workspace: string): Promise<EcosystemKind> {
  if (await exists(path.join(workspace, 'package.json'))) {
    return 'node';
  }
  if (
    (await exists(path.join(workspace, 'pyproject.toml'))) ||
    (await exists(path.join(workspace, 'setup.py')))
  ) {
    return 'python';
  }
  return 'unknown';
}

async function readScripts(workspace: string): Promise<Record<string, unknown>> {
  try {
    const manifest: unknown = JSON.parse(
      await fs.readFile(path.join(workspace, 'package.json'), 'utf8')
    );
    if (isRecord(manifest) && isRecord(manifest.scripts)) {
      return manifest.scripts;
    }
  } catch {
    // Unreadable manifest: fall through to entry files
  }
  return {};
}

/**
 * Searches conventional script names first, then entry-point files, and
 * returns the first match.
 */
export async function deriveStartCommand(
  workspace: string,
  ecosystem: EcosystemKind,
  python = 'python3'
): Promise<string[] | null> {
  if (ecosystem === 'node') {
    const scripts = await readScripts(workspace);
    for (const script of NODE_SCRIPTS) {
      if (typeof scripts[script] === 'string') {
        return script === 'start' ? ['npm', 'start'] : ['npm', 'run', script];
      }
    }
    for (const entry of NODE_ENTRY_FILES) {
      if (await exists(path.join(workspace, entry))) {
        return ['node', entry];
      }
    }
    return null;
  }

  if (ecosystem === 'python') {
    const example = (await listDirectory(path.join(workspace, 'examples'))).find(
      (file) => file.includes('server') && file.endsWith('.py')
    );
    if (example) {
      return [python, path.join('examples', example)];
    }
    const srcModule = (await listDirectory(path.join(workspace, 'src'))).find(
      (entry) => entry.startsWith('mcp_')
    );
    if (srcModule) {
      return [python, '-m', srcModule];
    }
    for (const entry of PYTHON_ENTRY_FILES) {
      if (await exists(path.join(workspace, entry))) {
        return [python, entry];
      }
    }
  }

  return null;
}

export interface ProvisionerOptions {
  fetcher?: SourceFetcher;
  installer?: DependencyInstaller;
  python?: string;
  /** Parent of every workspace. Defaults to the OS temp directory. */
  root?: string;
  logger?: Logger;
}

export class EnvironmentProvisioner implements Provisioner {
  private readonly fetcher: SourceFetcher;
  private readonly installer: DependencyInstaller;
  private readonly python: string;
  private readonly root: string;
  private readonly logger: Logger;
  private readonly workspaces = new Set<string>();

  constructor(options: ProvisionerOptions = {}) {
    this.python = options.python ?? 'python3';
    this.fetcher = options.fetcher ?? new GitSourceFetcher();
    this.installer = options.installer ?? new CommandInstaller(this.python);
    this.root = options.root ?? os.tmpdir();
    this.logger = options.logger ?? createLogger('provisioner');
  }

  /**
   * Builds an isolated workspace for `target`. Returns null when any step
   * fails; the workspace is removed before returning.
   */
  async provision(target: Target): Promise<ProvisionConfig | null> {
    let workspace: string | undefined;
    try {
      workspace = await fs.mkdtemp(
        path.join(this.root, `mcp_test_${target.name.replace(/[^\w.-]/g, '_')}_`)
      );
      this.workspaces.add(workspace);

      this.logger.info(`Fetching ${target.source} into ${workspace}`);
      await this.fetcher.fetch(target.source, workspace);

      const ecosystem = await detectEcosystem(workspace);
      this.logger.debug(`${target.name} detected as ${ecosystem}`);

      await this.installer.install(workspace, ecosystem);

      const startCommand =
        target.startCommand ??
        (await deriveStartCommand(workspace, ecosystem, this.python));
      const port = target.port ?? DEFAULT_PORTS[ecosystem];
      this.logger.debug(
        `${target.name} start command: ${startCommand?.join(' ') ?? '(none)'}, port ${port ?? '(none)'}`
      );

      return { path: workspace, ecosystem, startCommand, port };
    } catch (error) {
      this.logger.error(
        `Failed to set up test environment for ${target.name}: ${errorMessage(error)}`
      );
      if (workspace) {
        await this.removeWorkspace(workspace);
      }
      return null;
    }
  }

  async teardown(config: ProvisionConfig): Promise<void> {
    await this.removeWorkspace(config.path);
  }

  async teardownAll(): Promise<void> {
    await Promise.all(
      [...this.workspaces].map((workspace) => this.removeWorkspace(workspace))
    );
  }

  private async removeWorkspace(workspace: string): Promise<void> {
    this.workspaces.delete(workspace);
    try {
      await fs.rm(workspace, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(`Failed to remove ${workspace}: ${errorMessage(error)}`);
    }
  }
}
