import { HARNESS_VERSION } from '../constants.js';
import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { ResolvedProbeParams } from '../schemas.js';
import { openChannel, type JsonRpcChannel } from '../transport/index.js';
import type {
  Compatibility,
  Issue,
  IssueSeverity,
  ProbeCounters,
  ServerInfo,
  TestType
} from '../types.js';

export interface ProbeVerdict {
  /** Whether the category-specific counters were satisfied. */
  requirementsMet: boolean;
}

export interface Probe {
  readonly name: TestType;
  readonly title: string;
  readonly description: string;
  run(context: ProbeContext): Promise<ProbeVerdict>;
}

export function emptyCounters(): ProbeCounters {
  return {
    connected: false,
    initialized: false,
    tools_found: 0,
    resources_accessible: 0,
    messages_exchanged: 0,
    errors_encountered: 0
  };
}

/**
 * Append-only record of one probe run. Shared with the dispatcher so partial
 * progress survives a probe that throws.
 */
export class ProbeRecorder {
  readonly results: ProbeCounters = emptyCounters();
  readonly issues: Issue[] = [];
  readonly features: Record<string, boolean> = {};
  private readonly protocolVersions: string[] = [];
  serverInfo: ServerInfo | undefined;

  exchanged(count = 2): void {
    this.results.messages_exchanged += count;
  }

  info(category: string, description: string): void {
    this.issues.push({ severity: 'info', category, description });
  }

  warn(category: string, description: string): void {
    this.issues.push({ severity: 'warning', category, description });
  }

  /** Records an issue that also counts against the run. */
  fail(
    category: string,
    description: string,
    severity: IssueSeverity = 'error',
    stackTrace?: string
  ): void {
    this.results.errors_encountered += 1;
    this.issues.push({
      severity,
      category,
      description,
      ...(stackTrace && { stack_trace: stackTrace })
    });
  }

  hasErrors(): boolean {
    return this.issues.some((issue) => issue.severity === 'error');
  }

  markFeature(feature: string): void {
    this.features[feature] = true;
  }

  addProtocolVersion(version: string): void {
    if (!this.protocolVersions.includes(version)) {
      this.protocolVersions.push(version);
    }
  }

  compatibility(): Compatibility {
    return {
      implementation_version: HARNESS_VERSION,
      runtime_version: process.versions.node,
      protocol_versions: [...this.protocolVersions],
      features: { ...this.features }
    };
  }
}

export interface ProbeSettings {
  timeoutMs: number;
  transportHint: string;
  verbose: boolean;
  params: ResolvedProbeParams;
}

export class ProbeContext {
  readonly recorder = new ProbeRecorder();
  private readonly channels: JsonRpcChannel[] = [];
  private nextId = 1;

  constructor(
    readonly serverUrl: string,
    readonly settings: ProbeSettings,
    readonly logger: Logger
  ) {}

  /** Opens a channel to the server. The dispatcher closes it when the probe ends. */
  async connect(serverUrl = this.serverUrl): Promise<JsonRpcChannel> {
    const channel = await openChannel(serverUrl, this.settings.timeoutMs);
    this.channels.push(channel);
    if (channel.kind !== 'http') {
      this.recorder.results.connected = true;
    }
    this.logger.debug(`Opened ${channel.kind} channel to ${serverUrl}`);
    return channel;
  }

  /** Request ids after the handshake's fixed id of 1. */
  nextRequestId(): number {
    this.nextId += 1;
    return this.nextId;
  }

  async closeAll(): Promise<void> {
    const channels = this.channels.splice(0);
    for (const channel of channels) {
      try {
        await channel.close();
      } catch (error) {
        this.logger.warn(
          `Failed to close ${channel.kind} channel: ${errorMessage(error)}`
        );
      }
    }
  }
}
