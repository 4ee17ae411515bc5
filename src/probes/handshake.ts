import { SUPPORTED_PROTOCOL_VERSIONS } from '@modelcontextprotocol/sdk/types.js';
import { HARNESS_VERSION, PROTOCOL_VERSION } from '../constants.js';
import { ProbeError } from '../errors.js';
import { InitializeResultSchema } from '../schemas.js';
import {
  buildRequest,
  getErrorMessage,
  getResult,
  hasError,
  type JsonRpcChannel
} from '../transport/index.js';
import type { ServerInfo } from '../types.js';
import type { ProbeContext } from './probe.js';

export const INITIALIZE_REQUEST_ID = 1;

export function buildInitializeRequest(clientName: string) {
  return buildRequest(
    'initialize',
    {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: { name: clientName, version: HARNESS_VERSION }
    },
    INITIALIZE_REQUEST_ID
  );
}

/**
 * Common prologue of every probe. Throws ProbeError when the server does not
 * complete the initialize exchange, which aborts the probe.
 */
export async function performHandshake(
  context: ProbeContext,
  channel: JsonRpcChannel
): Promise<ServerInfo> {
  const { recorder, settings } = context;
  recorder.addProtocolVersion(PROTOCOL_VERSION);

  const reply = await channel.request(
    buildInitializeRequest(settings.params.clientName)
  );

  if (reply.status !== 200) {
    throw new ProbeError('connection', `HTTP ${reply.status}: Failed to initialize`);
  }
  recorder.results.connected = true;

  if (hasError(reply.body)) {
    throw new ProbeError(
      'initialization',
      `Initialize error: ${getErrorMessage(reply.body)}`
    );
  }

  const result = getResult(reply.body);
  if (!result) {
    throw new ProbeError('initialization', 'Invalid initialization response');
  }

  recorder.results.initialized = true;
  recorder.exchanged();
  recorder.markFeature(`${channel.kind}_transport`);

  const parsed = InitializeResultSchema.safeParse(result);
  let info: ServerInfo = { capabilities: [] };
  if (parsed.success) {
    const { protocolVersion, capabilities, serverInfo } = parsed.data;
    info = {
      ...(serverInfo?.name !== undefined && { name: serverInfo.name }),
      ...(serverInfo?.version !== undefined && { version: serverInfo.version }),
      ...(protocolVersion !== undefined && { protocol_version: protocolVersion }),
      capabilities: Object.keys(capabilities ?? {})
    };

    if (protocolVersion) {
      recorder.addProtocolVersion(protocolVersion);
      if (!SUPPORTED_PROTOCOL_VERSIONS.includes(protocolVersion)) {
        recorder.info(
          'protocol_version',
          `Server answered with unrecognized protocol version ${protocolVersion}`
        );
      }
    }
  } else {
    recorder.warn('initialization', 'Initialize result has an unexpected shape');
  }

  recorder.serverInfo = info;
  context.logger.debug(
    `Initialized ${info.name ?? 'server'} (protocol ${info.protocol_version ?? 'unknown'})`
  );
  return info;
}
