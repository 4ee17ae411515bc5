import {
  classifyTransport,
  probeStreamingEndpoint
} from '../transport/index.js';
import { performHandshake } from './handshake.js';
import type { Probe, ProbeContext, ProbeVerdict } from './probe.js';

export function streamingEndpointUrl(serverUrl: string, ssePath: string): string {
  const suffix = ssePath.startsWith('/') ? ssePath : `/${ssePath}`;
  return serverUrl.replace(/\/+$/, '') + suffix;
}

export class TransportCompatProbe implements Probe {
  readonly name = 'transport_compat';
  readonly title = 'Transport compatibility';
  readonly description =
    'Exercise the transport named by the address scheme and look for a streaming endpoint';

  async run(context: ProbeContext): Promise<ProbeVerdict> {
    const { recorder, serverUrl, settings } = context;
    const kind = classifyTransport(serverUrl);
    context.logger.debug(`Classified ${serverUrl} as ${kind} transport`);

    switch (kind) {
      case 'http': {
        const channel = await context.connect();
        await performHandshake(context, channel);

        const sseUrl = streamingEndpointUrl(serverUrl, settings.params.ssePath);
        const sse = await probeStreamingEndpoint(sseUrl, settings.timeoutMs);
        if (sse.available) {
          recorder.markFeature('sse_transport');
          recorder.info('sse_transport', `SSE endpoint available at ${sseUrl}`);
        } else {
          const detail =
            sse.status !== undefined ? `HTTP ${sse.status}` : sse.reason;
          recorder.info(
            'sse_transport',
            `No SSE endpoint at ${sseUrl} (${detail ?? 'no response'})`
          );
        }
        break;
      }
      case 'websocket': {
        const channel = await context.connect();
        await performHandshake(context, channel);
        break;
      }
      case 'stdio':
        recorder.info(
          'stdio_transport',
          'stdio transport verification needs process management and is not exercised by this probe'
        );
        break;
      case 'unknown':
        recorder.fail('transport', `Unknown transport type for ${serverUrl}`);
        break;
    }

    return {
      requirementsMet:
        recorder.results.initialized && recorder.results.errors_encountered === 0
    };
  }
}
