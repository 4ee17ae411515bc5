import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import {
  ListResourcesResultSchema,
  ListToolsResultSchema
} from '../schemas.js';
import {
  buildRequest,
  getErrorCode,
  getResult
} from '../transport/index.js';
import { performHandshake } from './handshake.js';
import type { Probe, ProbeContext, ProbeVerdict } from './probe.js';

export class BasicConnectionProbe implements Probe {
  readonly name = 'basic_connection';
  readonly title = 'Connection';
  readonly description =
    'Initialize a session, then list tools and resources once each';

  async run(context: ProbeContext): Promise<ProbeVerdict> {
    const { recorder } = context;
    const channel = await context.connect();
    await performHandshake(context, channel);

    const toolsReply = await channel.request(
      buildRequest('tools/list', {}, context.nextRequestId())
    );
    const tools = ListToolsResultSchema.safeParse(getResult(toolsReply.body));
    if (toolsReply.status === 200 && tools.success) {
      recorder.results.tools_found = tools.data.tools.length;
      recorder.exchanged();
    } else {
      recorder.fail(
        'tools',
        `Invalid tools/list response (HTTP ${toolsReply.status})`
      );
    }

    const resourcesReply = await channel.request(
      buildRequest('resources/list', {}, context.nextRequestId())
    );
    const resources = ListResourcesResultSchema.safeParse(
      getResult(resourcesReply.body)
    );
    if (resourcesReply.status === 200 && resources.success) {
      recorder.results.resources_accessible = resources.data.resources.length;
      recorder.exchanged();
    } else if (getErrorCode(resourcesReply.body) === ErrorCode.MethodNotFound) {
      recorder.exchanged();
      recorder.info('resources', 'Server does not expose resources');
    } else {
      recorder.fail(
        'resources',
        `Invalid resources/list response (HTTP ${resourcesReply.status})`
      );
    }

    return {
      requirementsMet:
        recorder.results.initialized && recorder.results.errors_encountered === 0
    };
  }
}
