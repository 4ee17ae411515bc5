import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import {
  ListResourcesResultSchema,
  ResourceDescriptorSchema
} from '../schemas.js';
import {
  buildRequest,
  getErrorCode,
  getErrorMessage,
  getResult,
  hasError,
  isRecord,
  type JsonRpcChannel
} from '../transport/index.js';
import { performHandshake } from './handshake.js';
import type { Probe, ProbeContext, ProbeVerdict } from './probe.js';

export class ResourceAccessProbe implements Probe {
  readonly name = 'resource_access';
  readonly title = 'Resource access';
  readonly description =
    'List resources, read the first one and try subscribing to it';

  async run(context: ProbeContext): Promise<ProbeVerdict> {
    const { recorder } = context;
    const channel = await context.connect();
    await performHandshake(context, channel);

    const listReply = await channel.request(
      buildRequest('resources/list', {}, context.nextRequestId())
    );

    let resources: unknown[] = [];
    if (listReply.status !== 200) {
      recorder.fail(
        'resources',
        `Failed to list resources: HTTP ${listReply.status}`
      );
    } else {
      const listed = ListResourcesResultSchema.safeParse(
        getResult(listReply.body)
      );
      if (listed.success) {
        resources = listed.data.resources;
        recorder.results.resources_accessible = resources.length;
        recorder.exchanged();
        if (resources.length === 0) {
          recorder.info('resources', 'No resources found on server');
        }
      } else {
        recorder.fail('resources', 'Invalid resources/list response format');
      }
    }

    if (resources.length > 0) {
      const resource = ResourceDescriptorSchema.safeParse(resources[0]);
      if (!resource.success) {
        recorder.fail('resources', 'First listed resource has no URI');
      } else {
        await this.read(context, channel, resource.data.uri);
        await this.subscribe(context, channel, resource.data.uri);
      }
    }

    return {
      requirementsMet:
        recorder.results.initialized && recorder.results.errors_encountered === 0
    };
  }

  private async read(
    context: ProbeContext,
    channel: JsonRpcChannel,
    uri: string
  ): Promise<void> {
    const { recorder } = context;
    const reply = await channel.request(
      buildRequest('resources/read', { uri }, context.nextRequestId())
    );

    if (reply.status !== 200) {
      recorder.fail('resource_access', `Resource read failed: HTTP ${reply.status}`);
      return;
    }
    recorder.exchanged();

    if (hasError(reply.body)) {
      recorder.fail(
        'resource_access',
        `Resource read error: ${getErrorMessage(reply.body)}`,
        'warning'
      );
      return;
    }

    const contents = getResult(reply.body)?.contents;
    if (!Array.isArray(contents) || contents.length === 0) {
      recorder.fail('resource_access', 'Invalid resource read response format');
      return;
    }

    contents.forEach((item: unknown, index) => {
      const hasUri = isRecord(item) && typeof item.uri === 'string';
      const hasText = isRecord(item) && typeof item.text === 'string';
      if (!hasUri || !hasText) {
        const missing = [!hasUri && 'uri', !hasText && 'text'].filter(Boolean);
        recorder.warn(
          'resource_format',
          `Resource content ${index} missing ${missing.join(' and ')}`
        );
      }
    });
  }

  private async subscribe(
    context: ProbeContext,
    channel: JsonRpcChannel,
    uri: string
  ): Promise<void> {
    const { recorder } = context;
    const reply = await channel.request(
      buildRequest('resources/subscribe', { uri }, context.nextRequestId())
    );
    if (reply.status !== 200) {
      recorder.info(
        'resource_subscription',
        `Subscription request answered with HTTP ${reply.status}`
      );
      return;
    }
    recorder.exchanged();

    if (!hasError(reply.body)) {
      recorder.info('resource_subscription', 'Resource subscription supported');
    } else if (getErrorCode(reply.body) === ErrorCode.MethodNotFound) {
      recorder.info(
        'resource_subscription',
        'Resource subscription not supported'
      );
    } else {
      recorder.warn(
        'resource_subscription',
        `Subscription error: ${getErrorMessage(reply.body)}`
      );
    }
  }
}
