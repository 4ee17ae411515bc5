import {
  ListToolsResultSchema,
  ToolDescriptorSchema,
  type ToolDescriptor
} from '../schemas.js';
import {
  buildRequest,
  getErrorMessage,
  getResult,
  hasError,
  hasResult,
  type JsonRpcChannel
} from '../transport/index.js';
import { performHandshake } from './handshake.js';
import type { Probe, ProbeContext, ProbeVerdict } from './probe.js';

function primaryType(type: string | string[] | undefined): string | undefined {
  if (Array.isArray(type)) {
    return type.find((candidate) => candidate !== 'null');
  }
  return type;
}

/**
 * Minimal arguments for a tool: the declared default when there is one,
 * otherwise a placeholder per primitive type. Properties of any other type
 * are left out.
 */
export function synthesizeArguments(
  tool: ToolDescriptor
): Record<string, unknown> {
  const args: Record<string, unknown> = {};
  const properties = tool.inputSchema?.properties ?? {};

  for (const [name, property] of Object.entries(properties)) {
    if (property.default !== undefined) {
      args[name] = property.default;
      continue;
    }
    switch (primaryType(property.type)) {
      case 'string':
        args[name] = 'test';
        break;
      case 'number':
      case 'integer':
        args[name] = 0;
        break;
      case 'boolean':
        args[name] = false;
        break;
    }
  }
  return args;
}

export class ToolExecutionProbe implements Probe {
  readonly name = 'tool_execution';
  readonly title = 'Tool execution';
  readonly description =
    'List tools and invoke the first one with arguments derived from its input schema';

  async run(context: ProbeContext): Promise<ProbeVerdict> {
    const { recorder } = context;
    const channel = await context.connect();
    await performHandshake(context, channel);

    const listReply = await channel.request(
      buildRequest('tools/list', {}, context.nextRequestId())
    );

    let tools: unknown[] = [];
    if (listReply.status !== 200) {
      recorder.fail('tools', `Failed to list tools: HTTP ${listReply.status}`);
    } else {
      const listed = ListToolsResultSchema.safeParse(getResult(listReply.body));
      if (listed.success) {
        tools = listed.data.tools;
        recorder.results.tools_found = tools.length;
        recorder.exchanged();
        if (tools.length === 0) {
          recorder.warn('tools', 'No tools found on server');
        }
      } else {
        recorder.fail('tools', 'Invalid tools/list response format');
      }
    }

    if (tools.length > 0) {
      const tool = ToolDescriptorSchema.safeParse(tools[0]);
      if (!tool.success) {
        recorder.fail('tools', 'First listed tool has no usable name');
      } else {
        await this.invoke(context, channel, tool.data);
      }
    }

    return {
      requirementsMet:
        recorder.results.tools_found > 0 &&
        recorder.results.errors_encountered === 0
    };
  }

  private async invoke(
    context: ProbeContext,
    channel: JsonRpcChannel,
    tool: ToolDescriptor
  ): Promise<void> {
    const { recorder } = context;
    const args = synthesizeArguments(tool);
    context.logger.debug(`Calling tool ${tool.name} with ${JSON.stringify(args)}`);

    const reply = await channel.request(
      buildRequest(
        'tools/call',
        { name: tool.name, arguments: args },
        context.nextRequestId()
      )
    );

    if (reply.status !== 200) {
      recorder.fail('tool_execution', `Tool execution failed: HTTP ${reply.status}`);
      return;
    }
    recorder.exchanged();

    if (hasError(reply.body)) {
      recorder.fail(
        'tool_execution',
        `Tool execution error: ${getErrorMessage(reply.body)}`,
        'warning'
      );
    } else if (!hasResult(reply.body)) {
      recorder.fail('tool_execution', 'Invalid tool execution response format');
    } else if (getResult(reply.body)?.isError === true) {
      recorder.warn('tool_execution', `Tool ${tool.name} reported an error result`);
    }
  }
}
