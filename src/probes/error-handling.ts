import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import {
  ChannelNotOpenError,
  RequestTimeoutError,
  errorMessage
} from '../errors.js';
import {
  getErrorCode,
  hasError,
  type ChannelReply,
  type JsonRpcChannel
} from '../transport/index.js';
import { performHandshake } from './handshake.js';
import type { Probe, ProbeContext, ProbeVerdict } from './probe.js';

export const MALFORMED_BODY =
  '{"jsonrpc": "2.0", "method": "test", invalid json}';

interface AdversarialCase {
  /** Fills in "Wrong error code for <label>". */
  label: string;
  /** Fills in "Server accepted <accepted>". */
  accepted: string;
  expectedCodes: readonly number[];
  send(channel: JsonRpcChannel): Promise<ChannelReply>;
}

export const ADVERSARIAL_CASES: readonly AdversarialCase[] = [
  {
    label: 'invalid JSON-RPC version',
    accepted: 'invalid JSON-RPC version',
    expectedCodes: [ErrorCode.InvalidRequest],
    send: (channel) =>
      channel.request({
        jsonrpc: '1.0',
        method: 'tools/list',
        params: {},
        id: 'test1'
      })
  },
  {
    label: 'missing method',
    accepted: 'request without method',
    expectedCodes: [ErrorCode.InvalidRequest, ErrorCode.InvalidParams],
    send: (channel) =>
      channel.request({ jsonrpc: '2.0', params: {}, id: 'test2' })
  },
  {
    label: 'unknown method',
    accepted: 'unknown method',
    expectedCodes: [ErrorCode.MethodNotFound],
    send: (channel) =>
      channel.request({
        jsonrpc: '2.0',
        method: 'unknown/method',
        params: {},
        id: 'test3'
      })
  },
  {
    label: 'missing required parameter',
    accepted: 'tools/call without a tool name',
    expectedCodes: [ErrorCode.InvalidParams, ErrorCode.InternalError],
    send: (channel) =>
      channel.request({
        jsonrpc: '2.0',
        method: 'tools/call',
        params: { arguments: {} },
        id: 'test4'
      })
  }
];

const CASE_COUNT = ADVERSARIAL_CASES.length + 1;

/**
 * Sends adversarial requests after a normal handshake and checks the error
 * code of each rejection. The malformed body goes last: a server may drop
 * the connection over it.
 */
export class ErrorHandlingProbe implements Probe {
  readonly name = 'error_handling';
  readonly title = 'Error handling';
  readonly description =
    'Send invalid requests and check the JSON-RPC error codes returned';

  async run(context: ProbeContext): Promise<ProbeVerdict> {
    const { recorder, settings } = context;
    const channel = await context.connect();
    await performHandshake(context, channel);

    let passed = 0;
    for (const adversarial of ADVERSARIAL_CASES) {
      if (await this.check(context, channel, adversarial)) {
        passed += 1;
      }
    }
    if (await this.checkMalformed(context, channel)) {
      passed += 1;
    }

    const ratio = passed / CASE_COUNT;
    if (ratio < settings.params.passThreshold) {
      recorder.warn(
        'error_handling',
        `Error handling score: ${(ratio * 100).toFixed(1)}% (${passed}/${CASE_COUNT} tests passed)`
      );
    }

    return {
      requirementsMet:
        recorder.results.initialized && ratio >= settings.params.passThreshold
    };
  }

  private async check(
    context: ProbeContext,
    channel: JsonRpcChannel,
    adversarial: AdversarialCase
  ): Promise<boolean> {
    const { recorder } = context;
    let reply: ChannelReply;
    try {
      reply = await adversarial.send(channel);
    } catch (error) {
      recorder.warn(
        'error_handling',
        `No response for ${adversarial.label}: ${errorMessage(error)}`
      );
      return false;
    }
    recorder.exchanged();

    const code = getErrorCode(reply.body);
    if (code !== undefined) {
      if (adversarial.expectedCodes.includes(code)) {
        return true;
      }
      recorder.warn(
        'error_handling',
        `Wrong error code for ${adversarial.label}: ${code}`
      );
      return false;
    }

    if (hasError(reply.body)) {
      recorder.warn(
        'error_handling',
        `Error response for ${adversarial.label} carries no numeric code`
      );
    } else if (reply.status === 200) {
      recorder.fail('error_handling', `Server accepted ${adversarial.accepted}`);
    } else {
      recorder.warn(
        'error_handling',
        `Unexpected HTTP ${reply.status} for ${adversarial.label}`
      );
    }
    return false;
  }

  private async checkMalformed(
    context: ProbeContext,
    channel: JsonRpcChannel
  ): Promise<boolean> {
    const { recorder } = context;
    let reply: ChannelReply;
    try {
      reply = await channel.requestRaw(MALFORMED_BODY);
    } catch (error) {
      if (error instanceof RequestTimeoutError) {
        recorder.warn('error_handling', 'No response to malformed message');
        return false;
      }
      if (error instanceof ChannelNotOpenError) {
        recorder.warn(
          'error_handling',
          `Malformed message not sent: ${errorMessage(error)}`
        );
        return false;
      }
      // Refusing or dropping the connection is an acceptable rejection
      recorder.info(
        'error_handling',
        `Connection closed on malformed message: ${errorMessage(error)}`
      );
      return true;
    }
    recorder.exchanged();

    const code = getErrorCode(reply.body);
    if (code === ErrorCode.ParseError) {
      return true;
    }
    if (code !== undefined) {
      recorder.warn('error_handling', `Wrong error code for parse error: ${code}`);
      return false;
    }
    if (reply.status === 400) {
      return true;
    }
    if (reply.status === 200 && !hasError(reply.body)) {
      recorder.fail('error_handling', 'Server accepted malformed JSON');
      return false;
    }
    recorder.warn(
      'error_handling',
      `Unexpected status for malformed JSON: ${reply.status}`
    );
    return false;
  }
}
