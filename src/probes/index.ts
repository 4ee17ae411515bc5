import { TEST_TYPES, type TestType } from '../types.js';
import { BasicConnectionProbe } from './basic-connection.js';
import { ErrorHandlingProbe } from './error-handling.js';
import type { Probe } from './probe.js';
import { ResourceAccessProbe } from './resource-access.js';
import { ToolExecutionProbe } from './tool-execution.js';
import { TransportCompatProbe } from './transport-compat.js';

/**
 * Closed table of test types. A `null` entry is a known test type without a
 * probe yet, which is reported as missing coverage rather than a server
 * defect.
 */
export const probes: ReadonlyMap<TestType, Probe | null> = new Map<
  TestType,
  Probe | null
>([
  ['basic_connection', new BasicConnectionProbe()],
  ['tool_execution', new ToolExecutionProbe()],
  ['resource_access', new ResourceAccessProbe()],
  ['transport_compat', new TransportCompatProbe()],
  ['error_handling', new ErrorHandlingProbe()],
  ['prompt_handling', null],
  ['notifications', null],
  ['oauth_auth', null]
]);

const KNOWN_TEST_TYPES: ReadonlySet<string> = new Set(TEST_TYPES);

export function isTestType(name: string): name is TestType {
  return KNOWN_TEST_TYPES.has(name);
}

/** `undefined` for an unrecognized name, `null` for a recognized one without a probe. */
export function getProbe(name: string): Probe | null | undefined {
  return isTestType(name) ? probes.get(name) : undefined;
}

export function listProbes(): TestType[] {
  return Array.from(probes.keys());
}

export function listImplementedProbes(): TestType[] {
  return listProbes().filter((name) => probes.get(name) !== null);
}

export type { Probe, ProbeVerdict } from './probe.js';
export { ProbeContext, ProbeRecorder, emptyCounters } from './probe.js';
export { performHandshake, buildInitializeRequest } from './handshake.js';
export { synthesizeArguments } from './tool-execution.js';
