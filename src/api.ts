/**
 * Programmatic API for the MCP ecosystem validator
 *
 * This module exposes the probes and the batch orchestration for use as a
 * library, rather than just as a CLI tool.
 */

// Dispatcher exports
export { runProbe, parseTestRequest } from './runner/dispatcher.js';
export type { ParsedTestRequest, RunProbeOptions } from './runner/dispatcher.js';

// Probe exports
export {
  probes,
  getProbe,
  isTestType,
  listProbes,
  listImplementedProbes,
  synthesizeArguments
} from './probes/index.js';
export type { Probe, ProbeVerdict } from './probes/index.js';

// Ecosystem exports
export {
  KnownImplementationsSource,
  StaticTargetSource,
  parseTargetSpec
} from './ecosystem/discovery.js';
export type { DiscoverySource } from './ecosystem/discovery.js';
export {
  ConfigError,
  configuredTargets,
  loadEcosystemConfig,
  parseEcosystemConfig
} from './ecosystem/config.js';
export { ConcurrencyGate } from './ecosystem/gate.js';
export {
  CommandInstaller,
  EnvironmentProvisioner,
  GitSourceFetcher,
  deriveStartCommand,
  detectEcosystem
} from './ecosystem/provisioner.js';
export type {
  DependencyInstaller,
  Provisioner,
  SourceFetcher
} from './ecosystem/provisioner.js';
export { ProcessSupervisor, buildServerCommand } from './ecosystem/supervisor.js';
export type {
  ServerSupervisor,
  StartResult,
  SupervisedServer
} from './ecosystem/supervisor.js';
export { EngineValidator, ProbeSuiteValidator } from './ecosystem/invoker.js';
export type { Validator } from './ecosystem/invoker.js';
export { BatchOrchestrator } from './ecosystem/orchestrator.js';
export {
  formatSummary,
  generateReport,
  recommendations,
  writeReport
} from './ecosystem/report.js';

// Type exports
export type {
  EcosystemReport,
  Issue,
  IssueSeverity,
  ProbeConfig,
  ProvisionConfig,
  Target,
  TestRequest,
  TestResult,
  TestType,
  ValidationOutcome,
  ValidationResult,
  ValidationStatus
} from './types.js';

export { PROTOCOL_VERSION } from './constants.js';
export { createLogger, setLogLevel } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
