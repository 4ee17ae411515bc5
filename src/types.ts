/**
 * Shared result and request shapes.
 *
 * Wire documents (requests, probe results, validation results, reports) keep
 * the snake_case field names other tooling consumes. Types that never leave
 * the process use camelCase.
 */

export type IssueSeverity = 'info' | 'warning' | 'error';

export interface Issue {
  severity: IssueSeverity;
  category: string;
  description: string;
  stack_trace?: string;
}

export const TEST_TYPES = [
  'basic_connection',
  'tool_execution',
  'resource_access',
  'transport_compat',
  'error_handling',
  'prompt_handling',
  'notifications',
  'oauth_auth'
] as const;

export type TestType = (typeof TEST_TYPES)[number];

export interface ProbeParams {
  pass_threshold?: number;
  sse_path?: string;
  client_name?: string;
}

export interface ProbeConfig {
  /** Seconds allowed for each exchange. */
  timeout: number;
  transport: string;
  verbose: boolean;
  params: Record<string, unknown>;
}

export interface TestRequest {
  server_url: string;
  test_type: string;
  config: ProbeConfig;
}

export interface ProbeCounters {
  connected: boolean;
  initialized: boolean;
  tools_found: number;
  resources_accessible: number;
  messages_exchanged: number;
  errors_encountered: number;
}

export interface Compatibility {
  implementation_version: string;
  runtime_version: string;
  protocol_versions: string[];
  features: Record<string, boolean>;
}

export interface ServerInfo {
  name?: string;
  version?: string;
  protocol_version?: string;
  capabilities: string[];
}

export interface TestResult {
  success: boolean;
  duration_ms: number;
  results: ProbeCounters;
  error?: string;
  issues: Issue[];
  compatibility: Compatibility;
  server_info?: ServerInfo;
}

export const VALIDATION_STATUSES = [
  'compliant',
  'passed',
  'failed',
  'setup_failed',
  'failed_to_start',
  'timeout',
  'error',
  'build_failed',
  'parse_error',
  'no_output',
  'unknown'
] as const;

export type ValidationStatus = (typeof VALIDATION_STATUSES)[number];

export const PASSING_STATUSES: readonly ValidationStatus[] = [
  'compliant',
  'passed'
];

export interface ValidationResult {
  server_name: string;
  server_url: string;
  status: ValidationStatus;
  compliance_score: number | null;
  protocol_version: string | null;
  capabilities: string[];
  issues: Issue[];
  duration_ms: number;
  timestamp: string;
  error_message?: string;
}

/** What a validator learns about one live server. */
export interface ValidationOutcome {
  status: ValidationStatus;
  compliance_score: number | null;
  protocol_version: string | null;
  capabilities: string[];
  issues: Issue[];
  error_message?: string;
}

export type EcosystemKind = 'node' | 'python' | 'unknown';

export interface Target {
  name: string;
  /** Where the implementation's source comes from, usually a git URL. */
  source: string;
  startCommand?: string[];
  port?: number;
}

export interface ProvisionConfig {
  path: string;
  ecosystem: EcosystemKind;
  startCommand: string[] | null;
  port: number | null;
}

export interface ReportSummary {
  total_validations: number;
  successful_validations: number;
  success_rate: number;
  average_compliance_score: number | null;
}

export interface EcosystemReport {
  timestamp: string;
  summary: ReportSummary;
  status_distribution: Record<string, number>;
  protocol_version_distribution: Record<string, number>;
  detailed_results: ValidationResult[];
  recommendations: string[];
}
