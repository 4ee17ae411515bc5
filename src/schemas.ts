import { z } from 'zod';
import {
  DEFAULT_MAX_CONCURRENT,
  DEFAULT_PASS_THRESHOLD,
  DEFAULT_SSE_PATH,
  DEFAULT_TIMEOUT_SECONDS,
  HARNESS_NAME
} from './constants.js';
import type { Logger } from './logger.js';
import { VALIDATION_STATUSES } from './types.js';

// Probe request read from stdin
export const ProbeConfigSchema = z.object({
  timeout: z
    .number()
    .positive('Timeout must be a positive number')
    .default(DEFAULT_TIMEOUT_SECONDS),
  transport: z.string().default('http'),
  verbose: z.boolean().default(false),
  params: z.record(z.unknown()).default({})
});

export const TestRequestSchema = z.object({
  server_url: z.string().min(1, 'Server URL cannot be empty'),
  test_type: z.string().min(1, 'Test type cannot be empty'),
  config: ProbeConfigSchema.default({})
});

export type TestRequestInput = z.input<typeof TestRequestSchema>;

// Documented probe params; anything else is logged and dropped
const ProbeParamsSchema = z.object({
  pass_threshold: z.number().min(0).max(1).optional(),
  sse_path: z.string().min(1).optional(),
  client_name: z.string().min(1).optional()
});

export interface ResolvedProbeParams {
  passThreshold: number;
  ssePath: string;
  clientName: string;
}

export function resolveProbeParams(
  params: Record<string, unknown>,
  logger: Logger
): ResolvedProbeParams {
  const known = new Set(Object.keys(ProbeParamsSchema.shape));
  for (const key of Object.keys(params)) {
    if (!known.has(key)) {
      logger.warn(`Ignoring unknown probe param '${key}'`);
    }
  }

  const parsed = ProbeParamsSchema.safeParse(params);
  let values: z.infer<typeof ProbeParamsSchema> = {};
  if (parsed.success) {
    values = parsed.data;
  } else {
    logger.warn(
      `Invalid probe params, using defaults: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`
    );
  }

  return {
    passThreshold: values.pass_threshold ?? DEFAULT_PASS_THRESHOLD,
    ssePath: values.sse_path ?? DEFAULT_SSE_PATH,
    clientName: values.client_name ?? HARNESS_NAME
  };
}

const positiveInt = (label: string) =>
  z
    .string()
    .transform((val) => parseInt(val, 10))
    .pipe(
      z
        .number()
        .positive(`${label} must be a positive number`)
        .int(`${label} must be an integer`)
    );

// probe command options schema
export const ProbeOptionsSchema = z.object({
  json: z.boolean().optional(),
  timeout: positiveInt('Timeout').optional(),
  transport: z.string().optional(),
  verbose: z.boolean().optional()
});

export type ProbeOptions = z.infer<typeof ProbeOptionsSchema>;

// validate command options schema
export const ValidateOptionsSchema = z.object({
  config: z.string().min(1, 'Config path cannot be empty').optional(),
  target: z
    .array(
      z
        .string()
        .regex(/^[^=]+=.+$/, 'Targets must be given as name=source')
    )
    .optional(),
  timeout: positiveInt('Timeout').optional(),
  maxConcurrent: positiveInt('Max concurrent').optional(),
  output: z.string().min(1).optional(),
  engine: z.array(z.string()).min(1).optional(),
  verbose: z.boolean().optional()
});

export type ValidateOptions = z.infer<typeof ValidateOptionsSchema>;

// Ecosystem configuration file
export const TargetSchema = z.object({
  name: z.string().min(1),
  source: z.string().min(1),
  start_command: z.array(z.string()).min(1).optional(),
  port: z.number().int().positive().optional()
});

export const EngineConfigSchema = z.object({
  command: z.array(z.string()).min(1, 'Engine command cannot be empty'),
  build_command: z.array(z.string()).min(1).optional(),
  build_cwd: z.string().optional()
});

export const EcosystemConfigSchema = z.object({
  timeout_seconds: z.number().int().positive().default(DEFAULT_TIMEOUT_SECONDS),
  max_concurrent: z.number().int().positive().default(DEFAULT_MAX_CONCURRENT),
  known_implementations: z.record(z.array(z.string().min(1))).default({}),
  targets: z.array(TargetSchema).default([]),
  engine: EngineConfigSchema.optional()
});

export type EcosystemConfig = z.infer<typeof EcosystemConfigSchema>;

export const IssueSchema = z.object({
  severity: z.enum(['info', 'warning', 'error']),
  category: z.string(),
  description: z.string(),
  stack_trace: z.string().optional()
});

/** Document the external validation engine prints on stdout. */
export const EngineReportSchema = z.object({
  status: z.string().optional(),
  compliance_score: z.number().min(0).max(100).nullable().optional(),
  protocol_version: z.string().nullable().optional(),
  capabilities: z.array(z.string()).default([]),
  issues: z.array(IssueSchema).default([])
});

export const ValidationStatusSchema = z.enum(VALIDATION_STATUSES);

// MCP payloads the probes read. Unknown fields pass through untouched.
export const InitializeResultSchema = z
  .object({
    protocolVersion: z.string().optional(),
    capabilities: z.record(z.unknown()).optional(),
    serverInfo: z
      .object({
        name: z.string().optional(),
        version: z.string().optional()
      })
      .passthrough()
      .optional()
  })
  .passthrough();

export const PropertySchema = z
  .object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    default: z.unknown().optional()
  })
  .passthrough();

export const ToolDescriptorSchema = z
  .object({
    name: z.string(),
    inputSchema: z
      .object({
        properties: z.record(PropertySchema).optional()
      })
      .passthrough()
      .optional()
  })
  .passthrough();

export type ToolDescriptor = z.infer<typeof ToolDescriptorSchema>;

export const ListToolsResultSchema = z
  .object({ tools: z.array(z.unknown()) })
  .passthrough();

export const ListResourcesResultSchema = z
  .object({ resources: z.array(z.unknown()) })
  .passthrough();

export const ResourceDescriptorSchema = z
  .object({ uri: z.string() })
  .passthrough();
