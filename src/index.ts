#!/usr/bin/env node

import { Command } from 'commander';
import { ZodError } from 'zod';
import { HARNESS_NAME, HARNESS_VERSION } from './constants.js';
import {
  configuredTargets,
  loadEcosystemConfig
} from './ecosystem/config.js';
import {
  KnownImplementationsSource,
  StaticTargetSource,
  parseTargetSpec,
  type DiscoverySource
} from './ecosystem/discovery.js';
import {
  EngineValidator,
  ProbeSuiteValidator,
  type Validator
} from './ecosystem/invoker.js';
import { BatchOrchestrator } from './ecosystem/orchestrator.js';
import { EnvironmentProvisioner } from './ecosystem/provisioner.js';
import { formatSummary, generateReport, writeReport } from './ecosystem/report.js';
import { ProcessSupervisor } from './ecosystem/supervisor.js';
import { errorMessage } from './errors.js';
import { createLogger, setLogLevel } from './logger.js';
import { getProbe, listProbes } from './probes/index.js';
import { parseTestRequest, runProbe } from './runner/dispatcher.js';
import {
  ProbeOptionsSchema,
  ValidateOptionsSchema,
  type EcosystemConfig,
  type ProbeOptions,
  type ValidateOptions
} from './schemas.js';

const logger = createLogger('cli');

function reportOptionErrors(error: unknown): void {
  if (error instanceof ZodError) {
    console.error('Validation error:');
    error.errors.forEach((err) => {
      console.error(`  ${err.path.join('.')}: ${err.message}`);
    });
  } else {
    console.error(`Error: ${errorMessage(error)}`);
  }
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

function printDocument(document: unknown, pretty: boolean): void {
  console.log(pretty ? JSON.stringify(document, null, 2) : JSON.stringify(document));
}

function printRequestError(error: string): void {
  printDocument(
    { success: false, error, results: {}, issues: [], compatibility: {} },
    false
  );
}

const program = new Command();

program
  .name('mcp-ecosystem')
  .description('Conformance probes and ecosystem validation for MCP servers')
  .version(HARNESS_VERSION);

// Probe command: one test type against one live server
program
  .command('probe')
  .description(
    'Run one conformance probe. With --json the TestRequest is read from stdin'
  )
  .argument('[server_url]', 'Server address (http, ws or stdio://)')
  .argument('[test_type]', 'Test type, see list-probes')
  .option('--json', 'Read the TestRequest document from stdin')
  .option('--timeout <seconds>', 'Timeout for each exchange in seconds')
  .option('--transport <transport>', 'Transport hint (http, websocket, stdio)')
  .option('--verbose', 'Pretty-print the result and log debug output')
  .action(
    async (
      serverUrl: string | undefined,
      testType: string | undefined,
      options: unknown
    ) => {
      let probeOptions: ProbeOptions;
      try {
        probeOptions = ProbeOptionsSchema.parse(options);
      } catch (error) {
        reportOptionErrors(error);
        process.exit(1);
      }

      if (probeOptions.verbose) {
        setLogLevel('debug');
      }

      let raw: string;
      if (probeOptions.json) {
        raw = await readStdin();
      } else {
        if (!serverUrl || !testType) {
          printRequestError(
            'A server URL and test type are required unless --json is given'
          );
          process.exit(1);
        }
        raw = JSON.stringify({
          server_url: serverUrl,
          test_type: testType,
          config: {
            ...(probeOptions.timeout !== undefined && {
              timeout: probeOptions.timeout
            }),
            ...(probeOptions.transport !== undefined && {
              transport: probeOptions.transport
            }),
            verbose: probeOptions.verbose ?? false
          }
        });
      }

      const parsed = parseTestRequest(raw);
      if (!parsed.ok) {
        logger.error(parsed.error);
        printRequestError(parsed.error);
        process.exit(1);
      }

      const result = await runProbe(parsed.request);
      printDocument(
        result,
        parsed.request.config.verbose || (probeOptions.verbose ?? false)
      );
      process.exit(0);
    }
  );

function buildValidator(
  config: EcosystemConfig,
  engineCommand: string[] | undefined,
  timeoutSeconds: number
): Validator {
  const command = engineCommand ?? config.engine?.command;
  if (!command) {
    return new ProbeSuiteValidator({ timeoutSeconds });
  }
  return new EngineValidator({
    command,
    timeoutSeconds,
    buildCommand: config.engine?.build_command,
    buildCwd: config.engine?.build_cwd
  });
}

const collect = (value: string, previous: string[] = []) => [
  ...previous,
  value
];

// Validate command: provision, start and validate many implementations
program
  .command('validate')
  .description('Validate MCP server implementations across the ecosystem')
  .option('--config <file>', 'Ecosystem configuration file (JSON)')
  .option(
    '--target <name=source>',
    'Implementation to validate (repeatable)',
    collect
  )
  .option('--timeout <seconds>', 'Timeout in seconds for each validation')
  .option('--max-concurrent <n>', 'Maximum concurrent validations')
  .option('--output <file>', 'Write the JSON report to this file')
  .option(
    '--engine <command...>',
    'External validation engine command; probes run in-process without it'
  )
  .option('--verbose', 'Enable verbose logging')
  .action(async (options: unknown) => {
    let validateOptions: ValidateOptions;
    try {
      validateOptions = ValidateOptionsSchema.parse(options);
    } catch (error) {
      reportOptionErrors(error);
      process.exit(1);
    }

    if (validateOptions.verbose) {
      setLogLevel('debug');
    }

    try {
      const config = await loadEcosystemConfig(validateOptions.config);
      const timeoutSeconds = validateOptions.timeout ?? config.timeout_seconds;

      const sources: DiscoverySource[] = [
        new KnownImplementationsSource(config.known_implementations),
        new StaticTargetSource(configuredTargets(config), 'config'),
        new StaticTargetSource(
          (validateOptions.target ?? []).map(parseTargetSpec),
          'command line'
        )
      ];

      const orchestrator = new BatchOrchestrator({
        sources,
        provisioner: new EnvironmentProvisioner(),
        supervisor: new ProcessSupervisor(),
        validator: buildValidator(config, validateOptions.engine, timeoutSeconds),
        maxConcurrent: validateOptions.maxConcurrent ?? config.max_concurrent
      });

      process.once('SIGINT', () => {
        logger.info('Validation interrupted by user, stopping servers');
        orchestrator.shutdown().then(
          () => process.exit(1),
          (error: unknown) => {
            logger.error(`Cleanup after interrupt failed: ${errorMessage(error)}`);
            process.exit(1);
          }
        );
      });

      logger.info('Starting MCP ecosystem validation...');
      const results = await orchestrator.run();
      const report = generateReport(results);

      if (validateOptions.output) {
        await writeReport(report, validateOptions.output);
      }

      console.log(`\n${formatSummary(report)}`);
      if (validateOptions.output) {
        console.log(`\nDetailed report saved to: ${validateOptions.output}`);
      }
      process.exit(0);
    } catch (error) {
      logger.error(`Validation failed: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

// List probes command
program
  .command('list-probes')
  .description('List the test types and whether each has a probe')
  .action(() => {
    console.log(`${HARNESS_NAME} test types:\n`);
    for (const name of listProbes()) {
      const probe = getProbe(name);
      console.log(
        probe
          ? `  ${name.padEnd(18)} ${probe.description}`
          : `  ${name.padEnd(18)} (not implemented)`
      );
    }
  });

program.parseAsync().catch((error: unknown) => {
  logger.error(errorMessage(error));
  process.exit(1);
});
