import { promises as fs } from 'fs';
import { ZodError } from 'zod';
import { errorMessage } from '../errors.js';
import { EcosystemConfigSchema, type EcosystemConfig } from '../schemas.js';
import type { Target } from '../types.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function parseEcosystemConfig(json: unknown): EcosystemConfig {
  try {
    return EcosystemConfigSchema.parse(json);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(
        `Invalid ecosystem configuration: ${error.errors
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ')}`
      );
    }
    throw error;
  }
}

/** Reads a configuration file. Without a path, every setting takes its default. */
export async function loadEcosystemConfig(file?: string): Promise<EcosystemConfig> {
  if (!file) {
    return parseEcosystemConfig({});
  }

  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read ${file}: ${errorMessage(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`${file} is not valid JSON: ${errorMessage(error)}`);
  }
  return parseEcosystemConfig(json);
}

export function configuredTargets(config: EcosystemConfig): Target[] {
  return config.targets.map((entry) => ({
    name: entry.name,
    source: entry.source,
    ...(entry.start_command && { startCommand: entry.start_command }),
    ...(entry.port !== undefined && { port: entry.port })
  }));
}
