import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ConfigError,
  configuredTargets,
  loadEcosystemConfig,
  parseEcosystemConfig
} from './config.js';

describe('parseEcosystemConfig', () => {
  it('applies defaults to an empty document', () => {
    expect(parseEcosystemConfig({})).toEqual({
      timeout_seconds: 30,
      max_concurrent: 3,
      known_implementations: {},
      targets: []
    });
  });

  it('names every invalid field', () => {
    expect(() =>
      parseEcosystemConfig({ max_concurrent: 0, targets: [{ name: 'x' }] })
    ).toThrow(
      'Invalid ecosystem configuration: max_concurrent: Number must be greater than 0; targets.0.source: Required'
    );
  });
});

describe('configuredTargets', () => {
  it('maps overrides onto targets', () => {
    const config = parseEcosystemConfig({
      targets: [
        { name: 'a', source: 'https://git.example.test/a', start_command: ['node', 'a.js'], port: 4100 },
        { name: 'b', source: 'https://git.example.test/b' }
      ]
    });

    expect(configuredTargets(config)).toEqual([
      {
        name: 'a',
        source: 'https://git.example.test/a',
        startCommand: ['node', 'a.js'],
        port: 4100
      },
      { name: 'b', source: 'https://git.example.test/b' }
    ]);
  });
});

describe('loadEcosystemConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ecosystem-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('uses defaults without a file', async () => {
    const config = await loadEcosystemConfig();
    expect(config.max_concurrent).toBe(3);
  });

  it('reads a configuration file', async () => {
    const file = path.join(dir, 'ecosystem.json');
    await fs.writeFile(
      file,
      JSON.stringify({
        timeout_seconds: 10,
        engine: { command: ['mcp-validate'], build_command: ['make', 'engine'] }
      })
    );

    const config = await loadEcosystemConfig(file);
    expect(config.timeout_seconds).toBe(10);
    expect(config.engine).toEqual({
      command: ['mcp-validate'],
      build_command: ['make', 'engine']
    });
  });

  it('reports a file that is not JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ timeout_seconds: 10');

    await expect(loadEcosystemConfig(file)).rejects.toBeInstanceOf(ConfigError);
    await expect(loadEcosystemConfig(file)).rejects.toThrow(
      `${file} is not valid JSON`
    );
  });

  it('reports a missing file', async () => {
    const file = path.join(dir, 'missing.json');
    await expect(loadEcosystemConfig(file)).rejects.toThrow(`Cannot read ${file}`);
  });

  it('loads the example configuration', async () => {
    const file = fileURLToPath(
      new URL('../../config/ecosystem.example.json', import.meta.url)
    );
    const config = await loadEcosystemConfig(file);

    expect(Object.keys(config.known_implementations)).toEqual(['typescript', 'python']);
    expect(configuredTargets(config)).toEqual([
      {
        name: 'local-echo',
        source: '/srv/mcp/echo-server',
        startCommand: ['node', 'dist/index.js', '--port', '4100'],
        port: 4100
      }
    ]);
  });
});
