/**
 * Config Manager Tests
 *
 * Tests the unified config loader: file loading, merging, and validation.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, writeFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadConfig } from '../../src/config/config-manager.js';
import { ConfigError } from '../../src/errors/index.js';

// Mock the paths module to control where config files are loaded from
vi.mock('../../src/paths.js', async () => {
  const actual = await vi.importActual<typeof import('../../src/paths.js')>('../../src/paths.js');
  return {
    ...actual,
    getConfigPath: vi.fn(),
    getProjectDir: vi.fn(),
    getDataDir: vi.fn(() => '/data/tracelens'),
  };
});

import { getConfigPath, getProjectDir } from '../../src/paths.js';

const mockedGetConfigPath = vi.mocked(getConfigPath);
const mockedGetProjectDir = vi.mocked(getProjectDir);

describe('loadConfig', () => {
  let testDir: string;
  let userConfigDir: string;
  let projectDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `tracelens-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    userConfigDir = join(testDir, 'user');
    projectDir = join(testDir, 'project', '.tracelens');

    await mkdir(userConfigDir, { recursive: true });
    await mkdir(projectDir, { recursive: true });

    mockedGetConfigPath.mockReturnValue(join(userConfigDir, 'config.json'));
    mockedGetProjectDir.mockReturnValue(projectDir);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('returns defaults when no files exist', () => {
    const result = loadConfig();

    expect(result.config).toEqual({
      outputDir: '/data/tracelens',
      topN: 5,
      treemapDepth: 25,
      displayInterfaces: { memtime: 'stackplot', memleak: 'treemap', ipc: 'tcpplot' },
      aggregate: [{ interfaces: ['ipc', 'cpusched'], visualizer: 'tcpplot' }],
      logging: { level: 'info' },
    });
    expect(result.user).toEqual({});
    expect(result.sources.map(s => s.loaded)).toEqual([false, false]);
  });

  it('loads user-level config', async () => {
    await writeFile(join(userConfigDir, 'config.json'), JSON.stringify({ topN: 8, outputDir: '/tmp/traces' }));

    const result = loadConfig();

    expect(result.config.topN).toBe(8);
    expect(result.config.outputDir).toBe('/tmp/traces');
    expect(result.sources[0].loaded).toBe(true);
  });

  it('project config overrides user config (deep merge)', async () => {
    await writeFile(
      join(userConfigDir, 'config.json'),
      JSON.stringify({ topN: 8, displayInterfaces: { callstack: 'treemap' }, logging: { level: 'debug' } }),
    );
    await writeFile(
      join(projectDir, 'config.json'),
      JSON.stringify({ displayInterfaces: { cpusched: 'tcpplot' }, logging: { file: '/tmp/tracelens.log' } }),
    );

    const result = loadConfig();

    expect(result.config.topN).toBe(8);
    expect(result.config.displayInterfaces).toEqual({
      memtime: 'stackplot',
      memleak: 'treemap',
      ipc: 'tcpplot',
      callstack: 'treemap',
      cpusched: 'tcpplot',
    });
    expect(result.config.logging).toEqual({ level: 'debug', file: '/tmp/tracelens.log' });
  });

  it('replaces the aggregate list instead of concatenating', async () => {
    await writeFile(join(projectDir, 'config.json'), JSON.stringify({ aggregate: [] }));
    expect(loadConfig().config.aggregate).toEqual([]);
  });

  it('skips project config when asked', async () => {
    await writeFile(join(projectDir, 'config.json'), JSON.stringify({ topN: 3 }));

    const result = loadConfig({ skipProject: true });

    expect(result.config.topN).toBe(5);
    expect(result.sources).toHaveLength(1);
  });

  // ─── Invalid configuration ──────────────────────────────────────────

  it('rejects unparseable JSON', async () => {
    await writeFile(join(userConfigDir, 'config.json'), '{ not json');
    expect(() => loadConfig()).toThrow(ConfigError);
    expect(() => loadConfig()).toThrow(/failed to parse JSON/);
  });

  it('rejects a non-object config file', async () => {
    await writeFile(join(userConfigDir, 'config.json'), '[1, 2]');
    expect(() => loadConfig()).toThrow(/expected a JSON object, got array/);
  });

  it('rejects schema violations with the field path', async () => {
    await writeFile(join(userConfigDir, 'config.json'), JSON.stringify({ topN: -1, displayInterfaces: { x: 'pie' } }));

    try {
      loadConfig();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.fields).toEqual(['topN', 'displayInterfaces.x']);
      }
    }
  });

  it('rejects unknown keys', async () => {
    await writeFile(join(userConfigDir, 'config.json'), JSON.stringify({ colour: 'blue' }));
    expect(() => loadConfig()).toThrow(/Unrecognized key/);
  });

  it('rejects a default that cannot render a known interface', async () => {
    await writeFile(join(projectDir, 'config.json'), JSON.stringify({ displayInterfaces: { cpusched: 'flamegraph' } }));
    expect(() => loadConfig()).toThrow(
      "displayInterfaces.cpusched: 'flamegraph' cannot render event data written by 'cpusched'",
    );
  });

  it('rejects an aggregate group that cannot be merged', async () => {
    await writeFile(
      join(projectDir, 'config.json'),
      JSON.stringify({ aggregate: [{ interfaces: ['ipc', 'memtime'], visualizer: 'g2' }] }),
    );

    try {
      loadConfig();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.fields).toEqual(['aggregate.0.visualizer', 'aggregate.0.interfaces']);
      }
    }
  });
});
