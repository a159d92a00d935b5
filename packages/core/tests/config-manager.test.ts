import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, DEFAULT_CONFIG } from '@synaptic/shared';
import { ConfigManager } from '../src/config-manager.js';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'synaptic-config-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('ConfigManager', () => {
  it('uses defaults without a file or environment', async () => {
    const manager = new ConfigManager();
    const config = await manager.load({ cwd: dir, env: {} });

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.collections.vectorSize).toBe(768);
    expect(manager.getSourcePath()).toBeNull();
  });

  it('finds a YAML file in a parent directory', async () => {
    writeFileSync(
      join(dir, 'synaptic.config.yaml'),
      ['backend:', '  kind: lancedb', 'collections:', '  vectorSize: 1536', 'inference:', '  similarityThreshold: 0.8'].join('\n'),
    );
    const nested = join(dir, 'a', 'b');
    mkdirSync(nested, { recursive: true });

    const manager = new ConfigManager();
    const config = await manager.load({ cwd: nested, env: {} });

    expect(config.backend.kind).toBe('lancedb');
    expect(config.collections.vectorSize).toBe(1536);
    expect(config.collections.distance).toBe('cosine');
    expect(config.inference).toEqual({ recentWindow: 10, similarityThreshold: 0.8 });
    expect(manager.getSourcePath()).toBe(join(dir, 'synaptic.config.yaml'));
  });

  it('lets environment variables override the file', async () => {
    const file = join(dir, 'synaptic.config.json');
    writeFileSync(file, JSON.stringify({ embedding: { provider: 'ollama' }, logging: { level: 'warn' } }));

    const config = await new ConfigManager().load({
      configPath: file,
      env: {
        SYNAPTIC_EMBEDDING_PROVIDER: 'openai',
        SYNAPTIC_OPENAI_API_KEY: 'test-key',
        SYNAPTIC_VECTOR_SIZE: '256',
        SYNAPTIC_LOG_LEVEL: 'debug',
      },
    });

    expect(config.embedding.provider).toBe('openai');
    expect(config.embedding.apiKey).toBe('test-key');
    expect(config.collections.vectorSize).toBe(256);
    expect(config.logging.level).toBe('debug');
  });

  it('rejects invalid values with their path', async () => {
    await expect(
      new ConfigManager().load({ cwd: dir, env: { SYNAPTIC_VECTOR_SIZE: 'many' } }),
    ).rejects.toThrow(/collections\.vectorSize/);
  });

  it('rejects a missing explicit file', async () => {
    await expect(
      new ConfigManager().load({ configPath: join(dir, 'nope.yaml'), env: {} }),
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects a file without a top-level mapping', async () => {
    const file = join(dir, 'synaptic.config.yaml');
    writeFileSync(file, '- just\n- a list\n');
    await expect(new ConfigManager().load({ configPath: file, env: {} })).rejects.toBeInstanceOf(ConfigError);
  });
});
