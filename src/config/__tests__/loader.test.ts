import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../../errors.js';
import { loadProjectConfig, parseBooleanEnv, parseLLMConfig, resolveConfig } from '../loader.js';

let root: string;
let home: string;
let cwd: string;

function writeConfig(dir: string, yaml: string): void {
  mkdirSync(join(dir, '.citewise'), { recursive: true });
  writeFileSync(join(dir, '.citewise', 'config.yaml'), yaml);
}

describe('config loader', () => {
  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'citewise-config-'));
    home = join(root, 'home');
    cwd = join(root, 'project');
    mkdirSync(home);
    mkdirSync(cwd);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('returns empty sections when there are no config files', () => {
    expect(loadProjectConfig({ cwd, home })).toEqual({ llm: {}, settings: {} });
  });

  it('lets the project file override the user file', () => {
    writeConfig(home, 'llm:\n  type: anthropic\n  maxTokens: 500\n  cache:\n    type: redis\n    prefix: mine\nsettings:\n  debug: true\n');
    writeConfig(cwd, 'llm:\n  maxTokens: 256\n  cache:\n    type: memory\n');

    expect(loadProjectConfig({ cwd, home })).toEqual({
      llm: { type: 'anthropic', maxTokens: 256, cache: { type: 'memory', prefix: 'mine' } },
      settings: { debug: true },
    });
  });

  it('accepts an empty file', () => {
    writeConfig(cwd, '');

    expect(loadProjectConfig({ cwd, home })).toEqual({ llm: {}, settings: {} });
  });

  it('rejects a file with the wrong shape', () => {
    writeConfig(cwd, 'llm: [1, 2]\n');

    expect(() => loadProjectConfig({ cwd, home })).toThrow(ConfigError);
  });

  it('resolves defaults, files, environment and overrides in that order', () => {
    writeConfig(cwd, 'llm:\n  type: google\n  temperature: 0.5\nsettings:\n  stream: true\n');

    const { llm, settings } = resolveConfig(
      { llm: { temperature: 0.9 } },
      { cwd, home, env: { CITEWISE_PROVIDER: 'ollama', CITEWISE_DEBUG: 'yes', CITEWISE_STREAM: '0' } },
    );

    expect(llm.type).toBe('ollama');
    expect(llm.temperature).toBe(0.9);
    expect(llm.maxTokens).toBe(1024);
    expect(llm.cache).toEqual({ type: 'memory', prefix: 'citewise:llm' });
    expect(settings).toEqual({ debug: true, stream: false });
  });

  it('reports an unknown provider from the environment as a config error', () => {
    expect(() => resolveConfig({}, { cwd, home, env: { CITEWISE_PROVIDER: 'cohere' } })).toThrow(
      /Invalid LLM config: type:/,
    );
  });
});

describe('parseLLMConfig', () => {
  it('fills in defaults', () => {
    expect(parseLLMConfig({})).toEqual({
      type: 'openai',
      maxTokens: 1024,
      temperature: 0,
      useChatForCompletion: true,
      stream: false,
      maxRetries: 3,
      cache: { type: 'memory', prefix: 'citewise:llm' },
    });
  });

  it('names the offending field', () => {
    expect(() => parseLLMConfig({ maxTokens: -5 })).toThrow(/^Invalid LLM config: maxTokens: /);
  });
});

describe('parseBooleanEnv', () => {
  it('reads common spellings', () => {
    expect(parseBooleanEnv('X', 'TRUE')).toBe(true);
    expect(parseBooleanEnv('X', ' off ')).toBe(false);
    expect(parseBooleanEnv('X', undefined)).toBeUndefined();
    expect(parseBooleanEnv('X', '')).toBeUndefined();
  });

  it('rejects anything else', () => {
    expect(() => parseBooleanEnv('CITEWISE_DEBUG', 'maybe')).toThrow('CITEWISE_DEBUG must be a boolean, got "maybe"');
  });
});
