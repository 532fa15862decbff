import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, test } from 'vitest';
import { ConfigError } from './errors.js';
import { configFromEnv, defaultConfig, loadSettingsFile, resolveAnalyzerConfig } from './config.js';

function writeSettings(yaml: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sastweave-config-'));
  fs.writeFileSync(path.join(dir, 'sastweave.yml'), yaml);
  return dir;
}

describe('layered configuration', () => {
  test('defaults apply when no layer sets a value', () => {
    const config = resolveAnalyzerConfig([]);
    expect(config).toEqual(defaultConfig());
    expect(config.llm.url).toBe('http://localhost:11434');
    expect(config.llm.model).toBe('qwen2.5:7b');
    expect(config.reachability.timeoutSec).toBe(300);
    expect(config.tools.semgrep).toEqual({ enabled: true, timeoutSec: 180 });
  });

  test('explicit beats environment beats file', () => {
    const cwd = writeSettings(
      [
        'llm:',
        '  model: from-file',
        '  url: http://file.example:8000',
        '  timeout: 30',
        'tools:',
        '  joern:',
        '    enabled: false',
        '    timeout: 99',
      ].join('\n')
    );

    const file = loadSettingsFile(undefined, cwd);
    const env = configFromEnv({
      SASTWEAVE_LLM_MODEL: 'from-env',
      SASTWEAVE_LLM_URL: 'http://env.example:9000',
      SASTWEAVE_JOERN_TIMEOUT: '45',
    });
    const explicit = { llm: { model: 'from-cli' } };

    const config = resolveAnalyzerConfig([file, env, explicit]);
    expect(config.llm.model).toBe('from-cli');
    expect(config.llm.url).toBe('http://env.example:9000');
    expect(config.llm.timeoutSec).toBe(30);
    expect(config.tools.joern).toEqual({ enabled: false, timeoutSec: 45 });
    expect(config.tools.codeql.enabled).toBe(true);
  });

  test('the resolved configuration is deeply frozen', () => {
    const config = resolveAnalyzerConfig([{ concurrency: 2 }]);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.tools.bandit)).toBe(true);
    expect(Object.isFrozen(config.llm)).toBe(true);
  });

  test('a missing default settings file is not an error, a missing explicit one is', () => {
    const cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'sastweave-config-'));
    expect(loadSettingsFile(undefined, cwd)).toEqual({});
    expect(() => loadSettingsFile('nope.yml', cwd)).toThrow(ConfigError);
  });

  test('unknown keys and wrong types in the settings file are rejected', () => {
    expect(() => loadSettingsFile(undefined, writeSettings('llm:\n  modle: typo\n'))).toThrow(/invalid config/);
    expect(() => loadSettingsFile(undefined, writeSettings('concurrency: lots\n'))).toThrow(/concurrency/);
    expect(() => loadSettingsFile(undefined, writeSettings('tools:\n  pylint:\n    enabled: true\n'))).toThrow(ConfigError);
  });

  test('malformed environment values are reported', () => {
    expect(() => configFromEnv({ SASTWEAVE_ENABLE_LLM: 'maybe' })).toThrow(/SASTWEAVE_ENABLE_LLM/);
    expect(() => configFromEnv({ SASTWEAVE_CONCURRENCY: '-1' })).toThrow(ConfigError);
    expect(configFromEnv({ SASTWEAVE_ENABLE_REACHABILITY: 'yes' }).reachability?.enabled).toBe(true);
  });

  test('a non-integer concurrency is refused', () => {
    expect(() => resolveAnalyzerConfig([{ concurrency: 1.5 }])).toThrow(/concurrency/);
  });
});
