import { describe, expect, test, vi } from 'vitest';
import {
  ToolExecutionError,
  ToolUnavailableError,
  createFinding,
  resolveAnalyzerConfig,
  type ConfigLayer,
  type EngineId,
  type Language,
} from '@sastweave/core';
import type { EngineAdapter, EngineContext } from './adapter.js';
import { ENGINE_REGISTRY, createAdapters, dispatch, listEngines, normalize, planDispatch } from './index.js';

function stubAdapter(
  engineId: EngineId,
  languages: Language[],
  overrides: Partial<EngineAdapter> = {}
): EngineAdapter {
  return {
    engineId,
    displayName: engineId.toUpperCase(),
    tool: { name: engineId },
    installHint: `install ${engineId}`,
    languages,
    scope: 'project',
    severityMap: {},
    async isAvailable() {
      return true;
    },
    async version() {
      return '1.0';
    },
    async invoke() {
      return '';
    },
    // one finding per non-empty line: "<file>:<line>"
    parse(raw, ctx) {
      return raw
        .split('\n')
        .filter(Boolean)
        .map((entry, i) => {
          const [file, line] = entry.split(':');
          return createFinding({
            findingId: `${ctx.unitId}-${i + 1}`,
            filePath: `proj/${file}`,
            line: Number(line),
            ruleId: `${engineId}.rule`,
            message: `${engineId} finding`,
            severity: 'warning',
            tool: ctx.tool,
          });
        });
    },
    ...overrides,
  };
}

function engineCtx(layer: ConfigLayer = {}, signal?: AbortSignal): EngineContext {
  return {
    projectRoot: '/work/proj',
    config: resolveAnalyzerConfig([{ concurrency: 2, ...layer }]),
    exec: vi.fn(async () => {
      throw new Error('no process may run in this test');
    }),
    which: async () => undefined,
    signal,
  };
}

describe('dispatch plan', () => {
  test('registry picks tools per language; codeql groups C and C++ into one database', () => {
    const units = planDispatch(['c', 'cpp', 'python'], createAdapters());
    expect(units.map((u) => [u.unitId, u.languages])).toEqual([
      ['codeql:cpp', ['c', 'cpp']],
      ['codeql:python', ['python']],
      ['joern', ['c', 'cpp']],
      ['bandit', ['python']],
      ['semgrep', ['c', 'cpp', 'python']],
    ]);
  });

  test('java gets spotbugs and javascript only codeql and semgrep', () => {
    expect(planDispatch(['java'], createAdapters()).map((u) => u.unitId)).toEqual([
      'codeql:java',
      'spotbugs',
      'semgrep',
    ]);
    expect(planDispatch(['javascript'], createAdapters()).map((u) => u.unitId)).toEqual([
      'codeql:javascript',
      'semgrep',
    ]);
  });

  test('a custom registry narrows the plan', () => {
    const registry = { ...ENGINE_REGISTRY, python: ['bandit'] as const };
    expect(planDispatch(['python'], createAdapters(), registry).map((u) => u.unitId)).toEqual(['bandit']);
  });

  test('no detected languages means no units', () => {
    expect(planDispatch([], createAdapters())).toEqual([]);
  });
});

describe('dispatcher', () => {
  test('one tool missing, failing or timing out never costs the others their findings', async () => {
    const adapters = [
      stubAdapter('codeql', ['c', 'python'], {
        scope: 'language',
        async invoke() {
          throw new ToolExecutionError('codeql', 'exited with code 2: out of memory', { exitCode: 2 });
        },
      }),
      stubAdapter('joern', ['c'], {
        async isAvailable() {
          return false;
        },
      }),
      stubAdapter('bandit', ['python'], {
        invoke: () => new Promise<string>(() => undefined),
      }),
      stubAdapter('semgrep', ['c', 'python'], {
        async invoke() {
          return 'src/main.c:10\napp.py:4\n';
        },
      }),
    ];

    const ctx = engineCtx({ tools: { bandit: { timeoutSec: 0.05 } } });
    const results = await dispatch(ctx, ['c', 'python'], adapters);

    expect(results.map((r) => [r.unitId, r.meta.status])).toEqual([
      ['codeql:c', 'failed'],
      ['codeql:python', 'failed'],
      ['joern', 'skipped'],
      ['bandit', 'timeout'],
      ['semgrep', 'ok'],
    ]);
    expect(results[0].meta.errorMessage).toBe('codeql: exited with code 2: out of memory');
    expect(results[2].meta.installHint).toBe('install joern');
    expect(results[3].meta.errorMessage).toBe('bandit: timed out after 0.05s');

    const findings = normalize(results, ctx.projectRoot, adapters);
    expect(findings.map((f) => [f.findingId, f.filePath, f.line])).toEqual([
      ['semgrep-1', 'proj/src/main.c', 10],
      ['semgrep-2', 'proj/app.py', 4],
    ]);
    expect(findings[0].tool).toEqual({ name: 'semgrep', version: '1.0' });
  });

  test('disabled tools are skipped without being invoked', async () => {
    const invoke = vi.fn(async () => 'src/main.c:1');
    const adapters = [stubAdapter('semgrep', ['c'], { invoke })];

    const [result] = await dispatch(engineCtx({ tools: { semgrep: { enabled: false } } }), ['c'], adapters);
    expect(result.meta).toMatchObject({ status: 'skipped', errorMessage: 'Disabled by configuration' });
    expect(invoke).not.toHaveBeenCalled();
  });

  test('a binary vanishing mid-run is a skip, not a failure', async () => {
    const adapters = [
      stubAdapter('bandit', ['python'], {
        async invoke() {
          throw new ToolUnavailableError('bandit');
        },
      }),
    ];
    const [result] = await dispatch(engineCtx(), ['python'], adapters);
    expect(result.meta.status).toBe('skipped');
    expect(result.output).toBeUndefined();
  });

  test('a failed version check still runs the tool', async () => {
    const adapters = [
      stubAdapter('semgrep', ['c'], {
        async version() {
          throw new Error('no banner');
        },
        async invoke() {
          return 'a.c:2';
        },
      }),
    ];
    const [result] = await dispatch(engineCtx(), ['c'], adapters);
    expect(result.meta).toMatchObject({ status: 'ok', version: 'unknown' });
  });

  test('never runs more units at once than the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const slow = async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 20));
      active -= 1;
      return '';
    };
    const adapters = (['codeql', 'joern', 'bandit', 'semgrep'] as const).map((id) =>
      stubAdapter(id, ['c', 'python'], { invoke: slow })
    );

    const results = await dispatch(engineCtx(), ['c', 'python'], adapters);
    expect(results).toHaveLength(4);
    expect(peak).toBe(2);
  });

  test('a cancelled run rejects', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(dispatch(engineCtx({}, controller.signal), ['c'], [stubAdapter('semgrep', ['c'])])).rejects.toThrow(
      /cancelled/
    );
  });

  test('a parser that throws only loses its own unit', async () => {
    const adapters = [
      stubAdapter('joern', ['c'], {
        async invoke() {
          return 'x';
        },
        parse() {
          throw new Error('boom');
        },
      }),
      stubAdapter('semgrep', ['c'], {
        async invoke() {
          return 'src/main.c:10';
        },
      }),
    ];
    const results = await dispatch(engineCtx(), ['c'], adapters);
    expect(normalize(results, '/work/proj', adapters).map((f) => f.findingId)).toEqual(['semgrep-1']);
  });
});

describe('listEngines', () => {
  test('reports availability and configured state per tool', async () => {
    const adapters = [
      stubAdapter('bandit', ['python']),
      stubAdapter('joern', ['c'], {
        async isAvailable() {
          return false;
        },
      }),
    ];
    const rows = await listEngines(engineCtx({ tools: { bandit: { enabled: false } } }), adapters);
    expect(rows).toEqual([
      {
        engineId: 'bandit',
        displayName: 'BANDIT',
        languages: ['python'],
        enabled: false,
        available: true,
        version: '1.0',
        installHint: 'install bandit',
      },
      {
        engineId: 'joern',
        displayName: 'JOERN',
        languages: ['c'],
        enabled: true,
        available: false,
        version: 'unavailable',
        installHint: 'install joern',
      },
    ]);
  });
});
