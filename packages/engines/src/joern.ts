// packages/engines/src/joern.ts
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import {
  Logger,
  ToolExecutionError,
  ToolUnavailableError,
  createFinding,
  errorMessage,
  expectExit,
  languageForPath,
  normalizeFindingPath,
  normalizeSeverity,
  withScratchDir,
  type Finding,
  type Language,
} from '@sastweave/core';
import {
  BinaryLocator,
  probeVersion,
  remaining,
  type EngineAdapter,
  type EngineContext,
  type ParseContext,
} from './adapter.js';

export interface JoernQuery {
  ruleId: string;
  ruleName: string;
  /** Scala traversal yielding call nodes. */
  selector: string;
}

export const JOERN_QUERIES: readonly JoernQuery[] = [
  { ruleId: 'CWE-119', ruleName: 'Buffer Overflow', selector: 'cpg.call.name("(strcpy|memcpy|sprintf|gets)")' },
  { ruleId: 'CWE-416', ruleName: 'Use After Free', selector: 'cpg.call.name("free")' },
  { ruleId: 'CWE-476', ruleName: 'NULL Pointer Dereference', selector: 'cpg.call.where(_.argument.code("NULL"))' },
];

/** Joern script printing one JSON record per matching call. */
export function joernScript(query: JoernQuery): string {
  return [
    '@main def exec(cpgFile: String) = {',
    '  importCpg(cpgFile)',
    `  ${query.selector}.l.foreach { c =>`,
    '    println(ujson.Obj(',
    `      "ruleId" -> "${query.ruleId}",`,
    `      "ruleName" -> "${query.ruleName}",`,
    '      "function" -> c.name,',
    '      "file" -> c.file.name.headOption.getOrElse("unknown"),',
    '      "line" -> c.lineNumber.map(_.intValue).getOrElse(0),',
    '      "code" -> c.code',
    '    ).render())',
    '  }',
    '}',
    '',
  ].join('\n');
}

const JoernRecordSchema = z.object({
  ruleId: z.string().trim().min(1),
  ruleName: z.string().optional(),
  function: z.string().optional(),
  file: z.string().trim().min(1),
  line: z.number(),
  code: z.string().optional(),
});

const UNKNOWN_FILES = new Set(['unknown', '<empty>', '<unknown>']);

// Joern reports pattern matches without a severity of its own.
const JOERN_LEVEL = 'warning';

const JOERN_DIRS = ['/opt/joern/joern-cli', path.join(os.homedir(), 'bin', 'joern', 'joern-cli')];

export class JoernAdapter implements EngineAdapter {
  readonly engineId = 'joern';
  readonly displayName = 'Joern';
  readonly tool = { name: 'Joern', informationUri: 'https://joern.io' };
  readonly installHint = 'Install Joern (https://docs.joern.io/installation) so that `joern` and `joern-parse` are on PATH.';
  readonly languages: readonly Language[] = ['c', 'cpp'];
  readonly scope = 'project';
  readonly severityMap = { warning: 'warning' } as const;

  private readonly joern = new BinaryLocator('joern', JOERN_DIRS);
  private readonly joernParse = new BinaryLocator('joern-parse', JOERN_DIRS);

  async isAvailable(ctx: EngineContext) {
    return Boolean((await this.joern.resolve(ctx)) && (await this.joernParse.resolve(ctx)));
  }

  async version(ctx: EngineContext) {
    const bin = await this.joern.resolve(ctx);
    if (!bin) return 'unavailable';
    return probeVersion(ctx, [bin, '--version']);
  }

  async invoke(ctx: EngineContext, _languages: readonly Language[], timeoutMs: number): Promise<string> {
    const joern = await this.joern.resolve(ctx);
    const joernParse = await this.joernParse.resolve(ctx);
    if (!joern || !joernParse) throw new ToolUnavailableError('joern', this.installHint);

    const deadline = Date.now() + timeoutMs;

    return withScratchDir('joern', async (scratch) => {
      const cpg = path.join(scratch, 'cpg.bin');
      expectExit(
        'joern-parse',
        await ctx.exec([joernParse, ctx.projectRoot, '--output', cpg], {
          cwd: scratch,
          timeoutMs: remaining(deadline),
          signal: ctx.signal,
        })
      );

      const chunks: string[] = [];
      for (const query of JOERN_QUERIES) {
        const script = path.join(scratch, `${query.ruleId.toLowerCase()}.sc`);
        await fs.promises.writeFile(script, joernScript(query), 'utf8');

        const result = await ctx.exec([joern, '--script', script, '--param', `cpgFile=${cpg}`], {
          cwd: scratch,
          timeoutMs: remaining(deadline),
          signal: ctx.signal,
        });
        if (result.timedOut) throw new ToolExecutionError('joern', 'timed out', { timedOut: true });
        if (result.code !== 0) {
          Logger.warn(`joern: ${query.ruleName} query failed (exit ${result.code})`);
          continue;
        }
        chunks.push(result.stdout);
      }
      return chunks.join('\n');
    });
  }

  /** One JSON object (or array of objects) per line; other lines are Joern's own chatter. */
  parse(raw: string, ctx: ParseContext): Finding[] {
    const findings: Finding[] = [];
    let seq = 0;
    let skipped = 0;

    for (const line of raw.split(/\r?\n/)) {
      const text = line.trim();
      if (!text.startsWith('{') && !text.startsWith('[')) continue;

      let data: unknown;
      try {
        data = JSON.parse(text);
      } catch {
        skipped += 1;
        continue;
      }

      for (const entry of Array.isArray(data) ? data : [data]) {
        const record = JoernRecordSchema.safeParse(entry);
        if (!record.success || UNKNOWN_FILES.has(record.data.file)) {
          skipped += 1;
          continue;
        }

        const r = record.data;
        seq += 1;
        const filePath = normalizeFindingPath(r.file, ctx.projectRoot);
        const ruleName = r.ruleName ?? r.ruleId;
        try {
          findings.push(
            createFinding({
              findingId: `${ctx.unitId}-${seq}`,
              filePath,
              line: r.line,
              ruleId: r.ruleId,
              ruleName,
              message: `${ruleName}: ${r.code || r.function || 'call'}`,
              severity: normalizeSeverity(JOERN_LEVEL, this.severityMap),
              tool: ctx.tool,
              toolMetadata: {
                ...(r.function ? { function: r.function } : {}),
                ...(r.code ? { code: r.code } : {}),
              },
              language: languageForPath(filePath),
            })
          );
        } catch (error) {
          Logger.debug(`${ctx.unitId}: ${errorMessage(error)}`);
          skipped += 1;
        }
      }
    }

    if (skipped > 0) Logger.warn(`${ctx.unitId}: skipped ${skipped} malformed record(s)`);
    return findings;
  }
}
