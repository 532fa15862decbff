// packages/verify/src/prompt.ts
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { FatalIOError, type Finding } from '@sastweave/core';

export type PromptName = 'basic' | 'reachability';

export interface PromptTemplate {
  system: string;
  human: string;
}

export interface RenderedPrompt {
  system: string;
  user: string;
}

/** Source layout keeps prompts beside src/; the bundled CLI copies them beside dist/index.js. */
export function defaultPromptDirs(): string[] {
  return [fileURLToPath(new URL('../prompts/', import.meta.url)), fileURLToPath(new URL('./prompts/', import.meta.url))];
}

const SEPARATOR = /^---\s*$/m;

/** `system --- human`; a file without the separator is all human turn. */
export function parsePromptTemplate(text: string): PromptTemplate {
  const match = SEPARATOR.exec(text);
  if (!match) return { system: 'You are a security expert.', human: text.trim() };
  return {
    system: text.slice(0, match.index).trim(),
    human: text.slice(match.index + match[0].length).trim(),
  };
}

export async function loadPromptTemplate(
  name: PromptName,
  dirs: readonly string[] = defaultPromptDirs()
): Promise<PromptTemplate> {
  let lastError: unknown;
  for (const dir of dirs) {
    try {
      return parsePromptTemplate(await fs.promises.readFile(path.join(dir, `${name}.txt`), 'utf8'));
    } catch (error) {
      lastError = error;
    }
  }
  throw new FatalIOError(path.join(dirs[dirs.length - 1] ?? '.', `${name}.txt`), 'read prompt', lastError);
}

/** Replaces `{name}` placeholders; unknown ones stay as written. */
export function renderTemplate(template: string, vars: Readonly<Record<string, string>>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => (Object.hasOwn(vars, key) ? vars[key] : whole));
}

/**
 * Numbered lines around `line` (1-based), the target marked `>>>`:
 * `>>>   10 | strcpy(buf, input);`. Empty when the line is past the end.
 */
export function sourceWindow(content: string, line: number, radius = 5): string {
  const lines = content.split('\n');
  if (line < 1 || line > lines.length) return '';

  const start = Math.max(0, line - radius - 1);
  const end = Math.min(lines.length, line + radius);
  const out: string[] = [];
  for (let i = start; i < end; i++) {
    const prefix = i === line - 1 ? '>>> ' : '    ';
    out.push(`${prefix}${String(i + 1).padStart(4)} | ${lines[i]}`);
  }
  return out.join('\n');
}

export function promptVariables(finding: Finding, source: string): Record<string, string> {
  const vars: Record<string, string> = {
    rule_id: finding.ruleId,
    message: finding.message,
    file_path: finding.filePath,
    line: String(finding.line),
    severity: finding.severity,
    source_code: source,
  };
  if (finding.reachability) {
    vars.aux_reachable = finding.reachability.reachable ? 'Yes' : 'No';
    vars.aux_call_stack = finding.reachability.callStack.join('\n');
    vars.aux_data_flow = finding.reachability.dataFlow.join('\n');
  }
  return vars;
}
