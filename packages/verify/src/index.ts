// packages/verify/src/index.ts
import fs from 'node:fs';
import { z } from 'zod';
import {
  CancelledError,
  Logger,
  attachVerdict,
  errorMessage,
  resolveFindingPath,
  runPool,
  withTimeout,
  type AnalyzerConfig,
  type Finding,
  type PatchVerdict,
} from '@sastweave/core';
import type { VerificationOracle } from './oracle.js';
import {
  loadPromptTemplate,
  promptVariables,
  renderTemplate,
  sourceWindow,
  type PromptName,
  type PromptTemplate,
  type RenderedPrompt,
} from './prompt.js';

export * from './oracle.js';
export * from './prompt.js';

const VerdictSchema = z.object({
  is_valid: z.boolean(),
  confidence: z.number().min(0).max(1),
  patch_code: z.string().nullish(),
  explanation: z.string(),
});

export function failedVerdict(explanation: string): PatchVerdict {
  return { isValid: false, confidence: 0, explanation };
}

/** The JSON object in a model reply, tolerating prose or code fences around it. */
export function extractLikelyJson(text: string): string | undefined {
  const t = String(text || '').trim();
  if (!t) return undefined;

  const candidates = [t];
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(t);
  if (fenced) candidates.push(fenced[1].trim());
  const o1 = t.indexOf('{');
  const o2 = t.lastIndexOf('}');
  if (o1 !== -1 && o2 > o1) candidates.push(t.slice(o1, o2 + 1));

  for (const c of candidates) {
    try {
      JSON.parse(c);
      return c;
    } catch {
      // next candidate
    }
  }
  return undefined;
}

/** Model reply -> verdict. Throws when the reply is not a valid verdict. */
export function parseVerdict(reply: string): PatchVerdict {
  const json = extractLikelyJson(reply);
  if (json === undefined) throw new Error('response is not JSON');

  const parsed = VerdictSchema.safeParse(JSON.parse(json));
  if (!parsed.success) {
    throw new Error(`response does not match the verdict schema (${parsed.error.issues[0]?.message ?? 'invalid'})`);
  }

  const v = parsed.data;
  return {
    isValid: v.is_valid,
    confidence: v.confidence,
    ...(v.patch_code ? { patchText: v.patch_code } : {}),
    explanation: v.explanation,
  };
}

export interface PatchVerifierOptions {
  oracle: VerificationOracle;
  promptDirs?: string[];
}

/**
 * Asks the model, once per finding, whether the finding is real and how to
 * patch it. Every failure becomes a negative verdict on that finding alone.
 */
export class PatchVerifier {
  private readonly templates = new Map<PromptName, Promise<PromptTemplate>>();

  constructor(
    private readonly config: AnalyzerConfig,
    private readonly options: PatchVerifierOptions
  ) {}

  get enabled(): boolean {
    return this.config.llm.enabled;
  }

  private template(name: PromptName): Promise<PromptTemplate> {
    let template = this.templates.get(name);
    if (!template) {
      template = loadPromptTemplate(name, this.options.promptDirs);
      this.templates.set(name, template);
    }
    return template;
  }

  /** Prompt for one finding, or undefined when its source cannot be read. */
  async buildPrompt(finding: Finding, projectRoot: string): Promise<RenderedPrompt | undefined> {
    let content: string;
    try {
      content = await fs.promises.readFile(resolveFindingPath(finding.filePath, projectRoot), 'utf8');
    } catch (error) {
      Logger.warn(`verify ${finding.findingId}: cannot read ${finding.filePath}: ${errorMessage(error)}`);
      return undefined;
    }

    const window = sourceWindow(content, finding.line);
    if (!window) return undefined;

    const template = await this.template(finding.reachability ? 'reachability' : 'basic');
    const vars = promptVariables(finding, window);
    return { system: renderTemplate(template.system, vars), user: renderTemplate(template.human, vars) };
  }

  async verify(finding: Finding, projectRoot: string, signal?: AbortSignal): Promise<PatchVerdict> {
    try {
      const prompt = await this.buildPrompt(finding, projectRoot);
      if (!prompt) return failedVerdict('Source code not found');

      const timeoutSec = this.config.llm.timeoutSec;
      const reply = await withTimeout(
        this.options.oracle.complete(prompt, signal),
        timeoutSec * 1000,
        new Error(`no response within ${timeoutSec}s`)
      );
      const verdict = parseVerdict(reply);
      Logger.info(
        `verify ${finding.findingId}: ${verdict.isValid ? 'valid' : 'not valid'} (confidence ${verdict.confidence})`
      );
      return verdict;
    } catch (error) {
      if (signal?.aborted) throw new CancelledError('verification');
      Logger.warn(`verify ${finding.findingId}: ${errorMessage(error)}`);
      return failedVerdict(`Error during verification: ${errorMessage(error)}`);
    }
  }

  /** Disabled: returns the input untouched. */
  async verifyAll(findings: readonly Finding[], projectRoot: string, signal?: AbortSignal): Promise<Finding[]> {
    if (!this.enabled) return [...findings];
    Logger.info(`verify: ${findings.length} finding(s) with ${this.options.oracle.name}`);
    return runPool(
      findings,
      this.config.concurrency,
      async (finding) => attachVerdict(finding, await this.verify(finding, projectRoot, signal)),
      signal
    );
  }
}
