// packages/verify/src/oracle.ts
import OpenAI from 'openai';
import type { LlmSettings } from '@sastweave/core';
import type { RenderedPrompt } from './prompt.js';

/** One chat completion per call; returns the raw model text. */
export interface VerificationOracle {
  readonly name: string;
  complete(prompt: RenderedPrompt, signal?: AbortSignal): Promise<string>;
}

/** Ollama and most self-hosted servers expose the OpenAI API under /v1. */
export function chatBaseUrl(url: string): string {
  const trimmed = url.replace(/\/+$/, '');
  return trimmed.endsWith('/v1') ? trimmed : `${trimmed}/v1`;
}

/** Any OpenAI-compatible endpoint: OpenAI itself, Ollama, LM Studio, vLLM. */
export class OpenAiVerificationOracle implements VerificationOracle {
  readonly name: string;
  private readonly client: OpenAI;

  constructor(private readonly settings: Readonly<LlmSettings>) {
    this.name = `openai-compatible:${settings.model}`;
    this.client = new OpenAI({
      baseURL: chatBaseUrl(settings.url),
      // local servers ignore the key but the SDK insists on one
      apiKey: settings.apiKey || 'not-needed',
      maxRetries: 0,
      timeout: settings.timeoutSec * 1000,
    });
  }

  async complete(prompt: RenderedPrompt, signal?: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.settings.model,
        temperature: this.settings.temperature,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        response_format: { type: 'json_object' },
      },
      { signal }
    );

    const content = response.choices[0]?.message?.content;
    if (!content) throw new Error(`empty response from ${this.settings.model}`);
    return content;
  }
}
