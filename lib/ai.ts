import type { z } from 'zod';
import { log } from './logger';
import type { Settings } from './config';
import { IntelError, ServiceUnavailable, errorMessage } from './errors';
import { deadline, raceSignal } from './concurrency';
import type { QuotaCounter } from './quota';

// LLM Provider Types
export type LLMProvider = 'openai' | 'gemini' | 'anthropic';

export type CompletionRequest = {
  system: string;
  prompt: string;
  temperature?: number;
  maxTokens?: number;
  json?: boolean;
  signal?: AbortSignal;
};

/** Text-in, text-out model collaborator. Parsing and validation happen in the caller. */
export interface LanguageModel {
  readonly name: string;
  complete(request: CompletionRequest): Promise<string>;
}

class OpenAIModel implements LanguageModel {
  readonly name = 'openai';

  constructor(
    private readonly apiKey: string,
    private readonly model: string
  ) {}

  async complete(request: CompletionRequest) {
    const { default: OpenAI } = await import('openai');
    const client = new OpenAI({ apiKey: this.apiKey, maxRetries: 0 });
    const response = await client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ],
        response_format: request.json ? { type: 'json_object' } : undefined,
        temperature: request.temperature ?? 0.1,
        max_tokens: request.maxTokens ?? 4000,
      },
      { signal: request.signal }
    );
    return response.choices[0]?.message?.content ?? '';
  }
}

class GeminiModel implements LanguageModel {
  readonly name = 'gemini';

  constructor(
    private readonly apiKey: string,
    private readonly model: string
  ) {}

  async complete(request: CompletionRequest) {
    const { GoogleGenerativeAI } = await import('@google/generative-ai');
    const genAI = new GoogleGenerativeAI(this.apiKey);
    const model = genAI.getGenerativeModel({
      model: this.model,
      systemInstruction: request.system,
      generationConfig: {
        temperature: request.temperature ?? 0.1,
        maxOutputTokens: request.maxTokens ?? 4000,
        responseMimeType: request.json ? 'application/json' : 'text/plain',
      },
    });
    const result = await model.generateContent(request.prompt);
    return result.response.text();
  }
}

class AnthropicModel implements LanguageModel {
  readonly name = 'anthropic';

  constructor(
    private readonly apiKey: string,
    private readonly model: string
  ) {}

  async complete(request: CompletionRequest) {
    const { default: Anthropic } = await import('@anthropic-ai/sdk');
    const client = new Anthropic({ apiKey: this.apiKey, maxRetries: 0 });
    const response = await client.messages.create(
      {
        model: this.model,
        max_tokens: request.maxTokens ?? 4000,
        temperature: request.temperature ?? 0.1,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      },
      { signal: request.signal }
    );
    for (const block of response.content) {
      if (block.type === 'text') return block.text;
    }
    return '';
  }
}

/** Builds the configured model, or null when no provider is configured. */
export function makeLanguageModel(settings: Settings): LanguageModel | null {
  switch (settings.aiProvider) {
    case 'openai':
      if (!settings.openaiApiKey) throw new ServiceUnavailable('openai', 'OPENAI_API_KEY not configured');
      return new OpenAIModel(settings.openaiApiKey, settings.openaiModel ?? 'gpt-4o-mini');
    case 'gemini':
      if (!settings.geminiApiKey) throw new ServiceUnavailable('gemini', 'GEMINI_API_KEY not configured');
      return new GeminiModel(settings.geminiApiKey, settings.geminiModel ?? 'gemini-1.5-flash');
    case 'anthropic':
      if (!settings.anthropicApiKey) throw new ServiceUnavailable('anthropic', 'ANTHROPIC_API_KEY not configured');
      return new AnthropicModel(settings.anthropicApiKey, settings.anthropicModel ?? 'claude-3-5-sonnet-20241022');
    default:
      log.warn('No AI provider configured; categorization and extraction will be skipped');
      return null;
  }
}

export type ModelLimits = {
  timeoutMs: number;
  requestsPerMinute: number;
  acquireTimeoutMs: number;
  temperature: number;
  maxTokens: number;
};

export function modelLimitsFromSettings(settings: Settings): ModelLimits {
  return {
    timeoutMs: settings.llmTimeoutMs,
    requestsPerMinute: settings.llmRequestsPerMinute,
    acquireTimeoutMs: settings.acquireTimeoutMs,
    temperature: settings.temperature,
    maxTokens: settings.maxTokens,
  };
}

export type JsonOutcome<T> =
  | { ok: true; data: T; raw: string }
  | { ok: false; kind: 'malformed' | 'schema'; issue: string; raw: string };

/**
 * Wraps a LanguageModel with the shared quota, a hard timeout and JSON
 * handling. Provider failures and timeouts surface as ServiceUnavailable.
 */
export class ModelClient {
  constructor(
    readonly model: LanguageModel,
    private readonly limits: ModelLimits,
    private readonly quota?: QuotaCounter
  ) {}

  async complete(request: Omit<CompletionRequest, 'signal'>, signal?: AbortSignal): Promise<string> {
    const { timeoutMs, requestsPerMinute, acquireTimeoutMs } = this.limits;
    if (this.quota) {
      await this.quota.consume(`llm:${this.model.name}`, requestsPerMinute, 60_000, { timeoutMs: acquireTimeoutMs, signal });
    }
    const guard = deadline(timeoutMs, signal);
    try {
      return await raceSignal(
        this.model.complete({
          temperature: this.limits.temperature,
          maxTokens: this.limits.maxTokens,
          ...request,
          signal: guard.signal,
        }),
        guard.signal
      );
    } catch (error) {
      if (signal?.aborted) throw error;
      if (error instanceof IntelError) throw error;
      const reason = guard.timedOut() ? `timed out after ${timeoutMs}ms` : errorMessage(error);
      log.warn({ provider: this.model.name, error }, 'LLM call failed');
      throw new ServiceUnavailable(this.model.name, reason, { cause: error });
    } finally {
      guard.dispose();
    }
  }

  async completeJson<S extends z.ZodTypeAny>(
    request: Omit<CompletionRequest, 'signal' | 'json'>,
    schema: S,
    signal?: AbortSignal
  ): Promise<JsonOutcome<z.output<S>>> {
    const raw = await this.complete({ ...request, json: true }, signal);
    return parseJsonResponse(raw, schema);
  }
}

/** Removes markdown code fences and any prose around the outermost JSON object. */
export function stripFences(text: string) {
  const cleaned = text.replace(/```(?:json)?\s*/gi, '').replace(/```/g, '').trim();
  if (cleaned.startsWith('{') || cleaned.startsWith('[')) return cleaned;
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  return start !== -1 && end > start ? cleaned.slice(start, end + 1) : cleaned;
}

export function parseJsonResponse<S extends z.ZodTypeAny>(raw: string, schema: S): JsonOutcome<z.output<S>> {
  let value: unknown;
  try {
    value = JSON.parse(stripFences(raw));
  } catch (error) {
    return { ok: false, kind: 'malformed', issue: `invalid JSON (${errorMessage(error)})`, raw };
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, kind: 'schema', issue: formatIssues(parsed.error), raw };
  }
  return { ok: true, data: parsed.data, raw };
}

export function formatIssues(error: z.ZodError) {
  return error.issues
    .slice(0, 8)
    .map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`)
    .join('; ');
}
