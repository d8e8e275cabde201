import got, { HTTPError, RequestError } from 'got';
import { z } from 'zod';

import { fail, ok, type Result } from '../curation/errors.js';
import { logger } from '../logger.js';

export type ProviderName = 'openrouter' | 'groq' | 'ollama';

export interface GenerateRequest {
  systemPrompt: string;
  userPrompt: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Chat-style LLM collaborator. Implementations return the raw assistant text;
 * callers treat it as untrusted.
 */
export interface LlmProvider {
  readonly name: string;
  generate(request: GenerateRequest, signal?: AbortSignal): Promise<string>;
}

export class LlmTransportError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'LlmTransportError';
    this.status = status;
  }
}

/** The endpoint answered, but not with a chat-completions body */
export class LlmEnvelopeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LlmEnvelopeError';
  }
}

interface ProviderDefinition {
  baseUrl: string;
  requiresKey: boolean;
  defaultModel: string;
  signupUrl: string;
}

export const PROVIDERS: Record<ProviderName, ProviderDefinition> = {
  openrouter: {
    baseUrl: 'https://openrouter.ai/api/v1/chat/completions',
    requiresKey: true,
    defaultModel: 'openai/gpt-3.5-turbo',
    signupUrl: 'https://openrouter.ai/'
  },
  groq: {
    baseUrl: 'https://api.groq.com/openai/v1/chat/completions',
    requiresKey: true,
    defaultModel: 'mixtral-8x7b-32768',
    signupUrl: 'https://console.groq.com/'
  },
  ollama: {
    baseUrl: 'http://localhost:11434/v1/chat/completions',
    requiresKey: false,
    defaultModel: 'llama3.2',
    signupUrl: ''
  }
};

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() })
      })
    )
    .min(1)
});

export interface ChatCompletionProviderOptions {
  provider: ProviderName;
  apiKey?: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
  /** Retries on 500/503 while a local model loads */
  retries?: number;
}

/**
 * OpenAI-compatible chat-completions client (OpenRouter, Groq, Ollama).
 */
export class ChatCompletionProvider implements LlmProvider {
  readonly name: string;

  constructor(private readonly options: ChatCompletionProviderOptions) {
    this.name = `${options.provider}:${options.model}`;
  }

  async generate(request: GenerateRequest, signal?: AbortSignal): Promise<string> {
    const { provider, apiKey, model, baseUrl, timeoutMs, retries = 0 } = this.options;
    const headers: Record<string, string> = {};
    if (provider !== 'ollama' && apiKey) {
      headers.Authorization = `Bearer ${apiKey}`;
    }

    let body: unknown;
    try {
      body = await got.post(baseUrl, {
        json: {
          model,
          messages: [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.userPrompt }
          ],
          max_tokens: request.maxTokens,
          temperature: request.temperature
        },
        headers,
        timeout: { request: timeoutMs },
        retry: {
          limit: retries,
          methods: ['POST'],
          statusCodes: [500, 503],
          // Model loading takes a while: 10s, 20s, 30s
          calculateDelay: ({ attemptCount, computedValue }) => (computedValue === 0 ? 0 : attemptCount * 10000)
        },
        signal
      }).json<unknown>();
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      if (error instanceof HTTPError) {
        throw new LlmTransportError(`HTTP error from AI API: ${error.response.statusCode}`, error.response.statusCode);
      }
      if (error instanceof RequestError) {
        throw new LlmTransportError(`Network error: ${error.message}`);
      }
      throw error;
    }

    const parsed = chatCompletionSchema.safeParse(body);
    if (!parsed.success) {
      throw new LlmEnvelopeError(`Unexpected response from ${provider}: ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
    }

    const content = parsed.data.choices[0].message.content.trim();
    logger.debug({ provider: this.name, length: content.length }, 'received ai response');
    return content;
  }
}

export interface LlmSettings {
  provider: string;
  apiKey?: string;
  model?: string;
  ollamaBaseUrl?: string;
  timeoutMs?: number;
  ollamaTimeoutMs?: number;
}

const isProviderName = (value: string): value is ProviderName => Object.hasOwn(PROVIDERS, value);

/**
 * Build the configured provider, or `configuration-missing` when it cannot be used.
 * No network request is made here.
 */
export const createLlmProvider = (settings: LlmSettings): Result<LlmProvider> => {
  if (!isProviderName(settings.provider)) {
    return fail({
      kind: 'configuration-missing',
      message: `Unknown AI_PROVIDER: ${settings.provider}. Options: ${Object.keys(PROVIDERS).join(', ')}`
    });
  }

  const definition = PROVIDERS[settings.provider];
  if (definition.requiresKey && !settings.apiKey) {
    return fail({ kind: 'configuration-missing', message: 'No AI API key configured' });
  }

  const isOllama = settings.provider === 'ollama';
  return ok(
    new ChatCompletionProvider({
      provider: settings.provider,
      apiKey: settings.apiKey || undefined,
      model: settings.model || definition.defaultModel,
      baseUrl: isOllama ? settings.ollamaBaseUrl || definition.baseUrl : definition.baseUrl,
      timeoutMs: isOllama ? settings.ollamaTimeoutMs ?? 180000 : settings.timeoutMs ?? 30000,
      retries: isOllama ? 3 : 0
    })
  );
};
