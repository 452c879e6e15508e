import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { getLLMConfig } from '../../config/llmConfig';
import logger from '../../utils/logger';
import { LlmClient, LlmRequest, LlmResponse } from './types';

/** The part of the OpenAI SDK this client uses. */
export interface ChatClient {
  chat: {
    completions: Pick<OpenAI['chat']['completions'], 'create'>;
  };
}

export interface OpenAILlmClientOptions {
  model?: string;
  maxRetries?: number;
  backoffMs?: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Resolves after `ms`, or as soon as the signal aborts. */
function pause(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * LlmClient over the OpenAI chat completions API. Works with any
 * OpenAI-compatible endpoint (OpenRouter, a local gateway) through the SDK's
 * base URL.
 */
export class OpenAILlmClient implements LlmClient {
  private readonly openai: ChatClient;
  private readonly model: string;
  private readonly maxRetries: number;
  private readonly backoffMs: number;

  constructor(openaiClient: ChatClient, options: OpenAILlmClientOptions = {}) {
    this.openai = openaiClient;
    this.model = options.model || process.env.OPENAI_MODEL || 'gpt-4o-mini';
    this.maxRetries = options.maxRetries ?? Number(process.env.LLM_MAX_RETRIES || 2);
    this.backoffMs = options.backoffMs ?? 500;
  }

  static fromEnv(options: OpenAILlmClientOptions & { apiKey?: string; baseUrl?: string } = {}): OpenAILlmClient {
    const client = new OpenAI({
      apiKey: options.apiKey || process.env.OPENAI_API_KEY,
      baseURL: options.baseUrl || process.env.OPENAI_BASE_URL || undefined,
    });
    return new OpenAILlmClient(client, options);
  }

  async complete(request: LlmRequest, signal?: AbortSignal): Promise<LlmResponse> {
    const llmConfig = getLLMConfig(request.mode || 'reasoning');
    const messages: ChatCompletionMessageParam[] = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }
    messages.push({ role: 'user', content: request.prompt });

    const params: ChatCompletionCreateParamsNonStreaming = {
      model: request.model || this.model,
      temperature: llmConfig.temperature,
      max_tokens: llmConfig.maxTokens,
      messages,
    };
    if (request.json) {
      params.response_format = { type: 'json_object' };
    }

    let lastErr: unknown;
    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (signal?.aborted) {
        throw new Error('LLM request aborted');
      }
      try {
        const completion = await this.openai.chat.completions.create(params, { signal });
        const text = completion.choices[0]?.message?.content;
        if (!text) {
          throw new Error('LLM returned an empty completion');
        }
        return {
          text,
          model: completion.model,
          usage: completion.usage
            ? {
                promptTokens: completion.usage.prompt_tokens,
                completionTokens: completion.usage.completion_tokens,
              }
            : undefined,
        };
      } catch (error) {
        lastErr = error;
        logger.warn('LLM attempt failed', { model: params.model, attempt, error: errorMessage(error) });
        if (attempt < this.maxRetries && !signal?.aborted) {
          await pause(this.backoffMs * (attempt + 1), signal);
        }
      }
    }
    throw new Error(`LLM request failed after ${this.maxRetries + 1} attempts: ${errorMessage(lastErr)}`);
  }
}
