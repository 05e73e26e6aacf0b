import OpenAI, {
  APIConnectionTimeoutError,
  APIError,
  AuthenticationError,
  PermissionDeniedError,
  RateLimitError as OpenAIRateLimitError,
} from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { logger, performanceLogger } from '@askbridge/shared';
import type { BridgeConfig } from '../config/settings.js';
import type { CompletionRequest, CompletionResult, PromptMessage } from '../types/ask.js';
import {
  AuthError,
  ExternalServiceError,
  MalformedResponseError,
  RateLimitError,
  TimeoutError,
  UpstreamError,
} from '../types/errors.js';

export interface LlmClient {
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

/** The slice of the OpenAI SDK this client calls */
export interface ChatCompletionsApi {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

function toChatMessage(message: PromptMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

function retryAfterSeconds(error: APIError): number | undefined {
  const value = error.headers?.['retry-after'];
  if (!value) return undefined;
  const seconds = Number.parseFloat(value);
  return Number.isFinite(seconds) ? seconds : undefined;
}

/**
 * Translate whatever the SDK threw into one of the bridge's client errors.
 */
export function toLlmError(error: unknown): ExternalServiceError {
  if (error instanceof ExternalServiceError) return error;

  if (error instanceof APIConnectionTimeoutError) {
    return new TimeoutError('Model request timed out', 'llm', { cause: error });
  }
  if (error instanceof AuthenticationError || error instanceof PermissionDeniedError) {
    return new AuthError(`Model provider rejected credentials: ${error.message}`, 'llm', {
      cause: error,
    });
  }
  if (error instanceof OpenAIRateLimitError) {
    return new RateLimitError(
      `Model provider rate limit: ${error.message}`,
      'llm',
      retryAfterSeconds(error),
      { cause: error }
    );
  }
  if (error instanceof APIError) {
    return new UpstreamError(`Model provider error (${error.status ?? 'no status'}): ${error.message}`, 'llm', {
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new UpstreamError(`Model request failed: ${message}`, 'llm', { cause: error });
}

/**
 * Chat completions against an OpenAI-compatible endpoint (OpenRouter by
 * default). One attempt per call: SDK retries are off.
 */
export class OpenRouterClient implements LlmClient {
  private completions: ChatCompletionsApi;

  constructor(config: BridgeConfig, completions?: ChatCompletionsApi) {
    if (completions) {
      this.completions = completions;
    } else {
      const client = new OpenAI({
        apiKey: config.llm.apiKey,
        baseURL: config.llm.baseUrl,
        timeout: config.requestTimeoutMs,
        maxRetries: 0,
        defaultHeaders: {
          'X-Title': 'Slack Ask Bridge',
        },
      });
      this.completions = client.chat.completions;
    }
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    logger.info(`🤖 Requesting completion from ${request.model} for ${request.messages.length} messages`);

    let completion: ChatCompletion;
    try {
      completion = await performanceLogger.measureAsync(
        `Completion from ${request.model}`,
        () =>
          this.completions.create({
            model: request.model,
            messages: request.messages.map(toChatMessage),
            max_tokens: request.maxTokens,
            temperature: request.temperature,
          }),
        { model: request.model }
      );
    } catch (error) {
      const mapped = toLlmError(error);
      logger.error(`❌ Completion failed: ${mapped.message}`, { errorType: mapped.name });
      throw mapped;
    }

    const answer = completion.choices?.[0]?.message?.content;
    if (typeof answer !== 'string' || answer.trim().length === 0) {
      throw new MalformedResponseError(
        `Completion from ${request.model} contained no text`,
        'llm'
      );
    }

    logger.info(`✅ ${completion.model || request.model} answered with ${answer.length} chars`);

    return {
      answerText: answer,
      modelUsed: completion.model || request.model,
      tokenUsage: completion.usage
        ? {
            promptTokens: completion.usage.prompt_tokens,
            completionTokens: completion.usage.completion_tokens,
            totalTokens: completion.usage.total_tokens,
          }
        : undefined,
    };
  }
}
