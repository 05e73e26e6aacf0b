/**
 * Ask pipeline - turns one inbound question into a model call and a Slack post
 *
 * Steps, in order:
 * 1. validate the request
 * 2. fetch channel context (only when a source channel is named)
 * 3. assemble the prompt
 * 4. call the model
 * 5. lay out the answer as Slack messages (header, answer parts, footer)
 * 6. post them, long answers as replies under the first message
 *
 * Steps 1-4 abort with a tagged error. Delivery problems never abort: the
 * answer is returned with the failure recorded in the DeliveryOutcome.
 */

import { logger, performanceLogger } from '@askbridge/shared';
import type { BridgeConfig } from '../config/settings.js';
import type {
  AskFailure,
  AskRequest,
  AskResult,
  ChunkOutcome,
  CompletionRequest,
  CompletionResult,
  DeliveryOutcome,
  PromptMessage,
} from '../types/ask.js';
import {
  CompletionError,
  ContextFetchError,
  DeliveryError,
  PayloadTooLargeError,
  ValidationError,
} from '../types/errors.js';
import { generateCorrelationId, getShortCorrelationId } from '../utils/correlation.js';
import { chunkMessage, formatAnswerMessages, formatForSlack, previewText } from '../utils/slack-formatter.js';
import { formatContext } from './context-formatter.js';
import type { LlmClient } from './llm-client.js';
import { toLlmError } from './llm-client.js';
import type { MessagingClient } from './slack-client.js';
import { toSlackError } from './slack-client.js';

// =============================================================================
// TYPES
// =============================================================================

type Step<T> = { ok: true; value: T } | { ok: false; error: AskFailure };

interface ValidatedAsk {
  question?: string;
  conversation: NonNullable<AskRequest['conversation']>;
  model: string;
  maxTokens: number;
  temperature: number;
  system?: string;
  sourceChannel?: string;
  contextMessageCount: number;
  destinationChannel: string;
  threadTs?: string;
}

interface ChannelContext {
  block?: string;
  messageCount: number;
}

interface PostOptions {
  threadTs?: string;
  /** Post everything after the first message as replies to it */
  threadUnderFirst?: boolean;
  shortId?: string;
}

export interface AskPipelineDeps {
  config: BridgeConfig;
  llm: LlmClient;
  slack: MessagingClient;
  /** Timestamp source for answer footers */
  clock?: () => Date;
}

// =============================================================================
// PROMPT HELPERS
// =============================================================================

export function buildContextBlock(sourceChannel: string, formattedContext: string): string {
  return `Recent messages in ${sourceChannel}:\n${formattedContext}`;
}

/**
 * Assemble the message list sent to the model. A non-empty conversation
 * drives the prompt; otherwise the question becomes a single user turn.
 */
export function buildPromptMessages(
  ask: Pick<ValidatedAsk, 'question' | 'conversation' | 'system'>,
  contextBlock?: string
): PromptMessage[] {
  const messages: PromptMessage[] = [];
  if (ask.system) {
    messages.push({ role: 'system', content: ask.system });
  }

  if (ask.conversation.length > 0) {
    if (contextBlock) {
      messages.push({ role: 'system', content: contextBlock });
    }
    messages.push(...ask.conversation.map((turn) => ({ role: turn.role, content: turn.content })));
    if (ask.question) {
      messages.push({ role: 'user', content: ask.question });
    }
    return messages;
  }

  const question = ask.question ?? '';
  messages.push({
    role: 'user',
    content: contextBlock ? `${contextBlock}\n\n${question}` : question,
  });
  return messages;
}

/**
 * Question shown above the answer: the question itself, else the last user
 * turn of the conversation.
 */
export function displayQuestion(ask: Pick<ValidatedAsk, 'question' | 'conversation'>): string | undefined {
  if (ask.question) return ask.question;
  const lastUserTurn = [...ask.conversation].reverse().find((turn) => turn.role === 'user');
  return lastUserTurn?.content;
}

/**
 * Collapse per-chunk results into one outcome. Posting stops at the first
 * failure, so at most one entry has `ok: false` and it is the last.
 */
export function reduceChunkOutcomes(
  destinationChannel: string,
  chunksTotal: number,
  outcomes: readonly ChunkOutcome[]
): DeliveryOutcome {
  const firstPosted = outcomes.find((outcome) => outcome.ok);
  const failed = outcomes.find((outcome) => !outcome.ok);
  const chunksSent = outcomes.filter((outcome) => outcome.ok).length;

  return {
    delivered: !failed && chunksSent === chunksTotal,
    destinationChannel,
    messageId: firstPosted && firstPosted.ok ? firstPosted.messageId : undefined,
    chunksSent,
    chunksTotal,
    failedChunk: failed ? failed.index : undefined,
    error: failed && !failed.ok ? failed.error : undefined,
  };
}

// =============================================================================
// PIPELINE
// =============================================================================

export class AskPipeline {
  private config: BridgeConfig;
  private llm: LlmClient;
  private slack: MessagingClient;
  private clock: () => Date;

  constructor({ config, llm, slack, clock }: AskPipelineDeps) {
    this.config = config;
    this.llm = llm;
    this.slack = slack;
    this.clock = clock ?? (() => new Date());
  }

  async handleAsk(request: AskRequest, correlationId: string = generateCorrelationId()): Promise<AskResult> {
    const shortId = getShortCorrelationId(correlationId);

    const validated = this.validate(request);
    if (!validated.ok) {
      logger.warn(`🚫 Rejected ask [${shortId}]: ${validated.error.message}`, { correlationId });
      return validated;
    }
    const ask = validated.value;
    const timer = performanceLogger.startTimer(`Ask [${shortId}]`);

    logger.info(`📨 Ask received [${shortId}]`, {
      correlationId,
      mode: ask.conversation.length > 0 ? 'conversation' : 'question',
      question: ask.question ? previewText(ask.question) : undefined,
      sourceChannel: ask.sourceChannel,
      destinationChannel: ask.destinationChannel,
      model: ask.model,
    });

    const context = await this.fetchContext(ask, shortId);
    if (!context.ok) return context;

    const messages = buildPromptMessages(ask, context.value.block);

    const completion = await this.complete(
      { messages, model: ask.model, maxTokens: ask.maxTokens, temperature: ask.temperature },
      shortId
    );
    if (!completion.ok) return completion;

    const answerMessages = formatAnswerMessages(
      {
        answer: completion.value.answerText,
        question: displayQuestion(ask),
        model: completion.value.modelUsed,
        sourceChannel: ask.sourceChannel,
        messageCount: context.value.messageCount,
        postedAt: this.clock(),
      },
      this.config.slack.chunkLimit
    );
    const delivery = await this.postMessages(ask.destinationChannel, answerMessages, {
      threadTs: ask.threadTs,
      threadUnderFirst: true,
      shortId,
    });
    timer.end({ correlationId, model: completion.value.modelUsed, success: delivery.delivered });

    return { ok: true, completion: completion.value, delivery };
  }

  /**
   * Escape, chunk and post text to a channel as-is, one chunk at a time.
   */
  async deliver(channel: string, text: string, threadTs?: string): Promise<DeliveryOutcome> {
    return this.postMessages(channel, formatForSlack(text, this.config.slack.chunkLimit), { threadTs });
  }

  /**
   * Post prepared messages in order, stopping at the first failure. The
   * channel is resolved once so a `#name` costs a single lookup.
   */
  private async postMessages(
    channel: string,
    messages: readonly string[],
    { threadTs, threadUnderFirst = false, shortId = '--------' }: PostOptions
  ): Promise<DeliveryOutcome> {
    const channelId = await this.resolveDestination(channel, shortId);
    const outcomes: ChunkOutcome[] = [];
    let replyTo = threadTs;

    logger.info(`📨 SLACK: Sending ${messages.length} messages to ${channelId} [${shortId}]`);

    for (let i = 0; i < messages.length; i++) {
      const outcome = await this.postChunk(channelId, messages[i], i + 1, messages.length, replyTo);
      outcomes.push(outcome);

      if (!outcome.ok) {
        logger.error(`❌ SLACK: ${outcome.error} [${shortId}]`, { channel: channelId, chunksSent: i });
        break;
      }
      if (threadUnderFirst && replyTo === undefined) {
        replyTo = outcome.messageId;
      }
    }

    const delivery = reduceChunkOutcomes(channel, messages.length, outcomes);
    if (delivery.delivered) {
      logger.info(`✅ SLACK: All ${messages.length} messages delivered [${shortId}]`, { messageId: delivery.messageId });
    }
    return delivery;
  }

  private async resolveDestination(channel: string, shortId: string): Promise<string> {
    try {
      return await this.slack.resolveChannel(channel);
    } catch (error) {
      logger.warn(`Could not resolve ${channel}, posting to it as given [${shortId}]`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return channel;
    }
  }

  // ---------------------------------------------------------------------------
  // Steps
  // ---------------------------------------------------------------------------

  private validate(request: AskRequest): Step<ValidatedAsk> {
    const issues: string[] = [];
    const { llm, slack, context } = this.config;

    const question = request.question?.trim() || undefined;
    const conversation = request.conversation ?? [];

    if (!question && conversation.length === 0) {
      issues.push('question or conversation is required');
    }
    conversation.forEach((turn, i) => {
      if (turn.role !== 'user' && turn.role !== 'assistant') {
        issues.push(`conversation[${i}].role must be "user" or "assistant"`);
      }
      if (!turn.content || turn.content.trim().length === 0) {
        issues.push(`conversation[${i}].content must not be empty`);
      }
    });

    const maxTokens = request.maxTokens ?? llm.defaultMaxTokens;
    if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
      issues.push('max_tokens must be a positive integer');
    }

    const temperature = request.temperature ?? llm.defaultTemperature;
    if (!Number.isFinite(temperature) || temperature < 0 || temperature > 1) {
      issues.push('temperature must be between 0 and 1');
    }

    const requestedCount = request.contextMessageCount ?? context.defaultMessageCount;
    if (!Number.isInteger(requestedCount) || requestedCount <= 0) {
      issues.push('context_message_count must be a positive integer');
    }
    const contextMessageCount = Math.min(requestedCount, context.maxMessageCount);

    const sourceChannel = request.sourceChannel?.trim() || undefined;
    const destinationChannel = request.destinationChannel?.trim() || slack.defaultChannel;
    if (!destinationChannel) {
      issues.push('destination_channel is required when no default channel is configured');
    }

    if (issues.length > 0 || !destinationChannel) {
      return { ok: false, error: new ValidationError(issues) };
    }

    return {
      ok: true,
      value: {
        question,
        conversation,
        model: request.model?.trim() || llm.defaultModel,
        maxTokens,
        temperature,
        system: request.system?.trim() || llm.systemPrompt || (sourceChannel ? llm.contextSystemPrompt : undefined),
        sourceChannel,
        contextMessageCount,
        destinationChannel,
        threadTs: request.threadTs?.trim() || undefined,
      },
    };
  }

  private async fetchContext(ask: ValidatedAsk, shortId: string): Promise<Step<ChannelContext>> {
    if (!ask.sourceChannel) return { ok: true, value: { messageCount: 0 } };
    const sourceChannel = ask.sourceChannel;

    try {
      const messages = await this.slack.fetchRecent(sourceChannel, ask.contextMessageCount);
      logger.info(`📜 Fetched ${messages.length} recent messages for context [${shortId}]`);

      const formatted = await formatContext(messages, {
        maxChars: this.config.context.charBudget,
        resolveName: (authorId) => this.slack.resolveDisplayName(authorId),
      });
      return {
        ok: true,
        value: {
          block: formatted ? buildContextBlock(sourceChannel, formatted) : undefined,
          messageCount: messages.length,
        },
      };
    } catch (error) {
      const cause = toSlackError(error, sourceChannel);
      logger.error(`❌ Context fetch failed [${shortId}]: ${cause.message}`, { errorType: cause.name });
      return { ok: false, error: new ContextFetchError(sourceChannel, cause) };
    }
  }

  private async complete(request: CompletionRequest, shortId: string): Promise<Step<CompletionResult>> {
    try {
      return { ok: true, value: await this.llm.complete(request) };
    } catch (error) {
      const cause = toLlmError(error);
      logger.error(`❌ Completion failed [${shortId}]: ${cause.message}`, { errorType: cause.name });
      return { ok: false, error: new CompletionError(request.model, cause) };
    }
  }

  private async postChunk(
    channel: string,
    chunk: string,
    index: number,
    chunksTotal: number,
    threadTs?: string
  ): Promise<ChunkOutcome> {
    try {
      return { index, ok: true, messageId: await this.slack.post(channel, chunk, threadTs) };
    } catch (error) {
      const cause = toSlackError(error, channel);
      if (cause instanceof PayloadTooLargeError && chunk.length > 1) {
        return this.postSplitChunk(channel, chunk, index, chunksTotal, threadTs);
      }
      return { index, ok: false, error: new DeliveryError(index, chunksTotal, cause).message };
    }
  }

  /**
   * Slack measured the chunk differently than we did; halve it once and post
   * the pieces in its place.
   */
  private async postSplitChunk(
    channel: string,
    chunk: string,
    index: number,
    chunksTotal: number,
    threadTs?: string
  ): Promise<ChunkOutcome> {
    const pieces = chunkMessage(chunk, Math.ceil(chunk.length / 2));
    let firstId: string | undefined;

    for (const piece of pieces) {
      try {
        const messageId = await this.slack.post(channel, piece, threadTs);
        firstId ??= messageId;
      } catch (error) {
        return { index, ok: false, error: new DeliveryError(index, chunksTotal, toSlackError(error, channel)).message };
      }
    }

    return firstId
      ? { index, ok: true, messageId: firstId }
      : { index, ok: false, error: `chunk ${index}/${chunksTotal} failed: nothing to post` };
  }
}
