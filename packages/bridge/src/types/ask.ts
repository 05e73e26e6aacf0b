import type { CompletionError, ContextFetchError, ValidationError } from './errors.js';

export type ConversationRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

/**
 * A question for the model plus everything needed to route the answer.
 * `question` alone drives a single-turn prompt; a non-empty `conversation`
 * takes over prompt construction instead.
 */
export interface AskRequest {
  question?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  conversation?: ConversationTurn[];
  sourceChannel?: string;
  contextMessageCount?: number;
  destinationChannel?: string;
  system?: string;
  threadTs?: string;
}

/** A message read from channel history. Never persisted. */
export interface ChannelMessage {
  readonly authorId: string;
  readonly text: string;
  readonly timestamp: number;
}

export interface PromptMessage {
  role: 'system' | ConversationRole;
  content: string;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionRequest {
  messages: PromptMessage[];
  model: string;
  maxTokens: number;
  temperature: number;
}

export interface CompletionResult {
  answerText: string;
  modelUsed: string;
  tokenUsage?: TokenUsage;
}

export interface DeliveryOutcome {
  delivered: boolean;
  destinationChannel: string;
  /** ts of the first posted chunk */
  messageId?: string;
  chunksSent: number;
  chunksTotal: number;
  /** 1-based index of the chunk that failed */
  failedChunk?: number;
  error?: string;
}

export type ChunkOutcome =
  | { index: number; ok: true; messageId: string }
  | { index: number; ok: false; error: string };

export type AskFailure = ValidationError | ContextFetchError | CompletionError;

export type AskResult =
  | { ok: true; completion: CompletionResult; delivery: DeliveryOutcome }
  | { ok: false; error: AskFailure };

export interface SlackChannel {
  id: string;
  name: string;
  isPrivate: boolean;
  memberCount: number;
}
