import { ErrorCode, WebClient } from '@slack/web-api';
import { logger } from '@askbridge/shared';
import type { BridgeConfig } from '../config/settings.js';
import type { ChannelMessage, SlackChannel } from '../types/ask.js';
import {
  AuthError,
  ChannelNotFoundError,
  ExternalServiceError,
  PayloadTooLargeError,
  PermissionError,
  RateLimitError,
  TimeoutError,
  UpstreamError,
} from '../types/errors.js';

export interface MessagingClient {
  /** Most recent messages first, as the platform returns them */
  fetchRecent(channel: string, limit: number): Promise<ChannelMessage[]>;
  /** Returns the posted message's id (Slack `ts`) */
  post(channel: string, text: string, threadTs?: string): Promise<string>;
  /** Channel reference to an id; falls back to the reference without its prefix */
  resolveChannel(channel: string): Promise<string>;
  resolveDisplayName(userId: string): Promise<string | undefined>;
  listChannels(): Promise<SlackChannel[]>;
}

const PERMISSION_CODES = new Set(['not_in_channel', 'missing_scope', 'restricted_action', 'is_archived']);
const AUTH_CODES = new Set(['invalid_auth', 'not_authed', 'account_inactive', 'token_revoked']);

// Page size for conversations.list
const CHANNEL_PAGE_SIZE = 200;

/**
 * Slack error code carried by a platform error (`{ ok: false, error }`).
 */
function platformErrorCode(error: Error): string | undefined {
  if ('code' in error && error.code === ErrorCode.PlatformError && 'data' in error) {
    const data = error.data;
    if (data && typeof data === 'object' && 'error' in data && typeof data.error === 'string') {
      return data.error;
    }
  }
  return undefined;
}

function isRequestTimeout(error: Error): boolean {
  if (!('code' in error) || error.code !== ErrorCode.RequestError) return false;
  const original = 'original' in error ? error.original : undefined;
  if (original instanceof Error) {
    const originalCode = 'code' in original ? original.code : undefined;
    return originalCode === 'ECONNABORTED' || originalCode === 'ETIMEDOUT' || /timeout/i.test(original.message);
  }
  return /timeout/i.test(error.message);
}

/**
 * Translate a WebClient failure into one of the bridge's client errors.
 */
export function toSlackError(error: unknown, channel?: string): ExternalServiceError {
  if (error instanceof ExternalServiceError) return error;
  if (!(error instanceof Error)) {
    return new UpstreamError(`Slack call failed: ${String(error)}`, 'slack', { cause: error });
  }

  if ('code' in error && error.code === ErrorCode.RateLimitedError) {
    const retryAfter = 'retryAfter' in error && typeof error.retryAfter === 'number' ? error.retryAfter : undefined;
    return new RateLimitError('Slack rate limit reached', 'slack', retryAfter, { cause: error });
  }
  if (isRequestTimeout(error)) {
    return new TimeoutError('Slack request timed out', 'slack', { cause: error });
  }

  const code = platformErrorCode(error);
  if (code === 'channel_not_found') {
    return new ChannelNotFoundError(`Slack channel not found: ${channel ?? 'unknown'}`, channel ?? '', {
      cause: error,
    });
  }
  if (code && PERMISSION_CODES.has(code)) {
    return new PermissionError(`Slack refused access (${code})`, { cause: error });
  }
  if (code && AUTH_CODES.has(code)) {
    return new AuthError(`Slack rejected the bot token (${code})`, 'slack', { cause: error });
  }
  if (code === 'msg_too_long') {
    return new PayloadTooLargeError('Slack rejected the message as too long', { cause: error });
  }
  if (code === 'ratelimited') {
    return new RateLimitError('Slack rate limit reached', 'slack', undefined, { cause: error });
  }

  return new UpstreamError(`Slack call failed: ${code ?? error.message}`, 'slack', { cause: error });
}

/**
 * Strip the `#`/`@` prefix users tend to type in front of channel ids.
 */
export function normalizeChannelRef(channel: string): string {
  return channel.trim().replace(/^[#@]+/, '');
}

/**
 * Slack Web API wrapper used by the bridge. Retries are left to the caller,
 * so rate-limited calls are rejected rather than queued.
 */
export class SlackMessagingClient implements MessagingClient {
  private client: WebClient;

  constructor(config: BridgeConfig, client?: WebClient) {
    this.client =
      client ??
      new WebClient(config.slack.botToken, {
        timeout: config.requestTimeoutMs,
        retryConfig: { retries: 0 },
        rejectRateLimitedCalls: true,
      });
  }

  /**
   * Turn `#name` into a channel id when the bot can see a channel by that
   * name; ids and unknown names pass through without their prefix.
   */
  async resolveChannel(channel: string): Promise<string> {
    const trimmed = channel.trim();
    const normalized = normalizeChannelRef(trimmed);
    if (!trimmed.startsWith('#')) return normalized;

    try {
      const channels = await this.listChannels();
      const match = channels.find((candidate) => candidate.name === normalized);
      if (match) {
        logger.info(`Resolved channel name #${normalized} to ${match.id}`);
        return match.id;
      }
    } catch (error) {
      logger.warn(`Could not resolve channel name #${normalized}, using it as-is`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return normalized;
  }

  async fetchRecent(channel: string, limit: number): Promise<ChannelMessage[]> {
    const channelId = await this.resolveChannel(channel);
    logger.info(`📜 Fetching ${limit} recent messages from ${channelId}`);

    try {
      const result = await this.client.conversations.history({ channel: channelId, limit });
      const messages: ChannelMessage[] = [];

      for (const message of result.messages ?? []) {
        if (typeof message.text !== 'string' || message.text.length === 0) continue;
        messages.push({
          authorId: message.user ?? message.bot_id ?? 'unknown',
          text: message.text,
          timestamp: Number.parseFloat(message.ts ?? '0'),
        });
      }

      return messages;
    } catch (error) {
      throw toSlackError(error, channelId);
    }
  }

  async post(channel: string, text: string, threadTs?: string): Promise<string> {
    const channelId = await this.resolveChannel(channel);

    try {
      const result = await this.client.chat.postMessage({
        channel: channelId,
        text,
        unfurl_links: false,
        unfurl_media: false,
        ...(threadTs ? { thread_ts: threadTs } : {}),
      });

      if (!result.ts) {
        throw new UpstreamError('Slack accepted the message but returned no ts', 'slack');
      }
      return result.ts;
    } catch (error) {
      throw toSlackError(error, channelId);
    }
  }

  async resolveDisplayName(userId: string): Promise<string | undefined> {
    try {
      const result = await this.client.users.info({ user: userId });
      const user = result.user;
      return user?.profile?.display_name || user?.real_name || user?.name || undefined;
    } catch (error) {
      throw toSlackError(error);
    }
  }

  async listChannels(): Promise<SlackChannel[]> {
    const channels: SlackChannel[] = [];
    let cursor: string | undefined;

    try {
      do {
        const result = await this.client.conversations.list({
          types: 'public_channel,private_channel',
          exclude_archived: true,
          limit: CHANNEL_PAGE_SIZE,
          ...(cursor ? { cursor } : {}),
        });

        for (const channel of result.channels ?? []) {
          if (!channel.id || !channel.name) continue;
          channels.push({
            id: channel.id,
            name: channel.name,
            isPrivate: channel.is_private ?? false,
            memberCount: channel.num_members ?? 0,
          });
        }

        cursor = result.response_metadata?.next_cursor || undefined;
      } while (cursor);
    } catch (error) {
      throw toSlackError(error);
    }

    return channels;
  }
}
