import { vi } from 'vitest';
import { ErrorCode } from '@slack/web-api';
import { loadConfig, type BridgeConfig } from '../src/config/settings.js';
import type { LlmClient } from '../src/services/llm-client.js';
import type { MessagingClient } from '../src/services/slack-client.js';

export const TEST_API_KEY = 'test-secret';

export function testConfig(overrides: Record<string, string> = {}): BridgeConfig {
  return loadConfig({
    LLM_API_KEY: 'test-key',
    SLACK_BOT_TOKEN: 'xoxb-test',
    LOCAL_API_KEY: TEST_API_KEY,
    DEFAULT_SLACK_CHANNEL: 'C0DEFAULT',
    ...overrides,
  });
}

/** Fixed footer time for answer layouts */
export const POSTED_AT = new Date('2025-03-01T09:30:00Z');
export const FOOTER = '_Model: anthropic/claude-3.7-sonnet | 2025-03-01 09:30:00 UTC_';

export function fakeLlm() {
  return {
    complete: vi.fn<LlmClient['complete']>().mockResolvedValue({
      answerText: '42',
      modelUsed: 'anthropic/claude-3.7-sonnet',
      tokenUsage: { promptTokens: 12, completionTokens: 1, totalTokens: 13 },
    }),
  };
}

export function fakeSlack() {
  return {
    fetchRecent: vi.fn<MessagingClient['fetchRecent']>().mockResolvedValue([]),
    post: vi.fn<MessagingClient['post']>().mockResolvedValue('1.1'),
    resolveChannel: vi.fn<MessagingClient['resolveChannel']>(async (channel) => channel.replace(/^[#@]+/, '')),
    resolveDisplayName: vi.fn<MessagingClient['resolveDisplayName']>().mockResolvedValue(undefined),
    listChannels: vi.fn<MessagingClient['listChannels']>().mockResolvedValue([]),
  };
}

/** Error shaped like the WebClient's `{ ok: false, error }` platform errors */
export function platformError(code: string): Error {
  return Object.assign(new Error(`An API error occurred: ${code}`), {
    code: ErrorCode.PlatformError,
    data: { ok: false, error: code },
  });
}
