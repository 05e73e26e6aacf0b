import { describe, it, expect, beforeEach, vi } from 'vitest';
import { WebClient } from '@slack/web-api';
import { AskPipeline, buildPromptMessages, reduceChunkOutcomes } from '../src/services/ask-pipeline.js';
import {
  ChannelNotFoundError,
  CompletionError,
  ContextFetchError,
  RateLimitError,
  statusCodeFor,
  ValidationError,
} from '../src/types/errors.js';
import { DEFAULT_CONTEXT_SYSTEM_PROMPT } from '../src/config/settings.js';
import { SlackMessagingClient } from '../src/services/slack-client.js';
import { FOOTER, POSTED_AT, fakeLlm, fakeSlack, platformError, testConfig } from './helpers.js';

const clock = () => POSTED_AT;

// Three 80-char words: too long for one 100-char message, one word per part
const LONG_ANSWER = ['a'.repeat(80), 'b'.repeat(80), 'c'.repeat(80)].join(' ');

describe('AskPipeline', () => {
  let llm: ReturnType<typeof fakeLlm>;
  let slack: ReturnType<typeof fakeSlack>;
  let pipeline: AskPipeline;

  beforeEach(() => {
    llm = fakeLlm();
    slack = fakeSlack();
    pipeline = new AskPipeline({ config: testConfig(), llm, slack, clock });
  });

  describe('question mode', () => {
    it('asks the model and posts the answer to the default channel', async () => {
      const result = await pipeline.handleAsk({ question: '  What is 6x7?  ' }, 'req-00000001');

      expect(llm.complete).toHaveBeenCalledWith({
        messages: [{ role: 'user', content: 'What is 6x7?' }],
        model: 'anthropic/claude-3.7-sonnet',
        maxTokens: 4096,
        temperature: 0.7,
      });
      expect(slack.fetchRecent).not.toHaveBeenCalled();
      expect(slack.post).toHaveBeenCalledWith(
        'C0DEFAULT',
        `*Question*: What is 6x7?\n\n*Answer*:\n42\n\n${FOOTER}`,
        undefined
      );
      expect(result).toEqual({
        ok: true,
        completion: {
          answerText: '42',
          modelUsed: 'anthropic/claude-3.7-sonnet',
          tokenUsage: { promptTokens: 12, completionTokens: 1, totalTokens: 13 },
        },
        delivery: {
          delivered: true,
          destinationChannel: 'C0DEFAULT',
          messageId: '1.1',
          chunksSent: 1,
          chunksTotal: 1,
        },
      });
    });

    it('prefixes the question with channel context', async () => {
      slack.fetchRecent.mockResolvedValue([
        { authorId: 'U2', text: 'yo', timestamp: 2 },
        { authorId: 'U1', text: 'hi', timestamp: 1 },
      ]);
      slack.resolveDisplayName.mockImplementation(async (id) => (id === 'U1' ? 'Alice' : 'Bob'));

      await pipeline.handleAsk({ question: 'Summarize', sourceChannel: 'C1' });

      expect(slack.fetchRecent).toHaveBeenCalledWith('C1', 10);
      expect(llm.complete.mock.calls[0][0].messages).toEqual([
        { role: 'system', content: DEFAULT_CONTEXT_SYSTEM_PROMPT },
        { role: 'user', content: 'Recent messages in C1:\nAlice: hi\nBob: yo\n\nSummarize' },
      ]);
      expect(slack.post).toHaveBeenCalledWith(
        'C0DEFAULT',
        `*Question*: Summarize\n_Source: 2 messages from \`C1\`_\n\n*Answer*:\n42\n\n${FOOTER}`,
        undefined
      );
    });

    it('sends a bare question as the only message', async () => {
      await pipeline.handleAsk({ question: 'ping' });

      expect(llm.complete.mock.calls[0][0].messages).toEqual([{ role: 'user', content: 'ping' }]);
    });

    it('prefers a configured system prompt over the context default', async () => {
      const configured = new AskPipeline({
        config: testConfig({ SYSTEM_PROMPT: 'House style' }),
        llm,
        slack,
        clock,
      });

      await configured.handleAsk({ question: 'Summarize', sourceChannel: 'C1' });

      expect(llm.complete.mock.calls[0][0].messages[0]).toEqual({ role: 'system', content: 'House style' });
    });

    it('skips the context block when the channel is empty', async () => {
      await pipeline.handleAsk({ question: 'Anyone here?', sourceChannel: 'C1' });

      expect(llm.complete.mock.calls[0][0].messages).toEqual([
        { role: 'system', content: DEFAULT_CONTEXT_SYSTEM_PROMPT },
        { role: 'user', content: 'Anyone here?' },
      ]);
    });

    it('caps the context message count', async () => {
      await pipeline.handleAsk({ question: 'Summarize', sourceChannel: 'C1', contextMessageCount: 500 });

      expect(slack.fetchRecent).toHaveBeenCalledWith('C1', 50);
    });

    it('passes request overrides through', async () => {
      await pipeline.handleAsk({
        question: 'Hi',
        model: 'openai/gpt-4o-mini',
        maxTokens: 64,
        temperature: 0,
        destinationChannel: 'C777',
        threadTs: '123.456',
      });

      expect(llm.complete).toHaveBeenCalledWith({
        messages: [{ role: 'user', content: 'Hi' }],
        model: 'openai/gpt-4o-mini',
        maxTokens: 64,
        temperature: 0,
      });
      expect(slack.post).toHaveBeenCalledWith(
        'C777',
        `*Question*: Hi\n\n*Answer*:\n42\n\n${FOOTER}`,
        '123.456'
      );
    });
  });

  describe('conversation mode', () => {
    it('sends system prompt, turns and trailing question in order', async () => {
      await pipeline.handleAsk({
        system: 'Be terse',
        conversation: [
          { role: 'user', content: 'Hi' },
          { role: 'assistant', content: 'Hello' },
        ],
        question: 'And now?',
      });

      expect(llm.complete.mock.calls[0][0].messages).toEqual([
        { role: 'system', content: 'Be terse' },
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello' },
        { role: 'user', content: 'And now?' },
      ]);
    });

    it('places channel context between the system prompt and the turns', async () => {
      slack.fetchRecent.mockResolvedValue([{ authorId: 'U1', text: 'hi', timestamp: 1 }]);
      slack.resolveDisplayName.mockResolvedValue('Alice');

      await pipeline.handleAsk({
        system: 'Be terse',
        sourceChannel: 'C1',
        conversation: [{ role: 'user', content: 'What did I miss?' }],
      });

      expect(llm.complete.mock.calls[0][0].messages).toEqual([
        { role: 'system', content: 'Be terse' },
        { role: 'system', content: 'Recent messages in C1:\nAlice: hi' },
        { role: 'user', content: 'What did I miss?' },
      ]);
    });

    it('shows the last user turn as the question header', async () => {
      await pipeline.handleAsk({
        conversation: [
          { role: 'user', content: 'First' },
          { role: 'assistant', content: 'Reply' },
          { role: 'user', content: 'Second' },
        ],
      });

      expect(slack.post).toHaveBeenCalledWith(
        'C0DEFAULT',
        `*Question*: Second\n\n*Answer*:\n42\n\n${FOOTER}`,
        undefined
      );
    });
  });

  describe('validation', () => {
    it('requires a question or a conversation', async () => {
      const result = await pipeline.handleAsk({});

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error instanceof ValidationError && result.error.issues).toEqual([
        'question or conversation is required',
      ]);
      expect(llm.complete).not.toHaveBeenCalled();
    });

    it('collects every problem', async () => {
      const result = await pipeline.handleAsk({
        question: 'Hi',
        temperature: 2,
        maxTokens: 0,
        conversation: [{ role: 'user', content: ' ' }],
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error instanceof ValidationError && result.error.issues).toEqual([
        'conversation[0].content must not be empty',
        'max_tokens must be a positive integer',
        'temperature must be between 0 and 1',
      ]);
      expect(statusCodeFor(result.error)).toBe(400);
    });

    it('requires a destination when no default channel is configured', async () => {
      const bare = new AskPipeline({ config: testConfig({ DEFAULT_SLACK_CHANNEL: '' }), llm, slack });

      const result = await bare.handleAsk({ question: 'Hi' });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error instanceof ValidationError && result.error.issues).toEqual([
        'destination_channel is required when no default channel is configured',
      ]);
    });
  });

  describe('failures', () => {
    it('aborts when the context channel cannot be read', async () => {
      slack.fetchRecent.mockRejectedValue(platformError('channel_not_found'));

      const result = await pipeline.handleAsk({ question: 'Summarize', sourceChannel: 'C404' });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ContextFetchError);
      expect(result.error.cause).toBeInstanceOf(ChannelNotFoundError);
      expect(statusCodeFor(result.error)).toBe(502);
      expect(llm.complete).not.toHaveBeenCalled();
    });

    it('aborts when the model call fails', async () => {
      llm.complete.mockRejectedValue(new RateLimitError('Model provider rate limit', 'llm', 5));

      const result = await pipeline.handleAsk({ question: 'Hi' });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(CompletionError);
      expect(statusCodeFor(result.error)).toBe(429);
      expect(slack.post).not.toHaveBeenCalled();
    });
  });

  describe('delivery', () => {
    it('escapes the answer before posting', async () => {
      llm.complete.mockResolvedValue({ answerText: 'a < b', modelUsed: 'anthropic/claude-3.7-sonnet' });

      await pipeline.handleAsk({ question: 'Compare' });

      expect(slack.post).toHaveBeenCalledWith(
        'C0DEFAULT',
        `*Question*: Compare\n\n*Answer*:\na &lt; b\n\n${FOOTER}`,
        undefined
      );
    });

    it('threads the parts of a long answer under the first message', async () => {
      const chunked = new AskPipeline({ config: testConfig({ SLACK_CHUNK_LIMIT: '100' }), llm, slack, clock });
      llm.complete.mockResolvedValue({ answerText: LONG_ANSWER, modelUsed: 'm' });
      let posted = 0;
      slack.post.mockImplementation(async () => `10.${++posted}`);

      const result = await chunked.handleAsk({ question: 'Long answer please' });

      expect(slack.post.mock.calls).toEqual([
        ['C0DEFAULT', '*Question*: Long answer please\n\n*Answer*: continued in 3 replies', undefined],
        ['C0DEFAULT', `*Answer 1/3*:\n${'a'.repeat(80)}`, '10.1'],
        ['C0DEFAULT', `*Answer 2/3*:\n${'b'.repeat(80)}`, '10.1'],
        ['C0DEFAULT', `*Answer 3/3*:\n${'c'.repeat(80)}`, '10.1'],
        ['C0DEFAULT', '_Model: m | 2025-03-01 09:30:00 UTC_', '10.1'],
      ]);
      expect(result.ok && result.delivery).toEqual({
        delivered: true,
        destinationChannel: 'C0DEFAULT',
        messageId: '10.1',
        chunksSent: 5,
        chunksTotal: 5,
      });
    });

    it('keeps every part in the requested thread', async () => {
      const chunked = new AskPipeline({ config: testConfig({ SLACK_CHUNK_LIMIT: '100' }), llm, slack, clock });
      llm.complete.mockResolvedValue({ answerText: LONG_ANSWER, modelUsed: 'm' });

      await chunked.handleAsk({ question: 'Long answer please', threadTs: '5.5' });

      expect(slack.post).toHaveBeenCalledTimes(5);
      expect(slack.post.mock.calls.map((call) => call[2])).toEqual(['5.5', '5.5', '5.5', '5.5', '5.5']);
    });

    it('stops at the first failed message and still returns the answer', async () => {
      const chunked = new AskPipeline({ config: testConfig({ SLACK_CHUNK_LIMIT: '100' }), llm, slack, clock });
      llm.complete.mockResolvedValue({ answerText: LONG_ANSWER, modelUsed: 'm' });
      slack.post.mockResolvedValueOnce('1.1').mockRejectedValueOnce(platformError('fatal_error'));

      const result = await chunked.handleAsk({ question: 'Long answer please' });

      expect(slack.post).toHaveBeenCalledTimes(2);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.completion.answerText).toBe(LONG_ANSWER);
      expect(result.delivery).toEqual({
        delivered: false,
        destinationChannel: 'C0DEFAULT',
        messageId: '1.1',
        chunksSent: 1,
        chunksTotal: 5,
        failedChunk: 2,
        error: 'chunk 2/5 failed: Slack call failed: fatal_error',
      });
    });

    it('resolves the destination once per delivery', async () => {
      const chunked = new AskPipeline({ config: testConfig({ SLACK_CHUNK_LIMIT: '100' }), llm, slack, clock });
      llm.complete.mockResolvedValue({ answerText: LONG_ANSWER, modelUsed: 'm' });

      await chunked.handleAsk({ question: 'Long answer please', destinationChannel: '#general' });

      expect(slack.resolveChannel).toHaveBeenCalledTimes(1);
      expect(slack.resolveChannel).toHaveBeenCalledWith('#general');
      expect(slack.post.mock.calls.map((call) => call[0])).toEqual(['general', 'general', 'general', 'general', 'general']);
    });

    it('posts raw text flat for direct delivery', async () => {
      const delivery = await pipeline.deliver('C1', 'hi & bye');

      expect(slack.post).toHaveBeenCalledWith('C1', 'hi &amp; bye', undefined);
      expect(delivery.delivered).toBe(true);
    });

    it('re-splits a chunk Slack rejects as too long', async () => {
      const answer = `${'x'.repeat(50)} ${'y'.repeat(50)}`;
      slack.post
        .mockRejectedValueOnce(platformError('msg_too_long'))
        .mockResolvedValueOnce('2.1')
        .mockResolvedValueOnce('2.2');

      const delivery = await pipeline.deliver('C1', answer);

      expect(slack.post).toHaveBeenNthCalledWith(2, 'C1', 'x'.repeat(50), undefined);
      expect(slack.post).toHaveBeenNthCalledWith(3, 'C1', 'y'.repeat(50), undefined);
      expect(delivery).toEqual({
        delivered: true,
        destinationChannel: 'C1',
        messageId: '2.1',
        chunksSent: 1,
        chunksTotal: 1,
      });
    });

    it('reports the chunk when a re-split piece fails', async () => {
      const answer = `${'x'.repeat(50)} ${'y'.repeat(50)}`;
      slack.post
        .mockRejectedValueOnce(platformError('msg_too_long'))
        .mockResolvedValueOnce('2.1')
        .mockRejectedValueOnce(platformError('fatal_error'));

      const delivery = await pipeline.deliver('C1', answer);

      expect(slack.post).toHaveBeenCalledTimes(3);
      expect(delivery).toEqual({
        delivered: false,
        destinationChannel: 'C1',
        chunksSent: 0,
        chunksTotal: 1,
        failedChunk: 1,
        error: 'chunk 1/1 failed: Slack call failed: fatal_error',
      });
    });
  });

  describe('with the Slack client', () => {
    it('looks up a #name destination once for a multi-part answer', async () => {
      const config = testConfig({ SLACK_CHUNK_LIMIT: '100' });
      const web = new WebClient('xoxb-test');
      const list = vi.spyOn(web.conversations, 'list').mockResolvedValue({
        ok: true,
        channels: [{ id: 'C999', name: 'general', is_private: false, num_members: 3 }],
      });
      const postMessage = vi.spyOn(web.chat, 'postMessage').mockResolvedValue({ ok: true, ts: '7.1' });
      llm.complete.mockResolvedValue({ answerText: LONG_ANSWER, modelUsed: 'm' });
      const real = new AskPipeline({ config, llm, slack: new SlackMessagingClient(config, web), clock });

      const result = await real.handleAsk({ question: 'Long answer please', destinationChannel: '#general' });

      expect(list).toHaveBeenCalledTimes(1);
      expect(postMessage).toHaveBeenCalledTimes(5);
      expect(postMessage.mock.calls.every(([args]) => args?.channel === 'C999')).toBe(true);
      expect(result.ok && result.delivery.delivered).toBe(true);
    });
  });
});

describe('buildPromptMessages', () => {
  it('puts context in a system message in conversation mode', () => {
    const messages = buildPromptMessages(
      { conversation: [{ role: 'user', content: 'What did I miss?' }] },
      'Recent messages in C1:\nAlice: hi'
    );

    expect(messages).toEqual([
      { role: 'system', content: 'Recent messages in C1:\nAlice: hi' },
      { role: 'user', content: 'What did I miss?' },
    ]);
  });
});

describe('reduceChunkOutcomes', () => {
  it('reports nothing sent when the first chunk fails', () => {
    expect(
      reduceChunkOutcomes('C1', 2, [{ index: 1, ok: false, error: 'chunk 1/2 failed: Slack refused access (not_in_channel)' }])
    ).toEqual({
      delivered: false,
      destinationChannel: 'C1',
      messageId: undefined,
      chunksSent: 0,
      chunksTotal: 2,
      failedChunk: 1,
      error: 'chunk 1/2 failed: Slack refused access (not_in_channel)',
    });
  });
});
