import { Router, type Request, type Response, type Router as ExpressRouter } from 'express';
import { logger } from '@askbridge/shared';
import type { AskPipeline } from '../services/ask-pipeline.js';
import { resolveNames } from '../services/context-formatter.js';
import type { MessagingClient } from '../services/slack-client.js';
import { toSlackError } from '../services/slack-client.js';
import { parseAskRequest, slackMessageSchema, formatIssues } from '../schemas/ask.js';
import type { AskFailure, CompletionResult, DeliveryOutcome, SlackChannel } from '../types/ask.js';
import { ChannelNotFoundError, statusCodeFor, ValidationError } from '../types/errors.js';
import { generateCorrelationId } from '../utils/correlation.js';

export interface ApiRouterDeps {
  pipeline: Pick<AskPipeline, 'handleAsk' | 'deliver'>;
  slack: MessagingClient;
  /** Page size and ceiling for GET /slack/messages */
  browse: {
    defaultMessageCount: number;
    maxMessageCount: number;
  };
}

// Shorter search queries return nothing
const MIN_SEARCH_LENGTH = 2;

function toWireChannel(channel: SlackChannel) {
  return {
    id: channel.id,
    name: channel.name,
    is_private: channel.isPrivate,
    member_count: channel.memberCount,
  };
}

export function toWireCompletion(completion: CompletionResult) {
  return {
    answer_text: completion.answerText,
    model_used: completion.modelUsed,
    token_usage: completion.tokenUsage
      ? {
          prompt_tokens: completion.tokenUsage.promptTokens,
          completion_tokens: completion.tokenUsage.completionTokens,
          total_tokens: completion.tokenUsage.totalTokens,
        }
      : null,
  };
}

export function toWireDelivery(delivery: DeliveryOutcome) {
  return {
    delivered: delivery.delivered,
    destination_channel: delivery.destinationChannel,
    message_id: delivery.messageId ?? null,
    chunks_sent: delivery.chunksSent,
    chunks_total: delivery.chunksTotal,
    failed_chunk: delivery.failedChunk ?? null,
    error: delivery.error ?? null,
  };
}

function sendFailure(res: Response, requestId: string, error: AskFailure): void {
  res.status(statusCodeFor(error)).json({
    success: false,
    request_id: requestId,
    error: {
      kind: error.kind,
      message: error.message,
      ...(error instanceof ValidationError ? { issues: error.issues } : {}),
    },
  });
}

function sendUnhandled(res: Response, error: unknown): void {
  res.status(500).json({
    success: false,
    error: error instanceof Error ? error.message : String(error),
  });
}

function requestIdOf(res: Response): string {
  const requestId: unknown = res.locals.requestId;
  return typeof requestId === 'string' ? requestId : generateCorrelationId();
}

export function createApiRouter(deps: ApiRouterDeps): ExpressRouter {
  const router = Router();
  const { pipeline, slack } = deps;

  // POST /ask - question in, answer out and posted to Slack
  router.post('/ask', async (req: Request, res: Response) => {
    const requestId = requestIdOf(res);

    try {
      const parsed = parseAskRequest(req.body);
      if (!parsed.success) {
        sendFailure(res, requestId, new ValidationError(parsed.issues));
        return;
      }

      const result = await pipeline.handleAsk(parsed.data, requestId);
      if (!result.ok) {
        sendFailure(res, requestId, result.error);
        return;
      }

      res.json({
        success: true,
        request_id: requestId,
        completion: toWireCompletion(result.completion),
        delivery: toWireDelivery(result.delivery),
      });
    } catch (error) {
      logger.error('Unhandled error in POST /ask:', error);
      sendUnhandled(res, error);
    }
  });

  // POST /slack/message - post text straight to a channel
  router.post('/slack/message', async (req: Request, res: Response) => {
    try {
      const parsed = slackMessageSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ success: false, error: formatIssues(parsed.error).join('; ') });
        return;
      }

      const { channel, text, thread_ts } = parsed.data;
      const delivery = await pipeline.deliver(channel, text, thread_ts);

      res.json({ success: delivery.delivered, delivery: toWireDelivery(delivery) });
    } catch (error) {
      logger.error('Unhandled error in POST /slack/message:', error);
      sendUnhandled(res, error);
    }
  });

  // GET /slack/channels - channels the bot can see
  router.get('/slack/channels', async (_req: Request, res: Response) => {
    try {
      const channels = await slack.listChannels();
      res.json({ channels: channels.map(toWireChannel) });
    } catch (error) {
      const mapped = toSlackError(error);
      logger.error(`Failed to list Slack channels: ${mapped.message}`);
      res.status(502).json({ success: false, error: mapped.message });
    }
  });

  // GET /slack/channels/search?query= - case-insensitive name match
  router.get('/slack/channels/search', async (req: Request, res: Response) => {
    const query = typeof req.query.query === 'string' ? req.query.query.trim().toLowerCase() : '';
    if (query.length < MIN_SEARCH_LENGTH) {
      res.json({ channels: [] });
      return;
    }

    try {
      const channels = await slack.listChannels();
      res.json({
        channels: channels.filter((channel) => channel.name.toLowerCase().includes(query)).map(toWireChannel),
      });
    } catch (error) {
      const mapped = toSlackError(error);
      logger.error(`Failed to search Slack channels: ${mapped.message}`);
      res.status(502).json({ success: false, error: mapped.message });
    }
  });

  // GET /slack/messages/:channel - recent history, oldest first
  router.get('/slack/messages/:channel', async (req: Request, res: Response) => {
    const rawLimit = typeof req.query.limit === 'string' ? Number.parseInt(req.query.limit, 10) : NaN;
    const limit = Number.isInteger(rawLimit) && rawLimit > 0
      ? Math.min(rawLimit, deps.browse.maxMessageCount)
      : deps.browse.defaultMessageCount;

    try {
      const messages = await slack.fetchRecent(req.params.channel, limit);
      const names = await resolveNames(
        messages.map((message) => message.authorId),
        (authorId) => slack.resolveDisplayName(authorId)
      );

      const oldestFirst = [...messages].reverse().map((message) => ({
        author: names.get(message.authorId) ?? message.authorId,
        text: message.text,
        timestamp: new Date(message.timestamp * 1000).toISOString(),
      }));

      res.json({ messages: oldestFirst, count: oldestFirst.length });
    } catch (error) {
      const mapped = toSlackError(error, req.params.channel);
      logger.error(`Failed to fetch Slack messages: ${mapped.message}`);
      res.status(mapped instanceof ChannelNotFoundError ? 404 : 502).json({
        success: false,
        error: mapped.message,
      });
    }
  });

  return router;
}
