import { z } from 'zod';
import type { AskRequest } from '../types/ask.js';

// Wire shapes are snake_case; ranges and defaults are the pipeline's business
export const askRequestSchema = z.object({
  question: z.string().optional(),
  model: z.string().optional(),
  max_tokens: z.number().int().optional(),
  temperature: z.number().optional(),
  conversation: z
    .array(
      z.object({
        role: z.enum(['user', 'assistant']),
        content: z.string(),
      })
    )
    .optional(),
  source_channel: z.string().optional(),
  context_message_count: z.number().int().optional(),
  destination_channel: z.string().optional(),
  system: z.string().optional(),
  thread_ts: z.string().optional(),
});

export const slackMessageSchema = z.object({
  channel: z.string().trim().min(1, 'channel is required'),
  text: z.string().min(1, 'text is required'),
  thread_ts: z.string().optional(),
});

export type AskRequestBody = z.infer<typeof askRequestSchema>;
export type SlackMessageBody = z.infer<typeof slackMessageSchema>;

export type ParseResult<T> = { success: true; data: T } | { success: false; issues: string[] };

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

export function parseAskRequest(body: unknown): ParseResult<AskRequest> {
  const parsed = askRequestSchema.safeParse(body);
  if (!parsed.success) {
    return { success: false, issues: formatIssues(parsed.error) };
  }

  const wire = parsed.data;
  return {
    success: true,
    data: {
      question: wire.question,
      model: wire.model,
      maxTokens: wire.max_tokens,
      temperature: wire.temperature,
      conversation: wire.conversation,
      sourceChannel: wire.source_channel,
      contextMessageCount: wire.context_message_count,
      destinationChannel: wire.destination_channel,
      system: wire.system,
      threadTs: wire.thread_ts,
    },
  };
}
