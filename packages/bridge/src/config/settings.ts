import { randomBytes } from 'crypto';
import { z } from 'zod';
import { logger } from '@askbridge/shared';

export interface BridgeConfig {
  readonly server: {
    readonly host: string;
    readonly port: number;
    readonly corsOrigins: readonly string[];
  };
  readonly auth: {
    readonly localApiKey: string;
    readonly generatedKey: boolean;
  };
  readonly llm: {
    readonly apiKey: string;
    readonly baseUrl: string;
    readonly defaultModel: string;
    readonly defaultMaxTokens: number;
    readonly defaultTemperature: number;
    readonly systemPrompt?: string;
    /** Used when an ask reads channel context and no other prompt applies */
    readonly contextSystemPrompt: string;
  };
  readonly slack: {
    readonly botToken: string;
    readonly defaultChannel?: string;
    readonly chunkLimit: number;
  };
  readonly context: {
    readonly charBudget: number;
    readonly defaultMessageCount: number;
    readonly maxMessageCount: number;
  };
  readonly browse: {
    readonly defaultMessageCount: number;
    readonly maxMessageCount: number;
  };
  readonly requestTimeoutMs: number;
}

export const DEFAULT_CONTEXT_SYSTEM_PROMPT = [
  'You answer questions about the conversation in a Slack channel.',
  'Read the supplied messages carefully and give an accurate, useful answer, quoting messages where a detail matters.',
  'Keep the answer clear and concise but include enough detail.',
  'If you are not sure of something, say so instead of guessing.',
  'Point out any contradiction between the messages and the question.',
].join('\n');

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z
  .object({
    LLM_API_KEY: z.string().trim().min(1, 'LLM_API_KEY is required'),
    LLM_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
    DEFAULT_MODEL: z.string().trim().min(1).default('anthropic/claude-3.7-sonnet'),
    DEFAULT_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
    DEFAULT_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.7),
    SYSTEM_PROMPT: optionalText,
    CONTEXT_SYSTEM_PROMPT: optionalText,
    SLACK_BOT_TOKEN: z.string().trim().min(1, 'SLACK_BOT_TOKEN is required'),
    DEFAULT_SLACK_CHANNEL: optionalText,
    SLACK_CHUNK_LIMIT: z.coerce.number().int().min(100).max(40000).default(2900),
    LOCAL_API_KEY: optionalText,
    BRIDGE_HOST: z.string().trim().min(1).default('127.0.0.1'),
    BRIDGE_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
    CORS_ORIGINS: z.string().default('http://localhost:8000'),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    CONTEXT_CHAR_BUDGET: z.coerce.number().int().min(200).default(8000),
    DEFAULT_CONTEXT_MESSAGES: z.coerce.number().int().positive().default(10),
    MAX_CONTEXT_MESSAGES: z.coerce.number().int().positive().default(50),
    // conversations.history takes at most 1000 per page
    DEFAULT_BROWSE_MESSAGES: z.coerce.number().int().positive().default(100),
    MAX_BROWSE_MESSAGES: z.coerce.number().int().positive().max(1000).default(200),
  })
  .refine((env) => env.DEFAULT_CONTEXT_MESSAGES <= env.MAX_CONTEXT_MESSAGES, {
    message: 'DEFAULT_CONTEXT_MESSAGES must not exceed MAX_CONTEXT_MESSAGES',
    path: ['DEFAULT_CONTEXT_MESSAGES'],
  })
  .refine((env) => env.DEFAULT_BROWSE_MESSAGES <= env.MAX_BROWSE_MESSAGES, {
    message: 'DEFAULT_BROWSE_MESSAGES must not exceed MAX_BROWSE_MESSAGES',
    path: ['DEFAULT_BROWSE_MESSAGES'],
  });

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Read process configuration once. The result is frozen and meant to be
 * handed to constructors; nothing else in the bridge reads `process.env`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const settings = parsed.data;
  const generatedKey = !settings.LOCAL_API_KEY;
  const localApiKey = settings.LOCAL_API_KEY ?? randomBytes(32).toString('hex');

  if (generatedKey) {
    logger.warn('LOCAL_API_KEY not set; generated a one-off key for this process');
  }

  return deepFreeze({
    server: {
      host: settings.BRIDGE_HOST,
      port: settings.BRIDGE_PORT,
      corsOrigins: settings.CORS_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    },
    auth: { localApiKey, generatedKey },
    llm: {
      apiKey: settings.LLM_API_KEY,
      baseUrl: settings.LLM_BASE_URL,
      defaultModel: settings.DEFAULT_MODEL,
      defaultMaxTokens: settings.DEFAULT_MAX_TOKENS,
      defaultTemperature: settings.DEFAULT_TEMPERATURE,
      systemPrompt: settings.SYSTEM_PROMPT,
      contextSystemPrompt: settings.CONTEXT_SYSTEM_PROMPT ?? DEFAULT_CONTEXT_SYSTEM_PROMPT,
    },
    slack: {
      botToken: settings.SLACK_BOT_TOKEN,
      defaultChannel: settings.DEFAULT_SLACK_CHANNEL,
      chunkLimit: settings.SLACK_CHUNK_LIMIT,
    },
    context: {
      charBudget: settings.CONTEXT_CHAR_BUDGET,
      defaultMessageCount: settings.DEFAULT_CONTEXT_MESSAGES,
      maxMessageCount: settings.MAX_CONTEXT_MESSAGES,
    },
    browse: {
      defaultMessageCount: settings.DEFAULT_BROWSE_MESSAGES,
      maxMessageCount: settings.MAX_BROWSE_MESSAGES,
    },
    requestTimeoutMs: settings.REQUEST_TIMEOUT_MS,
  });
}
