// Must load before anything reads process.env at import time
import './env.js';
import { logger } from '@askbridge/shared';
import { ConfigError, loadConfig, type BridgeConfig } from './config/settings.js';
import { AskPipeline } from './services/ask-pipeline.js';
import { ApiServer } from './services/api-server.js';
import { OpenRouterClient } from './services/llm-client.js';
import { SlackMessagingClient } from './services/slack-client.js';

function readConfig(): BridgeConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

async function start(): Promise<void> {
  const config = readConfig();

  const llm = new OpenRouterClient(config);
  const slack = new SlackMessagingClient(config);
  const pipeline = new AskPipeline({ config, llm, slack });
  const apiServer = new ApiServer(config, { pipeline, slack });

  logger.info('🔌 Environment check:', {
    model: config.llm.defaultModel,
    baseUrl: config.llm.baseUrl,
    defaultChannel: config.slack.defaultChannel ?? 'not set',
    localApiKey: config.auth.generatedKey ? 'generated for this process' : 'from environment',
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down bridge`);
    apiServer
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Failed to stop API server cleanly:', error);
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  await apiServer.start();
  logger.info('✅ bridge: ready to take questions');
}

start().catch((error: unknown) => {
  logger.error('Failed to start bridge:', error);
  process.exit(1);
});
