import { Router, type Router as ExpressRouter } from 'express';
import type { BridgeConfig } from '../config/settings.js';

export function createHealthRouter(config: BridgeConfig): ExpressRouter {
  const healthRouter = Router();

  healthRouter.get('/', (_req, res) => {
    res.json({
      status: 'healthy',
      service: 'askbridge',
      timestamp: new Date().toISOString(),
      slack_configured: config.slack.botToken.length > 0,
      llm_configured: config.llm.apiKey.length > 0,
      default_channel: config.slack.defaultChannel ?? null,
    });
  });

  return healthRouter;
}
