/**
 * Entry point: load and validate configuration, then serve the chat relay.
 */
import { createApp } from './api/app';
import { listen } from './api/server';
import { loadConfig } from './config';
import { logger, setLogLevel } from './config/logger';
import { MessageDispatcher } from './services/message-dispatcher.service';

async function start() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const dispatcher = new MessageDispatcher(config.ai);

  const host = process.env.HOST || '0.0.0.0';
  const httpServer = await listen(createApp(dispatcher, config), config.port, host);
  logger.info(`Server listening on ${host}:${config.port} (env: ${config.env})`, {
    model: config.ai.defaultModel,
    maxRetries: config.ai.maxRetries,
  });

  return httpServer;
}

const serverPromise = start().catch((e: unknown) => {
  logger.error('Startup failed', { error: e instanceof Error ? e.message : String(e) });
  process.exit(1);
});

export default serverPromise;
