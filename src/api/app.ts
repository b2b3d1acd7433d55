/**
 * Express app: CORS, JSON body, health probe and the chat relay routes.
 */

import express, { Express } from 'express';
import cors from 'cors';
import type { AppConfig } from '../config';
import type { MessageDispatcher } from '../services/message-dispatcher.service';
import { createChatRoutes } from './routes/chat.routes';

export function createApp(
  dispatcher: Pick<MessageDispatcher, 'dispatch' | 'testConnection'>,
  config: Pick<AppConfig, 'apiPrefix'>
): Express {
  const app = express();

  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  app.use(`${config.apiPrefix}/chat`, createChatRoutes(dispatcher));

  return app;
}
