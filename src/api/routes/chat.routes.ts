import { Router, Request, Response } from 'express';
import { body } from 'express-validator';
import { logger } from '../../config/logger';
import type { DispatchResult } from '../../ai/llm/types';
import type { MessageDispatcher } from '../../services/message-dispatcher.service';
import { formatResponseTime, sanitizeInput } from '../../utils/text';
import { validate } from '../middleware/validate';

type Dispatcher = Pick<MessageDispatcher, 'dispatch' | 'testConnection'>;

/** The reply is rendered by browser clients, so it is escaped on the way out. */
function present(result: DispatchResult) {
  const body = result.success ? { ...result, response: sanitizeInput(result.response) } : result;
  return { ...body, formattedResponseTime: formatResponseTime(result.responseTime) };
}

function statusFor(result: DispatchResult): number {
  if (result.success) return 200;
  return result.kind === 'invalid_input' ? 400 : 502;
}

export function createChatRoutes(dispatcher: Dispatcher): Router {
  const router = Router();

  /** POST /chat - relay one message to the model; length and emptiness are checked on the raw text */
  router.post(
    '/',
    validate([
      body('message').isString().withMessage('Message must be a string'),
      body('model').optional().isString().trim().notEmpty().withMessage('Model must be a non-empty string'),
    ]),
    async (req: Request, res: Response) => {
      try {
        const { message, model } = req.body;
        const result = await dispatcher.dispatch(message, model);
        if (!result.success) {
          logger.warn('Chat dispatch failed', { kind: result.kind, error: result.error });
        }
        res.status(statusFor(result)).json(present(result));
      } catch (error) {
        logger.error('Chat route failed', { error });
        res.status(500).json({ error: 'Internal server error' });
      }
    }
  );

  /** GET /chat/connection - round-trip a fixed greeting */
  router.get('/connection', async (_req: Request, res: Response) => {
    try {
      const result = await dispatcher.testConnection();
      res.status(result.success ? 200 : 503).json(present(result));
    } catch (error) {
      logger.error('Connection test failed', { error });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
