/**
 * Querywise - Chat API Routes
 *
 * POST /api/chat/message            answer one message
 * GET  /api/chat/conversations/:id  stored turns of a conversation
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';

import { formatValidationErrors } from '../../config/schema.js';
import type { ChatService } from '../../nl-query/service.js';
import { asyncHandler } from '../../server/middleware/errorHandler.js';
import logger from '../../utils/logger.js';
import { NotFoundError, RequestCancelledError, ValidationError } from '../../utils/types.js';

// =============================================================================
// Request Validation
// =============================================================================

export const ChatMessageBodySchema = z.object({
  message: z.string().trim().min(1, 'message is required').max(4000),
  conversation_id: z.string().trim().min(1).max(64).optional(),
  context: z.record(z.unknown()).optional(),
});

// =============================================================================
// Router
// =============================================================================

export function createChatRouter(service: ChatService): Router {
  const router = Router();

  router.post(
    '/message',
    asyncHandler(async (req: Request, res: Response) => {
      const parsed = ChatMessageBodySchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError('Invalid chat request', formatValidationErrors(parsed.error));
      }

      // Abandon the pipeline when the client disconnects before the answer
      const controller = new AbortController();
      const onClose = (): void => {
        if (!res.writableEnded) {
          controller.abort();
        }
      };
      res.on('close', onClose);

      try {
        const response = await service.chat(
          {
            message: parsed.data.message,
            conversationId: parsed.data.conversation_id,
            context: parsed.data.context,
          },
          { requestId: req.requestId, signal: controller.signal }
        );
        res.json(response);
      } catch (error) {
        if (error instanceof RequestCancelledError) {
          logger.info('Chat request abandoned by client', { requestId: req.requestId });
          return;
        }
        throw error;
      } finally {
        res.off('close', onClose);
      }
    })
  );

  router.get(
    '/conversations/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const id = req.params['id'] ?? '';
      const conversation = await service.getConversations().get(id);
      if (conversation === null) {
        throw new NotFoundError(`Conversation not found: ${id}`);
      }

      res.json({
        success: true,
        data: {
          conversation_id: conversation.id,
          created_at: conversation.createdAt.toISOString(),
          turns: conversation.turns.map((turn) => ({
            utterance: turn.utterance,
            rewritten: turn.rewritten,
            intent: turn.intent,
            sql_query: turn.sql,
            response: turn.summary,
            timestamp: turn.timestamp.toISOString(),
          })),
        },
        timestamp: new Date().toISOString(),
      });
    })
  );

  return router;
}

export default createChatRouter;
