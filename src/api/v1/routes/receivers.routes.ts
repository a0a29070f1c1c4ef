/**
 * Webhook Receiver Routes
 * Inbound release events from the providers
 */

import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { WebhookReceiver } from '../../../services/receiver.service';
import { maskUrlToken } from '../../../utils/logger';

const ParamsSchema = z.object({
  receiverId: z.string().min(1),
});

const QuerySchema = z.object({
  access_token: z.string().optional(),
});

export type ReceiverRoutesOptions = {
  receiver: WebhookReceiver;
};

export async function receiversRoutes(fastify: FastifyInstance, opts: ReceiverRoutesOptions) {
  /**
   * POST /v1/receivers/:receiverId/events?access_token=...
   *
   * Always answers with the receiver's outcome, including refusals, so the
   * provider's delivery log shows why an event was not taken.
   */
  fastify.post(
    '/:receiverId/events',
    {
      config: {
        rateLimit: { max: 600, timeWindow: '1 minute' },
      },
    },
    async (request, reply) => {
      const { receiverId } = ParamsSchema.parse(request.params);
      const { access_token: accessToken } = QuerySchema.parse(request.query);

      const outcome = await opts.receiver.receive({
        receiverId,
        accessToken,
        payload: request.body,
        rawBody: request.rawBody ?? '',
        headers: request.headers,
      });

      request.log.info(
        { receiverId, status: outcome.status, eventId: outcome.eventId, url: maskUrlToken(request.url) },
        'Webhook handled'
      );
      return reply.status(outcome.status).send(outcome.body);
    }
  );
}
