import { createLogger } from '../logging/logger.js';
import { describeError } from '../errors.js';
import { OutboundReply } from '../types/message.js';
import { DeliveryPrimitive } from './channel.js';

const log = createLogger('sender');

/**
 * Turns a finished reply into an OutboundReply record. The delivery
 * primitive is invoked exactly once; failures come back as status `failed`
 * and are never retried here.
 */
export class MessageSender {
  constructor(private readonly delivery: DeliveryPrimitive) {}

  async send(peer: string, text: string, inReplyTo: number): Promise<OutboundReply> {
    const reply: OutboundReply = { peer, text, inReplyTo, status: 'pending' };
    const start = Date.now();
    try {
      await this.delivery.deliver(peer, text);
      reply.status = 'sent';
      reply.sentAt = Date.now();
      log.info('Reply sent', { peer, inReplyTo, durationMs: reply.sentAt - start });
    } catch (err) {
      reply.status = 'failed';
      reply.error = describeError(err);
      log.error('Reply delivery failed', { peer, inReplyTo, error: reply.error });
    }
    return reply;
  }
}
