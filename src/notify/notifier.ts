// This module routes delivery requests to their channel and logs each outcome.

import type { FastifyBaseLogger } from 'fastify';
import type { DeliveryOutcome, DeliveryRequest } from '../types/domain.js';
import { redactUrl, sanitizeForLog } from '../utils/logger.js';
import type { EmailChannel } from './email.js';
import type { WebhookChannel } from './webhook.js';

// This capability is all the notification tools need; delivery failures are outcomes, not exceptions.
export interface Notifier {
  deliver(request: DeliveryRequest): Promise<DeliveryOutcome>;
}

export interface GatewayNotifierOptions {
  email: EmailChannel;
  webhook: WebhookChannel;
  logger?: FastifyBaseLogger;
}

export class GatewayNotifier implements Notifier {
  private readonly email: EmailChannel;
  private readonly webhook: WebhookChannel;
  private readonly logger?: FastifyBaseLogger;

  public constructor(options: GatewayNotifierOptions) {
    this.email = options.email;
    this.webhook = options.webhook;
    this.logger = options.logger?.child({ component: 'notifier' });
  }

  public async deliver(request: DeliveryRequest): Promise<DeliveryOutcome> {
    const outcome =
      request.channel === 'email'
        ? await this.email.deliver(request.payload)
        : await this.webhook.deliver(request.payload);

    const target = request.channel === 'email' ? request.payload.to : redactUrl(request.payload.url);
    if (outcome.status === 'success') {
      this.logger?.info(
        {
          event: 'notification_delivered',
          channel: request.channel,
          target: sanitizeForLog(target)
        },
        'notification_delivered'
      );
    } else {
      this.logger?.warn(
        {
          event: 'notification_delivery_failed',
          channel: request.channel,
          target: sanitizeForLog(target),
          reason: outcome.reason
        },
        'notification_delivery_failed'
      );
    }

    return outcome;
  }
}
