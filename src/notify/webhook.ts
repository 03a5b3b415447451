// This module delivers webhook notifications as JSON HTTP requests.

import type { DeliveryOutcome, WebhookPayload } from '../types/domain.js';
import { errorMessage } from '../utils/errors.js';

const WEBHOOK_TIMEOUT_MS = 30_000;

export class WebhookChannel {
  private readonly timeoutMs: number;

  public constructor(timeoutMs = WEBHOOK_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs;
  }

  public async deliver(payload: WebhookPayload): Promise<DeliveryOutcome> {
    let response: Response;
    try {
      response = await fetch(payload.url, {
        method: payload.method,
        headers: {
          'Content-Type': 'application/json',
          ...payload.headers
        },
        body: JSON.stringify(payload.payload),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      return { status: 'failure', reason: errorMessage(error) };
    }

    if (!response.ok) {
      return { status: 'failure', reason: `Webhook endpoint returned HTTP ${response.status}` };
    }

    return {
      status: 'success',
      detail: `Webhook sent successfully to ${payload.url} (Status: ${response.status})`
    };
  }
}
