// This module implements the email and webhook notification tools on top of the notifier.

import type { ToolHandler } from '../mcp/registry.js';
import { sendEmailSchema, sendTemplateEmailSchema, sendWebhookSchema } from '../mcp/tool-schemas.js';
import type { DeliveryOutcome, DeliveryRequest, EmailPayload, ToolArguments } from '../types/domain.js';
import type { ToolCallResult } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import type { Notifier } from '../notify/notifier.js';
import { renderEmailTemplate } from '../notify/templates.js';

export interface NotificationToolDeps {
  notifier: Notifier;
  now?: () => Date;
}

// A failed delivery becomes a handler error so dispatch reports it as an error result.
async function deliverOrThrow(notifier: Notifier, request: DeliveryRequest, failurePrefix: string): Promise<ToolCallResult> {
  const outcome: DeliveryOutcome = await notifier.deliver(request);
  if (outcome.status === 'failure') {
    throw new AppError(502, 'delivery_failed', `${failurePrefix}: ${outcome.reason}`);
  }

  return { content: [{ type: 'text', text: outcome.detail }] };
}

function sendEmailHandler(deps: NotificationToolDeps): ToolHandler {
  return async (args: ToolArguments) => {
    const input = sendEmailSchema.parse(args);
    const payload: EmailPayload = {
      to: input.to,
      subject: input.subject,
      body: input.body,
      cc: input.cc,
      bcc: input.bcc,
      isHtml: input.is_html,
      attachments: input.attachments.map((attachment) => ({
        filename: attachment.filename,
        content: attachment.content,
        contentType: attachment.content_type
      }))
    };

    return deliverOrThrow(deps.notifier, { channel: 'email', payload }, 'Failed to send email');
  };
}

function sendTemplateEmailHandler(deps: NotificationToolDeps): ToolHandler {
  return async (args: ToolArguments) => {
    const input = sendTemplateEmailSchema.parse(args);
    const rendered = renderEmailTemplate(input.template, input.variables);

    return deliverOrThrow(
      deps.notifier,
      {
        channel: 'email',
        payload: {
          to: input.to,
          subject: rendered.subject,
          body: rendered.body,
          cc: [],
          bcc: [],
          isHtml: rendered.isHtml,
          attachments: []
        }
      },
      'Failed to send template email'
    );
  };
}

function sendWebhookHandler(deps: NotificationToolDeps): ToolHandler {
  const now = deps.now ?? (() => new Date());

  return async (args: ToolArguments) => {
    const input = sendWebhookSchema.parse(args);

    return deliverOrThrow(
      deps.notifier,
      {
        channel: 'webhook',
        payload: {
          url: input.url,
          method: input.method,
          payload: { ...input.payload, timestamp: now().toISOString() },
          headers: input.headers
        }
      },
      'Failed to send webhook'
    );
  };
}

export function buildNotificationToolHandlers(deps: NotificationToolDeps): Map<string, ToolHandler> {
  return new Map<string, ToolHandler>([
    ['send_email', sendEmailHandler(deps)],
    ['send_template_email', sendTemplateEmailHandler(deps)],
    ['send_webhook', sendWebhookHandler(deps)]
  ]);
}
