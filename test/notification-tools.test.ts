// This test suite verifies email and webhook delivery channels, template rendering, and the notification tools.

import type { SendMailOptions } from 'nodemailer';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { classifyArguments } from '../src/mcp/arguments.js';
import { ToolDispatcher } from '../src/mcp/dispatch.js';
import { EmailChannel, type MailTransport } from '../src/notify/email.js';
import { GatewayNotifier } from '../src/notify/notifier.js';
import { renderEmailTemplate } from '../src/notify/templates.js';
import { WebhookChannel } from '../src/notify/webhook.js';
import { buildToolRegistry } from '../src/tools/index.js';
import { FakeDataApi, RecordingNotifier, silentLogger } from './helpers.js';

const smtpSettings = { host: 'smtp.test', port: 587, user: 'gateway@test.local', password: 'test-secret' };

// This helper builds an in-memory mail transport that records every message.
function recordingTransport(): { transport: MailTransport; sent: SendMailOptions[] } {
  const sent: SendMailOptions[] = [];
  return {
    sent,
    transport: {
      sendMail: async (options) => {
        sent.push(options);
        return { messageId: `test-${sent.length}` };
      }
    }
  };
}

function buildDispatcher(notifier: RecordingNotifier): ToolDispatcher {
  const logger = silentLogger();
  const registry = buildToolRegistry({
    api: new FakeDataApi(() => ({ success: true, data: [] })),
    notifier,
    logger,
    now: () => new Date('2024-05-01T12:00:00.000Z')
  });
  return new ToolDispatcher({ registry, logger });
}

describe('email channel', () => {
  it('sends HTML mail with decoded attachments', async () => {
    const { transport, sent } = recordingTransport();
    const channel = new EmailChannel({ settings: smtpSettings, transport });

    const outcome = await channel.deliver({
      to: 'ops@test.local',
      subject: 'Shift report',
      body: '<p>ok</p>',
      cc: ['lead@test.local'],
      bcc: [],
      isHtml: true,
      attachments: [{ filename: 'a.txt', content: 'aGVsbG8=', contentType: 'text/plain' }]
    });

    expect(outcome).toEqual({ status: 'success', detail: 'Email sent successfully to ops@test.local' });
    expect(sent).toHaveLength(1);
    expect(sent[0]).toMatchObject({
      from: 'gateway@test.local',
      to: 'ops@test.local',
      cc: ['lead@test.local'],
      subject: 'Shift report',
      html: '<p>ok</p>'
    });
    expect(sent[0]?.bcc).toBeUndefined();
    expect(sent[0]?.attachments).toEqual([
      { filename: 'a.txt', content: Buffer.from('hello'), contentType: 'text/plain' }
    ]);
  });

  it('reports a failure when no SMTP host is configured', async () => {
    const channel = new EmailChannel({ settings: { port: 587 } });

    const outcome = await channel.deliver({
      to: 'ops@test.local',
      subject: 'x',
      body: 'y',
      cc: [],
      bcc: [],
      isHtml: false,
      attachments: []
    });

    expect(outcome).toEqual({ status: 'failure', reason: 'SMTP configuration not available' });
  });

  it('reports transport errors as failures', async () => {
    const channel = new EmailChannel({
      settings: smtpSettings,
      transport: {
        sendMail: async () => {
          throw new Error('connection refused');
        }
      }
    });

    const outcome = await channel.deliver({
      to: 'ops@test.local',
      subject: 'x',
      body: 'y',
      cc: [],
      bcc: [],
      isHtml: false,
      attachments: []
    });

    expect(outcome).toEqual({ status: 'failure', reason: 'connection refused' });
  });
});

describe('webhook channel', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the JSON payload with merged headers', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('', { status: 202 }));
    vi.stubGlobal('fetch', fetchMock);

    const outcome = await new WebhookChannel().deliver({
      url: 'https://hooks.test/alert',
      method: 'PUT',
      payload: { level: 'high' },
      headers: { 'X-Signature': 'test-secret' }
    });

    expect(outcome).toEqual({
      status: 'success',
      detail: 'Webhook sent successfully to https://hooks.test/alert (Status: 202)'
    });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://hooks.test/alert');
    expect(init).toMatchObject({
      method: 'PUT',
      headers: { 'Content-Type': 'application/json', 'X-Signature': 'test-secret' },
      body: '{"level":"high"}'
    });
  });

  it('reports a non-OK status as a failure', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('', { status: 500 })));

    const outcome = await new WebhookChannel().deliver({
      url: 'https://hooks.test/alert',
      method: 'POST',
      payload: {},
      headers: {}
    });

    expect(outcome).toEqual({ status: 'failure', reason: 'Webhook endpoint returned HTTP 500' });
  });
});

describe('gateway notifier', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('routes each request to its channel', async () => {
    const { transport, sent } = recordingTransport();
    const fetchMock = vi.fn().mockResolvedValue(new Response('', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const notifier = new GatewayNotifier({
      email: new EmailChannel({ settings: smtpSettings, transport }),
      webhook: new WebhookChannel(),
      logger: silentLogger()
    });

    const emailOutcome = await notifier.deliver({
      channel: 'email',
      payload: { to: 'ops@test.local', subject: 'x', body: 'y', cc: [], bcc: [], isHtml: false, attachments: [] }
    });
    const webhookOutcome = await notifier.deliver({
      channel: 'webhook',
      payload: { url: 'https://hooks.test/alert', method: 'POST', payload: {}, headers: {} }
    });

    expect(emailOutcome.status).toBe('success');
    expect(webhookOutcome).toEqual({
      status: 'success',
      detail: 'Webhook sent successfully to https://hooks.test/alert (Status: 200)'
    });
    expect(sent).toHaveLength(1);
    expect(sent[0]?.text).toBe('y');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe('email templates', () => {
  it('substitutes known variables and leaves unknown placeholders in place', () => {
    const rendered = renderEmailTemplate('alert', { alert_type: 'overheat', message: 'Spindle hot', severity: 'high' });

    expect(rendered).toEqual({
      subject: 'ALERT: overheat',
      body: [
        '<h2 style="color: red;">ALERT: overheat</h2>',
        '<p><strong>Message:</strong> Spindle hot</p>',
        '<p><strong>Severity:</strong> high</p>',
        '<p><strong>Time:</strong> {timestamp}</p>'
      ].join('\n'),
      isHtml: true
    });
  });

  it('rejects unknown template names', () => {
    expect(() => renderEmailTemplate('farewell', {})).toThrow('Unknown email template: farewell');
  });
});

describe('notification tools', () => {
  it('adds a timestamp to webhook payloads', async () => {
    const notifier = new RecordingNotifier();
    const dispatcher = buildDispatcher(notifier);

    const outcome = await dispatcher.dispatch(
      'send_webhook',
      classifyArguments({ url: 'https://hooks.test/alert', payload: { level: 'high' } })
    );

    expect(outcome).toEqual({ ok: true, value: { content: [{ type: 'text', text: 'delivered' }] } });
    expect(notifier.requests).toEqual([
      {
        channel: 'webhook',
        payload: {
          url: 'https://hooks.test/alert',
          method: 'POST',
          payload: { level: 'high', timestamp: '2024-05-01T12:00:00.000Z' },
          headers: {}
        }
      }
    ]);
  });

  it('renders template email before delivery', async () => {
    const notifier = new RecordingNotifier();
    const dispatcher = buildDispatcher(notifier);

    await dispatcher.dispatch(
      'send_template_email',
      classifyArguments({ to: 'ops@test.local', template: 'welcome', variables: { name: 'Ada' } })
    );

    expect(notifier.requests[0]).toMatchObject({
      channel: 'email',
      payload: { to: 'ops@test.local', subject: 'Welcome Ada!', isHtml: true, cc: [], bcc: [], attachments: [] }
    });
  });

  it('turns a failed delivery into an error result', async () => {
    const notifier = new RecordingNotifier();
    notifier.outcome = { status: 'failure', reason: 'SMTP configuration not available' };
    const dispatcher = buildDispatcher(notifier);

    const outcome = await dispatcher.dispatch(
      'send_email',
      classifyArguments({ to: 'ops@test.local', subject: 'Hello', body: 'World' })
    );

    expect(outcome).toEqual({
      ok: true,
      value: {
        content: [{ type: 'text', text: 'Error executing send_email: Failed to send email: SMTP configuration not available' }],
        isError: true
      }
    });
    expect(notifier.requests[0]).toEqual({
      channel: 'email',
      payload: {
        to: 'ops@test.local',
        subject: 'Hello',
        body: 'World',
        cc: [],
        bcc: [],
        isHtml: false,
        attachments: []
      }
    });
  });

  it('rejects an invalid recipient without delivering', async () => {
    const notifier = new RecordingNotifier();
    const dispatcher = buildDispatcher(notifier);

    const outcome = await dispatcher.dispatch(
      'send_email',
      classifyArguments({ to: 'not-an-address', subject: 'Hello', body: 'World' })
    );

    expect(outcome.ok ? '' : outcome.error.message).toBe('Validation failed for send_email: to: Invalid email');
    expect(notifier.requests).toEqual([]);
  });
});
