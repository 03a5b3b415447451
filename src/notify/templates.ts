// This module renders the predefined email templates with `{key}` placeholders.

import { AppError } from '../utils/errors.js';

export type EmailTemplateName = 'welcome' | 'notification' | 'alert' | 'report';

export interface EmailTemplate {
  subject: string;
  body: string;
  isHtml: boolean;
}

const EMAIL_TEMPLATES: Record<EmailTemplateName, EmailTemplate> = {
  welcome: {
    subject: 'Welcome {name}!',
    body: [
      '<h1>Welcome to our service!</h1>',
      '<p>Hello {name},</p>',
      "<p>Thank you for joining us. We're excited to have you on board!</p>",
      '<p>Best regards,<br>The Team</p>'
    ].join('\n'),
    isHtml: true
  },
  notification: {
    subject: 'Notification: {title}',
    body: ['<h2>{title}</h2>', '<p>{message}</p>', '<p>Details: {details}</p>'].join('\n'),
    isHtml: true
  },
  alert: {
    subject: 'ALERT: {alert_type}',
    body: [
      '<h2 style="color: red;">ALERT: {alert_type}</h2>',
      '<p><strong>Message:</strong> {message}</p>',
      '<p><strong>Severity:</strong> {severity}</p>',
      '<p><strong>Time:</strong> {timestamp}</p>'
    ].join('\n'),
    isHtml: true
  },
  report: {
    subject: 'Report: {report_name}',
    body: ['<h2>Report: {report_name}</h2>', '<p>Generated on: {date}</p>', '<div>{content}</div>'].join('\n'),
    isHtml: true
  }
};

function stringifyVariable(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  return value === undefined ? '' : JSON.stringify(value);
}

// Placeholders without a matching variable stay in the output unchanged.
function substitute(text: string, variables: Record<string, unknown>): string {
  let rendered = text;
  for (const [key, value] of Object.entries(variables)) {
    rendered = rendered.split(`{${key}}`).join(stringifyVariable(value));
  }
  return rendered;
}

export function isEmailTemplateName(name: string): name is EmailTemplateName {
  return Object.hasOwn(EMAIL_TEMPLATES, name);
}

export function renderEmailTemplate(name: string, variables: Record<string, unknown>): EmailTemplate {
  if (!isEmailTemplateName(name)) {
    throw new AppError(404, 'unknown_template', `Unknown email template: ${name}`);
  }

  const template = EMAIL_TEMPLATES[name];
  return {
    subject: substitute(template.subject, variables),
    body: substitute(template.body, variables),
    isHtml: template.isHtml
  };
}
