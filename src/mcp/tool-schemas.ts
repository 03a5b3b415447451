// This module defines tool input contracts as zod schemas and exports them as JSON schema for tools/list.

import { z, type ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { DISTINCT_LISTS, RECORD_DATASETS, type RecordDataset } from '../tools/catalog.js';

const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format.');

const limitSchema = z.coerce
  .number()
  .int()
  .min(1)
  .max(1000)
  .default(50)
  .describe('Number of records to return (default: 50, max: 1000)');

const offsetSchema = z.coerce
  .number()
  .int()
  .min(0)
  .default(0)
  .describe('Number of records to skip for pagination (default: 0)');

export const pagingSchema = z.object({
  limit: limitSchema,
  offset: offsetSchema
});

export const filterValueSchema = z.string().trim().min(1).optional();

export const recordIdSchema = z.string().trim().min(1);

// This helper builds the paged list contract of one record dataset.
export function buildListSchema(dataset: RecordDataset) {
  return pagingSchema.extend({
    [dataset.filterParam]: filterValueSchema.describe(dataset.filterDescription)
  });
}

// This helper builds the single-record contract of one record dataset.
export function buildByIdSchema(dataset: RecordDataset) {
  return z.object({
    [dataset.idParam]: recordIdSchema.describe(`The ID of the ${dataset.label} record to retrieve`)
  });
}

export const emptySchema = z.object({});

export const searchCncDataSchema = z
  .object({
    equipment_ids: z.array(z.string().trim().min(1)).max(50).optional().describe('List of equipment IDs to filter by'),
    operation_mode: z.enum(['AUTO', 'MANUAL']).optional().describe('Filter by operation mode'),
    has_alarm: z.boolean().optional().describe('Filter records with or without alarms'),
    min_workpiece_count: z.coerce.number().int().min(0).optional().describe('Minimum workpiece count filter'),
    date_from: isoDateSchema.optional().describe('Filter records from this date (YYYY-MM-DD format)'),
    date_to: isoDateSchema.optional().describe('Filter records to this date (YYYY-MM-DD format)'),
    limit: limitSchema,
    offset: offsetSchema
  })
  .refine((value) => !value.date_from || !value.date_to || value.date_from <= value.date_to, {
    message: 'date_from must not be after date_to.',
    path: ['date_from']
  });

export const equipmentSummarySchema = z
  .object({
    equipment_id: z.string().trim().min(1).describe('Equipment ID to get summary for'),
    date_from: isoDateSchema.optional().describe('Start date for summary (YYYY-MM-DD format)'),
    date_to: isoDateSchema.optional().describe('End date for summary (YYYY-MM-DD format)')
  })
  .refine((value) => !value.date_from || !value.date_to || value.date_from <= value.date_to, {
    message: 'date_from must not be after date_to.',
    path: ['date_from']
  });

const attachmentSchema = z.object({
  filename: z.string().trim().min(1),
  content: z.string().min(1).describe('Base64 encoded content'),
  content_type: z.string().trim().min(1).default('application/octet-stream')
});

export const sendEmailSchema = z.object({
  to: z.string().trim().email().describe('Recipient email address'),
  subject: z.string().trim().min(1).max(200).describe('Email subject'),
  body: z.string().min(1).describe('Email body (supports HTML)'),
  cc: z.array(z.string().trim().email()).default([]).describe('CC recipients'),
  bcc: z.array(z.string().trim().email()).default([]).describe('BCC recipients'),
  attachments: z.array(attachmentSchema).max(20).default([]).describe('Email attachments'),
  is_html: z.boolean().default(false).describe('Whether the body contains HTML')
});

export const emailTemplateNames = ['welcome', 'notification', 'alert', 'report'] as const;

export const sendTemplateEmailSchema = z.object({
  to: z.string().trim().email().describe('Recipient email address'),
  template: z.enum(emailTemplateNames).describe('Email template to use'),
  variables: z.record(z.string(), z.unknown()).default({}).describe('Template variables')
});

export const sendWebhookSchema = z.object({
  url: z.string().trim().url().describe('Webhook URL'),
  method: z.enum(['POST', 'PUT', 'PATCH']).default('POST').describe('HTTP method'),
  payload: z.record(z.string(), z.unknown()).describe('Webhook payload'),
  headers: z.record(z.string(), z.string()).default({}).describe('Additional headers')
});

export interface ToolContract {
  name: string;
  description: string;
  schema: ZodTypeAny;
}

// This list fixes registration order, which tools/list preserves.
export function buildToolContracts(): ToolContract[] {
  const contracts: ToolContract[] = [];

  for (const dataset of RECORD_DATASETS) {
    contracts.push(
      { name: dataset.listTool, description: dataset.listDescription, schema: buildListSchema(dataset) },
      { name: dataset.byIdTool, description: dataset.byIdDescription, schema: buildByIdSchema(dataset) }
    );

    if (dataset.listTool === 'get_iot_cnc_data') {
      contracts.push(
        {
          name: 'search_cnc_data',
          description: 'Advanced search for CNC data with multiple filters',
          schema: searchCncDataSchema
        },
        {
          name: 'get_equipment_summary',
          description: 'Get summary statistics for specific equipment',
          schema: equipmentSummarySchema
        }
      );
    }
  }

  for (const entry of DISTINCT_LISTS) {
    contracts.push({ name: entry.tool, description: entry.description, schema: emptySchema });
  }

  contracts.push(
    { name: 'send_email', description: 'Send an email notification', schema: sendEmailSchema },
    {
      name: 'send_template_email',
      description: 'Send an email using a predefined template',
      schema: sendTemplateEmailSchema
    },
    { name: 'send_webhook', description: 'Send a webhook notification', schema: sendWebhookSchema }
  );

  return contracts;
}

// This helper renders one zod contract as an inline JSON schema object.
export function toInputSchema(schema: ZodTypeAny): Record<string, unknown> {
  const jsonSchema = zodToJsonSchema(schema, { $refStrategy: 'none' }) as Record<string, unknown>;
  return Object.fromEntries(Object.entries(jsonSchema).filter(([key]) => key !== '$schema'));
}
