// This test suite verifies tool input contracts and their published JSON schema form.

import { describe, expect, it } from 'vitest';
import {
  buildByIdSchema,
  buildListSchema,
  buildToolContracts,
  searchCncDataSchema,
  sendEmailSchema,
  sendTemplateEmailSchema,
  sendWebhookSchema,
  toInputSchema
} from '../src/mcp/tool-schemas.js';
import { RECORD_DATASETS } from '../src/tools/catalog.js';
import { isJsonObject } from '../src/utils/json.js';

describe('tool schemas', () => {
  it('builds one uniquely named contract per tool', () => {
    const names = buildToolContracts().map((contract) => contract.name);

    expect(names).toHaveLength(19);
    expect(new Set(names).size).toBe(19);
    expect(names.slice(0, 4)).toEqual([
      'get_iot_cnc_data',
      'get_iot_cnc_data_by_id',
      'search_cnc_data',
      'get_equipment_summary'
    ]);
    expect(names.slice(-3)).toEqual(['send_email', 'send_template_email', 'send_webhook']);
  });

  it('publishes inline object schemas without a draft marker', () => {
    const [cncData] = RECORD_DATASETS;
    if (!cncData) {
      throw new Error('Expected at least one dataset.');
    }

    const listSchema = toInputSchema(buildListSchema(cncData));
    const byIdSchema = toInputSchema(buildByIdSchema(cncData));

    expect(listSchema.$schema).toBeUndefined();
    expect(listSchema.type).toBe('object');
    const properties = isJsonObject(listSchema.properties) ? Object.keys(listSchema.properties) : [];
    expect(properties).toEqual(['limit', 'offset', 'equipment_id']);
    expect(byIdSchema).toMatchObject({ type: 'object', required: ['cnc_data_id'] });
  });

  it('applies paging defaults and coerces numeric strings', () => {
    expect(searchCncDataSchema.parse({ limit: '10' })).toMatchObject({ limit: 10, offset: 0 });
    expect(() => searchCncDataSchema.parse({ limit: 0 })).toThrow();
  });

  it('rejects a date range that ends before it starts', () => {
    const parsed = searchCncDataSchema.safeParse({ date_from: '2024-03-05', date_to: '2024-03-01' });

    expect(parsed.success).toBe(false);
    expect(parsed.success ? [] : parsed.error.issues.map((issue) => issue.message)).toEqual([
      'date_from must not be after date_to.'
    ]);
  });

  it('fills notification defaults', () => {
    expect(sendEmailSchema.parse({ to: 'ops@test.local', subject: 'Hi', body: 'There' })).toEqual({
      to: 'ops@test.local',
      subject: 'Hi',
      body: 'There',
      cc: [],
      bcc: [],
      attachments: [],
      is_html: false
    });
    expect(sendWebhookSchema.parse({ url: 'https://hooks.test/x', payload: {} })).toEqual({
      url: 'https://hooks.test/x',
      method: 'POST',
      payload: {},
      headers: {}
    });
    expect(() => sendTemplateEmailSchema.parse({ to: 'ops@test.local', template: 'farewell' })).toThrow();
  });
});
