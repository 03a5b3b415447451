// This test suite verifies data tool output formats, client-side search filters, and equipment summaries.

import { describe, expect, it } from 'vitest';
import { buildGatewayContext } from '../src/context.js';
import { classifyArguments } from '../src/mcp/arguments.js';
import type { ToolCallResult } from '../src/types/mcp.js';
import type { QueryParams } from '../src/types/domain.js';
import { FakeDataApi, MemoryAuditSink, RecordingNotifier, silentLogger, testSettings } from './helpers.js';

const EQ1_RECORDS = [
  {
    name: 'CNC-1',
    equipment_id: 'EQ1',
    operation_mode: 'AUTO',
    alarm_code: null,
    workpiece_count: 10,
    spindle_load: '40%',
    x_axis_load: '10.0%',
    y_axis_load: '20%',
    z_axis_load: '',
    created_at: '2024-03-01 08:00:00'
  },
  {
    name: 'CNC-2',
    equipment_id: 'EQ1',
    operation_mode: 'MANUAL',
    alarm_code: 'AL-7',
    workpiece_count: 4,
    spindle_load: '50%',
    x_axis_load: '12.5%',
    y_axis_load: '21%',
    created_at: '2024-03-02 09:30:00'
  },
  {
    name: 'CNC-3',
    equipment_id: 'EQ1',
    operation_mode: 'AUTO',
    alarm_code: null,
    workpiece_count: 7,
    spindle_load: '45%',
    x_axis_load: '11%',
    created_at: '2024-03-05 10:00:00'
  }
];

const EQ2_RECORDS = [
  {
    name: 'CNC-9',
    equipment_id: 'EQ2',
    operation_mode: 'AUTO',
    alarm_code: null,
    workpiece_count: 2,
    created_at: '2024-03-03 00:00:00'
  }
];

// This responder plays the data API: CNC reads filter by equipment, other endpoints answer fixed envelopes.
function respond(endpoint: string, params?: QueryParams): unknown {
  switch (endpoint) {
    case 'get_iot_cnc_data': {
      const equipmentId = params?.equipment_id;
      const data =
        equipmentId === 'EQ1' ? EQ1_RECORDS : equipmentId === 'EQ2' ? EQ2_RECORDS : [...EQ1_RECORDS, ...EQ2_RECORDS];
      return { message: { success: true, data, total_count: data.length, returned_count: data.length } };
    }
    case 'get_iot_failure_cases':
      return { message: { success: true, data: [{ name: 'FC-1' }], total_count: 7, returned_count: 1 } };
    case 'get_iot_spare_parts_by_id':
      return { success: true, data: { name: 'SP-1', part_id: 'P-9' } };
    case 'get_iot_cnc_data_by_id':
      return { message: { success: false, message: 'Equipment not found' } };
    default:
      throw new Error(`no stub for ${endpoint}`);
  }
}

function buildGateway() {
  const api = new FakeDataApi(respond);
  const context = buildGatewayContext(testSettings(), silentLogger(), {
    api,
    notifier: new RecordingNotifier(),
    audit: new MemoryAuditSink()
  });
  return { dispatcher: context.dispatcher, api };
}

// This helper dispatches one call and returns its successful tool result.
async function call(
  dispatcher: ReturnType<typeof buildGateway>['dispatcher'],
  name: string,
  args: unknown
): Promise<ToolCallResult> {
  const outcome = await dispatcher.dispatch(name, classifyArguments(args));
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}

// This helper reads the fenced JSON block out of a tool text result.
function fencedPayload(result: ToolCallResult): unknown {
  const text = result.content[0]?.text ?? '';
  const body = text.split('```json\n')[1]?.split('\n```')[0] ?? 'null';
  return JSON.parse(body);
}

function headline(result: ToolCallResult): string {
  return (result.content[0]?.text ?? '').split('\n')[0] ?? '';
}

describe('data tools', () => {
  it('lists records with the returned and total counts from a wrapped envelope', async () => {
    const { dispatcher, api } = buildGateway();

    const result = await call(dispatcher, 'get_iot_failure_cases', '{"equipment_model":"PX-200","limit":"10"}');

    expect(result.content).toEqual([
      {
        type: 'text',
        text: 'Failure Cases Retrieved (1 of 7 records):\n```json\n[\n  {\n    "name": "FC-1"\n  }\n]\n```'
      }
    ]);
    expect(api.calls).toEqual([
      { endpoint: 'get_iot_failure_cases', params: { equipment_model: 'PX-200', limit: 10, offset: 0 } }
    ]);
  });

  it('fetches one record by id from a bare envelope', async () => {
    const { dispatcher, api } = buildGateway();

    const result = await call(dispatcher, 'get_iot_spare_parts_by_id', { spare_part_id: 'SP-1' });

    expect(headline(result)).toBe('Spare Parts Record (ID: SP-1):');
    expect(fencedPayload(result)).toEqual({ name: 'SP-1', part_id: 'P-9' });
    expect(api.calls).toEqual([{ endpoint: 'get_iot_spare_parts_by_id', params: { spare_part_id: 'SP-1' } }]);
  });

  it('turns an upstream error envelope into an error result', async () => {
    const { dispatcher } = buildGateway();

    const result = await call(dispatcher, 'get_iot_cnc_data_by_id', { cnc_data_id: 'X-1' });

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error executing get_iot_cnc_data_by_id: API returned error: Equipment not found' }],
      isError: true
    });
  });

  it('rejects a missing record id and an out-of-range limit before calling the API', async () => {
    const { dispatcher, api } = buildGateway();

    const missingId = await dispatcher.dispatch('get_iot_spare_parts_by_id', classifyArguments({}));
    const hugeLimit = await dispatcher.dispatch('get_iot_cnc_data', classifyArguments({ limit: 5000 }));

    expect(missingId.ok ? '' : missingId.error.message).toBe(
      'Validation failed for get_iot_spare_parts_by_id: spare_part_id: Required'
    );
    expect(hugeLimit.ok ? '' : hugeLimit.error.message).toBe(
      'Validation failed for get_iot_cnc_data: limit: Number must be less than or equal to 1000'
    );
    expect(api.calls).toEqual([]);
  });

  it('fetches each equipment id, merges in argument order, filters, and truncates to the limit', async () => {
    const { dispatcher, api } = buildGateway();

    const result = await call(dispatcher, 'search_cnc_data', {
      equipment_ids: ['EQ2', 'EQ1'],
      has_alarm: false,
      limit: 2
    });

    expect(headline(result)).toBe('Filtered CNC Data (2 records found):');
    expect(fencedPayload(result)).toEqual([EQ2_RECORDS[0], EQ1_RECORDS[0]]);
    expect(api.calls).toEqual([
      { endpoint: 'get_iot_cnc_data', params: { equipment_id: 'EQ2', limit: 2, offset: 0 } },
      { endpoint: 'get_iot_cnc_data', params: { equipment_id: 'EQ1', limit: 2, offset: 0 } }
    ]);
  });

  it('applies operation mode, workpiece, and date filters client side', async () => {
    const { dispatcher } = buildGateway();

    const byMode = await call(dispatcher, 'search_cnc_data', { operation_mode: 'AUTO', min_workpiece_count: 8 });
    const byDate = await call(dispatcher, 'search_cnc_data', { date_from: '2024-03-02', date_to: '2024-03-03' });
    const withAlarm = await call(dispatcher, 'search_cnc_data', { has_alarm: true });

    expect(fencedPayload(byMode)).toEqual([EQ1_RECORDS[0]]);
    expect(fencedPayload(byDate)).toEqual([EQ1_RECORDS[1], EQ2_RECORDS[0]]);
    expect(fencedPayload(withAlarm)).toEqual([EQ1_RECORDS[1]]);
  });

  it('rejects a search whose date range is reversed', async () => {
    const { dispatcher } = buildGateway();

    const outcome = await dispatcher.dispatch(
      'search_cnc_data',
      classifyArguments({ date_from: '2024-03-05', date_to: '2024-03-01' })
    );

    expect(outcome.ok ? '' : outcome.error.message).toBe(
      'Validation failed for search_cnc_data: date_from: date_from must not be after date_to.'
    );
  });

  it('summarizes all records of one equipment', async () => {
    const { dispatcher, api } = buildGateway();

    const result = await call(dispatcher, 'get_equipment_summary', { equipment_id: 'EQ1' });

    expect(headline(result)).toBe('Equipment Summary for EQ1:');
    expect(fencedPayload(result)).toEqual({
      equipment_id: 'EQ1',
      total_records: 3,
      total_workpieces: 21,
      average_workpieces_per_record: 7,
      operation_mode_distribution: { AUTO: 2, MANUAL: 1 },
      alarm_percentage: '33.3%',
      avg_spindle_load: '45.0%',
      avg_x_axis_load: '11.2%',
      avg_y_axis_load: '20.5%',
      avg_z_axis_load: 'N/A',
      date_range: { from: 'Not specified', to: 'Not specified' }
    });
    expect(api.calls).toEqual([{ endpoint: 'get_iot_cnc_data', params: { equipment_id: 'EQ1', limit: 1000 } }]);
  });

  it('summarizes only records inside the requested date range', async () => {
    const { dispatcher } = buildGateway();

    const inRange = await call(dispatcher, 'get_equipment_summary', {
      equipment_id: 'EQ1',
      date_from: '2024-03-02',
      date_to: '2024-03-04'
    });
    const empty = await call(dispatcher, 'get_equipment_summary', { equipment_id: 'EQ1', date_from: '2025-01-01' });

    expect(fencedPayload(inRange)).toEqual({
      equipment_id: 'EQ1',
      total_records: 1,
      total_workpieces: 4,
      average_workpieces_per_record: 4,
      operation_mode_distribution: { MANUAL: 1 },
      alarm_percentage: '100.0%',
      avg_spindle_load: '50.0%',
      avg_x_axis_load: '12.5%',
      avg_y_axis_load: '21.0%',
      avg_z_axis_load: 'N/A',
      date_range: { from: '2024-03-02', to: '2024-03-04' }
    });
    expect(fencedPayload(empty)).toEqual({ error: 'No data available for this equipment' });
  });
});
