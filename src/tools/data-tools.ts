// This module implements the read-only data tools that proxy the backing data API.

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { ToolHandler } from '../mcp/registry.js';
import {
  equipmentSummarySchema,
  filterValueSchema,
  pagingSchema,
  recordIdSchema,
  searchCncDataSchema
} from '../mcp/tool-schemas.js';
import type { QueryParams, ToolArguments } from '../types/domain.js';
import type { ToolCallResult } from '../types/mcp.js';
import type { DataApi } from '../upstream/client.js';
import { AppError } from '../utils/errors.js';
import { isJsonObject } from '../utils/json.js';
import { DISTINCT_LISTS, RECORD_DATASETS, type DistinctListTool, type RecordDataset } from './catalog.js';

const CNC_DATA_ENDPOINT = 'get_iot_cnc_data';
const SUMMARY_RECORD_LIMIT = 1000;

// The data API answers either a bare envelope or the same envelope under a `message` key.
const envelopeSchema = z
  .object({
    success: z.boolean().optional(),
    message: z.unknown().optional(),
    data: z.unknown().optional(),
    count: z.number().optional(),
    total_count: z.number().optional(),
    returned_count: z.number().optional()
  })
  .passthrough();

type DataEnvelope = z.infer<typeof envelopeSchema>;

type DataRecord = Record<string, unknown>;

const recordsSchema = z.array(z.record(z.string(), z.unknown()));

export interface DataToolDeps {
  api: DataApi;
  logger?: FastifyBaseLogger;
}

export interface EquipmentSummary {
  equipment_id: string;
  total_records: number;
  total_workpieces: number;
  average_workpieces_per_record: number;
  operation_mode_distribution: Record<string, number>;
  alarm_percentage: string;
  avg_spindle_load: string;
  avg_x_axis_load: string;
  avg_y_axis_load: string;
  avg_z_axis_load: string;
  date_range: { from: string; to: string };
}

export interface SearchFilters {
  operation_mode?: 'AUTO' | 'MANUAL';
  has_alarm?: boolean;
  min_workpiece_count?: number;
  date_from?: string;
  date_to?: string;
}

function textResult(text: string): ToolCallResult {
  return { content: [{ type: 'text', text }] };
}

function fencedJson(value: unknown): string {
  return `\`\`\`json\n${JSON.stringify(value, null, 2)}\n\`\`\``;
}

// This helper unwraps the data API envelope and turns `success: false` into a handler error.
export function unwrapEnvelope(payload: unknown): DataEnvelope {
  const candidate = isJsonObject(payload) && isJsonObject(payload.message) ? payload.message : payload;
  const parsed = envelopeSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new AppError(502, 'unexpected_upstream_payload', 'Data API returned an unexpected response shape.');
  }

  if (parsed.data.success !== true) {
    const reason = typeof parsed.data.message === 'string' ? parsed.data.message : 'Unknown error';
    throw new AppError(502, 'upstream_reported_error', `API returned error: ${reason}`);
  }

  return parsed.data;
}

function toRecords(data: unknown): DataRecord[] {
  const parsed = recordsSchema.safeParse(data ?? []);
  if (!parsed.success) {
    throw new AppError(502, 'unexpected_upstream_payload', 'Data API returned records in an unexpected shape.');
  }

  return parsed.data;
}

function numberField(record: DataRecord, key: string): number {
  const value = record[key];
  if (typeof value === 'number') {
    return value;
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }

  return 0;
}

function hasAlarm(record: DataRecord): boolean {
  const alarm = record.alarm_code;
  return alarm !== undefined && alarm !== null && alarm !== '';
}

// This helper reads a load such as "12.5%" and skips missing or unparsable values.
function loadField(record: DataRecord, key: string): number | null {
  const value = record[key];
  if (typeof value === 'number') {
    return value;
  }

  if (typeof value !== 'string' || value.trim().length === 0) {
    return null;
  }

  const parsed = Number.parseFloat(value.replace('%', ''));
  return Number.isFinite(parsed) ? parsed : null;
}

function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

function averageLoad(records: DataRecord[], key: string): string {
  const values = records.map((record) => loadField(record, key)).filter((value): value is number => value !== null);
  if (values.length === 0) {
    return 'N/A';
  }

  return formatPercent(values.reduce((total, value) => total + value, 0) / values.length);
}

// Date bounds compare against the calendar day of `created_at`; records without it never match a bound.
export function withinDateRange(record: DataRecord, dateFrom?: string, dateTo?: string): boolean {
  if (!dateFrom && !dateTo) {
    return true;
  }

  const createdAt = record.created_at;
  if (typeof createdAt !== 'string' || createdAt.length < 10) {
    return false;
  }

  const day = createdAt.slice(0, 10);
  if (dateFrom && day < dateFrom) {
    return false;
  }

  return !(dateTo && day > dateTo);
}

// This function applies the client-side search filters in a fixed order.
export function applySearchFilters(records: DataRecord[], filters: SearchFilters): DataRecord[] {
  return records.filter((record) => {
    if (filters.operation_mode && record.operation_mode !== filters.operation_mode) {
      return false;
    }

    if (filters.has_alarm !== undefined && hasAlarm(record) !== filters.has_alarm) {
      return false;
    }

    if (filters.min_workpiece_count !== undefined && numberField(record, 'workpiece_count') < filters.min_workpiece_count) {
      return false;
    }

    return withinDateRange(record, filters.date_from, filters.date_to);
  });
}

// This function computes summary statistics over one equipment's CNC records.
export function summarizeEquipment(
  equipmentId: string,
  records: DataRecord[],
  dateFrom?: string,
  dateTo?: string
): EquipmentSummary {
  const totalRecords = records.length;
  const totalWorkpieces = records.reduce((total, record) => total + numberField(record, 'workpiece_count'), 0);
  const alarmCount = records.filter(hasAlarm).length;

  const operationModes: Record<string, number> = {};
  for (const record of records) {
    const mode = typeof record.operation_mode === 'string' ? record.operation_mode : 'Unknown';
    operationModes[mode] = (operationModes[mode] ?? 0) + 1;
  }

  const firstId = records[0]?.equipment_id;

  return {
    equipment_id: typeof firstId === 'string' ? firstId : equipmentId,
    total_records: totalRecords,
    total_workpieces: totalWorkpieces,
    average_workpieces_per_record: totalRecords > 0 ? totalWorkpieces / totalRecords : 0,
    operation_mode_distribution: operationModes,
    alarm_percentage: totalRecords > 0 ? formatPercent((alarmCount / totalRecords) * 100) : 'N/A',
    avg_spindle_load: averageLoad(records, 'spindle_load'),
    avg_x_axis_load: averageLoad(records, 'x_axis_load'),
    avg_y_axis_load: averageLoad(records, 'y_axis_load'),
    avg_z_axis_load: averageLoad(records, 'z_axis_load'),
    date_range: {
      from: dateFrom ?? 'Not specified',
      to: dateTo ?? 'Not specified'
    }
  };
}

function listHandler(deps: DataToolDeps, dataset: RecordDataset): ToolHandler {
  return async (args: ToolArguments) => {
    const { limit, offset } = pagingSchema.parse(args);
    const params: QueryParams = {
      [dataset.filterParam]: filterValueSchema.parse(args[dataset.filterParam]),
      limit,
      offset
    };

    const envelope = unwrapEnvelope(await deps.api.get(dataset.listTool, params));
    const data = envelope.data ?? [];
    const size = Array.isArray(data) ? data.length : 0;
    const total = envelope.total_count ?? size;
    const returned = envelope.returned_count ?? size;

    return textResult(`${dataset.label} Retrieved (${returned} of ${total} records):\n${fencedJson(data)}`);
  };
}

function byIdHandler(deps: DataToolDeps, dataset: RecordDataset): ToolHandler {
  return async (args: ToolArguments) => {
    const id = recordIdSchema.parse(args[dataset.idParam]);
    const envelope = unwrapEnvelope(await deps.api.get(dataset.byIdTool, { [dataset.idParam]: id }));

    return textResult(`${dataset.label} Record (ID: ${id}):\n${fencedJson(envelope.data ?? {})}`);
  };
}

function distinctListHandler(deps: DataToolDeps, entry: DistinctListTool): ToolHandler {
  return async () => {
    const envelope = unwrapEnvelope(await deps.api.get(entry.tool));
    const data = envelope.data ?? [];
    const count = envelope.count ?? (Array.isArray(data) ? data.length : 0);

    return textResult(`${entry.label} (${count} unique ${entry.noun}):\n${fencedJson(data)}`);
  };
}

// Several equipment IDs are fetched one call each and merged in argument order.
function searchCncDataHandler(deps: DataToolDeps): ToolHandler {
  return async (args: ToolArguments) => {
    const input = searchCncDataSchema.parse(args);
    const equipmentIds = input.equipment_ids ?? [];
    const targets: Array<string | undefined> = equipmentIds.length > 0 ? equipmentIds : [undefined];

    deps.logger?.debug(
      {
        event: 'cnc_search_fanout',
        calls: targets.length
      },
      'cnc_search_fanout'
    );

    const batches = await Promise.all(
      targets.map(async (equipmentId) => {
        const payload = await deps.api.get(CNC_DATA_ENDPOINT, {
          equipment_id: equipmentId,
          limit: input.limit,
          offset: input.offset
        });
        return toRecords(unwrapEnvelope(payload).data);
      })
    );

    const filtered = applySearchFilters(batches.flat(), input).slice(0, input.limit);

    return textResult(`Filtered CNC Data (${filtered.length} records found):\n${fencedJson(filtered)}`);
  };
}

function equipmentSummaryHandler(deps: DataToolDeps): ToolHandler {
  return async (args: ToolArguments) => {
    const input = equipmentSummarySchema.parse(args);
    const payload = await deps.api.get(CNC_DATA_ENDPOINT, {
      equipment_id: input.equipment_id,
      limit: SUMMARY_RECORD_LIMIT
    });

    const records = toRecords(unwrapEnvelope(payload).data).filter((record) =>
      withinDateRange(record, input.date_from, input.date_to)
    );
    const summary =
      records.length === 0
        ? { error: 'No data available for this equipment' }
        : summarizeEquipment(input.equipment_id, records, input.date_from, input.date_to);

    return textResult(`Equipment Summary for ${input.equipment_id}:\n${fencedJson(summary)}`);
  };
}

// This function builds the handler table of every data tool keyed by tool name.
export function buildDataToolHandlers(deps: DataToolDeps): Map<string, ToolHandler> {
  const handlers = new Map<string, ToolHandler>();

  for (const dataset of RECORD_DATASETS) {
    handlers.set(dataset.listTool, listHandler(deps, dataset));
    handlers.set(dataset.byIdTool, byIdHandler(deps, dataset));
  }

  for (const entry of DISTINCT_LISTS) {
    handlers.set(entry.tool, distinctListHandler(deps, entry));
  }

  handlers.set('search_cnc_data', searchCncDataHandler(deps));
  handlers.set('get_equipment_summary', equipmentSummaryHandler(deps));

  return handlers;
}
