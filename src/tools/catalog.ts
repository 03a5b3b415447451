// This module lists the record sets exposed by the data API and the tools generated for each of them.

export interface RecordDataset {
  label: string;
  listTool: string;
  listDescription: string;
  filterParam: string;
  filterDescription: string;
  byIdTool: string;
  byIdDescription: string;
  idParam: string;
}

export interface DistinctListTool {
  tool: string;
  label: string;
  noun: string;
  description: string;
}

export const RECORD_DATASETS: readonly RecordDataset[] = [
  {
    label: 'CNC Data',
    listTool: 'get_iot_cnc_data',
    listDescription: 'Get CNC data records with optional filtering and pagination',
    filterParam: 'equipment_id',
    filterDescription: 'Filter results by specific equipment ID (optional)',
    byIdTool: 'get_iot_cnc_data_by_id',
    byIdDescription: 'Get a specific CNC data record by its ID',
    idParam: 'cnc_data_id'
  },
  {
    label: 'Maintenance History',
    listTool: 'get_iot_maintenance_history',
    listDescription: 'Get maintenance history records with optional equipment filter and pagination',
    filterParam: 'equipment_id',
    filterDescription: 'Filter results by specific equipment ID (optional)',
    byIdTool: 'get_iot_maintenance_history_by_id',
    byIdDescription: 'Get a specific maintenance history record by its ID',
    idParam: 'maintenance_history_id'
  },
  {
    label: 'Failure Cases',
    listTool: 'get_iot_failure_cases',
    listDescription: 'Get failure case records with optional equipment model filter and pagination',
    filterParam: 'equipment_model',
    filterDescription: 'Filter results by equipment model (optional)',
    byIdTool: 'get_iot_failure_cases_by_id',
    byIdDescription: 'Get a specific failure case record by its ID',
    idParam: 'failure_case_id'
  },
  {
    label: 'Production Data',
    listTool: 'get_iot_production_data',
    listDescription: 'Get production data records with optional equipment filter and pagination',
    filterParam: 'equipment_id',
    filterDescription: 'Filter results by specific equipment ID (optional)',
    byIdTool: 'get_iot_production_data_by_id',
    byIdDescription: 'Get a specific production data record by its ID',
    idParam: 'production_data_id'
  },
  {
    label: 'Spare Parts',
    listTool: 'get_iot_spare_parts',
    listDescription: 'Get spare part records with optional part filter and pagination',
    filterParam: 'part_id',
    filterDescription: 'Filter results by part ID (optional)',
    byIdTool: 'get_iot_spare_parts_by_id',
    byIdDescription: 'Get a specific spare part record by its ID',
    idParam: 'spare_part_id'
  }
];

export const DISTINCT_LISTS: readonly DistinctListTool[] = [
  {
    tool: 'get_iot_equipment_list',
    label: 'Equipment List',
    noun: 'equipment IDs',
    description: 'Get a list of unique equipment IDs from all CNC data records'
  },
  {
    tool: 'get_iot_equipment_models_list',
    label: 'Equipment Models',
    noun: 'equipment models',
    description: 'Get a list of unique equipment models from failure case records'
  },
  {
    tool: 'get_iot_work_orders_list',
    label: 'Work Orders',
    noun: 'work order IDs',
    description: 'Get a list of unique work order IDs from production data records'
  },
  {
    tool: 'get_iot_suppliers_list',
    label: 'Suppliers',
    noun: 'suppliers',
    description: 'Get a list of unique suppliers from spare part records'
  }
];

// Endpoint names on the data API match the tool names.
export function listDataApiEndpoints(): string[] {
  return [
    ...RECORD_DATASETS.flatMap((dataset) => [dataset.listTool, dataset.byIdTool]),
    ...DISTINCT_LISTS.map((entry) => entry.tool)
  ];
}
