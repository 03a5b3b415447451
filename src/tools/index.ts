// This module registers every gateway tool from its contract and handler, then freezes the registry.

import { ToolRegistry, type ToolHandler } from '../mcp/registry.js';
import { buildToolContracts, toInputSchema } from '../mcp/tool-schemas.js';
import { ConfigurationError } from '../utils/errors.js';
import { buildDataToolHandlers, type DataToolDeps } from './data-tools.js';
import { buildNotificationToolHandlers, type NotificationToolDeps } from './notification-tools.js';

export type GatewayToolDeps = DataToolDeps & NotificationToolDeps;

export function registerGatewayTools(registry: ToolRegistry, deps: GatewayToolDeps): ToolRegistry {
  const handlers = new Map<string, ToolHandler>([
    ...buildDataToolHandlers(deps),
    ...buildNotificationToolHandlers(deps)
  ]);

  for (const contract of buildToolContracts()) {
    const handler = handlers.get(contract.name);
    if (!handler) {
      throw new ConfigurationError(`No handler implemented for tool ${contract.name}.`);
    }

    registry.register({
      descriptor: {
        name: contract.name,
        description: contract.description,
        inputSchema: toInputSchema(contract.schema)
      },
      handler,
      validator: contract.schema
    });
  }

  registry.freeze();
  return registry;
}

// This helper builds a fresh, frozen registry holding the full tool catalog.
export function buildToolRegistry(deps: GatewayToolDeps): ToolRegistry {
  return registerGatewayTools(new ToolRegistry(), deps);
}
