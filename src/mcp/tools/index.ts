import type { ServiceCatalog, ServiceDefinition } from '../catalog/service-catalog.js';
import { analystTool, searchTool } from './cortex-tools.js';
import { objectManagerTools } from './object-tools.js';
import { runSnowflakeQueryTool } from './query-tools.js';
import { semanticManagerTools } from './semantic-tools.js';
import type { ToolDefinition } from './tool-definition.js';

export type { ToolContext, ToolDefinition } from './tool-definition.js';
export { toInputSchema } from './tool-definition.js';

export function toolsFor(service: ServiceDefinition): readonly ToolDefinition[] {
  switch (service.kind) {
    case 'search':
      return [searchTool(service)];
    case 'analyst':
      return [analystTool(service)];
    case 'object_manager':
      return objectManagerTools;
    case 'query_manager':
      return [runSnowflakeQueryTool];
    case 'semantic_manager':
      return semanticManagerTools;
  }
}

/**
 * One tool per catalog entry name, in catalog order.
 */
export function buildToolRegistry(catalog: ServiceCatalog): ReadonlyMap<string, ToolDefinition> {
  const registry = new Map<string, ToolDefinition>();
  for (const service of catalog.services) {
    for (const tool of toolsFor(service)) {
      registry.set(tool.name, tool);
    }
  }
  return registry;
}
