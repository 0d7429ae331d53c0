import { readFileSync } from 'fs';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, ToolError, errorMessage } from '../errors.js';
import { PermissionPolicy } from '../sql-gate/permission-policy.js';

export const OBJECT_MANAGER_TOOLS = ['create_object', 'drop_object', 'describe_object', 'list_objects'] as const;
export const QUERY_MANAGER_TOOLS = ['run_snowflake_query'] as const;
export const SEMANTIC_MANAGER_TOOLS = [
  'list_semantic_views',
  'describe_semantic_view',
  'show_semantic_dimensions',
  'show_semantic_metrics',
  'get_semantic_view_ddl',
  'query_semantic_view',
] as const;

export type ObjectManagerTool = (typeof OBJECT_MANAGER_TOOLS)[number];
export type QueryManagerTool = (typeof QUERY_MANAGER_TOOLS)[number];
export type SemanticManagerTool = (typeof SEMANTIC_MANAGER_TOOLS)[number];

export const DEFAULT_SEARCH_LIMIT = 10;

export interface SearchServiceDefinition {
  kind: 'search';
  name: string;
  description: string;
  databaseName: string;
  schemaName: string;
  /** Columns callers may request; undefined means any. */
  columns?: readonly string[];
  /** Default and maximum number of results. */
  limit: number;
}

export type SemanticModelReference =
  | { kind: 'semantic_view'; identifier: string }
  | { kind: 'stage_file'; path: string };

export interface AnalystServiceDefinition {
  kind: 'analyst';
  name: string;
  description: string;
  semanticModel: SemanticModelReference;
}

export interface ObjectManagerToggle {
  kind: 'object_manager';
  name: 'object_manager';
  description: string;
  tools: readonly ObjectManagerTool[];
}

export interface QueryManagerToggle {
  kind: 'query_manager';
  name: 'query_manager';
  description: string;
  tools: readonly QueryManagerTool[];
}

export interface SemanticManagerToggle {
  kind: 'semantic_manager';
  name: 'semantic_manager';
  description: string;
  tools: readonly SemanticManagerTool[];
}

export type ServiceDefinition =
  | SearchServiceDefinition
  | AnalystServiceDefinition
  | ObjectManagerToggle
  | QueryManagerToggle
  | SemanticManagerToggle;

const ServiceNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{1,64}$/, 'service_name must be 1-64 letters, digits, underscores or hyphens');

const SearchServiceSchema = z
  .object({
    service_name: ServiceNameSchema,
    description: z.string().default(''),
    database_name: z.string().trim().min(1),
    schema_name: z.string().trim().min(1),
    columns: z.array(z.string().trim().min(1)).min(1).optional(),
    limit: z.number().int().positive().default(DEFAULT_SEARCH_LIMIT),
  })
  .strict();

const AnalystServiceSchema = z
  .object({
    service_name: ServiceNameSchema,
    description: z.string().default(''),
    semantic_model: z.string().trim().min(1),
  })
  .strict();

const OtherServicesSchema = z
  .object({
    object_manager: z.boolean().default(false),
    query_manager: z.boolean().default(false),
    semantic_manager: z.boolean().default(false),
  })
  .strict();

const ServiceConfigSchema = z
  .object({
    search_services: z.array(SearchServiceSchema).nullish(),
    analyst_services: z.array(AnalystServiceSchema).nullish(),
    other_services: OtherServicesSchema.nullish(),
    sql_statement_permissions: z.unknown().optional(),
  })
  .strict();

const SEMANTIC_VIEW_IDENTIFIER = /^("([^"]|"")+"|[A-Za-z_][A-Za-z0-9_$]*)(\.("([^"]|"")+"|[A-Za-z_][A-Za-z0-9_$]*)){0,2}$/;

/**
 * Registry of callable services, resolved by tool name. Built once and
 * read-only afterwards.
 */
export class ServiceCatalog {
  private readonly byToolName: ReadonlyMap<string, ServiceDefinition>;

  constructor(readonly services: readonly ServiceDefinition[]) {
    const byToolName = new Map<string, ServiceDefinition>();
    for (const service of services) {
      for (const toolName of toolNamesOf(service)) {
        const existing = byToolName.get(toolName);
        if (existing) {
          throw new ConfigurationError(
            `Tool name '${toolName}' is declared by both '${existing.name}' and '${service.name}'`,
            { toolName }
          );
        }
        byToolName.set(toolName, service);
      }
    }
    this.byToolName = byToolName;
    Object.freeze(this);
  }

  resolve(toolName: string): ServiceDefinition {
    const service = this.byToolName.get(toolName);
    if (!service) {
      throw new ToolError('NotFound', `Unknown tool '${toolName}'`, { tool: toolName });
    }
    return service;
  }

  toolNames(): string[] {
    return [...this.byToolName.keys()];
  }
}

export interface ServiceConfiguration {
  catalog: ServiceCatalog;
  policy: PermissionPolicy;
}

/**
 * Validates a parsed service configuration document. All-or-nothing: the
 * first invalid entry fails the whole load.
 */
export function loadServiceConfiguration(source: unknown): ServiceConfiguration {
  const parsed = ServiceConfigSchema.safeParse(source ?? {});
  if (!parsed.success) {
    const issues = parsed.error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new ConfigurationError(`Invalid service configuration: ${issues.join('; ')}`, { issues });
  }

  const config = parsed.data;
  const services: ServiceDefinition[] = [];

  for (const search of config.search_services ?? []) {
    services.push({
      kind: 'search',
      name: search.service_name,
      description: search.description,
      databaseName: search.database_name,
      schemaName: search.schema_name,
      ...(search.columns ? { columns: Object.freeze([...search.columns]) } : {}),
      limit: search.limit,
    });
  }

  for (const analyst of config.analyst_services ?? []) {
    services.push({
      kind: 'analyst',
      name: analyst.service_name,
      description: analyst.description,
      semanticModel: parseSemanticModel(analyst.service_name, analyst.semantic_model),
    });
  }

  const toggles = config.other_services;
  if (toggles?.object_manager) {
    services.push({
      kind: 'object_manager',
      name: 'object_manager',
      description: 'Create, drop, describe and list warehouse objects',
      tools: OBJECT_MANAGER_TOOLS,
    });
  }
  if (toggles?.query_manager) {
    services.push({
      kind: 'query_manager',
      name: 'query_manager',
      description: 'Run SQL statements permitted by sql_statement_permissions',
      tools: QUERY_MANAGER_TOOLS,
    });
  }
  if (toggles?.semantic_manager) {
    services.push({
      kind: 'semantic_manager',
      name: 'semantic_manager',
      description: 'Discover and query semantic views',
      tools: SEMANTIC_MANAGER_TOOLS,
    });
  }

  return {
    catalog: new ServiceCatalog(services),
    policy: PermissionPolicy.fromEntries(config.sql_statement_permissions),
  };
}

export function loadServiceConfigurationFile(path: string): ServiceConfiguration {
  let document: unknown;
  try {
    document = parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read service configuration ${path}: ${errorMessage(error)}`, { path });
  }
  return loadServiceConfiguration(document);
}

/**
 * `@stage/path/model.yaml` names a semantic model file; anything else must be
 * a (possibly qualified) semantic view identifier. Existence is checked by the
 * backend on first use.
 */
export function parseSemanticModel(serviceName: string, reference: string): SemanticModelReference {
  if (reference.startsWith('@')) {
    if (reference.length < 2 || /\s/.test(reference)) {
      throw new ConfigurationError(`Analyst service '${serviceName}' has an invalid semantic model path '${reference}'`);
    }
    return { kind: 'stage_file', path: reference };
  }
  if (!SEMANTIC_VIEW_IDENTIFIER.test(reference)) {
    throw new ConfigurationError(
      `Analyst service '${serviceName}' semantic_model must be a semantic view identifier or an @stage file path, got '${reference}'`
    );
  }
  return { kind: 'semantic_view', identifier: reference };
}

export function toolNamesOf(service: ServiceDefinition): readonly string[] {
  switch (service.kind) {
    case 'search':
    case 'analyst':
      return [service.name];
    case 'object_manager':
    case 'query_manager':
    case 'semantic_manager':
      return service.tools;
  }
}
