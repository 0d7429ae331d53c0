import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
  type CallToolResult,
  type ListResourcesResult,
  type ListToolsResult,
  type ReadResourceResult,
} from '@modelcontextprotocol/sdk/types.js';
import type { ToolDispatcher } from './dispatcher.js';
import { RESOURCES } from './resources.js';

export const SERVER_NAME = 'warehouse-mcp-bridge';
export const SERVER_VERSION = '1.0.0';

export interface BridgeServerOptions {
  dispatcher: ToolDispatcher;
  /** Reads a resource by URI; undefined when the URI is unknown. */
  readResource(uri: string): Record<string, unknown> | undefined;
}

export function createBridgeServer({ dispatcher, readResource }: BridgeServerOptions): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => {
    return { tools: dispatcher.listTools() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;
    const result = await dispatcher.invoke({ name, arguments: args }, extra.signal);

    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
      ...(result.success ? {} : { isError: true }),
    };
  });

  server.setRequestHandler(ListResourcesRequestSchema, async (): Promise<ListResourcesResult> => {
    return { resources: [...RESOURCES] };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request): Promise<ReadResourceResult> => {
    const { uri } = request.params;
    const body = readResource(uri);
    if (!body) {
      throw new McpError(ErrorCode.InvalidParams, `Unknown resource: ${uri}`);
    }
    return {
      contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(body, null, 2) }],
    };
  });

  return server;
}
