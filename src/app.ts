import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type ActivityLogStore } from './activity/store.js';
import { registerTools, type ToolOptions } from './tools/index.js';
import { registerResourcesAndPrompts } from './resources.js';

export const SERVER_NAME = 'activity-log-mcp';
export const SERVER_VERSION = '0.1.0';

export const createMcpServer = (store: ActivityLogStore, options: ToolOptions): McpServer => {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION
    },
    {
      capabilities: { logging: {} }
    }
  );

  registerTools(server, store, options);
  registerResourcesAndPrompts(server, store, options);
  return server;
};
