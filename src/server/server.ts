/**
 * Builds the MCP server: resources first, then tools.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { listResources, readResource } from "./resources.js";
import { registerTools } from "./tools.js";
import type { ToolDependencies } from "./tools.js";

export const SERVER_NAME = "catalog-optimizer";
export const SERVER_VERSION = "0.1.0";

export function createCatalogServer(deps: ToolDependencies): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  const config = deps.optimizer.getConfig();

  for (const resource of listResources()) {
    server.resource(
      resource.name,
      resource.uri,
      { description: resource.description, mimeType: resource.mimeType },
      async (uri) => {
        const result = readResource(uri.href, config);
        return {
          contents: [{
            uri: uri.href,
            text: result?.content ?? "Resource not found",
            mimeType: result?.mimeType ?? "text/plain",
          }],
        };
      }
    );
  }

  registerTools(server, deps);
  return server;
}
