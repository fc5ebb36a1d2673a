/**
 * Server Types
 *
 * Core types for server orchestration
 */

/**
 * MCP Server configuration
 */
export interface ServerConfig {
  name: string;
  version: string;
  capabilities: {
    tools?: Record<string, unknown>;
    logging?: Record<string, unknown>;
  };
}
