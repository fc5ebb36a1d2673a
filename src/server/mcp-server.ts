/**
 * MCP Server
 *
 * Main server orchestration for the form processor MCP server.
 * Handles tool registration, request routing, and MCP protocol implementation
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { SetLevelRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { ServerConfig } from './types.js';
import * as FormTools from '../tools/form-tools.js';
import { createErrorResponse, createSuccessResponse, type ToolResponse } from '../shared/errors/index.js';
import {
  getLogger,
  isLogLevel,
  type LogLevel,
  type McpNotificationSender,
} from '../shared/services/logging.service.js';

/**
 * Wrap handler execution with error handling and logging
 */
async function executeWithLogging(
  toolName: string,
  handler: () => Promise<Record<string, unknown>>,
): Promise<ToolResponse> {
  const logger = getLogger();
  const startTime = Date.now();

  try {
    logger.debug(`Executing tool: ${toolName}`);
    const result = await handler();
    logger.debug(`Tool ${toolName} completed in ${Date.now() - startTime}ms`);
    return createSuccessResponse(result);
  } catch (error) {
    logger.error(
      `Tool ${toolName} failed after ${Date.now() - startTime}ms`,
      error instanceof Error ? error : undefined,
      { toolName },
    );
    return createErrorResponse(error);
  }
}

/**
 * Form Processor MCP Server
 *
 * Uses McpServer with native Zod integration
 */
export class FormProcessorServer implements McpNotificationSender {
  private server: McpServer;
  private transport: StdioServerTransport;

  constructor(private readonly config: ServerConfig) {
    this.server = new McpServer(
      {
        name: config.name,
        version: config.version,
      },
      {
        capabilities: config.capabilities,
      },
    );

    this.transport = new StdioServerTransport();

    this.registerLoggingHandlers();
    this.registerTools();

    // Wire up logging service to MCP server
    getLogger().setMcpServer(this);
  }

  /**
   * Send logging message notification via MCP protocol
   */
  async sendLoggingMessage(params: {
    level: LogLevel;
    logger?: string;
    data: Record<string, unknown>;
  }): Promise<void> {
    await this.server.server.notification({
      method: 'notifications/message',
      params: {
        level: params.level,
        logger: params.logger,
        data: params.data,
      },
    });
  }

  /**
   * Register logging request handlers
   */
  private registerLoggingHandlers(): void {
    this.server.server.setRequestHandler(SetLevelRequestSchema, (request) => {
      const logger = getLogger();
      const { level } = request.params;
      if (isLogLevel(level)) {
        logger.setMinLevel(level);
        logger.info(`Log level set to: ${level}`);
      }
      return {};
    });
  }

  private registerTools(): void {
    this.server.registerTool(
      'list_forms',
      {
        title: 'List Forms',
        description: 'List the names of the registered forms',
        inputSchema: FormTools.ListFormsInputSchema.shape,
      },
      async (input) => executeWithLogging('list_forms', () => FormTools.listForms(input)),
    );

    this.server.registerTool(
      'describe_form',
      {
        title: 'Describe Form',
        description:
          'Describe the fields of a form (type, label, required, options) and its current values, optionally loaded from a record',
        inputSchema: FormTools.DescribeFormInputSchema.shape,
      },
      async (input) => executeWithLogging('describe_form', () => FormTools.describeForm(input)),
    );

    this.server.registerTool(
      'validate_form',
      {
        title: 'Validate Form',
        description:
          'Validate submitted values against a form without saving. Returns per-field errors and the values to redisplay',
        inputSchema: FormTools.ValidateFormInputSchema.shape,
      },
      async (input) => executeWithLogging('validate_form', () => FormTools.validateForm(input)),
    );

    this.server.registerTool(
      'submit_form',
      {
        title: 'Submit Form',
        description:
          'Validate submitted values and, when valid, create or update the bound record including its relationships',
        inputSchema: FormTools.SubmitFormInputSchema.shape,
      },
      async (input) => executeWithLogging('submit_form', () => FormTools.submitForm(input)),
    );
  }

  /**
   * Start the MCP server
   */
  async start(): Promise<void> {
    await this.server.connect(this.transport);
    getLogger().info(`${this.config.name} v${this.config.version} started`);
  }

  /**
   * Stop the MCP server
   */
  async stop(): Promise<void> {
    getLogger().setMcpServer(null);
    await this.server.close();
  }
}
