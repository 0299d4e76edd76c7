/**
 * MCP Client Implementation
 *
 * Stdio connector for tool providers: launches the provider process,
 * performs the MCP handshake and exposes tool discovery/execution.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { z } from 'zod';
import { ResolvedToolProviderSpec, ToolSession } from './types.js';
import { Tool } from '../models/base.js';
import { ToolCallError, ToolConnectError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('mcp');

export const CLIENT_INFO = {
  name: 'parley',
  version: '0.1.0',
};

const CallToolResultSchema = z.object({
  content: z
    .array(
      z
        .object({
          type: z.string(),
          text: z.string().optional(),
        })
        .passthrough()
    )
    .optional(),
  isError: z.boolean().optional(),
});

interface MCPToolDefinition {
  name: string;
  description?: string;
  inputSchema: {
    properties?: Record<string, unknown>;
    required?: unknown;
  };
}

export class MCPToolSession implements ToolSession {
  constructor(
    private readonly providerName: string,
    private readonly client: Client,
    private readonly transport: StdioClientTransport
  ) {}

  async listTools(): Promise<Tool[]> {
    const toolsResult = await this.client.listTools();
    return convertMCPTools(toolsResult.tools);
  }

  async callTool(name: string, args: Record<string, unknown>, timeoutMs?: number): Promise<string> {
    log.debug(`Executing tool: ${this.providerName}__${name}`, args);

    const raw = await this.client.callTool(
      { name, arguments: args },
      undefined,
      timeoutMs !== undefined ? { timeout: timeoutMs } : undefined
    );

    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ToolCallError(`Unexpected result shape from tool '${name}'`, name);
    }

    const text = (parsed.data.content ?? [])
      .filter(c => c.type === 'text' && typeof c.text === 'string')
      .map(c => c.text)
      .join('\n');

    if (parsed.data.isError) {
      throw new ToolCallError(text || `Tool '${name}' reported an error`, name);
    }

    return text;
  }

  async close(): Promise<void> {
    await this.client.close();
    log.debug(`Transport closed for ${this.providerName} (pid ${this.transport.pid ?? 'n/a'})`);
  }
}

/**
 * Default connector: launch over stdio and complete the MCP handshake.
 * Aborting `signal` closes the transport, which kills the provider process.
 */
export async function connectStdio(spec: ResolvedToolProviderSpec, signal?: AbortSignal): Promise<ToolSession> {
  if (signal?.aborted) {
    throw new ToolConnectError(`Connection to tool provider '${spec.name}' abandoned before start`, spec.name);
  }

  log.debug(`Command: ${spec.command}`);
  log.debug(`Args: ${JSON.stringify(spec.args)}`);

  const transport = new StdioClientTransport({
    command: spec.command,
    args: [...spec.args],
    env: { ...getDefaultEnvironment(), ...spec.resolvedEnv },
    stderr: 'pipe',
  });

  transport.stderr?.on('data', (chunk: Buffer) => {
    log.debug(`stderr '${spec.name}': ${chunk.toString('utf8').trim()}`);
  });

  const closeTransport = (reason: string) =>
    transport.close().catch((closeError: unknown) => {
      log.debug(`Transport close ${reason} for '${spec.name}': ${errorMessage(closeError)}`);
    });
  const onAbort = () => {
    log.debug(`Connection attempt for '${spec.name}' abandoned; closing transport`);
    void closeTransport('after abandoned connect');
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  const client = new Client(CLIENT_INFO, { capabilities: {} });

  try {
    await client.connect(transport);
  } catch (error) {
    await closeTransport('after failed connect');
    const cause = signal?.aborted ? 'abandoned' : errorMessage(error);
    throw new ToolConnectError(`Failed to connect to tool provider '${spec.name}': ${cause}`, spec.name);
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }

  return new MCPToolSession(spec.name, client, transport);
}

/**
 * Convert MCP tool definitions to our internal Tool format
 */
export function convertMCPTools(mcpTools: readonly MCPToolDefinition[]): Tool[] {
  return mcpTools.map(tool => ({
    name: tool.name,
    description: tool.description || tool.name,
    parameters: {
      type: 'object',
      properties: tool.inputSchema.properties ?? {},
      required: Array.isArray(tool.inputSchema.required)
        ? tool.inputSchema.required.filter((r): r is string => typeof r === 'string')
        : undefined,
    },
  }));
}
