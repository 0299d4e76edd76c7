/**
 * Tool Connection Manager
 *
 * Connects to every configured tool provider concurrently, each attempt
 * under its own timeout, and closes them again at the end of a turn.
 * A provider that fails or times out is simply left out: partial tool
 * availability is a normal operating mode.
 */

import { ToolConnection, TOOL_NAME_SEPARATOR } from './connection.js';
import { connectStdio } from './client.js';
import { ResolvedToolProviderSpec, ToolConnector, ToolProviderSpec, ToolSession } from './types.js';
import { Tool } from '../models/base.js';
import { ToolCallError, ToolConnectError, ToolConnectTimeoutError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { runTaskGroup } from '../utils/task-group.js';

const log = logger.child('mcp');

export interface ToolConnectionManagerConfig {
  connector?: ToolConnector;
  /** Environment used to fill empty env entries. Defaults to process.env. */
  env?: Readonly<Record<string, string | undefined>>;
}

interface EstablishedSession {
  session: ToolSession;
  tools: Tool[];
}

/**
 * Fill every empty env value from the runtime environment under the same
 * name. A variable missing at runtime passes through as an empty string.
 */
export function resolveProviderEnv(
  env: Readonly<Record<string, string>>,
  runtimeEnv: Readonly<Record<string, string | undefined>>
): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    resolved[name] = value === '' ? runtimeEnv[name] ?? '' : value;
  }
  return resolved;
}

export class ToolConnectionManager {
  private connector: ToolConnector;
  private runtimeEnv: Readonly<Record<string, string | undefined>>;

  constructor(config: ToolConnectionManagerConfig = {}) {
    this.connector = config.connector ?? connectStdio;
    this.runtimeEnv = config.env ?? process.env;
  }

  resolveSpec(spec: ToolProviderSpec): ResolvedToolProviderSpec {
    return {
      ...spec,
      resolvedEnv: resolveProviderEnv(spec.env, this.runtimeEnv),
    };
  }

  /**
   * Attempt every provider concurrently. Resolves with the connections
   * that reached `ready`, in provider order.
   */
  async connectAll(specs: readonly ToolProviderSpec[], connectTimeoutMs: number): Promise<ToolConnection[]> {
    if (specs.length === 0) {
      log.info('No tool providers configured. Agent will run without external tools.');
      return [];
    }

    log.info(`Connecting to ${specs.length} tool providers (timeout: ${connectTimeoutMs}ms each)`);

    const connections = specs.map(spec => new ToolConnection(spec.name));

    const outcomes = await runTaskGroup<EstablishedSession>(
      specs.map(spec => signal => this.establish(spec, signal)),
      {
        timeoutMs: connectTimeoutMs,
        createTimeoutError: index => new ToolConnectTimeoutError(specs[index].name, connectTimeoutMs),
        onLate: ({ session }, index) => {
          log.warn(`Tool provider '${specs[index].name}' connected after its timeout; closing it`);
          void session.close().catch((error: unknown) => {
            log.debug(`Closing late provider '${specs[index].name}' failed: ${errorMessage(error)}`);
          });
        },
      }
    );

    const ready: ToolConnection[] = [];
    for (const outcome of outcomes) {
      const connection = connections[outcome.index];
      if (outcome.status === 'fulfilled') {
        connection.markReady(outcome.value.session, outcome.value.tools);
        ready.push(connection);
        log.success(
          `Connected to tool provider: ${connection.providerName} (${outcome.value.tools.length} tools, ${outcome.durationMs}ms)`
        );
      } else {
        connection.markFailed();
        if (outcome.reason instanceof ToolConnectTimeoutError) {
          log.error(`Connection timeout for tool provider ${connection.providerName} after ${connectTimeoutMs}ms`);
        } else {
          log.error(`Failed to connect to tool provider ${connection.providerName}: ${errorMessage(outcome.reason)}`);
        }
      }
    }

    if (ready.length !== specs.length) {
      log.warn(`Disabling ${specs.length - ready.length} tool providers that failed to connect`);
    }

    return ready;
  }

  /**
   * Close every connection concurrently, each under its own timeout.
   */
  async closeAll(connections: Iterable<ToolConnection>, cleanupTimeoutMs: number): Promise<void> {
    const targets = Array.from(connections);
    if (targets.length === 0) {
      return;
    }

    log.info(`Cleaning up ${targets.length} tool providers (timeout: ${cleanupTimeoutMs}ms each)`);

    const outcomes = await runTaskGroup(
      targets.map(connection => () => connection.close()),
      { timeoutMs: cleanupTimeoutMs }
    );

    for (const outcome of outcomes) {
      const name = targets[outcome.index].providerName;
      if (outcome.status === 'fulfilled') {
        log.debug(`Cleaned up tool provider: ${name}`);
      } else if (outcome.timedOut) {
        log.error(`Cleanup timeout for tool provider ${name} after ${cleanupTimeoutMs}ms`);
      } else {
        log.error(`Failed to clean up tool provider ${name}: ${errorMessage(outcome.reason)}`);
      }
    }
  }

  /**
   * Connect and list tools. Once `signal` aborts, a session that is still
   * listing its tools is closed.
   */
  private async establish(spec: ToolProviderSpec, signal: AbortSignal): Promise<EstablishedSession> {
    log.info(`Connecting to tool provider: ${spec.name}`);
    const session = await this.connector(this.resolveSpec(spec), signal);

    const closeSession = (reason: string) =>
      session.close().catch((closeError: unknown) => {
        log.debug(`Closing '${spec.name}' ${reason}: ${errorMessage(closeError)}`);
      });
    if (signal.aborted) {
      await closeSession('that connected after its timeout');
      throw new ToolConnectError(`Tool provider '${spec.name}' connected after its timeout`, spec.name);
    }
    const onAbort = () => {
      void closeSession('after its connect timeout');
    };
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      const tools = await session.listTools();
      return { session, tools };
    } catch (error) {
      if (!signal.aborted) {
        await closeSession('after failed tool listing');
      }
      throw new ToolConnectError(`Failed to list tools of '${spec.name}': ${errorMessage(error)}`, spec.name);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * The tool set handed to the model for one turn.
 */
export class ToolBinding {
  private byProvider: Map<string, ToolConnection>;

  constructor(
    private readonly connections: readonly ToolConnection[],
    private readonly callTimeoutMs?: number
  ) {
    this.byProvider = new Map(connections.map(connection => [connection.providerName, connection]));
  }

  getConnections(): readonly ToolConnection[] {
    return this.connections;
  }

  getProviderNames(): string[] {
    return Array.from(this.byProvider.keys());
  }

  getTools(): Tool[] {
    return this.connections.flatMap(connection => connection.getTools());
  }

  isEmpty(): boolean {
    return this.connections.length === 0;
  }

  /**
   * Route a prefixed tool name (`provider__tool`) to its provider.
   */
  async dispatch(toolName: string, args: Record<string, unknown>): Promise<string> {
    const separatorIndex = toolName.indexOf(TOOL_NAME_SEPARATOR);
    if (separatorIndex <= 0) {
      throw new ToolCallError(`Tool name '${toolName}' has no provider prefix`, toolName);
    }

    const providerName = toolName.slice(0, separatorIndex);
    const actualToolName = toolName.slice(separatorIndex + TOOL_NAME_SEPARATOR.length);
    const connection = this.byProvider.get(providerName);
    if (!connection) {
      throw new ToolCallError(`Tool provider '${providerName}' is not connected`, toolName);
    }

    return connection.callTool(actualToolName, args, this.callTimeoutMs);
  }
}
