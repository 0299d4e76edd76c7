/**
 * One provider's connection for the duration of a single turn.
 */

import { ToolConnectionState, ToolSession } from './types.js';
import { Tool } from '../models/base.js';
import { ToolCallError } from '../utils/errors.js';

export const TOOL_NAME_SEPARATOR = '__';

export class ToolConnection {
  readonly providerName: string;
  private _state: ToolConnectionState = 'connecting';
  private _establishedAt: Date | null = null;
  private session: ToolSession | null = null;
  private tools: Tool[] = [];

  constructor(providerName: string) {
    this.providerName = providerName;
  }

  get state(): ToolConnectionState {
    return this._state;
  }

  get establishedAt(): Date | null {
    return this._establishedAt;
  }

  markReady(session: ToolSession, tools: Tool[], at: Date = new Date()): void {
    this.session = session;
    this.tools = tools;
    this._establishedAt = at;
    this._state = 'ready';
  }

  markFailed(): void {
    this._state = 'failed';
  }

  /**
   * Tools with provider-prefixed names, e.g. `search-tool__web_search`.
   */
  getTools(): Tool[] {
    return this.tools.map(tool => ({
      ...tool,
      name: `${this.providerName}${TOOL_NAME_SEPARATOR}${tool.name}`,
      description: `[${this.providerName}] ${tool.description}`,
    }));
  }

  async callTool(toolName: string, args: Record<string, unknown>, timeoutMs?: number): Promise<string> {
    if (this._state !== 'ready' || !this.session) {
      throw new ToolCallError(`Tool provider '${this.providerName}' is not ready (state: ${this._state})`, toolName);
    }
    return this.session.callTool(toolName, args, timeoutMs);
  }

  /**
   * Closing a closed or failed connection is a no-op.
   */
  async close(): Promise<void> {
    if (this._state !== 'ready' || !this.session) {
      return;
    }
    const session = this.session;
    this._state = 'closed';
    this.session = null;
    await session.close();
  }
}
