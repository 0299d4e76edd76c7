/**
 * Tool provider types
 */

import { Tool } from '../models/base.js';

/**
 * Launch specification of one stdio tool provider. An env entry with an
 * empty value is filled from the process environment at connect time.
 */
export interface ToolProviderSpec {
  readonly name: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly env: Readonly<Record<string, string>>;
}

/** Spec with its env already resolved against the runtime environment. */
export interface ResolvedToolProviderSpec extends ToolProviderSpec {
  readonly resolvedEnv: Readonly<Record<string, string>>;
}

export type ToolConnectionState = 'connecting' | 'ready' | 'failed' | 'closed';

/**
 * Live link to one provider, as returned by a connector.
 */
export interface ToolSession {
  listTools(): Promise<Tool[]>;
  callTool(name: string, args: Record<string, unknown>, timeoutMs?: number): Promise<string>;
  close(): Promise<void>;
}

/**
 * Opens a session to one provider. When `signal` aborts, the attempt is
 * abandoned and anything it started (the provider process) is torn down.
 */
export type ToolConnector = (spec: ResolvedToolProviderSpec, signal?: AbortSignal) => Promise<ToolSession>;
