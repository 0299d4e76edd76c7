/**
 * Parley - Agent Conversation Orchestrator
 *
 * Main exports for programmatic usage
 */

export {
  AgentOrchestrator,
  createOrchestrator,
  TurnState,
  RESPONSE_TITLE,
} from './core/orchestrator.js';
export type {
  AgentOrchestratorConfig,
  DeliverFn,
  OrchestratorDependencies,
  OrchestratorLimits,
  TurnRequest,
  TurnResult,
} from './core/orchestrator.js';
export { SessionStore, filterItems, trimItems } from './core/session-store.js';
export type { AppendableItem, SessionStoreConfig } from './core/session-store.js';
export { ConfigManager, loadSettings, parseProviderSpecs } from './core/config.js';
export type { ProviderConfig, Settings } from './core/config.js';
export { makeThreadKey, formatThreadKey, sameThread } from './core/types/conversation.js';
export type {
  ConversationItem,
  ConversationItemKind,
  ConversationRole,
  NewConversationItem,
  SessionRecord,
  ThreadKey,
  TurnOutput,
} from './core/types/conversation.js';

export { ContentPreprocessor, truncateText } from './content/preprocessor.js';
export type { ContentChunk, ContentCondenser, CondensedChunk } from './content/preprocessor.js';
export { ModelCondenser } from './content/condenser.js';
export { WebContentLoader, formatWebContent, htmlToMarkdown } from './content/loader.js';
export type { ContentLoader } from './content/loader.js';
export { chunkOnDelimiter } from './content/chunker.js';

export { ToolConnectionManager, ToolBinding, resolveProviderEnv } from './mcp/connection-manager.js';
export { ToolConnection, TOOL_NAME_SEPARATOR } from './mcp/connection.js';
export { connectStdio } from './mcp/client.js';
export type { ToolConnector, ToolProviderSpec, ToolSession } from './mcp/types.js';

export { OpenAICompatibleModel } from './models/openai-compatible.js';
export { ToolLoopRunner } from './models/tool-runner.js';
export type { AgentRunner, AgentRunRequest, AgentRunResult } from './models/tool-runner.js';
export type { ChatCompletionOptions, IModel, Message, ModelResponse, Tool, ToolCall } from './models/base.js';

export {
  SessionBackend,
  MemorySessionBackend,
  RedisSessionBackend,
  createSessionBackend,
} from './storage/index.js';

export { logger, LogLevel } from './utils/logger.js';
export { withRetry, NETWORK_RETRY_POLICY, RATE_LIMITED_RETRY_POLICY } from './utils/retry.js';
export type { RetryPolicy } from './utils/retry.js';

export * from './utils/errors.js';
