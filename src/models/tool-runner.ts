/**
 * Tool Loop Runner
 *
 * Runs one turn against the model: history plus the new user message go
 * in, the model may request tool calls which are dispatched through the
 * bound tool set, and the loop repeats until the model answers in plain
 * text or the iteration limit is hit.
 *
 * Retries apply to each model call on its own. Tool calls already made in
 * the turn are never replayed.
 */

import { ChatCompletionOptions, IModel, Message, ModelResponse } from './base.js';
import { ConversationItem, NewConversationItem } from '../core/types/conversation.js';
import { ToolBinding } from '../mcp/connection-manager.js';
import { ModelInvocationError, RetryError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { NETWORK_RETRY_POLICY, RetryPolicy, withRetry } from '../utils/retry.js';

const log = logger.child('agent');

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful assistant in a group chat. Answer concisely. Use the available tools when they help answer the question.';

export const DEFAULT_MAX_ITERATIONS = 10;

export interface AgentRunRequest {
  history: readonly ConversationItem[];
  userText: string;
  tools: ToolBinding;
  signal?: AbortSignal;
}

export interface AgentRunResult {
  output: string;
  /** Model turns produced by this run, in order. Excludes the user turn. */
  newItems: NewConversationItem[];
  iterations: number;
  toolsUsed: string[];
}

export interface AgentRunner {
  run(request: AgentRunRequest): Promise<AgentRunResult>;
}

export interface ToolLoopRunnerConfig {
  model: IModel;
  systemPrompt?: string;
  maxIterations?: number;
  temperature?: number;
  /** Applied to every model call. Defaults to NETWORK_RETRY_POLICY. */
  retryPolicy?: RetryPolicy;
}

export function historyToMessages(history: readonly ConversationItem[]): Message[] {
  return history
    .filter(item => item.kind === 'message' && item.role !== 'tool')
    .map(item => ({ role: item.role, content: item.content }));
}

function parseArguments(raw: string): Record<string, unknown> {
  const value: unknown = JSON.parse(raw || '{}');
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error('Tool arguments must be a JSON object');
  }
  return Object.fromEntries(Object.entries(value));
}

export class ToolLoopRunner implements AgentRunner {
  private model: IModel;
  private systemPrompt: string;
  private maxIterations: number;
  private temperature?: number;
  private retryPolicy: RetryPolicy;

  constructor(config: ToolLoopRunnerConfig) {
    this.model = config.model;
    this.systemPrompt = config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.maxIterations = config.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.temperature = config.temperature;
    this.retryPolicy = config.retryPolicy ?? NETWORK_RETRY_POLICY;
  }

  async run(request: AgentRunRequest): Promise<AgentRunResult> {
    const messages: Message[] = [
      { role: 'system', content: this.systemPrompt },
      ...historyToMessages(request.history),
      { role: 'user', content: request.userText },
    ];
    const newItems: NewConversationItem[] = [];
    const toolsUsed: string[] = [];
    const tools = request.tools.getTools();
    let iterations = 0;

    while (iterations < this.maxIterations) {
      iterations++;
      log.debug(`Agent iteration ${iterations}/${this.maxIterations}`);

      const response = await this.callModel({
        messages: [...messages],
        tools: tools.length > 0 ? tools : undefined,
        temperature: this.temperature,
        signal: request.signal,
      });

      if (response.toolCalls && response.toolCalls.length > 0) {
        log.info(`Model requested ${response.toolCalls.length} tool call(s)`);
        messages.push({ role: 'assistant', content: response.content, tool_calls: response.toolCalls });

        for (const toolCall of response.toolCalls) {
          const toolName = toolCall.function.name;
          newItems.push({
            role: 'assistant',
            kind: 'tool_call',
            content: toolCall.function.arguments,
            toolName,
            callId: toolCall.id,
          });

          let result: string;
          try {
            result = await request.tools.dispatch(toolName, parseArguments(toolCall.function.arguments));
            toolsUsed.push(toolName);
            log.success(`Tool ${toolName} executed successfully`);
          } catch (error) {
            log.error(`Tool ${toolName} execution failed: ${errorMessage(error)}`);
            result = `Error: ${errorMessage(error)}`;
          }

          messages.push({ role: 'tool', name: toolName, tool_call_id: toolCall.id, content: result });
          newItems.push({ role: 'tool', kind: 'tool_result', content: result, toolName, callId: toolCall.id });
        }
        continue;
      }

      const output = response.content.trim();
      if (!output) {
        throw new ModelInvocationError('Model returned an empty response', false, 1, this.model.modelName);
      }
      newItems.push({ role: 'assistant', kind: 'message', content: output });
      return { output, newItems, iterations, toolsUsed };
    }

    log.warn('Max iterations reached');
    const output = 'Maximum iterations reached. Task may be incomplete.';
    newItems.push({ role: 'assistant', kind: 'message', content: output });
    return { output, newItems, iterations, toolsUsed };
  }

  /**
   * One model call under the retry policy. Failures surface as
   * ModelInvocationError carrying the number of attempts made.
   */
  private async callModel(options: ChatCompletionOptions): Promise<ModelResponse> {
    let attempts = 0;
    try {
      return await withRetry(
        attempt => {
          attempts = attempt + 1;
          return this.model.chat(options);
        },
        { policy: this.retryPolicy, label: 'model call', signal: options.signal }
      );
    } catch (error) {
      if (error instanceof RetryError) {
        throw new ModelInvocationError(
          `Model invocation failed after ${error.attempts} attempts: ${errorMessage(error.lastError)}`,
          true,
          error.attempts,
          this.model.modelName
        );
      }
      if (error instanceof ModelInvocationError) {
        throw new ModelInvocationError(error.message, error.retryable, attempts, error.modelName ?? this.model.modelName);
      }
      throw error;
    }
  }
}
