/**
 * OpenAI-compatible Chat Completions client
 *
 * Sends tools in the standard function-calling format and validates the
 * response shape before it reaches the tool loop. Retrying is left to the
 * caller: errors carry a `retryable` flag instead.
 */

import { z } from 'zod';
import { ChatCompletionOptions, IModel, Message, ModelResponse } from './base.js';
import { ModelInvocationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { isRetryableError, isRetryableStatus } from '../utils/retry.js';

const log = logger.child('model');

export interface OpenAICompatibleConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  temperature?: number;
}

const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function').default('function'),
  function: z.object({
    name: z.string(),
    arguments: z.string().default('{}'),
  }),
});

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z.array(ToolCallSchema).nullable().optional(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().default(0),
      completion_tokens: z.number().default(0),
      total_tokens: z.number().default(0),
    })
    .optional(),
});

function toApiMessage(message: Message): Record<string, unknown> {
  const apiMessage: Record<string, unknown> = {
    role: message.role,
    content: message.content,
  };
  if (message.name) {
    apiMessage.name = message.name;
  }
  if (message.tool_call_id) {
    apiMessage.tool_call_id = message.tool_call_id;
  }
  if (message.tool_calls && message.tool_calls.length > 0) {
    apiMessage.tool_calls = message.tool_calls;
  }
  return apiMessage;
}

export class OpenAICompatibleModel implements IModel {
  private config: OpenAICompatibleConfig;

  constructor(config: OpenAICompatibleConfig) {
    this.config = config;
  }

  get modelName(): string {
    return this.config.model;
  }

  async chat(options: ChatCompletionOptions): Promise<ModelResponse> {
    const requestBody: Record<string, unknown> = {
      model: options.model || this.config.model,
      messages: options.messages.map(toApiMessage),
      temperature: options.temperature ?? this.config.temperature ?? 0,
    };

    if (options.maxTokens) {
      requestBody.max_tokens = options.maxTokens;
    }

    if (options.tools && options.tools.length > 0) {
      requestBody.tools = options.tools.map(tool => ({
        type: 'function',
        function: {
          name: tool.name,
          description: tool.description,
          parameters: tool.parameters,
        },
      }));
    }

    log.debug('Chat completion request:', JSON.stringify(requestBody, null, 2));

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    let response: Response;
    try {
      response = await fetch(`${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`, {
        method: 'POST',
        headers,
        body: JSON.stringify(requestBody),
        signal: options.signal,
      });
    } catch (error) {
      throw new ModelInvocationError(
        `Failed to reach model endpoint: ${errorMessage(error)}`,
        isRetryableError(error),
        1,
        this.config.model
      );
    }

    if (!response.ok) {
      const errorText = await response.text();
      log.error(`API Error Response (${response.status}):`, errorText);
      throw new ModelInvocationError(
        `Model API error (${response.status}): ${errorText}`,
        isRetryableStatus(response.status),
        1,
        this.config.model
      );
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ModelInvocationError(
        `Unexpected response shape: ${parsed.error.issues.map(issue => issue.message).join('; ')}`,
        false,
        1,
        this.config.model
      );
    }

    const { choices, usage } = parsed.data;
    const message = choices[0].message;
    const toolCalls = message.tool_calls ?? [];

    return {
      content: message.content ?? '',
      toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
      usage: usage
        ? {
            promptTokens: usage.prompt_tokens,
            completionTokens: usage.completion_tokens,
            totalTokens: usage.total_tokens,
          }
        : undefined,
    };
  }
}
