/**
 * Agent Orchestrator
 *
 * Runs one conversational turn end to end:
 *
 *   Idle -> Loading -> Preprocessing -> ToolBinding -> Running -> Persisting -> Done
 *                                                              \-> Failed
 *
 * Only the model step can fail the turn. History that cannot be loaded,
 * pages that cannot be fetched or condensed, providers that do not connect
 * and writes that do not land all degrade the turn instead of failing it.
 * Tool connections opened for the turn are closed on every exit path.
 */

import { Settings } from './config.js';
import { SessionStore } from './session-store.js';
import { ConversationItem, NewConversationItem, ThreadKey, TurnOutput } from './types/conversation.js';
import { ContentLoader, WebContentLoader, formatWebContent } from '../content/loader.js';
import { ContentPreprocessor } from '../content/preprocessor.js';
import { ModelCondenser } from '../content/condenser.js';
import { ToolConnection } from '../mcp/connection.js';
import { ToolBinding, ToolConnectionManager } from '../mcp/connection-manager.js';
import { ToolConnector, ToolProviderSpec } from '../mcp/types.js';
import { IModel } from '../models/base.js';
import { OpenAICompatibleModel } from '../models/openai-compatible.js';
import { AgentRunResult, AgentRunner, ToolLoopRunner } from '../models/tool-runner.js';
import { SessionBackend } from '../storage/provider.js';
import { createSessionBackend } from '../storage/factory.js';
import { ModelInvocationError, TurnCancelledError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { RetryPolicy } from '../utils/retry.js';
import { runTaskGroup } from '../utils/task-group.js';
import { sliceWhole } from '../utils/text.js';
import { secondsToMs } from '../utils/timeout.js';
import { parseUrls, replaceUrls } from '../utils/url.js';

const log = logger.child('orchestrator');

export const RESPONSE_TITLE = 'Agent Response';

export enum TurnState {
  IDLE = 'idle',
  LOADING = 'loading',
  PREPROCESSING = 'preprocessing',
  TOOL_BINDING = 'tool_binding',
  RUNNING = 'running',
  PERSISTING = 'persisting',
  DONE = 'done',
  FAILED = 'failed',
}

/**
 * Hands the output to the chat surface. May return the key of the message
 * that carried the reply so the next reply to it continues this thread.
 */
export type DeliverFn = (output: TurnOutput) => Promise<ThreadKey | void> | ThreadKey | void;

export interface TurnRequest {
  /** Reply thread; absent for a fresh conversation. */
  thread?: ThreadKey;
  text: string;
  deliver?: DeliverFn;
}

export interface TurnResult {
  output: TurnOutput;
  /** Key the turn was persisted under, if any. */
  persistedKey?: ThreadKey;
  toolProviders: string[];
  iterations: number;
}

export interface OrchestratorLimits {
  connectTimeoutMs: number;
  cleanupTimeoutMs: number;
  toolCallTimeoutMs?: number;
  cacheTtlSeconds: number;
  singleChunkThreshold: number;
  maxSynthesisChars: number;
}

export interface AgentOrchestratorConfig {
  sessionStore: SessionStore;
  connectionManager: ToolConnectionManager;
  preprocessor: ContentPreprocessor;
  loader: ContentLoader;
  runner: AgentRunner;
  providers: readonly ToolProviderSpec[] | (() => readonly ToolProviderSpec[]);
  limits: OrchestratorLimits;
  onTransition?: (state: TurnState) => void;
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new TurnCancelledError();
  }
}

function isThreadKey(value: unknown): value is ThreadKey {
  return typeof value === 'object' && value !== null && 'anchorMessageId' in value && 'chatId' in value;
}

export class AgentOrchestrator {
  private config: AgentOrchestratorConfig;

  constructor(config: AgentOrchestratorConfig) {
    this.config = config;
  }

  async handleTurn(request: TurnRequest, signal?: AbortSignal): Promise<TurnResult> {
    const { limits } = this.config;
    let connections: ToolConnection[] = [];
    this.enter(TurnState.IDLE);

    try {
      throwIfAborted(signal);
      this.enter(TurnState.LOADING);
      const history = request.thread ? await this.config.sessionStore.load(request.thread) : [];

      throwIfAborted(signal);
      this.enter(TurnState.PREPROCESSING);
      const userText = await this.expandUrls(request.text, signal);

      throwIfAborted(signal);
      this.enter(TurnState.TOOL_BINDING);
      connections = await this.config.connectionManager.connectAll(this.providerSpecs(), limits.connectTimeoutMs);
      throwIfAborted(signal);
      const binding = new ToolBinding(connections, limits.toolCallTimeoutMs);

      this.enter(TurnState.RUNNING);
      const result = await this.invokeModel(history, userText, binding, signal);
      const output: TurnOutput = { content: result.output, title: RESPONSE_TITLE };

      throwIfAborted(signal);
      const delivery = await this.deliver(request, output, signal);

      this.enter(TurnState.PERSISTING);
      const userItem: NewConversationItem = { role: 'user', kind: 'message', content: userText };
      const persistedKey = delivery.ok
        ? await this.persist(request.thread, delivery.key, history, [userItem, ...result.newItems])
        : undefined;

      this.enter(TurnState.DONE);
      return {
        output,
        persistedKey,
        toolProviders: binding.getProviderNames(),
        iterations: result.iterations,
      };
    } catch (error) {
      this.enter(TurnState.FAILED);
      if (signal?.aborted && !(error instanceof TurnCancelledError)) {
        throw new TurnCancelledError();
      }
      throw error;
    } finally {
      await this.config.connectionManager.closeAll(connections, limits.cleanupTimeoutMs);
    }
  }

  /**
   * Flush pending history writes and release the session backend.
   */
  async close(): Promise<void> {
    await this.config.sessionStore.close();
  }

  /**
   * Hand the output to the chat surface. A failed delivery does not fail
   * the turn; the answer the user never saw is simply not persisted.
   */
  private async deliver(
    request: TurnRequest,
    output: TurnOutput,
    signal?: AbortSignal
  ): Promise<{ ok: boolean; key?: ThreadKey }> {
    if (!request.deliver) {
      return { ok: true };
    }
    try {
      const delivered = await request.deliver(output);
      return { ok: true, key: isThreadKey(delivered) ? delivered : undefined };
    } catch (error) {
      if (error instanceof TurnCancelledError) {
        throw error;
      }
      if (signal?.aborted) {
        throw new TurnCancelledError();
      }
      log.error(`Delivering the response failed; history not persisted: ${errorMessage(error)}`);
      return { ok: false };
    }
  }

  /**
   * Replace every URL in the text with its fetched, bounded content.
   * A URL that cannot be fetched stays as it is.
   */
  private async expandUrls(text: string, signal?: AbortSignal): Promise<string> {
    const urls = parseUrls(text);
    if (urls.length === 0) {
      return text;
    }

    const outcomes = await runTaskGroup(urls.map(url => () => this.loadAndCondense(url, signal)));
    throwIfAborted(signal);

    const contents = new Map<string, string>();
    for (const outcome of outcomes) {
      const url = urls[outcome.index];
      if (outcome.status === 'fulfilled') {
        contents.set(url, outcome.value);
      } else {
        log.warn(`Could not load ${url}, leaving it in the text: ${errorMessage(outcome.reason)}`);
      }
    }

    return replaceUrls(text, url => {
      const content = contents.get(url);
      return content === undefined ? undefined : formatWebContent(url, content);
    });
  }

  private async loadAndCondense(url: string, signal?: AbortSignal): Promise<string> {
    const { limits } = this.config;
    const raw = await this.config.loader.load(url, signal);

    try {
      return await this.config.preprocessor.process(raw, limits.singleChunkThreshold, limits.maxSynthesisChars, {
        sourceId: url,
        signal,
      });
    } catch (error) {
      if (error instanceof TurnCancelledError) {
        throw error;
      }
      log.warn(`Preprocessing failed for ${url}, using truncated raw content: ${errorMessage(error)}`);
      return sliceWhole(raw, limits.singleChunkThreshold);
    }
  }

  /**
   * The runner retries each model call itself; whatever it raises is final
   * for this turn.
   */
  private async invokeModel(
    history: readonly ConversationItem[],
    userText: string,
    tools: ToolBinding,
    signal?: AbortSignal
  ): Promise<AgentRunResult> {
    try {
      return await this.config.runner.run({ history, userText, tools, signal });
    } catch (error) {
      if (signal?.aborted || error instanceof TurnCancelledError) {
        throw new TurnCancelledError();
      }
      if (error instanceof ModelInvocationError) {
        throw error;
      }
      throw new ModelInvocationError(`Model invocation failed: ${errorMessage(error)}`, false);
    }
  }

  /**
   * Delivered-reply key wins: the whole thread is carried forward under it.
   * Otherwise the new items are appended under the request's key.
   */
  private async persist(
    requestKey: ThreadKey | undefined,
    deliveredKey: ThreadKey | undefined,
    history: readonly ConversationItem[],
    newItems: readonly NewConversationItem[]
  ): Promise<ThreadKey | undefined> {
    const { sessionStore, limits } = this.config;

    if (deliveredKey) {
      await sessionStore.appendAndSave(deliveredKey, [...history, ...newItems], limits.cacheTtlSeconds);
      return deliveredKey;
    }
    if (requestKey) {
      await sessionStore.appendAndSave(requestKey, newItems, limits.cacheTtlSeconds);
      return requestKey;
    }

    log.debug('No thread key for this turn; history not persisted');
    return undefined;
  }

  private providerSpecs(): readonly ToolProviderSpec[] {
    const { providers } = this.config;
    return typeof providers === 'function' ? providers() : providers;
  }

  private enter(state: TurnState): void {
    log.debug(`Turn state: ${state}`);
    this.config.onTransition?.(state);
  }
}

export interface OrchestratorDependencies {
  providers: readonly ToolProviderSpec[] | (() => readonly ToolProviderSpec[]);
  backend?: SessionBackend;
  model?: IModel;
  connector?: ToolConnector;
  loader?: ContentLoader;
  runner?: AgentRunner;
  /** Retry policy for each model call of the default runner. */
  retryPolicy?: RetryPolicy;
  onTransition?: (state: TurnState) => void;
}

/**
 * Wire the default collaborators from settings. Anything passed in
 * `deps` replaces the default.
 */
export function createOrchestrator(settings: Settings, deps: OrchestratorDependencies): AgentOrchestrator {
  const model =
    deps.model ??
    new OpenAICompatibleModel({
      baseUrl: settings.openaiBaseUrl,
      apiKey: settings.openaiApiKey,
      model: settings.openaiModel,
      temperature: settings.openaiTemperature,
    });

  const sessionStore = new SessionStore({
    backend: deps.backend ?? createSessionBackend(settings.cacheUrl),
    maxItems: settings.maxCacheSize,
    ttlSeconds: settings.cacheTtlSeconds,
  });

  return new AgentOrchestrator({
    sessionStore,
    connectionManager: new ToolConnectionManager({ connector: deps.connector }),
    preprocessor: new ContentPreprocessor({
      condenser: new ModelCondenser(model),
      condenseTimeoutMs: secondsToMs(settings.condenseTimeoutSeconds),
    }),
    loader: deps.loader ?? new WebContentLoader(),
    runner:
      deps.runner ??
      new ToolLoopRunner({
        model,
        maxIterations: settings.maxIterations,
        temperature: settings.openaiTemperature,
        retryPolicy: deps.retryPolicy,
      }),
    providers: deps.providers,
    limits: {
      connectTimeoutMs: secondsToMs(settings.connectTimeoutSeconds),
      cleanupTimeoutMs: secondsToMs(settings.cleanupTimeoutSeconds),
      toolCallTimeoutMs: secondsToMs(settings.serverTimeoutSeconds),
      cacheTtlSeconds: settings.cacheTtlSeconds,
      singleChunkThreshold: settings.singleChunkThreshold,
      maxSynthesisChars: settings.maxSynthesisChars,
    },
    onTransition: deps.onTransition,
  });
}
