import { describe, expect, it, vi } from 'vitest';
import {
  AgentOrchestrator,
  AgentOrchestratorConfig,
  TurnState,
  createOrchestrator,
} from '../../../src/core/orchestrator.js';
import { loadSettings } from '../../../src/core/config.js';
import { SessionStore } from '../../../src/core/session-store.js';
import { NewConversationItem, makeThreadKey } from '../../../src/core/types/conversation.js';
import { ContentLoader, formatWebContent } from '../../../src/content/loader.js';
import { ContentPreprocessor } from '../../../src/content/preprocessor.js';
import { ToolConnectionManager } from '../../../src/mcp/connection-manager.js';
import { FakeSessionOptions, ScriptedModel, fakeConnector, UpperCaseCondenser } from '../../helpers/fakes.js';
import { ChatCompletionOptions, IModel, ModelResponse } from '../../../src/models/base.js';
import { AgentRunRequest, AgentRunResult, ToolLoopRunner } from '../../../src/models/tool-runner.js';
import { MemorySessionBackend } from '../../../src/storage/memory-provider.js';
import { ModelInvocationError, TurnCancelledError } from '../../../src/utils/errors.js';
import { RetryPolicy } from '../../../src/utils/retry.js';

const FAST_POLICY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 2, exponentialBase: 2, jitter: false };

function answer(content: string): AgentRunResult {
  return { output: content, newItems: [{ role: 'assistant', kind: 'message', content }], iterations: 1, toolsUsed: [] };
}

function message(content: string, role: 'user' | 'assistant' = 'user'): NewConversationItem {
  return { role, content, kind: 'message' };
}

function setup(
  overrides: Partial<AgentOrchestratorConfig> = {},
  providers: Record<string, FakeSessionOptions> = { 'search-tool': { tools: ['web_search'] } }
) {
  const backend = new MemorySessionBackend();
  const sessionStore = new SessionStore({ backend });
  const { connector, sessions } = fakeConnector(providers);
  const states: TurnState[] = [];
  const run = vi.fn(async (_request: AgentRunRequest): Promise<AgentRunResult> => answer('Answer'));
  const load = vi.fn(async (url: string) => `content of ${url}`);
  const loader: ContentLoader = { load };

  const orchestrator = new AgentOrchestrator({
    sessionStore,
    connectionManager: new ToolConnectionManager({ connector, env: {} }),
    preprocessor: new ContentPreprocessor({ condenser: new UpperCaseCondenser() }),
    loader,
    runner: { run },
    providers: Object.keys(providers).map(name => ({ name, command: 'node', args: [], env: {} })),
    limits: {
      connectTimeoutMs: 1_000,
      cleanupTimeoutMs: 1_000,
      cacheTtlSeconds: 60,
      singleChunkThreshold: 10_000,
      maxSynthesisChars: 2_000,
    },
    onTransition: state => states.push(state),
    ...overrides,
  });

  return { orchestrator, backend, sessionStore, sessions, states, run, load };
}

describe('AgentOrchestrator', () => {
  it('walks every state once on a successful turn', async () => {
    const { orchestrator, states } = setup();

    const result = await orchestrator.handleTurn({ text: 'Hello' });

    expect(result.output).toEqual({ content: 'Answer', title: 'Agent Response' });
    expect(states).toEqual([
      TurnState.IDLE,
      TurnState.LOADING,
      TurnState.PREPROCESSING,
      TurnState.TOOL_BINDING,
      TurnState.RUNNING,
      TurnState.PERSISTING,
      TurnState.DONE,
    ]);
  });

  it('continues the thread and appends the new turn under its key', async () => {
    const { orchestrator, sessionStore, run } = setup();
    const thread = makeThreadKey(100, 200);
    await sessionStore.appendAndSave(thread, [message('q0'), message('a0', 'assistant')]);

    const result = await orchestrator.handleTurn({ thread, text: 'Hello' });

    expect(run.mock.calls[0][0].history.map(item => item.content)).toEqual(['q0', 'a0']);
    expect(result.persistedKey).toEqual(thread);
    expect((await sessionStore.load(thread)).map(item => item.content)).toEqual(['q0', 'a0', 'Hello', 'Answer']);
  });

  it('carries the thread forward to the key returned by deliver', async () => {
    const { orchestrator, sessionStore } = setup();
    const thread = makeThreadKey(100, 200);
    const reply = makeThreadKey(101, 200);
    await sessionStore.appendAndSave(thread, [message('q0'), message('a0', 'assistant')]);
    const deliver = vi.fn(() => reply);

    const result = await orchestrator.handleTurn({ thread, text: 'Hello', deliver });

    expect(deliver).toHaveBeenCalledWith({ content: 'Answer', title: 'Agent Response' });
    expect(result.persistedKey).toEqual(reply);
    expect((await sessionStore.load(reply)).map(item => item.content)).toEqual(['q0', 'a0', 'Hello', 'Answer']);
    expect((await sessionStore.load(thread)).map(item => item.content)).toEqual(['q0', 'a0']);
  });

  it('skips persistence when the turn has no thread', async () => {
    const { orchestrator, backend } = setup();

    const result = await orchestrator.handleTurn({ text: 'Hello' });

    expect(result.persistedKey).toBeUndefined();
    expect(backend.size()).toBe(0);
  });

  it('replaces urls with their fetched content', async () => {
    const { orchestrator, run } = setup();
    const url = 'https://tea.example/a';

    await orchestrator.handleTurn({ text: `Summarise ${url} please` });

    expect(run.mock.calls[0][0].userText).toBe(`Summarise ${formatWebContent(url, `content of ${url}`)} please`);
  });

  it('leaves a url in place when it cannot be fetched', async () => {
    const { orchestrator, run, load } = setup();
    load.mockRejectedValueOnce(new Error('fetch failed'));

    await orchestrator.handleTurn({ text: 'Read https://tea.example/down' });

    expect(run.mock.calls[0][0].userText).toBe('Read https://tea.example/down');
  });

  it('falls back to truncated raw content when condensation fails', async () => {
    const url = 'https://tea.example/long';
    const { orchestrator, run, load } = setup({
      preprocessor: new ContentPreprocessor({
        condenser: {
          condense: async text => text,
          synthesize: async () => {
            throw new Error('synthesis unavailable');
          },
        },
      }),
      limits: {
        connectTimeoutMs: 1_000,
        cleanupTimeoutMs: 1_000,
        cacheTtlSeconds: 60,
        singleChunkThreshold: 10,
        maxSynthesisChars: 20,
      },
    });
    load.mockResolvedValueOnce('word '.repeat(10));

    await orchestrator.handleTurn({ text: `Read ${url}` });

    expect(run.mock.calls[0][0].userText).toBe(`Read ${formatWebContent(url, 'word word ')}`);
  });

  it('binds only providers that connect in time', async () => {
    const { orchestrator, run } = setup(
      {
        limits: {
          connectTimeoutMs: 30,
          cleanupTimeoutMs: 1_000,
          cacheTtlSeconds: 60,
          singleChunkThreshold: 10_000,
          maxSynthesisChars: 2_000,
        },
      },
      { 'finance-tool': { connectDelayMs: 200 }, 'search-tool': { tools: ['web_search'] } }
    );

    const result = await orchestrator.handleTurn({ text: 'Price of tea?' });

    expect(result.toolProviders).toEqual(['search-tool']);
    expect(run.mock.calls[0][0].tools.getTools().map(tool => tool.name)).toEqual(['search-tool__web_search']);
  });

  it('runs without tools when no provider connects', async () => {
    const { orchestrator, run } = setup({}, { broken: { failConnect: true } });

    const result = await orchestrator.handleTurn({ text: 'Hello' });

    expect(result.output.content).toBe('Answer');
    expect(run.mock.calls[0][0].tools.isEmpty()).toBe(true);
  });

  it('still answers while the session backend is down', async () => {
    const { orchestrator, backend, states } = setup();
    backend.setAvailable(false);

    const result = await orchestrator.handleTurn({ thread: makeThreadKey(1, 2), text: 'Hello' });

    expect(result.output.content).toBe('Answer');
    expect(states.at(-1)).toBe(TurnState.DONE);
  });

  it('closes tool connections after a successful turn', async () => {
    const { orchestrator, sessions } = setup();

    await orchestrator.handleTurn({ text: 'Hello' });

    expect(sessions.get('search-tool')?.closed).toBe(true);
  });

  it('surfaces a model failure once the runner has used up its retries', async () => {
    const busy = () => new ModelInvocationError('Model API error (503): busy', true);
    const model = new ScriptedModel([busy(), busy(), busy()]);
    const { orchestrator, states, sessions, sessionStore } = setup({
      runner: new ToolLoopRunner({ model, retryPolicy: FAST_POLICY }),
    });
    const thread = makeThreadKey(5, 5);

    const error = await orchestrator.handleTurn({ thread, text: 'Hello' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelInvocationError);
    if (error instanceof ModelInvocationError) {
      expect(error.attempts).toBe(3);
      expect(error.retryable).toBe(true);
    }
    expect(model.chat).toHaveBeenCalledTimes(3);
    expect(states.at(-1)).toBe(TurnState.FAILED);
    expect(states).not.toContain(TurnState.PERSISTING);
    expect(sessions.get('search-tool')?.closed).toBe(true);
    expect(await sessionStore.load(thread)).toEqual([]);
  });

  it('runs the runner once per turn', async () => {
    const { orchestrator, run } = setup();
    run.mockRejectedValue(new ModelInvocationError('overloaded', true, 3));

    const error = await orchestrator.handleTurn({ text: 'Hello' }).catch((e: unknown) => e);

    expect(error instanceof ModelInvocationError && error.attempts).toBe(3);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('does not retry a permanent model failure', async () => {
    const { orchestrator, run } = setup();
    run.mockRejectedValue(new ModelInvocationError('invalid request', false));

    const error = await orchestrator.handleTurn({ text: 'Hello' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelInvocationError);
    expect(error instanceof ModelInvocationError && error.attempts).toBe(1);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('wraps unexpected runner errors as model failures', async () => {
    const { orchestrator } = setup();
    const { orchestrator: failing, run } = setup();
    run.mockRejectedValue(new Error('unexpected'));

    await expect(orchestrator.handleTurn({ text: 'Hello' })).resolves.toBeDefined();
    await expect(failing.handleTurn({ text: 'Hello' })).rejects.toBeInstanceOf(ModelInvocationError);
  });

  it('finishes the turn without persisting when delivery fails', async () => {
    const { orchestrator, sessionStore, states } = setup();
    const thread = makeThreadKey(9, 9);
    const deliver = vi.fn(() => {
      throw new Error('chat unreachable');
    });

    const result = await orchestrator.handleTurn({ thread, text: 'Hello', deliver });

    expect(result.output.content).toBe('Answer');
    expect(result.persistedKey).toBeUndefined();
    expect(states.slice(-2)).toEqual([TurnState.PERSISTING, TurnState.DONE]);
    expect(await sessionStore.load(thread)).toEqual([]);
  });

  it('keeps surrogate pairs whole in the truncated fallback', async () => {
    const url = 'https://tea.example/emoji';
    const { orchestrator, run, load } = setup({
      preprocessor: new ContentPreprocessor({
        condenser: {
          condense: async text => text,
          synthesize: async () => {
            throw new Error('synthesis unavailable');
          },
        },
      }),
      limits: {
        connectTimeoutMs: 1_000,
        cleanupTimeoutMs: 1_000,
        cacheTtlSeconds: 60,
        singleChunkThreshold: 5,
        maxSynthesisChars: 20,
      },
    });
    load.mockResolvedValueOnce('abcd😀 and more text');

    await orchestrator.handleTurn({ text: `Read ${url}` });

    expect(run.mock.calls[0][0].userText).toBe(`Read ${formatWebContent(url, 'abcd')}`);
  });

  it('cancels mid-run, closes connections and persists nothing', async () => {
    const { orchestrator, run, sessions, sessionStore, states } = setup();
    const controller = new AbortController();
    const thread = makeThreadKey(7, 7);
    run.mockImplementation(
      request =>
        new Promise<AgentRunResult>((_, reject) => {
          request.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
          controller.abort();
        })
    );

    await expect(orchestrator.handleTurn({ thread, text: 'Hello' }, controller.signal)).rejects.toBeInstanceOf(
      TurnCancelledError
    );

    expect(run).toHaveBeenCalledTimes(1);
    expect(states.at(-1)).toBe(TurnState.FAILED);
    expect(sessions.get('search-tool')?.closed).toBe(true);
    expect(await sessionStore.load(thread)).toEqual([]);
  });

  it('does not start a turn that is already cancelled', async () => {
    const { orchestrator, run, states } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(orchestrator.handleTurn({ text: 'Hello' }, controller.signal)).rejects.toBeInstanceOf(
      TurnCancelledError
    );

    expect(run).not.toHaveBeenCalled();
    expect(states).toEqual([TurnState.IDLE, TurnState.FAILED]);
  });
});

/**
 * Condenses by upper-casing the quoted excerpt; hangs on excerpts that
 * contain `hangOn`. Synthesis returns the sections it was given.
 */
class PromptEchoModel implements IModel {
  readonly modelName = 'echo-model';

  constructor(private readonly hangOn: string) {}

  async chat(options: ChatCompletionOptions): Promise<ModelResponse> {
    const prompt = options.messages[0]?.content ?? '';
    const sections = prompt.split('Rewritten sections:\n')[1];
    if (sections !== undefined) {
      return { content: sections };
    }
    const excerpt = /'''\n([\s\S]*)\n'''/.exec(prompt)?.[1] ?? '';
    if (excerpt.includes(this.hangOn)) {
      return new Promise<ModelResponse>(() => {});
    }
    return { content: excerpt.toUpperCase() };
  }
}

describe('createOrchestrator', () => {
  it('wires collaborators from settings', async () => {
    const backend = new MemorySessionBackend();
    const run = vi.fn(async (_request: AgentRunRequest) => answer('Wired'));
    const orchestrator = createOrchestrator(loadSettings({ AGENT_MAX_CACHE_SIZE: '2' }), {
      providers: [],
      backend,
      runner: { run },
      loader: { load: async () => 'unused' },
    });
    const thread = makeThreadKey(1, 1);

    await orchestrator.handleTurn({ thread, text: 'first' });
    await orchestrator.handleTurn({ thread, text: 'second' });

    expect(run.mock.calls[1][0].history.map(item => item.content)).toEqual(['first', 'Wired']);
    expect(await backend.get('bot:1:1')).toContain('"second"');
    await orchestrator.close();
  });

  it('bounds each chunk condensation by the configured timeout', async () => {
    const run = vi.fn(async (_request: AgentRunRequest) => answer('Done'));
    const settings = loadSettings({
      CONDENSE_TIMEOUT: '0.05',
      SINGLE_CHUNK_THRESHOLD: '10',
      MAX_SYNTHESIS_CHARS: '200',
    });
    const orchestrator = createOrchestrator(settings, {
      providers: [],
      backend: new MemorySessionBackend(),
      model: new PromptEchoModel('gamma'),
      runner: { run },
      loader: { load: async () => 'alpha beta gamma delta' },
    });
    const url = 'https://tea.example/greek';

    await orchestrator.handleTurn({ text: `Read ${url}` });

    expect(settings.condenseTimeoutSeconds).toBe(0.05);
    expect(run.mock.calls[0][0].userText).toBe(
      `Read ${formatWebContent(url, 'Section 1:\nALPHA\n\nSection 2:\nBETA\n\nSection 3:\ngamma\n\nSection 4:\nDELTA')}`
    );
    await orchestrator.close();
  });
});
