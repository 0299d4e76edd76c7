import { beforeEach, describe, expect, it, vi } from 'vitest';
import { connectStdio, convertMCPTools } from '../../../src/mcp/client.js';
import { ResolvedToolProviderSpec } from '../../../src/mcp/types.js';
import { ToolConnectError } from '../../../src/utils/errors.js';

interface FakeTransport {
  params: unknown;
  closed: boolean;
  onclose?: () => void;
}

const { transports } = vi.hoisted(() => ({ transports: new Array<FakeTransport>() }));

vi.mock('@modelcontextprotocol/sdk/client/stdio.js', () => ({
  getDefaultEnvironment: () => ({ PATH: '/usr/bin' }),
  StdioClientTransport: class implements FakeTransport {
    closed = false;
    pid = 4242;
    onclose?: () => void;

    constructor(readonly params: unknown) {
      transports.push(this);
    }

    async close() {
      this.closed = true;
      this.onclose?.();
    }
  },
}));

// The handshake only settles when the transport goes away, like a provider
// that never answers `initialize`.
vi.mock('@modelcontextprotocol/sdk/client/index.js', () => ({
  Client: class {
    connect(transport: FakeTransport) {
      return new Promise<void>((_, reject) => {
        transport.onclose = () => reject(new Error('Connection closed'));
      });
    }

    async close() {}
  },
}));

const spec: ResolvedToolProviderSpec = {
  name: 'finance-tool',
  command: 'finance-server',
  args: ['--stdio'],
  env: { QUOTES_API_KEY: '' },
  resolvedEnv: { QUOTES_API_KEY: 'test-secret' },
};

describe('connectStdio', () => {
  beforeEach(() => {
    transports.length = 0;
  });

  it('launches the provider with the resolved env over the default one', () => {
    void connectStdio(spec, new AbortController().signal).catch(() => undefined);

    expect(transports[0].params).toEqual({
      command: 'finance-server',
      args: ['--stdio'],
      env: { PATH: '/usr/bin', QUOTES_API_KEY: 'test-secret' },
      stderr: 'pipe',
    });
  });

  it('closes the transport when the attempt is abandoned', async () => {
    const controller = new AbortController();
    const attempt = connectStdio(spec, controller.signal);

    expect(transports[0].closed).toBe(false);
    controller.abort();

    await expect(attempt).rejects.toBeInstanceOf(ToolConnectError);
    expect(transports[0].closed).toBe(true);
  });

  it('does not launch anything for an already abandoned attempt', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(connectStdio(spec, controller.signal)).rejects.toBeInstanceOf(ToolConnectError);
    expect(transports).toHaveLength(0);
  });
});

describe('convertMCPTools', () => {
  it('keeps string entries of required and defaults the description', () => {
    expect(
      convertMCPTools([{ name: 'quote', inputSchema: { properties: { symbol: { type: 'string' } }, required: ['symbol', 3] } }])
    ).toEqual([
      {
        name: 'quote',
        description: 'quote',
        parameters: { type: 'object', properties: { symbol: { type: 'string' } }, required: ['symbol'] },
      },
    ]);
  });
});
