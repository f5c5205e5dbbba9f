import type { Logger } from 'pino';
import { describe, expect, test, vi, type Mock } from 'vitest';

import { GatewayError } from '../../src/errors.js';
import { buildDispatcher, type OutboundEnvelope } from '../../src/mcp/dispatcher.js';
import { OpenShockClient, type DownstreamResult, type ShockerController } from '../../src/openshock/client.js';
import type { DownstreamCommand } from '../../src/openshock/commands.js';
import { SafetyClamp } from '../../src/safety/safetyClamp.js';

function makeLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  } as unknown as Logger;
}

type SendFn = (commands: readonly DownstreamCommand[], label: string) => Promise<DownstreamResult>;

interface Harness {
  dispatch: (body: unknown) => Promise<OutboundEnvelope>;
  send: Mock<SendFn>;
}

function createHarness(
  options: {
    maxShockIntensity?: number;
    send?: SendFn;
  } = {}
): Harness {
  const send = vi.fn<SendFn>(
    options.send ?? (async () => ({ ok: true, status: 200, body: { message: 'ok' } }))
  );
  const client: ShockerController = { send };

  const dispatcher = buildDispatcher({
    config: {
      serverName: 'openshock-mcp-server',
      serverVersion: '1.0.0'
    },
    logger: makeLogger(),
    client,
    clamp: new SafetyClamp(options.maxShockIntensity ?? 0)
  });

  return {
    dispatch: (body) => dispatcher.dispatch(body),
    send
  };
}

function callTool(name: string, shockers: unknown, id: string | number | null = 1) {
  return {
    jsonrpc: '2.0',
    method: 'tools/call',
    params: {
      name,
      arguments: { shockers }
    },
    id
  };
}

function resultOf(envelope: OutboundEnvelope): Record<string, unknown> {
  if (!('result' in envelope)) {
    throw new Error(`expected a result envelope, got error ${envelope.error.code}: ${envelope.error.message}`);
  }
  return envelope.result;
}

function textOf(envelope: OutboundEnvelope): string {
  const content = resultOf(envelope).content as Array<{ type: string; text: string }>;
  expect(content).toHaveLength(1);
  expect(content[0]?.type).toBe('text');
  return content[0]?.text ?? '';
}

describe('buildDispatcher initialize and tools/list', () => {
  test('initialize returns the fixed capability descriptor', async () => {
    const harness = createHarness();

    await expect(harness.dispatch({ jsonrpc: '2.0', method: 'initialize', params: {}, id: 1 })).resolves.toEqual({
      jsonrpc: '2.0',
      result: {
        protocolVersion: '2024-11-05',
        capabilities: {
          tools: {
            listChanged: false
          }
        },
        serverInfo: {
          name: 'openshock-mcp-server',
          version: '1.0.0'
        }
      },
      id: 1
    });
  });

  test('tools/list reports the current SHOCK ceiling', async () => {
    const harness = createHarness({ maxShockIntensity: 35 });

    const result = resultOf(await harness.dispatch({ method: 'tools/list', id: 'list-1' }));
    const tools = result.tools as Array<{
      name: string;
      description: string;
      inputSchema: { properties: { shockers: { items: { properties: { intensity: { maximum: number } } } } } };
    }>;

    expect(tools.map((tool) => tool.name)).toEqual(['SHOCK', 'VIBRATE', 'BEEP', 'STOP']);
    expect(tools[0]?.description).toContain('max intensity 35');
    expect(tools[0]?.inputSchema.properties.shockers.items.properties.intensity.maximum).toBe(35);
  });

  test('tools/list uses 100 as the ceiling when unlimited', async () => {
    const harness = createHarness({ maxShockIntensity: 0 });

    const result = resultOf(await harness.dispatch({ method: 'tools/list', id: 2 }));
    const tools = result.tools as Array<{ description: string }>;

    expect(tools[0]?.description).toBe('Send shock command to OpenShock devices (max intensity 100)');
  });
});

describe('buildDispatcher tools/call', () => {
  test('clamps SHOCK intensity and reports the adjustment', async () => {
    const harness = createHarness({ maxShockIntensity: 50 });

    const envelope = await harness.dispatch(callTool('SHOCK', [{ id: 'x', intensity: 90, duration: 1000 }]));

    expect(harness.send).toHaveBeenCalledTimes(1);
    expect(harness.send).toHaveBeenCalledWith([{ id: 'x', type: 1, intensity: 50, duration: 1000 }], 'MCP-SHOCK');
    expect(textOf(envelope)).toBe(
      [
        'Successfully executed SHOCK command on 1 shocker(s).',
        '',
        'Security adjustments applied (max shock intensity 50):',
        '- x: intensity reduced from 90 to 50',
        '',
        'Response: {',
        '  "message": "ok"',
        '}'
      ].join('\n')
    );
    expect(resultOf(envelope).structuredContent).toEqual({
      result: {
        tool: 'SHOCK',
        shockerCount: 1,
        commands: [{ id: 'x', type: 1, intensity: 50, duration: 1000 }],
        adjustments: [{ targetId: 'x', requested: 90, applied: 50 }],
        response: { message: 'ok' }
      }
    });
  });

  test('passes VIBRATE intensity through without an adjustment block', async () => {
    const harness = createHarness({ maxShockIntensity: 0 });

    const envelope = await harness.dispatch(callTool('VIBRATE', [{ id: 'y', intensity: 90, duration: 1000 }]));

    expect(harness.send).toHaveBeenCalledWith([{ id: 'y', type: 2, intensity: 90, duration: 1000 }], 'MCP-VIBRATE');
    const text = textOf(envelope);
    expect(text).toBe('Successfully executed VIBRATE command on 1 shocker(s).\n\nResponse: {\n  "message": "ok"\n}');
    expect(text).not.toContain('Security adjustments');
  });

  test('sends STOP with fixed intensity and duration', async () => {
    const harness = createHarness({ maxShockIntensity: 10 });

    await harness.dispatch(callTool('STOP', [{ id: 'z', intensity: 99, duration: 5000 }]));

    expect(harness.send).toHaveBeenCalledWith([{ id: 'z', type: 0, intensity: 0, duration: 300 }], 'MCP-STOP');
  });

  test('rejects an unknown tool with the internal-error code', async () => {
    const harness = createHarness();

    await expect(harness.dispatch(callTool('LASER', [{ id: 'x' }], 7))).resolves.toEqual({
      jsonrpc: '2.0',
      error: {
        code: -32603,
        message: 'Internal error: Unknown tool: LASER'
      },
      id: 7
    });
    expect(harness.send).not.toHaveBeenCalled();
  });

  test('tool names are matched exactly', async () => {
    const harness = createHarness();

    const envelope = await harness.dispatch(callTool('shock', [{ id: 'x', intensity: 10, duration: 300 }]));

    expect(envelope).toEqual({
      jsonrpc: '2.0',
      error: { code: -32603, message: 'Internal error: Unknown tool: shock' },
      id: 1
    });
  });

  test('requires the shockers argument', async () => {
    const harness = createHarness();

    const envelope = await harness.dispatch({
      jsonrpc: '2.0',
      method: 'tools/call',
      params: { name: 'BEEP', arguments: {} },
      id: 3
    });

    expect(envelope).toEqual({
      jsonrpc: '2.0',
      error: { code: -32603, message: "Internal error: Missing 'shockers' parameter" },
      id: 3
    });
  });

  test('treats missing arguments like missing shockers', async () => {
    const harness = createHarness();

    const envelope = await harness.dispatch({ method: 'tools/call', params: { name: 'STOP' }, id: 4 });

    expect(envelope).toEqual({
      jsonrpc: '2.0',
      error: { code: -32603, message: "Internal error: Missing 'shockers' parameter" },
      id: 4
    });
  });

  test('requires shockers to be an array', async () => {
    const harness = createHarness();

    const envelope = await harness.dispatch(callTool('STOP', { id: 'x' }));

    expect(envelope).toEqual({
      jsonrpc: '2.0',
      error: { code: -32603, message: "Internal error: 'shockers' must be an array" },
      id: 1
    });
  });

  test('issues no downstream call when any target is invalid', async () => {
    const harness = createHarness();

    const envelope = await harness.dispatch(
      callTool('SHOCK', [
        { id: 'a', intensity: 10, duration: 1000 },
        { id: 'b', intensity: 10, duration: 100 }
      ])
    );

    expect(envelope).toEqual({
      jsonrpc: '2.0',
      error: { code: -32603, message: 'Internal error: Shocker b: duration must be at least 300 (got 100)' },
      id: 1
    });
    expect(harness.send).not.toHaveBeenCalled();
  });

  test('reports a downstream rejection as a tool error result', async () => {
    const harness = createHarness({
      send: async () => ({
        ok: false,
        status: 404,
        statusText: 'Not Found',
        body: '{"message":"Shocker not found"}'
      })
    });

    const envelope = await harness.dispatch(callTool('SHOCK', [{ id: 'x', intensity: 10, duration: 1000 }]));
    const result = resultOf(envelope);

    expect(result.isError).toBe(true);
    expect(textOf(envelope)).toBe(
      'Error executing SHOCK command: HTTP 404 Not Found: {"message":"Shocker not found"}'
    );
    expect(result.structuredContent).toEqual({
      error: {
        code: 'DOWNSTREAM_ERROR',
        message: 'HTTP 404 Not Found: {"message":"Shocker not found"}',
        statusCode: 404,
        retryable: false,
        fixHint: expect.any(String)
      }
    });
  });

  test('maps downstream 401 to an AUTH tool error', async () => {
    const harness = createHarness({
      send: async () => ({ ok: false, status: 401, statusText: 'Unauthorized', body: '' })
    });

    const envelope = await harness.dispatch(callTool('BEEP', [{ id: 'x', duration: 1000 }]));

    expect(textOf(envelope)).toBe('Error executing BEEP command: HTTP 401 Unauthorized');
    expect(resultOf(envelope).structuredContent).toMatchObject({
      error: { code: 'AUTH', statusCode: 401, retryable: false }
    });
  });

  test('reports transport failures as a tool error result', async () => {
    const harness = createHarness({
      send: async () => {
        throw new GatewayError('NETWORK', 'Network failure for /2/shockers/control');
      }
    });

    const envelope = await harness.dispatch(callTool('VIBRATE', [{ id: 'x', intensity: 10, duration: 1000 }]));

    expect(resultOf(envelope).isError).toBe(true);
    expect(textOf(envelope)).toBe('Error executing VIBRATE command: Network failure for /2/shockers/control');
    expect(resultOf(envelope).structuredContent).toMatchObject({
      error: { code: 'NETWORK', retryable: true }
    });
  });

  test('reports a response body that fails mid-read as a tool error result', async () => {
    const fetchImpl = vi.fn(async () => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"a":'));
          controller.error(new TypeError('terminated'));
        }
      });
      return new Response(body, { status: 200 });
    });
    const client = new OpenShockClient({
      baseUrl: 'https://api.openshock.app',
      apiToken: 'test-openshock-token',
      timeoutMs: 5_000,
      userAgent: 'openshock-mcp-server/1.0.0',
      logger: makeLogger(),
      fetchImpl: fetchImpl as unknown as typeof fetch
    });
    const harness = createHarness({ send: (commands, label) => client.send(commands, label) });

    const envelope = await harness.dispatch(callTool('STOP', [{ id: 'x' }]));

    expect(envelope.id).toBe(1);
    expect(resultOf(envelope).isError).toBe(true);
    expect(textOf(envelope)).toBe('Error executing STOP command: Network failure for /2/shockers/control: terminated');
    expect(resultOf(envelope).structuredContent).toMatchObject({
      error: { code: 'NETWORK', retryable: true }
    });
  });

  test('turns unexpected faults into an internal error envelope', async () => {
    const harness = createHarness({
      send: async () => {
        throw new Error('boom');
      }
    });

    const envelope = await harness.dispatch(callTool('VIBRATE', [{ id: 'x', intensity: 10, duration: 1000 }], 'req-9'));

    expect(envelope).toEqual({
      jsonrpc: '2.0',
      error: { code: -32603, message: 'Internal error: boom' },
      id: 'req-9'
    });
  });
});

describe('buildDispatcher envelope handling', () => {
  test('unknown methods yield method-not-found', async () => {
    const harness = createHarness();

    await expect(harness.dispatch({ jsonrpc: '2.0', method: 'resources/list', id: 5 })).resolves.toEqual({
      jsonrpc: '2.0',
      error: { code: -32601, message: 'Method not found: resources/list' },
      id: 5
    });
  });

  test('echoes a null id and treats a missing id as null', async () => {
    const harness = createHarness();

    const explicitNull = await harness.dispatch({ method: 'initialize', id: null });
    const missing = await harness.dispatch({ method: 'initialize' });

    expect(explicitNull.id).toBeNull();
    expect(missing.id).toBeNull();
    expect('id' in missing).toBe(true);
  });

  test.each([[null], ['initialize'], [[1, 2]], [{ id: 3 }], [{ method: 42, id: 3 }], [{ method: 'initialize', params: [], id: 3 }]])(
    'rejects malformed envelope %j',
    async (body) => {
      const harness = createHarness();

      const envelope = await harness.dispatch(body);

      expect(envelope).toEqual({
        jsonrpc: '2.0',
        error: { code: -32600, message: 'Invalid Request' },
        id: typeof body === 'object' && body !== null && !Array.isArray(body) ? 3 : null
      });
    }
  );
});
