import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { tool, type StructuredToolInterface } from '@langchain/core/tools';
import { TUTOR_AGENT_DESCRIPTION } from '@econ-tutor/agent';
import { ConfigService } from '../config/config.service.js';
import { CoralClientService } from './coral-client.service.js';
import type { CoralConnection } from './coral.tokens.js';

const sendMessage = tool(async () => 'sent', {
  name: 'send_message',
  description: 'Send a message to a thread',
  schema: z.object({ threadId: z.string(), content: z.string() }),
});

const config = new ConfigService({
  CORAL_SSE_URL: 'http://localhost:5555/sse',
  CORAL_AGENT_ID: 'econ',
});

const fakeConnector = (loadTools: () => Promise<StructuredToolInterface[]>) => {
  const open = () => ({ getTools: vi.fn(loadTools), close: vi.fn(async () => undefined) });
  const connections: Array<ReturnType<typeof open>> = [];
  const urls: string[] = [];
  const connect = vi.fn((url: string): CoralConnection => {
    urls.push(url);
    const connection = open();
    connections.push(connection);
    return connection;
  });
  return { connect, connections, urls };
};

describe('CoralClientService', () => {
  it('registers with the agent id and description', () => {
    const service = new CoralClientService(config, fakeConnector(async () => []).connect);
    const url = new URL(service.serverUrl);

    expect(`${url.origin}${url.pathname}`).toBe('http://localhost:5555/sse');
    expect(url.searchParams.get('agentId')).toBe('econ');
    expect(url.searchParams.get('agentDescription')).toBe(TUTOR_AGENT_DESCRIPTION);
  });

  it('connects once and reuses the tool list', async () => {
    const fake = fakeConnector(async () => [sendMessage]);
    const service = new CoralClientService(config, fake.connect);

    const first = await service.getTools();
    const second = await service.getTools();

    expect(first.map((t) => t.name)).toEqual(['send_message']);
    expect(second).toBe(first);
    expect(fake.connect).toHaveBeenCalledTimes(1);
    expect(fake.urls).toEqual([service.serverUrl]);
    expect(fake.connections[0].getTools).toHaveBeenCalledTimes(1);
  });

  it('retries a failed tool load on the next call', async () => {
    const loadTools = vi
      .fn<() => Promise<StructuredToolInterface[]>>()
      .mockRejectedValueOnce(new Error('connection refused'))
      .mockResolvedValueOnce([sendMessage]);
    const fake = fakeConnector(loadTools);
    const service = new CoralClientService(config, fake.connect);

    await expect(service.getTools()).rejects.toThrow('connection refused');
    await expect(service.getTools()).resolves.toEqual([sendMessage]);
    expect(loadTools).toHaveBeenCalledTimes(2);
    expect(fake.connect).toHaveBeenCalledTimes(1);
  });

  it('closes the connection on shutdown and reconnects afterwards', async () => {
    const fake = fakeConnector(async () => [sendMessage]);
    const service = new CoralClientService(config, fake.connect);

    await service.onModuleDestroy();
    expect(fake.connect).not.toHaveBeenCalled();

    await service.getTools();
    await service.onModuleDestroy();
    expect(fake.connections[0].close).toHaveBeenCalledTimes(1);

    await service.onModuleDestroy();
    expect(fake.connections[0].close).toHaveBeenCalledTimes(1);

    await service.getTools();
    expect(fake.connect).toHaveBeenCalledTimes(2);
  });
});
