import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger } from '@nestjs/common';
import { Test, type TestingModule } from '@nestjs/testing';
import type { StructuredToolInterface } from '@langchain/core/tools';
import { TutorAgentService, type TutorInvokeOptions, type TutorRunResult } from '@econ-tutor/agent';
import { ConfigService } from '../config/config.service.js';
import { CoralClientService } from '../coral/coral-client.service.js';
import { TutorLoopService } from './tutor-loop.service.js';

const done: TutorRunResult = { messages: [], finalOutput: 'Answer sent.' };

describe('TutorLoopService', () => {
  let moduleRef: TestingModule;
  let loop: TutorLoopService;
  let env: Record<string, string>;

  const coral = {
    getTools: vi.fn<() => Promise<StructuredToolInterface[]>>(),
  };
  const agent = {
    invoke:
      vi.fn<
        (tools: StructuredToolInterface[], options?: TutorInvokeOptions) => Promise<TutorRunResult>
      >(),
  };

  const compile = async () => {
    moduleRef = await Test.createTestingModule({
      providers: [
        TutorLoopService,
        { provide: ConfigService, useValue: new ConfigService(env) },
        { provide: CoralClientService, useValue: coral },
        { provide: TutorAgentService, useValue: agent },
      ],
    }).compile();
    loop = moduleRef.get(TutorLoopService);
  };

  beforeEach(async () => {
    env = {
      CORAL_SSE_URL: 'http://localhost:5555/sse',
      CORAL_AGENT_ID: 'econ',
      LOOP_DELAY_MS: '0',
      ERROR_BACKOFF_MS: '0',
    };
    coral.getTools.mockReset().mockResolvedValue([]);
    agent.invoke.mockReset();
    await compile();
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('invokes the agent once per iteration until stopped', async () => {
    let calls = 0;
    agent.invoke.mockImplementation(async () => {
      calls += 1;
      if (calls === 3) loop.stop();
      return done;
    });

    await loop.run();

    expect(loop.completedIterations).toBe(3);
    expect(loop.isRunning).toBe(false);
    expect(coral.getTools).toHaveBeenCalledTimes(3);
    expect(agent.invoke).toHaveBeenCalledWith([], {
      timeoutMs: 300_000,
      recursionLimit: 25,
      waitForMentionsTimeoutMs: 30_000,
      signal: expect.any(AbortSignal),
    });
  });

  it('logs a failed iteration and carries on', async () => {
    const errorSpy = vi.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    coral.getTools.mockRejectedValueOnce(new Error('coral down'));
    agent.invoke.mockImplementation(async () => {
      loop.stop();
      return done;
    });

    await loop.run();

    expect(coral.getTools).toHaveBeenCalledTimes(2);
    expect(loop.completedIterations).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('Error in agent loop: coral down', expect.any(String));
  });

  it('treats an error raised by stopping as the end of the loop', async () => {
    const errorSpy = vi.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    agent.invoke.mockImplementation(async () => {
      loop.stop();
      throw new Error('aborted');
    });

    await loop.run();

    expect(loop.completedIterations).toBe(0);
    expect(agent.invoke).toHaveBeenCalledTimes(1);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('refuses to run twice at once', async () => {
    agent.invoke.mockImplementation(
      (_tools, options) =>
        new Promise<TutorRunResult>((_resolve, reject) => {
          const signal = options?.signal;
          if (!signal || signal.aborted) return reject(new Error('aborted'));
          signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        }),
    );

    const running = loop.run();
    expect(loop.isRunning).toBe(true);
    await expect(loop.run()).rejects.toThrow('Tutor loop is already running');

    loop.onApplicationShutdown();
    await running;
    expect(loop.isRunning).toBe(false);
  });

  it('cuts the pause between iterations short when stopped', async () => {
    env.LOOP_DELAY_MS = '60000';
    await moduleRef.close();
    await compile();
    agent.invoke.mockImplementation(async () => {
      setTimeout(() => loop.stop(), 10);
      return done;
    });

    const started = Date.now();
    await loop.run();

    expect(loop.completedIterations).toBe(1);
    expect(Date.now() - started).toBeLessThan(5_000);
  });
});
