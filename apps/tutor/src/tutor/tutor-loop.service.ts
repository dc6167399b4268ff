import { Inject, Injectable, Logger, type OnApplicationShutdown } from '@nestjs/common';
import { TutorAgentService } from '@econ-tutor/agent';
import { ConfigService } from '../config/config.service.js';
import { CoralClientService } from '../coral/coral-client.service.js';

/**
 * Sequential receive → solve → reply loop.
 * One agent invocation at a time; errors are logged and followed by a back-off.
 */
@Injectable()
export class TutorLoopService implements OnApplicationShutdown {
  private readonly logger = new Logger(TutorLoopService.name);
  private readonly controller = new AbortController();
  private running = false;
  private iterations = 0;

  constructor(
    @Inject(ConfigService) private readonly config: ConfigService,
    @Inject(CoralClientService) private readonly coral: CoralClientService,
    @Inject(TutorAgentService) private readonly agent: TutorAgentService,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  get completedIterations(): number {
    return this.iterations;
  }

  async run(): Promise<void> {
    if (this.running) throw new Error('Tutor loop is already running');
    this.running = true;
    const { signal } = this.controller;

    try {
      while (!signal.aborted) {
        try {
          const coralTools = await this.coral.getTools();
          this.logger.log('Starting new agent invocation');
          const { finalOutput } = await this.agent.invoke(coralTools, {
            timeoutMs: this.config.invocationTimeoutMs,
            recursionLimit: this.config.recursionLimit,
            waitForMentionsTimeoutMs: this.config.waitForMentionsTimeoutMs,
            signal,
          });
          this.iterations += 1;
          this.logger.log('Completed agent invocation, restarting loop');
          if (finalOutput) this.logger.debug(`Final answer: ${finalOutput}`);
          await this.pause(this.config.loopDelayMs);
        } catch (err) {
          if (signal.aborted) break;
          const message = err instanceof Error ? err.message : String(err);
          this.logger.error(
            `Error in agent loop: ${message}`,
            err instanceof Error ? err.stack : undefined,
          );
          await this.pause(this.config.errorBackoffMs);
        }
      }
    } finally {
      this.running = false;
      this.logger.log('Tutor loop stopped');
    }
  }

  /** Ends the loop for good; an in-flight invocation or pause is cut short. */
  stop(): void {
    this.controller.abort();
  }

  onApplicationShutdown(): void {
    this.stop();
  }

  private pause(ms: number): Promise<void> {
    const { signal } = this.controller;
    if (ms <= 0 || signal.aborted) return Promise.resolve();
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        signal.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal.addEventListener('abort', done, { once: true });
    });
  }
}
