import { Injectable } from '@nestjs/common';
import { z } from 'zod';

const EnvSchema = z.object({
  CORAL_SSE_URL: z.string().url(),
  CORAL_AGENT_ID: z.string().min(1),
  CORAL_ORCHESTRATION_RUNTIME: z.string().optional(),
  TIMEOUT_MS: z.string().optional(),
  WAIT_FOR_MENTIONS_TIMEOUT_MS: z.string().optional(),
  LOOP_DELAY_MS: z.string().optional(),
  ERROR_BACKOFF_MS: z.string().optional(),
  AGENT_RECURSION_LIMIT: z.string().optional(),
});

export type TutorEnv = z.infer<typeof EnvSchema>;

// Positive integer or the fallback
const positiveInt = (raw: string | undefined, fallback: number) => {
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

// Like positiveInt, but 0 is allowed (no pause)
const nonNegativeInt = (raw: string | undefined, fallback: number) => {
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
};

@Injectable()
export class ConfigService {
  readonly env: TutorEnv;

  constructor(source: Record<string, string | undefined> = process.env) {
    this.env = EnvSchema.parse(source);
  }

  get coralSseUrl(): string {
    return this.env.CORAL_SSE_URL;
  }

  get agentId(): string {
    return this.env.CORAL_AGENT_ID;
  }

  // Set by the orchestrator when it launches the agent; .env is skipped then
  get isOrchestrated(): boolean {
    return Boolean(this.env.CORAL_ORCHESTRATION_RUNTIME);
  }

  get invocationTimeoutMs(): number {
    return positiveInt(this.env.TIMEOUT_MS, 300_000);
  }

  get waitForMentionsTimeoutMs(): number {
    return positiveInt(this.env.WAIT_FOR_MENTIONS_TIMEOUT_MS, 30_000);
  }

  get loopDelayMs(): number {
    return nonNegativeInt(this.env.LOOP_DELAY_MS, 1_000);
  }

  get errorBackoffMs(): number {
    return nonNegativeInt(this.env.ERROR_BACKOFF_MS, 5_000);
  }

  get recursionLimit(): number {
    return positiveInt(this.env.AGENT_RECURSION_LIMIT, 25);
  }
}
