import type { StructuredToolInterface } from '@langchain/core/tools';

export const CORAL_CONNECTOR = Symbol('CORAL_CONNECTOR');

/** An open MCP session with the orchestration server. */
export interface CoralConnection {
  getTools(): Promise<StructuredToolInterface[]>;
  close(): Promise<void>;
}

export type CoralConnector = (serverUrl: string) => CoralConnection;
