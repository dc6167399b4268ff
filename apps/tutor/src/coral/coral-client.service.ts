import { Inject, Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import { MultiServerMCPClient } from '@langchain/mcp-adapters';
import type { StructuredToolInterface } from '@langchain/core/tools';
import { TUTOR_AGENT_DESCRIPTION } from '@econ-tutor/agent';
import { ConfigService } from '../config/config.service.js';
import { buildCoralServerUrl } from './coral-url.js';
import { CORAL_CONNECTOR, type CoralConnection, type CoralConnector } from './coral.tokens.js';

export const CORAL_SERVER_NAME = 'coral';

/** MCP client over SSE, one server entry named "coral". */
export const connectOverSse: CoralConnector = (serverUrl) =>
  new MultiServerMCPClient({
    throwOnLoadError: true,
    prefixToolNameWithServerName: false,
    additionalToolNamePrefix: '',
    mcpServers: {
      [CORAL_SERVER_NAME]: { transport: 'sse', url: serverUrl },
    },
  });

@Injectable()
export class CoralClientService implements OnModuleDestroy {
  private readonly logger = new Logger(CoralClientService.name);
  private connection: CoralConnection | null = null;
  private tools: Promise<StructuredToolInterface[]> | null = null;

  constructor(
    @Inject(ConfigService) private readonly config: ConfigService,
    @Inject(CORAL_CONNECTOR) private readonly connect: CoralConnector,
  ) {}

  get serverUrl(): string {
    return buildCoralServerUrl(this.config.coralSseUrl, this.config.agentId, TUTOR_AGENT_DESCRIPTION);
  }

  /**
   * Tools exposed by the server; the connection opens on first call.
   * A failed load is not cached, so the next call retries.
   */
  getTools(): Promise<StructuredToolInterface[]> {
    if (!this.tools) {
      this.tools = this.loadTools().catch((err: unknown) => {
        this.tools = null;
        throw err;
      });
    }
    return this.tools;
  }

  async onModuleDestroy(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    this.tools = null;
    if (connection) {
      await connection.close();
      this.logger.log('Coral server connection closed');
    }
  }

  private async loadTools(): Promise<StructuredToolInterface[]> {
    const url = this.serverUrl;
    this.logger.log(`Connecting to Coral server: ${url}`);
    this.connection ??= this.connect(url);
    const tools = await this.connection.getTools();
    this.logger.log(`Coral server connection established; tools count: ${tools.length}`);
    this.logger.debug(`Coral tools: ${tools.map((t) => t.name).join(', ')}`);
    return tools;
  }
}
