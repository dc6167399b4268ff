import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module.js';
import { CoralClientService, connectOverSse } from './coral-client.service.js';
import { CORAL_CONNECTOR } from './coral.tokens.js';

@Module({
  imports: [ConfigModule],
  providers: [{ provide: CORAL_CONNECTOR, useValue: connectOverSse }, CoralClientService],
  exports: [CoralClientService],
})
export class CoralModule {}
