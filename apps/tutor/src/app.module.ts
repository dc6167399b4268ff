import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module.js';
import { TutorModule } from './tutor/tutor.module.js';

@Module({
  imports: [ConfigModule, TutorModule.forRoot()],
})
export class AppModule {}
