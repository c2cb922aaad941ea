import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module.js';
import { ContentModule } from './content/content.module.js';
import { EngineModule } from './engine/engine.module.js';

@Module({
  imports: [ConfigModule, ContentModule, EngineModule],
})
export class AppModule {}
