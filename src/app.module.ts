import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AppController } from './app.controller';
import { triageConfig } from './config/triage.config';
import { KnowledgeChunkEntity } from './entities';
import { ChatModule } from './logic/chat/chat.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [triageConfig] }),
    TypeOrmModule.forRootAsync({
      inject: [triageConfig.KEY],
      useFactory: (config: ConfigType<typeof triageConfig>) => {
        mkdirSync(dirname(config.indexPath), { recursive: true });
        return {
          type: 'better-sqlite3',
          database: config.indexPath,
          entities: [KnowledgeChunkEntity],
          synchronize: true,
        };
      },
    }),
    ChatModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
