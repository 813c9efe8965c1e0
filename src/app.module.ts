import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AppController } from './app.controller';
import { AppConfig, validateEnv } from './config/env.validation';
import { User } from './entities';
import { AccessPolicyModule } from './logic/access-policy/access-policy.module';
import { AuthModule } from './logic/auth/auth.module';
import { ChatModule } from './logic/chat/chat.module';
import { DocumentIndexModule } from './logic/document-index/document-index.module';
import { IngestionModule } from './logic/ingestion/ingestion.module';

@Module({
  imports: [
    ScheduleModule.forRoot(),
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    TypeOrmModule.forRootAsync({
      useFactory: (configService: ConfigService<AppConfig, true>) => ({
        type: 'mysql',
        host: configService.get('DB_HOST', { infer: true }),
        port: configService.get('DB_PORT', { infer: true }),
        username: configService.get('DB_USERNAME', { infer: true }),
        password: configService.get('DB_PASSWORD', { infer: true }),
        database: configService.get('DB_DATABASE', { infer: true }),
        entities: [User],
        synchronize: true,
        logging: configService.get('NODE_ENV', { infer: true }) === 'development',
      }),
      inject: [ConfigService],
    }),
    AccessPolicyModule,
    AuthModule,
    DocumentIndexModule,
    ChatModule,
    IngestionModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
