import 'reflect-metadata';
import { Logger, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { validateEnv } from '../config/env.validation';
import { IngestionModule } from '../logic/ingestion/ingestion.module';
import { IngestionService } from '../logic/ingestion/ingestion.service';
import { errorMessage } from '../utils/errors';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }), IngestionModule],
})
class SetupDataModule {}

async function main() {
  const logger = new Logger('SetupData');
  const app = await NestFactory.createApplicationContext(SetupDataModule);
  try {
    const report = await app.get(IngestionService).ingestAll();
    logger.log(`Data setup completed: ${report.fragments} fragments from ${report.files} files`);
    if (report.skipped.length > 0) {
      logger.warn(`Skipped folders: ${report.skipped.join(', ')}`);
    }
  } finally {
    await app.close();
  }
}

main().catch(err => {
  new Logger('SetupData').error(`Data setup failed: ${errorMessage(err)}`);
  process.exit(1);
});
