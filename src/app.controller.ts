import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from './config/env.validation';
import { DocumentIndex } from './logic/document-index/document-index';
import { errorMessage } from './utils/errors';

export const APP_VERSION = '1.0.0';

@Controller()
export class AppController {
  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly documentIndex: DocumentIndex,
  ) {}

  @Get()
  root() {
    return { message: 'Internal knowledge assistant API', version: APP_VERSION };
  }

  @Get('health')
  async health() {
    let index: string;
    let indexReachable = true;
    try {
      index = `healthy (${await this.documentIndex.count()} fragments)`;
    } catch (err) {
      index = `unavailable: ${errorMessage(err)}`;
      indexReachable = false;
    }
    const generationConfigured = Boolean(this.configService.get('GEMINI_API_KEY', { infer: true }));
    return {
      status: indexReachable && generationConfigured ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      services: {
        auth: 'healthy',
        documentIndex: index,
        generation: generationConfigured ? 'configured' : 'not configured',
      },
    };
  }
}
