import { Module } from '@nestjs/common';
import { AccessPolicyModule } from '../access-policy/access-policy.module';
import { ChatMemoryModule } from '../chat-memory/chat-memory.module';
import { DocumentIndexModule } from '../document-index/document-index.module';
import { GeminiModule } from '../gemini/gemini.module';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';
import { ResponseComposerService } from './response-composer.service';

@Module({
    imports: [
        AccessPolicyModule,
        ChatMemoryModule,
        DocumentIndexModule,
        GeminiModule,
    ],
    controllers: [ChatController],
    providers: [ChatService, ResponseComposerService],
    exports: [ChatService],
})
export class ChatModule {}
