import { Module } from '@nestjs/common';
import { ChatMemoryService, SESSION_STORE, SessionStore } from './chat-memory.service';

@Module({
    exports: [ChatMemoryService],
    providers: [
        ChatMemoryService,
        { provide: SESSION_STORE, useFactory: (): SessionStore => new Map() },
    ],
})
export class ChatMemoryModule {}
