import { Body, Controller, Delete, Get, HttpCode, Post, Request, Res, ServiceUnavailableException, UseGuards } from '@nestjs/common';
import { AuthUser, ChatResponse, Turn } from '../../utils/types';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { ChatService } from './chat.service';
import { ChatQueryDto } from './dto/chat.dto';

// the part of the HTTP response used to notice a client disconnect
export interface ClosableResponse {
    readonly writableEnded: boolean;
    on(event: 'close', listener: () => void): unknown;
    off(event: 'close', listener: () => void): unknown;
}

@Controller('chat')
@UseGuards(JwtAuthGuard)
export class ChatController {

    constructor(private readonly chatService: ChatService) {}

    @Post()
    @HttpCode(200)
    async chat(
        @Request() req: { user: AuthUser },
        @Body() body: ChatQueryDto,
        @Res({ passthrough: true }) res: ClosableResponse,
    ): Promise<ChatResponse> {
        const controller = new AbortController();
        // client went away before we answered
        const onClose = () => {
            if (!res.writableEnded) controller.abort();
        };
        res.on('close', onClose);
        try {
            const response = await this.chatService.chat(
                { userId: req.user.userId, role: req.user.role, query: body.query, priorTurnsHint: body.priorTurnsHint },
                controller.signal,
            );
            if (response.status === 'failed') {
                throw new ServiceUnavailableException(response.answer);
            }
            return response;
        } finally {
            res.off('close', onClose);
        }
    }

    @Get('history')
    async history(@Request() req: { user: AuthUser }): Promise<{ turns: Turn[] }> {
        return { turns: await this.chatService.history(req.user.userId) };
    }

    @Delete('memory')
    async clearMemory(@Request() req: { user: AuthUser }): Promise<{ message: string }> {
        const cleared = await this.chatService.clearMemory(req.user.userId);
        return { message: cleared ? 'Conversation memory cleared' : 'No conversation memory to clear' };
    }
}
