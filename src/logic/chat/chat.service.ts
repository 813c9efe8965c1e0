import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { AppConfig } from '../../config/env.validation';
import {
    GenerationFailureReason,
    GenerationUnavailableError,
    InvariantViolationError,
    errorMessage,
} from '../../utils/errors';
import {
    ChatRequest,
    ChatResponse,
    QueryState,
    QueryStatus,
    RetrievalResult,
    Role,
    SourceCitation,
    Turn,
} from '../../utils/types';
import { AccessPolicyService } from '../access-policy/access-policy.service';
import { ChatMemoryService } from '../chat-memory/chat-memory.service';
import { DocumentIndex } from '../document-index/document-index';
import { GenerationService, PromptContext } from '../gemini/generation';
import { GENERATION_UNAVAILABLE_MESSAGE, NO_ACCESSIBLE_CONTENT_MESSAGE, buildPromptContext } from './prompt';
import { ResponseComposerService } from './response-composer.service';

/**
 * Runs one query through resolve → retrieve → merge context → generate →
 * compose → remember. Memory is written only after generation succeeds, so a
 * refused, failed or abandoned query leaves the session untouched.
 *
 * Queries from the same user are not serialized end to end; only their memory
 * operations are. Turns therefore land in the order generation completed.
 */
@Injectable()
export class ChatService {
    private readonly logger = new Logger(ChatService.name);
    private readonly topK: number;
    private readonly timeoutMs: number;
    private readonly charsPerFragment: number;

    constructor(
        configService: ConfigService<AppConfig, true>,
        private readonly accessPolicy: AccessPolicyService,
        private readonly documentIndex: DocumentIndex,
        private readonly memory: ChatMemoryService,
        private readonly generation: GenerationService,
        private readonly composer: ResponseComposerService,
    ) {
        this.topK = configService.get('RETRIEVAL_TOP_K', { infer: true });
        this.timeoutMs = configService.get('GENERATION_TIMEOUT_MS', { infer: true });
        this.charsPerFragment = configService.get('CONTEXT_CHARS_PER_FRAGMENT', { infer: true });
    }

    async chat(request: ChatRequest, signal?: AbortSignal): Promise<ChatResponse> {
        const queryId = uuidv4();
        const trace = (state: QueryState, detail?: string) =>
            this.logger.debug(`[${queryId}] ${state}${detail ? `: ${detail}` : ''}`);

        trace('Received', `user=${request.userId} role=${request.role} query="${request.query}"`);
        const allowed = this.accessPolicy.allowedDepartments(request.role);
        trace('AuthorizedDepartmentsResolved', [...allowed].join(','));

        const retrieved = await this.documentIndex.query(request.query, this.topK, allowed);
        this.assertWithinAllowed(queryId, retrieved, request.role);
        if (retrieved.length === 0) {
            this.logger.warn(`[${queryId}] Refused: nothing accessible to role ${request.role} matches the query`);
            return this.respond(request, 'refused', NO_ACCESSIBLE_CONTENT_MESSAGE, []);
        }
        trace('Retrieved', `${retrieved.length} fragment(s)`);

        const priorTurns = await this.memory.recent(request.userId, request.priorTurnsHint ?? this.memory.windowSize);
        const context = buildPromptContext(request.role, request.query, retrieved, priorTurns, this.charsPerFragment);
        trace('ContextMerged', `${priorTurns.length} prior turn(s)`);

        let completion: string;
        try {
            completion = await this.generate(context, signal);
        } catch (err) {
            const reason = err instanceof GenerationUnavailableError ? err.reason : 'service';
            this.logger.warn(`[${queryId}] Failed (${reason}): ${errorMessage(err)}`);
            return this.respond(request, 'failed', GENERATION_UNAVAILABLE_MESSAGE, []);
        }
        trace('Generated');

        const composed = this.composer.compose(completion, retrieved);
        trace('Composed', `${composed.sources.length} source(s)`);

        const turn: Turn = {
            id: uuidv4(),
            query: request.query,
            answer: composed.answer,
            sources: composed.sources,
            createdAt: new Date(),
        };
        await this.memory.append(request.userId, turn);
        trace('Delivered');

        return this.respond(request, 'answered', composed.answer, composed.sources);
    }

    async history(userId: string): Promise<Turn[]> {
        return this.memory.recent(userId, this.memory.windowSize);
    }

    async clearMemory(userId: string): Promise<boolean> {
        const cleared = await this.memory.clear(userId);
        this.logger.log(cleared ? `Cleared conversation memory for ${userId}` : `No conversation memory found for ${userId}`);
        return cleared;
    }

    private assertWithinAllowed(queryId: string, retrieved: RetrievalResult, role: Role) {
        const leaked = retrieved.find(({ fragment }) => !this.accessPolicy.canAccess(role, fragment.department));
        if (leaked) {
            const error = new InvariantViolationError(
                `retrieval returned fragment ${leaked.fragment.id} from department "${leaked.fragment.department}" outside the allowed set`,
            );
            this.logger.error(`[${queryId}] ${error.message}`);
            throw error;
        }
    }

    // Bounded by GENERATION_TIMEOUT_MS and by the caller's signal, whichever fires first.
    private async generate(context: PromptContext, signal?: AbortSignal): Promise<string> {
        if (signal?.aborted) {
            throw new GenerationUnavailableError('aborted', 'request was abandoned before generation started');
        }

        const controller = new AbortController();
        let stopReason: GenerationFailureReason | undefined;
        const stop = (reason: GenerationFailureReason) => {
            stopReason ??= reason;
            controller.abort();
        };
        const onCallerAbort = () => stop('aborted');
        signal?.addEventListener('abort', onCallerAbort, { once: true });
        const timer = setTimeout(() => stop('timeout'), this.timeoutMs);

        const stopped = new Promise<never>((_, reject) => {
            controller.signal.addEventListener(
                'abort',
                () => reject(this.stoppedError(stopReason ?? 'aborted')),
                { once: true },
            );
        });

        try {
            const text = await Promise.race([this.generation.complete(context, controller.signal), stopped]);
            if (!text.trim()) {
                throw new GenerationUnavailableError('service', 'generation returned an empty completion');
            }
            return text;
        } catch (err) {
            if (err instanceof GenerationUnavailableError) throw err;
            if (stopReason) throw this.stoppedError(stopReason);
            throw new GenerationUnavailableError('service', errorMessage(err));
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onCallerAbort);
        }
    }

    private stoppedError(reason: GenerationFailureReason): GenerationUnavailableError {
        return reason === 'timeout'
            ? new GenerationUnavailableError('timeout', `generation exceeded ${this.timeoutMs}ms`)
            : new GenerationUnavailableError(reason, 'request was abandoned during generation');
    }

    private respond(request: ChatRequest, status: QueryStatus, answer: string, sources: SourceCitation[]): ChatResponse {
        return {
            status,
            answer,
            sources,
            userRole: request.role,
            timestamp: new Date().toISOString(),
            queryProcessed: request.query,
        };
    }
}
