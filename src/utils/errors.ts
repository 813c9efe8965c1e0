/**
 * Programming errors: unknown role, malformed department tag, a retrieval
 * result outside the caller's allowed departments, out-of-order turns.
 * Never turned into a normal response.
 */
export class InvariantViolationError extends Error {
    constructor(message: string) {
        super(`Invariant violation: ${message}`);
        this.name = 'InvariantViolationError';
    }
}

export type GenerationFailureReason = 'timeout' | 'aborted' | 'service';

export class GenerationUnavailableError extends Error {
    constructor(readonly reason: GenerationFailureReason, message: string) {
        super(message);
        this.name = 'GenerationUnavailableError';
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
