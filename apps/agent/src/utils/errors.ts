// Agent Error Utilities
// Typed transcription errors, retry logic and error handling helpers

// ============================================
// ERROR TAXONOMY
// ============================================

export type TranscriptionErrorKind =
    | 'configuration'
    | 'permission'
    | 'device'
    | 'transport'
    | 'payload'
    | 'persistence';

/**
 * Base transcription error with a taxonomy kind and a stable code
 */
export class TranscriptionError extends Error {
    public readonly kind: TranscriptionErrorKind;
    public readonly code: string;
    public readonly isFatal: boolean;
    public readonly context?: Record<string, unknown>;

    constructor(
        message: string,
        kind: TranscriptionErrorKind,
        code: string,
        isFatal: boolean = false,
        context?: Record<string, unknown>
    ) {
        super(message);
        this.kind = kind;
        this.code = code;
        this.isFatal = isFatal;
        this.context = context;
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ConfigurationError extends TranscriptionError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'configuration', 'CONFIGURATION_MISSING', true, context);
    }
}

export class PermissionDeniedError extends TranscriptionError {
    constructor(message: string = 'Microphone and speech recognition permissions are required to record.') {
        super(message, 'permission', 'PERMISSION_DENIED', true);
    }
}

export class DeviceUnavailableError extends TranscriptionError {
    public readonly route?: string;

    constructor(message: string, route?: string) {
        super(route ? `${message} route=${route}.` : message, 'device', 'DEVICE_UNAVAILABLE', true, { route });
        this.route = route;
    }
}

export class TransportError extends TranscriptionError {
    public readonly reason: string;

    constructor(reason: string, message: string, cause?: unknown) {
        super(message, 'transport', 'TRANSPORT_FAILURE', false, { reason, cause: errorMessage(cause) });
        this.reason = reason;
    }
}

export class PayloadError extends TranscriptionError {
    constructor(message: string, byteLength?: number) {
        super(message, 'payload', 'PAYLOAD_TOO_LARGE', false, { byteLength });
    }
}

export class PersistenceError extends TranscriptionError {
    constructor(operation: string, cause: unknown) {
        super(`Could not ${operation}: ${errorMessage(cause)}`, 'persistence', 'PERSISTENCE_FAILURE', false, {
            operation,
        });
    }
}

export class EmptyTranscriptError extends TranscriptionError {
    constructor() {
        super('Record something before saving.', 'payload', 'EMPTY_TRANSCRIPT', false);
    }
}

/**
 * Non-2xx response from a backend function or REST endpoint
 */
export class BackendHttpError extends Error {
    public readonly status: number;
    public readonly body: string;

    constructor(target: string, status: number, body: string) {
        super(`${target} failed (HTTP ${status}). ${body}`.trim());
        this.name = 'BackendHttpError';
        this.status = status;
        this.body = body;
    }
}

// ============================================
// HELPERS
// ============================================

/**
 * Retry options for async operations
 */
export interface RetryOptions {
    maxAttempts?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    backoffMultiplier?: number;
    onRetry?: (error: unknown, attempt: number) => void;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry'>> = {
    maxAttempts: 3,
    initialDelayMs: 500,
    maxDelayMs: 5000,
    backoffMultiplier: 2,
};

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Wrap an async function with retry logic
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    let lastError: unknown;

    for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
        try {
            return await fn();
        } catch (error) {
            lastError = error;

            if (attempt >= opts.maxAttempts) {
                break;
            }

            const delay = Math.min(
                opts.initialDelayMs * Math.pow(opts.backoffMultiplier, attempt - 1),
                opts.maxDelayMs
            );

            if (options.onRetry) {
                options.onRetry(error, attempt);
            }

            await sleep(delay);
        }
    }

    throw lastError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Log error with context prefix
 */
export function logError(error: unknown, context: string): void {
    console.error(`[${context}] Error: ${errorMessage(error)}`);
}
