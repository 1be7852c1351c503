// Transcription Backend
// Ephemeral realtime credentials and batch transcription, behind one interface

import type {
    StreamSessionRequest,
    StreamSessionResponse,
    TranscribeRequest,
    TranscribeResponse,
} from '@reverie/contracts';
import { TransportError } from '../utils/errors.js';
import type { SupabaseClient } from './supabase.js';

const STREAM_SESSION_FUNCTION = 'transcribe-stream-session';

export interface TranscriptionBackendClient {
    /** Short-lived secret used to authenticate the realtime socket */
    createRealtimeSession(model: string): Promise<string>;
    transcribe(request: TranscribeRequest): Promise<TranscribeResponse>;
}

export class SupabaseTranscriptionBackend implements TranscriptionBackendClient {
    constructor(
        private readonly client: SupabaseClient,
        private readonly transcribeFunction: string
    ) {}

    async createRealtimeSession(model: string): Promise<string> {
        const request: StreamSessionRequest = { model };
        const response = await this.client.invokeFunction<StreamSessionResponse>(STREAM_SESSION_FUNCTION, request);
        return extractClientSecret(response);
    }

    async transcribe(request: TranscribeRequest): Promise<TranscribeResponse> {
        const response = await this.client.invokeFunction<Partial<TranscribeResponse>>(this.transcribeFunction, request);
        return { text: typeof response.text === 'string' ? response.text : '' };
    }
}

/**
 * The relay returns the secret either at the top level or nested under client_secret
 */
export function extractClientSecret(response: StreamSessionResponse): string {
    if (response.value) {
        return response.value;
    }
    if (response.client_secret?.value) {
        return response.client_secret.value;
    }
    throw new TransportError(
        'invalid_session_response',
        'Realtime session setup failed. Missing client secret from relay function.'
    );
}
