// Realtime Transcription Wire Types
// JSON text frames exchanged with the realtime transcription socket

// ============================================
// OUTBOUND
// ============================================

export interface SessionUpdateEvent {
    type: 'session.update';
    session: {
        type: 'transcription';
        audio: {
            input: {
                format: {
                    type: 'audio/pcm';
                    rate: number;
                };
                transcription: {
                    model: string;
                };
                turn_detection: {
                    type: 'server_vad';
                    threshold: number;
                    prefix_padding_ms: number;
                    silence_duration_ms: number;
                };
            };
        };
    };
}

export interface InputAudioAppendEvent {
    type: 'input_audio_buffer.append';
    audio: string;
}

export interface InputAudioCommitEvent {
    type: 'input_audio_buffer.commit';
}

export type RealtimeClientEvent =
    | SessionUpdateEvent
    | InputAudioAppendEvent
    | InputAudioCommitEvent;

// ============================================
// INBOUND
// ============================================

export interface InputAudioCommittedEvent {
    type: 'input_audio_buffer.committed';
    item_id?: string;
}

export interface TranscriptionDeltaEvent {
    type: 'conversation.item.input_audio_transcription.delta';
    item_id?: string;
    delta?: string;
}

export interface TranscriptionCompletedEvent {
    type: 'conversation.item.input_audio_transcription.completed';
    item_id?: string;
    transcript?: string;
}

export interface RealtimeErrorEvent {
    type: 'error';
    error?: {
        message?: string;
        code?: string;
    };
}

export type RealtimeServerEvent =
    | InputAudioCommittedEvent
    | TranscriptionDeltaEvent
    | TranscriptionCompletedEvent
    | RealtimeErrorEvent;
