// Event Contracts
// Events the transcription session emits to its host
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only interfaces, types, and enums

import type { QuestionItem } from '../questions/index.js';

// ============================================
// RECORDING EVENTS
// ============================================

export type RecordingState = 'idle' | 'recording' | 'paused';

export interface RecordingStateChangedEvent {
    readonly type: 'recording.state';
    readonly payload: {
        readonly state: RecordingState;
        readonly timestamp: number;
    };
}

// ============================================
// TRANSCRIPTION EVENTS
// ============================================

export interface TranscriptUpdatedEvent {
    readonly type: 'transcript.updated';
    readonly payload: {
        readonly text: string;
        readonly committedLines: readonly string[];
        readonly currentLine: string;
        readonly isFinal: boolean;
        readonly timestamp: number;
    };
}

// ============================================
// QUESTION EVENTS
// ============================================

export interface QuestionChangedEvent {
    readonly type: 'question.changed';
    readonly payload: {
        readonly question: QuestionItem;
        readonly timestamp: number;
    };
}

// ============================================
// ERROR EVENTS
// ============================================

export interface SessionErrorEvent {
    readonly type: 'session.error';
    readonly payload: {
        readonly kind: string;
        readonly message: string;
        readonly fatal: boolean;
        readonly timestamp: number;
    };
}

export type SessionEvent =
    | RecordingStateChangedEvent
    | TranscriptUpdatedEvent
    | QuestionChangedEvent
    | SessionErrorEvent;
