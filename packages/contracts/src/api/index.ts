// API Contracts
// Request/response shapes for the backend functions and the REST tables
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only DTOs and request/response shapes

import type {
    Proactivity,
    QuestionHistoryItem,
    QuestionKind,
    QuestionProfile,
    QuestionStatus,
    RecentSessionContext,
    Tone,
} from '../questions/index.js';

// ============================================
// QUESTION GENERATION
// ============================================

export type QuestionRequestMode = 'validate' | 'next';

export interface QuestionRequest {
    mode: QuestionRequestMode;
    draftText: string;
    recentText: string;
    lastQuestion: string | null;
    questionHistory: QuestionHistoryItem[];
    profile: QuestionProfile;
    recentSessions: RecentSessionContext[];
    preferredKind: QuestionKind | null;
}

export interface QuestionPayload {
    text: string;
    coverageTag?: string | null;
    kind?: QuestionKind | null;
}

export interface QuestionResponse {
    answered?: boolean;
    answerConfidence?: number;
    nextQuestion?: QuestionPayload | null;
    reason?: string;
    fallbackUsed?: boolean;
}

// ============================================
// TRANSCRIPTION
// ============================================

export interface TranscribeRequest {
    audioBase64: string;
    mimeType: string;
    fileName: string;
    prompt?: string;
}

export interface TranscribeResponse {
    text: string;
}

export interface StreamSessionRequest {
    model: string;
}

export interface StreamSessionResponse {
    value?: string;
    expires_at?: number;
    client_secret?: {
        value: string;
        expires_at?: number;
    };
}

// ============================================
// PERSISTENCE ROWS
// ============================================

export type JournalSessionStatus = 'draft' | 'completed';

export interface JournalSessionRow {
    id: string;
    user_id: string;
    status: JournalSessionStatus;
    mode: 'voice' | 'text';
    title: string | null;
    final_text: string | null;
    duration_seconds: number | null;
    started_at: string;
    ended_at: string | null;
}

export interface NewSessionQuestion {
    id: string;
    sessionId: string;
    createdAt: number;
    question: string;
    coverageTag: string | null;
    status: QuestionStatus;
    answeredText: string | null;
}

export interface ProfileRow {
    user_id: string;
    tone: Tone | null;
    proactivity: Proactivity | null;
    avoid_topics: string | null;
}
