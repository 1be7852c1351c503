// Journal Repository
// Durable sink for sessions and asked questions (journal_sessions, session_questions)

import type {
    JournalSessionRow,
    NewSessionQuestion,
    ProfileRow,
    QuestionProfile,
    QuestionStatus,
    RecentSessionContext,
} from '@reverie/contracts';
import type { SupabaseClient } from './supabase.js';

const RECENT_SNIPPET_LENGTH = 280;

export interface CompleteSessionInput {
    sessionId: string;
    transcript: string;
    durationSeconds: number | null;
    startedAt: number;
    endedAt: number;
}

export interface JournalRepository {
    startSession(userId: string, startedAt: number): Promise<string>;
    completeSession(input: CompleteSessionInput): Promise<void>;
    deleteSession(sessionId: string): Promise<void>;
    insertQuestion(question: NewSessionQuestion): Promise<void>;
    updateQuestion(questionId: string, status: QuestionStatus, answeredText: string | null): Promise<void>;
    fetchProfile(userId: string): Promise<QuestionProfile | null>;
    fetchRecentSessions(userId: string): Promise<RecentSessionContext[]>;
}

export const EMPTY_PROFILE: QuestionProfile = {
    tone: 'neutral',
    proactivity: 'medium',
    avoidTopics: [],
};

/**
 * Comma separated avoid-topics column to a clean list
 */
export function parseAvoidTopics(raw: string | null | undefined): string[] {
    return (raw ?? '')
        .split(',')
        .map(topic => topic.trim())
        .filter(topic => topic.length > 0);
}

export class SupabaseJournalRepository implements JournalRepository {
    constructor(private readonly client: SupabaseClient) {}

    async startSession(userId: string, startedAt: number): Promise<string> {
        const rows = await this.client.rest<JournalSessionRow[]>('journal_sessions', 'POST', {
            body: {
                user_id: userId,
                status: 'draft',
                mode: 'voice',
                started_at: new Date(startedAt).toISOString(),
            },
            returnData: true,
        });
        const row = rows?.[0];
        if (!row) {
            throw new Error('journal_sessions insert returned no row');
        }
        return row.id;
    }

    async completeSession(input: CompleteSessionInput): Promise<void> {
        await this.client.rest('journal_sessions', 'PATCH', {
            query: `id=eq.${encodeURIComponent(input.sessionId)}`,
            body: {
                status: 'completed',
                final_text: input.transcript,
                duration_seconds: input.durationSeconds,
                started_at: new Date(input.startedAt).toISOString(),
                ended_at: new Date(input.endedAt).toISOString(),
            },
        });
    }

    async deleteSession(sessionId: string): Promise<void> {
        await this.client.rest('journal_sessions', 'DELETE', {
            query: `id=eq.${encodeURIComponent(sessionId)}`,
        });
    }

    async insertQuestion(question: NewSessionQuestion): Promise<void> {
        await this.client.rest('session_questions', 'POST', {
            body: {
                id: question.id,
                session_id: question.sessionId,
                created_at: new Date(question.createdAt).toISOString(),
                question: question.question,
                coverage_tag: question.coverageTag,
                status: question.status,
                answered_text: question.answeredText,
            },
        });
    }

    async updateQuestion(questionId: string, status: QuestionStatus, answeredText: string | null): Promise<void> {
        await this.client.rest('session_questions', 'PATCH', {
            query: `id=eq.${encodeURIComponent(questionId)}`,
            body: { status, answered_text: answeredText },
        });
    }

    async fetchProfile(userId: string): Promise<QuestionProfile | null> {
        const rows = await this.client.rest<ProfileRow[]>('profiles', 'GET', {
            query: `user_id=eq.${encodeURIComponent(userId)}&select=user_id,tone,proactivity,avoid_topics`,
            returnData: true,
        });
        const row = rows?.[0];
        if (!row) return null;
        return {
            tone: row.tone ?? EMPTY_PROFILE.tone,
            proactivity: row.proactivity ?? EMPTY_PROFILE.proactivity,
            avoidTopics: parseAvoidTopics(row.avoid_topics),
        };
    }

    async fetchRecentSessions(userId: string): Promise<RecentSessionContext[]> {
        const rows = await this.client.rest<JournalSessionRow[]>('journal_sessions', 'GET', {
            query: `user_id=eq.${encodeURIComponent(userId)}&status=eq.completed&order=started_at.desc&limit=5`,
            returnData: true,
        });
        return (rows ?? []).map(row => ({
            title: row.title ?? '',
            snippet: (row.final_text ?? '').slice(0, RECENT_SNIPPET_LENGTH),
        }));
    }
}
