// Question Contracts
// Question items, their lifecycle states and the profile that steers them

// ============================================
// QUESTION ITEMS
// ============================================

export type QuestionKind = 'default' | 'follow_up' | 'new_topic';

export type QuestionStatus = 'shown' | 'pending_validation' | 'answered' | 'ignored';

export type QuestionTriggerReason = 'answered' | 'refresh' | 'interval' | 'silence';

export interface QuestionItem {
    readonly id: string;
    readonly text: string;
    readonly coverageTag: string | null;
    readonly kind: QuestionKind;
    readonly status: QuestionStatus;
    /** Epoch milliseconds */
    readonly askedAt: number;
}

export interface QuestionHistoryItem {
    readonly text: string;
    readonly coverageTag: string | null;
    readonly kind: QuestionKind;
    readonly status: QuestionStatus;
}

// ============================================
// PROFILE & CONTEXT
// ============================================

export type Proactivity = 'low' | 'medium' | 'high';

export type Tone = 'gentle' | 'neutral' | 'direct';

export interface QuestionProfile {
    readonly tone: Tone;
    readonly proactivity: Proactivity;
    readonly avoidTopics: readonly string[];
}

export interface RecentSessionContext {
    readonly title: string;
    readonly snippet: string;
}
