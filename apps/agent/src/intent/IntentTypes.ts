// Intent Types
// Decisions the question engine hands back to the session

import type { QuestionTriggerReason } from '@reverie/contracts';

export interface ValidateAnswerAction {
    type: 'validateAnswer';
    recentText: string;
}

export interface RequestNextQuestionAction {
    type: 'requestNextQuestion';
    reason: QuestionTriggerReason;
    recentText: string;
}

export type QuestionEngineAction = ValidateAnswerAction | RequestNextQuestionAction;

/** Spoken words after a question before an answer is worth validating */
export const MINIMUM_WORDS_FOR_ANSWER = 6;

/** Milliseconds without a transcript update that count as a silence episode */
export const SILENCE_THRESHOLD_MS = 4500;

export const ANSWER_MARKERS: readonly string[] = [
    'because',
    'so',
    'it felt',
    'i felt',
    'i realized',
    'i think',
    'i noticed',
    'i wanted',
    'i decided',
];

export const STOPWORDS: ReadonlySet<string> = new Set([
    'a', 'an', 'the', 'and', 'or', 'but', 'if', 'then', 'this', 'that', 'these', 'those',
    'i', 'you', 'we', 'they', 'he', 'she', 'it', 'me', 'my', 'your', 'our', 'their',
    'to', 'for', 'of', 'in', 'on', 'at', 'with', 'from', 'by', 'about', 'as', 'is', 'are',
    'was', 'were', 'be', 'been', 'being', 'do', 'did', 'does', 'have', 'has', 'had',
    'what', 'why', 'how', 'when', 'where', 'which', 'who', 'whom',
]);
