// Question Engine
// Decides from transcript updates and timing when to validate an answer or ask again

import type { Proactivity, QuestionItem, QuestionKind, QuestionStatus, QuestionTriggerReason } from '@reverie/contracts';
import { countWords, endsWithTerminalPunctuation } from '../transcription/transcriptText.js';
import {
    ANSWER_MARKERS,
    MINIMUM_WORDS_FOR_ANSWER,
    SILENCE_THRESHOLD_MS,
    STOPWORDS,
} from './IntentTypes.js';
import type { QuestionEngineAction } from './IntentTypes.js';

const MIN_INTERVAL_MS: Record<Proactivity, number> = {
    low: 45000,
    medium: 30000,
    high: 20000,
};

const ALLOWED_TRANSITIONS: Record<QuestionStatus, readonly QuestionStatus[]> = {
    shown: ['pending_validation', 'ignored'],
    pending_validation: ['answered', 'shown'],
    answered: [],
    ignored: [],
};

/** Questions in these states are settled or waiting on the service */
const BLOCKING_STATUSES: ReadonlySet<QuestionStatus> = new Set(['pending_validation', 'answered', 'ignored']);

export function minIntervalMs(proactivity: Proactivity): number {
    return MIN_INTERVAL_MS[proactivity];
}

/**
 * Content words of a question: letters-only tokens longer than two characters
 */
export function extractKeywords(question: string): string[] {
    return question
        .toLowerCase()
        .split(/[^\p{L}]+/u)
        .filter(token => token.length > 2 && !STOPWORDS.has(token));
}

export function canTransition(from: QuestionStatus, to: QuestionStatus): boolean {
    return from === to || ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Pure policy object. Holds the current question, the ask history and the
 * timing marks; performs no I/O.
 */
export class QuestionEngine {
    private _currentQuestion: QuestionItem | null = null;
    private history: QuestionItem[] = [];
    private lastQuestionAskedAt: number | null = null;
    private lastTranscriptUpdateAt: number | null = null;
    private lastSilenceTriggerAt: number | null = null;
    private lastProcessedSentence: string | null = null;
    private wordCountAtQuestion = 0;

    get currentQuestion(): QuestionItem | null {
        return this._currentQuestion;
    }

    get questionHistory(): readonly QuestionItem[] {
        return this.history;
    }

    reset(): void {
        this._currentQuestion = null;
        this.history = [];
        this.lastQuestionAskedAt = null;
        this.lastTranscriptUpdateAt = null;
        this.lastSilenceTriggerAt = null;
        this.lastProcessedSentence = null;
        this.wordCountAtQuestion = 0;
    }

    setCurrentQuestion(question: QuestionItem, wordCount: number, now: number): void {
        this._currentQuestion = question;
        this.wordCountAtQuestion = wordCount;
        this.lastQuestionAskedAt = now;
        this.lastProcessedSentence = null;
        this.upsertHistory(question);
    }

    /**
     * Moves the current question along its status machine. Returns false, and
     * changes nothing, when there is no current question or the move is illegal.
     */
    updateCurrentQuestionStatus(status: QuestionStatus): boolean {
        const question = this._currentQuestion;
        if (!question || !canTransition(question.status, status)) {
            return false;
        }
        const updated: QuestionItem = { ...question, status };
        this._currentQuestion = updated;
        this.upsertHistory(updated);
        return true;
    }

    markTranscriptUpdate(now: number): void {
        this.lastTranscriptUpdateAt = now;
    }

    evaluateTranscript(
        fullText: string,
        committedLines: readonly string[],
        currentLine: string,
        now: number,
        proactivity: Proactivity
    ): QuestionEngineAction | null {
        this.markTranscriptUpdate(now);

        const question = this._currentQuestion;
        if (!question || BLOCKING_STATUSES.has(question.status)) {
            return null;
        }

        const recentText = this.buildRecentText(committedLines, currentLine);
        const latestLine = latestLineText(committedLines, currentLine);
        if (!endsWithTerminalPunctuation(latestLine)) {
            return null;
        }

        if (
            question.status === 'shown' &&
            this.shouldValidateAnswer(question, recentText, fullText) &&
            this.shouldProcessSentence(latestLine)
        ) {
            this.lastProcessedSentence = latestLine.trim().toLowerCase();
            return { type: 'validateAnswer', recentText };
        }

        if (this.shouldRequestNextQuestion(now, proactivity)) {
            return { type: 'requestNextQuestion', reason: 'interval', recentText };
        }

        return null;
    }

    /**
     * Fires at most once per silence episode; a new transcript update opens the
     * next episode.
     */
    evaluateSilence(
        committedLines: readonly string[],
        currentLine: string,
        now: number,
        proactivity: Proactivity
    ): QuestionEngineAction | null {
        const lastUpdate = this.lastTranscriptUpdateAt;
        if (lastUpdate === null) return null;
        if (now - lastUpdate < SILENCE_THRESHOLD_MS) return null;
        if (this.lastSilenceTriggerAt !== null && lastUpdate <= this.lastSilenceTriggerAt) return null;
        if (!this.shouldRequestNextQuestion(now, proactivity)) return null;

        this.lastSilenceTriggerAt = now;
        return {
            type: 'requestNextQuestion',
            reason: 'silence',
            recentText: this.buildRecentText(committedLines, currentLine),
        };
    }

    preferredNextKind(reason: QuestionTriggerReason): QuestionKind {
        if (reason === 'refresh') return 'new_topic';

        if (this._currentQuestion?.status === 'answered') {
            return this.countTrailingFollowUps() >= 2 ? 'new_topic' : 'follow_up';
        }

        if (this.history.length >= 2) {
            const [previous, last] = this.history.slice(-2);
            if (previous.kind === last.kind) return 'new_topic';
        }

        return 'default';
    }

    /**
     * Last three lines, the live line included, joined by spaces
     */
    buildRecentText(committedLines: readonly string[], currentLine: string): string {
        const lines = [...committedLines];
        if (currentLine.trim()) {
            lines.push(currentLine);
        }
        return lines.slice(-3).join(' ').trim();
    }

    private shouldValidateAnswer(question: QuestionItem, recentText: string, fullText: string): boolean {
        const newWords = Math.max(0, countWords(fullText) - this.wordCountAtQuestion);
        if (newWords < MINIMUM_WORDS_FOR_ANSWER) return false;

        const loweredRecent = recentText.toLowerCase();
        if (ANSWER_MARKERS.some(marker => loweredRecent.includes(marker))) {
            return true;
        }

        return extractKeywords(question.text).some(keyword => loweredRecent.includes(keyword));
    }

    private shouldRequestNextQuestion(now: number, proactivity: Proactivity): boolean {
        const status = this._currentQuestion?.status;
        if (status && BLOCKING_STATUSES.has(status)) return false;
        if (this.lastQuestionAskedAt === null) return true;
        return now - this.lastQuestionAskedAt >= minIntervalMs(proactivity);
    }

    private shouldProcessSentence(line: string): boolean {
        const normalized = line.trim().toLowerCase();
        if (!normalized) return false;
        return this.lastProcessedSentence !== normalized;
    }

    private countTrailingFollowUps(): number {
        let count = 0;
        for (let i = this.history.length - 1; i >= 0; i--) {
            if (this.history[i].kind !== 'follow_up') break;
            count++;
        }
        return count;
    }

    private upsertHistory(question: QuestionItem): void {
        const index = this.history.findIndex(item => item.id === question.id);
        if (index >= 0) {
            this.history[index] = question;
        } else {
            this.history.push(question);
        }
    }
}

function latestLineText(committedLines: readonly string[], currentLine: string): string {
    const current = currentLine.trim();
    if (current) return current;
    return committedLines[committedLines.length - 1]?.trim() ?? '';
}
