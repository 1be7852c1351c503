// Transcription Session
// Hosts one transcription provider, the question engine and the persistence sink

import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import type {
    NewSessionQuestion,
    Proactivity,
    QuestionHistoryItem,
    QuestionItem,
    QuestionKind,
    QuestionProfile,
    QuestionRequest,
    QuestionRequestMode,
    QuestionStatus,
    QuestionTriggerReason,
    RecentSessionContext,
    RecordingState,
    SessionEvent,
} from '@reverie/contracts';
import type { PermissionGate } from '../audio/AudioCapture.js';
import type { QuestionEngineAction } from '../intent/IntentTypes.js';
import { QuestionEngine } from '../intent/QuestionEngine.js';
import { INITIAL_QUESTION, QuestionPool } from '../intent/QuestionPool.js';
import { EMPTY_PROFILE } from '../services/journalRepository.js';
import type { JournalRepository } from '../services/journalRepository.js';
import type { QuestionService } from '../services/questionService.js';
import { track } from '../transcription/telemetry.js';
import type { AppLifecycleEvent, TranscriptionProvider } from '../transcription/TranscriptionTypes.js';
import { countWords, endsWithTerminalPunctuation, splitTranscriptLines } from '../transcription/transcriptText.js';
import {
    BackendHttpError,
    EmptyTranscriptError,
    PermissionDeniedError,
    PersistenceError,
    TranscriptionError,
    errorMessage,
    logError,
    toError,
    withRetry,
} from '../utils/errors.js';

export interface TranscriptionSessionOptions {
    provider: TranscriptionProvider;
    permissions: PermissionGate;
    repository?: JournalRepository;
    questionService?: QuestionService;
    pool?: QuestionPool;
    /** Used until a stored profile says otherwise */
    proactivity?: Proactivity;
    silencePollMs?: number;
    persistenceRetryDelayMs?: number;
    now?: () => number;
    createId?: () => string;
}

export interface SavedSession {
    sessionId: string | null;
    transcript: string;
    durationSeconds: number;
    startedAt: number;
    endedAt: number;
    recordingFilePath: string | null;
}

export type SessionEventListener = (event: SessionEvent) => void;

const SESSION_EVENT = 'event';

/**
 * Splits a provider transcript into committed lines and the live line. A last
 * line that already ends a sentence is committed too.
 */
export function splitTranscript(text: string, isFinal: boolean): { committedLines: string[]; currentLine: string } {
    const lines = splitTranscriptLines(text);
    if (isFinal || lines.length === 0 || endsWithTerminalPunctuation(lines[lines.length - 1])) {
        return { committedLines: lines, currentLine: '' };
    }
    return { committedLines: lines.slice(0, -1), currentLine: lines[lines.length - 1] };
}

export class TranscriptionSession extends EventEmitter {
    private readonly provider: TranscriptionProvider;
    private readonly permissions: PermissionGate;
    private readonly repository?: JournalRepository;
    private readonly questionService?: QuestionService;
    private readonly pool: QuestionPool;
    private readonly engine = new QuestionEngine();
    private readonly silencePollMs: number;
    private readonly persistenceRetryDelayMs: number;
    private readonly now: () => number;
    private readonly createId: () => string;
    private readonly pendingWork = new Set<Promise<void>>();
    private pendingSave: Promise<SavedSession> | null = null;

    private state: RecordingState = 'idle';
    private sessionId: string | null = null;
    private startedAt: number | null = null;
    private activeMs = 0;
    private segmentStartedAt: number | null = null;
    private silenceTimer: NodeJS.Timeout | null = null;

    private profile: QuestionProfile;
    private recentSessions: RecentSessionContext[] = [];
    private transcript = '';
    private committedLines: string[] = [];
    private currentLine = '';

    private isValidatingAnswer = false;
    private isRequestingQuestion = false;

    constructor(options: TranscriptionSessionOptions) {
        super();
        this.provider = options.provider;
        this.permissions = options.permissions;
        this.repository = options.repository;
        this.questionService = options.questionService;
        this.pool = options.pool ?? new QuestionPool();
        this.silencePollMs = options.silencePollMs ?? 500;
        this.persistenceRetryDelayMs = options.persistenceRetryDelayMs ?? 500;
        this.now = options.now ?? Date.now;
        this.createId = options.createId ?? randomUUID;
        this.profile = { ...EMPTY_PROFILE, proactivity: options.proactivity ?? EMPTY_PROFILE.proactivity };
        this.bindProvider();
    }

    // ============================================
    // STATE
    // ============================================

    get recordingState(): RecordingState {
        return this.state;
    }

    get currentQuestion(): QuestionItem | null {
        return this.engine.currentQuestion;
    }

    get questionHistory(): readonly QuestionItem[] {
        return this.engine.questionHistory;
    }

    get transcriptText(): string {
        return this.transcript;
    }

    get journalSessionId(): string | null {
        return this.sessionId;
    }

    subscribe(listener: SessionEventListener): () => void {
        this.on(SESSION_EVENT, listener);
        return () => {
            this.off(SESSION_EVENT, listener);
        };
    }

    /**
     * Resolves once every question request and best-effort write started so far has finished
     */
    async flushPendingWork(): Promise<void> {
        while (this.pendingWork.size > 0) {
            await Promise.all([...this.pendingWork]);
        }
    }

    // ============================================
    // LIFECYCLE
    // ============================================

    async start(userId: string): Promise<void> {
        if (this.state !== 'idle') return;

        await this.requestPermissions();

        const startedAt = this.now();
        this.startedAt = startedAt;
        this.activeMs = 0;

        if (this.repository) {
            const repository = this.repository;
            try {
                this.sessionId = await this.persist(() => repository.startSession(userId, startedAt));
            } catch (error) {
                this.reportError(new PersistenceError('start the journal session', error));
            }
            await this.loadQuestionContext(repository, userId);
        }

        await this.showInitialQuestion();
        await this.beginRecording();
        console.log(`[session:${this.sessionId ?? 'local'}] Recording started`);
    }

    async pause(): Promise<void> {
        if (this.state !== 'recording') return;
        this.stopSilencePoll();
        this.accumulateActiveTime();
        this.setState('paused');
        await this.provider.stop();
    }

    async resume(): Promise<void> {
        if (this.state !== 'paused') return;
        await this.beginRecording();
    }

    async refreshQuestion(): Promise<void> {
        if (this.state === 'idle' || this.isRequestingQuestion) return;
        if (!this.updateQuestionStatus('ignored')) return;

        const question = this.engine.currentQuestion;
        if (question) {
            this.persistInBackground('update_ignored', repository =>
                repository.updateQuestion(question.id, 'ignored', null)
            );
        }
        await this.requestNextQuestion('refresh', this.engine.buildRecentText(this.committedLines, this.currentLine));
    }

    /**
     * Completes the journal session. A failed write is surfaced and everything
     * stays in memory so the save can be retried. An empty transcript is
     * refused, and a second call while one is running shares its result.
     */
    save(): Promise<SavedSession> {
        if (!this.pendingSave) {
            this.pendingSave = this.performSave().finally(() => {
                this.pendingSave = null;
            });
        }
        return this.pendingSave;
    }

    private async performSave(): Promise<SavedSession> {
        await this.pause();
        await this.flushPendingWork();
        if (!this.transcript.trim()) {
            throw new EmptyTranscriptError();
        }

        const endedAt = this.now();
        const saved: SavedSession = {
            sessionId: this.sessionId,
            transcript: this.transcript,
            durationSeconds: Math.round(this.activeMs / 1000),
            startedAt: this.startedAt ?? endedAt,
            endedAt,
            recordingFilePath: this.provider.recordingFilePath,
        };

        const repository = this.repository;
        const sessionId = this.sessionId;
        if (repository && sessionId) {
            try {
                await this.persist(() => repository.completeSession({
                    sessionId,
                    transcript: saved.transcript,
                    durationSeconds: saved.durationSeconds,
                    startedAt: saved.startedAt,
                    endedAt,
                }));
            } catch (error) {
                const failure = new PersistenceError('save the journal session', error);
                this.reportError(failure);
                throw failure;
            }
        }

        console.log(`[session:${sessionId ?? 'local'}] Saved (${saved.durationSeconds}s)`);
        await this.provider.reset();
        this.resetLocalState();
        return saved;
    }

    async discard(): Promise<void> {
        this.stopSilencePoll();
        await this.provider.cancel();
        await this.flushPendingWork();

        const repository = this.repository;
        const sessionId = this.sessionId;
        if (repository && sessionId) {
            try {
                await this.persist(() => repository.deleteSession(sessionId));
            } catch (error) {
                logError(new PersistenceError('delete the draft session', error), `session:${sessionId}`);
            }
        }

        console.log(`[session:${sessionId ?? 'local'}] Discarded`);
        this.resetLocalState();
    }

    handleLifecycleEvent(event: AppLifecycleEvent): void {
        this.provider.handleAppLifecycle?.(event);
    }

    // ============================================
    // PROVIDER
    // ============================================

    private bindProvider(): void {
        this.provider.onPartial = text => this.applyTranscript(text, false);
        this.provider.onFinal = text => this.applyTranscript(text, true);
        this.provider.onError = error => this.reportError(error);
    }

    private async requestPermissions(): Promise<void> {
        if (this.provider.requiresPlatformSpeechAuthorization) {
            const speechAllowed = await this.permissions.requestSpeechRecognition();
            if (!speechAllowed) {
                throw new PermissionDeniedError();
            }
        }
        const microphoneAllowed = await this.permissions.requestMicrophone();
        if (!microphoneAllowed) {
            throw new PermissionDeniedError();
        }
    }

    private async beginRecording(): Promise<void> {
        try {
            await this.provider.start();
        } catch (error) {
            this.reportError(toError(error));
            throw error;
        }
        this.segmentStartedAt = this.now();
        this.setState('recording');
        this.startSilencePoll();
    }

    private applyTranscript(text: string, isFinal: boolean): void {
        const { committedLines, currentLine } = splitTranscript(text, isFinal);
        this.transcript = text;
        this.committedLines = committedLines;
        this.currentLine = currentLine;

        const timestamp = this.now();
        this.publish({
            type: 'transcript.updated',
            payload: { text, committedLines, currentLine, isFinal, timestamp },
        });

        if (this.state === 'idle') return;
        const action = this.engine.evaluateTranscript(text, committedLines, currentLine, timestamp, this.profile.proactivity);
        if (action) {
            this.runInBackground(this.handleAction(action));
        }
    }

    private startSilencePoll(): void {
        this.stopSilencePoll();
        this.silenceTimer = setInterval(() => {
            const action = this.engine.evaluateSilence(
                this.committedLines,
                this.currentLine,
                this.now(),
                this.profile.proactivity
            );
            if (action) {
                this.runInBackground(this.handleAction(action));
            }
        }, this.silencePollMs);
    }

    private stopSilencePoll(): void {
        if (this.silenceTimer) {
            clearInterval(this.silenceTimer);
            this.silenceTimer = null;
        }
    }

    private accumulateActiveTime(): void {
        if (this.segmentStartedAt !== null) {
            this.activeMs += Math.max(0, this.now() - this.segmentStartedAt);
            this.segmentStartedAt = null;
        }
    }

    // ============================================
    // QUESTIONS
    // ============================================

    private async handleAction(action: QuestionEngineAction): Promise<void> {
        if (action.type === 'validateAnswer') {
            await this.validateAnswer(action.recentText);
        } else {
            await this.requestNextQuestion(action.reason, action.recentText);
        }
    }

    private async validateAnswer(recentText: string): Promise<void> {
        if (this.isValidatingAnswer || !this.engine.currentQuestion) return;
        if (!this.updateQuestionStatus('pending_validation')) return;

        this.isValidatingAnswer = true;
        try {
            if (!this.questionService) {
                await this.markAnswered(recentText);
                return;
            }

            let answered = false;
            try {
                const response = await this.questionService.validateAnswer(this.buildQuestionRequest('validate', recentText, null));
                answered = response.answered ?? false;
            } catch (error) {
                this.updateQuestionStatus('shown');
                this.reportNonFatalQuestionError(error, 'validate');
                return;
            }

            if (answered) {
                await this.markAnswered(recentText);
            } else {
                this.updateQuestionStatus('shown');
            }
        } finally {
            this.isValidatingAnswer = false;
        }
    }

    private async markAnswered(recentText: string): Promise<void> {
        this.updateQuestionStatus('answered');
        const question = this.engine.currentQuestion;
        if (question) {
            this.persistInBackground('update_answered', repository =>
                repository.updateQuestion(question.id, 'answered', recentText)
            );
        }
        await this.requestNextQuestion('answered', recentText);
    }

    private async requestNextQuestion(reason: QuestionTriggerReason, recentText: string): Promise<void> {
        if (this.isRequestingQuestion) return;
        this.isRequestingQuestion = true;

        try {
            const preferredKind = this.engine.preferredNextKind(reason);
            if (!this.questionService) {
                await this.applyNextQuestion(this.fallbackQuestion(preferredKind));
                return;
            }

            let next: QuestionItem;
            try {
                const response = await this.questionService.requestNextQuestion(
                    this.buildQuestionRequest('next', recentText, preferredKind)
                );
                const payload = response.nextQuestion;
                next = payload && payload.text.trim()
                    ? this.newQuestion(payload.text.trim(), payload.coverageTag ?? null, payload.kind ?? preferredKind)
                    : this.fallbackQuestion(preferredKind);
            } catch (error) {
                this.reportNonFatalQuestionError(error, 'next');
                next = this.fallbackQuestion(preferredKind);
            }
            await this.applyNextQuestion(next);
        } finally {
            this.isRequestingQuestion = false;
        }
    }

    private async applyNextQuestion(question: QuestionItem): Promise<void> {
        this.engine.setCurrentQuestion(question, countWords(this.transcript), question.askedAt);
        this.publishQuestion();

        const sessionId = this.sessionId;
        if (!sessionId) return;
        const record: NewSessionQuestion = {
            id: question.id,
            sessionId,
            createdAt: question.askedAt,
            question: question.text,
            coverageTag: question.coverageTag,
            status: 'shown',
            answeredText: null,
        };
        this.persistInBackground('persist', repository => repository.insertQuestion(record));
    }

    private async showInitialQuestion(): Promise<void> {
        if (this.engine.currentQuestion) return;
        await this.applyNextQuestion(this.newQuestion(INITIAL_QUESTION.text, INITIAL_QUESTION.coverageTag, 'default'));
    }

    private fallbackQuestion(kind: QuestionKind): QuestionItem {
        const excludingTags = this.engine.questionHistory
            .slice(-2)
            .map(item => item.coverageTag)
            .filter((tag): tag is string => tag !== null);
        const template = this.pool.randomQuestion(this.profile.avoidTopics, excludingTags);
        return this.newQuestion(template.text, template.coverageTag, kind);
    }

    private newQuestion(text: string, coverageTag: string | null, kind: QuestionKind): QuestionItem {
        return {
            id: this.createId(),
            text,
            coverageTag,
            kind,
            status: 'shown',
            askedAt: this.now(),
        };
    }

    private updateQuestionStatus(status: QuestionStatus): boolean {
        const changed = this.engine.updateCurrentQuestionStatus(status);
        if (changed) {
            this.publishQuestion();
        }
        return changed;
    }

    private buildQuestionRequest(
        mode: QuestionRequestMode,
        recentText: string,
        preferredKind: QuestionKind | null
    ): QuestionRequest {
        const questionHistory: QuestionHistoryItem[] = this.engine.questionHistory.map(item => ({
            text: item.text,
            coverageTag: item.coverageTag,
            kind: item.kind,
            status: item.status,
        }));

        return {
            mode,
            draftText: this.transcript.trim(),
            recentText,
            lastQuestion: this.engine.currentQuestion?.text ?? null,
            questionHistory,
            profile: this.profile,
            recentSessions: this.recentSessions,
            preferredKind,
        };
    }

    private async loadQuestionContext(repository: JournalRepository, userId: string): Promise<void> {
        try {
            const profile = await repository.fetchProfile(userId);
            if (profile) {
                this.profile = profile;
            }
        } catch (error) {
            logError(error, 'session:profile');
        }

        try {
            this.recentSessions = await repository.fetchRecentSessions(userId);
        } catch (error) {
            logError(error, 'session:recent');
            this.recentSessions = [];
        }
    }

    // ============================================
    // PERSISTENCE & EVENTS
    // ============================================

    private persist<T>(operation: () => Promise<T>): Promise<T> {
        return withRetry(operation, { maxAttempts: 2, initialDelayMs: this.persistenceRetryDelayMs });
    }

    private persistInBackground(context: string, write: (repository: JournalRepository) => Promise<void>): void {
        const repository = this.repository;
        if (!repository) return;
        this.runInBackground(
            this.persist(() => write(repository)).catch(error => this.reportNonFatalQuestionError(error, context))
        );
    }

    private runInBackground(work: Promise<void>): void {
        const tracked = work.catch(error => logError(error, `session:${this.sessionId ?? 'local'}`));
        this.pendingWork.add(tracked);
        tracked.finally(() => {
            this.pendingWork.delete(tracked);
        }).catch(error => logError(error, 'session'));
    }

    private reportNonFatalQuestionError(error: unknown, context: string): void {
        const fields: Record<string, string> = { context, message: errorMessage(error) };
        if (error instanceof BackendHttpError) {
            fields.status = String(error.status);
        }
        track('question_error_non_fatal', fields);
    }

    private reportError(error: Error): void {
        const kind = error instanceof TranscriptionError ? error.kind : 'transport';
        const fatal = error instanceof TranscriptionError && error.isFatal;
        console.error(`[session:${this.sessionId ?? 'local'}] ${kind} error: ${error.message}`);
        track('transcription_error', { kind, message: error.message });
        this.publish({
            type: 'session.error',
            payload: { kind, message: error.message, fatal, timestamp: this.now() },
        });
    }

    private publishQuestion(): void {
        const question = this.engine.currentQuestion;
        if (!question) return;
        this.publish({ type: 'question.changed', payload: { question, timestamp: this.now() } });
    }

    private setState(state: RecordingState): void {
        this.state = state;
        this.publish({ type: 'recording.state', payload: { state, timestamp: this.now() } });
    }

    private publish(event: SessionEvent): void {
        this.emit(SESSION_EVENT, event);
    }

    private resetLocalState(): void {
        this.stopSilencePoll();
        this.sessionId = null;
        this.startedAt = null;
        this.activeMs = 0;
        this.segmentStartedAt = null;
        this.transcript = '';
        this.committedLines = [];
        this.currentLine = '';
        this.recentSessions = [];
        this.engine.reset();
        if (this.state !== 'idle') {
            this.setState('idle');
        }
    }
}
