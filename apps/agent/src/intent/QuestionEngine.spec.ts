import { describe, it, expect, beforeEach } from 'vitest';
import type { QuestionItem, QuestionKind } from '@reverie/contracts';
import { QuestionEngine, canTransition, extractKeywords, minIntervalMs } from './QuestionEngine.js';

function question(id: string, kind: QuestionKind = 'default', text = 'What made you feel calm today?'): QuestionItem {
    return { id, text, coverageTag: 'emotion', kind, status: 'shown', askedAt: 0 };
}

describe('extractKeywords', () => {
    it('should drop stopwords and short tokens', () => {
        expect(extractKeywords('What made you feel calm?')).toEqual(['made', 'feel', 'calm']);
        expect(extractKeywords('Who is it?')).toEqual([]);
    });
});

describe('canTransition', () => {
    it('should follow the question lifecycle', () => {
        expect(canTransition('shown', 'pending_validation')).toBe(true);
        expect(canTransition('shown', 'ignored')).toBe(true);
        expect(canTransition('shown', 'answered')).toBe(false);
        expect(canTransition('pending_validation', 'shown')).toBe(true);
        expect(canTransition('answered', 'shown')).toBe(false);
        expect(canTransition('ignored', 'ignored')).toBe(true);
    });
});

describe('minIntervalMs', () => {
    it('should shorten the interval as proactivity rises', () => {
        expect(minIntervalMs('low')).toBe(45000);
        expect(minIntervalMs('medium')).toBe(30000);
        expect(minIntervalMs('high')).toBe(20000);
    });
});

describe('QuestionEngine', () => {
    let engine: QuestionEngine;

    beforeEach(() => {
        engine = new QuestionEngine();
        engine.setCurrentQuestion(question('q-1'), 0, 0);
    });

    describe('evaluateTranscript', () => {
        it('should wait for a sentence boundary', () => {
            const text = 'I felt calm because I took a walk';

            expect(engine.evaluateTranscript(text, [], text, 1000, 'medium')).toBeNull();
        });

        it('should ask for validation once a shown question gets an answer', () => {
            const text = 'I felt calm because I took a walk.';

            expect(engine.evaluateTranscript(text, [text], '', 1000, 'medium')).toEqual({
                type: 'validateAnswer',
                recentText: 'I felt calm because I took a walk.',
            });
        });

        it('should not process the same sentence twice', () => {
            const text = 'I felt calm because I took a walk.';
            engine.evaluateTranscript(text, [text], '', 1000, 'medium');

            expect(engine.evaluateTranscript(text, [text], '', 2000, 'medium')).toBeNull();
        });

        it('should require enough new words since the question', () => {
            const text = 'I felt calm today.';

            expect(engine.evaluateTranscript(text, [text], '', 1000, 'medium')).toBeNull();
        });

        it('should count only the words spoken after the question', () => {
            engine.setCurrentQuestion(question('q-2'), 5, 0);
            const text = 'One two three four five. I felt calm.';

            expect(engine.evaluateTranscript(text, ['One two three four five.', 'I felt calm.'], '', 1000, 'medium')).toBeNull();
        });

        it('should accept an answer that mentions a question keyword', () => {
            const text = 'The lake was very calm this morning.';

            expect(engine.evaluateTranscript(text, [text], '', 1000, 'medium')).toEqual({
                type: 'validateAnswer',
                recentText: text,
            });
        });

        it('should ignore a sentence with neither a marker nor a keyword', () => {
            const text = 'The lake was very quiet this morning.';

            expect(engine.evaluateTranscript(text, [text], '', 1000, 'medium')).toBeNull();
        });

        it('should request the next question once the interval has passed', () => {
            const text = 'Nothing much happened at the office.';

            expect(engine.evaluateTranscript(text, [text], '', 29000, 'medium')).toBeNull();
            expect(engine.evaluateTranscript(text, [text], '', 31000, 'low')).toBeNull();
            expect(engine.evaluateTranscript(text, [text], '', 31000, 'medium')).toEqual({
                type: 'requestNextQuestion',
                reason: 'interval',
                recentText: text,
            });
        });

        it('should hold back while a validation is pending', () => {
            engine.updateCurrentQuestionStatus('pending_validation');
            const text = 'I felt calm because I took a walk.';

            expect(engine.evaluateTranscript(text, [text], '', 60000, 'medium')).toBeNull();
        });
    });

    describe('evaluateSilence', () => {
        it('should stay quiet before any transcript arrived', () => {
            expect(engine.evaluateSilence([], '', 60000, 'medium')).toBeNull();
        });

        it('should fire once per silence episode', () => {
            engine.markTranscriptUpdate(40000);

            expect(engine.evaluateSilence([], 'and then', 44000, 'medium')).toBeNull();
            expect(engine.evaluateSilence([], 'and then', 44500, 'medium')).toEqual({
                type: 'requestNextQuestion',
                reason: 'silence',
                recentText: 'and then',
            });
            expect(engine.evaluateSilence([], 'and then', 46000, 'medium')).toBeNull();

            engine.markTranscriptUpdate(50000);
            expect(engine.evaluateSilence([], 'and then', 54500, 'medium')).not.toBeNull();
        });

        it('should respect the minimum interval', () => {
            engine.setCurrentQuestion(question('q-2'), 0, 38000);
            engine.markTranscriptUpdate(40000);

            expect(engine.evaluateSilence([], '', 44500, 'medium')).toBeNull();
        });

        it('should not fire while the question is settled', () => {
            engine.updateCurrentQuestionStatus('ignored');
            engine.markTranscriptUpdate(40000);

            expect(engine.evaluateSilence([], '', 80000, 'medium')).toBeNull();
        });
    });

    describe('updateCurrentQuestionStatus', () => {
        it('should reject illegal moves and keep the status', () => {
            expect(engine.updateCurrentQuestionStatus('answered')).toBe(false);
            expect(engine.currentQuestion?.status).toBe('shown');

            expect(engine.updateCurrentQuestionStatus('pending_validation')).toBe(true);
            expect(engine.updateCurrentQuestionStatus('answered')).toBe(true);
            expect(engine.updateCurrentQuestionStatus('shown')).toBe(false);
            expect(engine.currentQuestion?.status).toBe('answered');
        });

        it('should update the history entry in place', () => {
            engine.updateCurrentQuestionStatus('ignored');

            expect(engine.questionHistory).toHaveLength(1);
            expect(engine.questionHistory[0].status).toBe('ignored');
        });

        it('should refuse without a current question', () => {
            expect(new QuestionEngine().updateCurrentQuestionStatus('ignored')).toBe(false);
        });
    });

    describe('preferredNextKind', () => {
        it('should pick a new topic on refresh', () => {
            expect(engine.preferredNextKind('refresh')).toBe('new_topic');
        });

        it('should follow up an answered question', () => {
            engine.updateCurrentQuestionStatus('pending_validation');
            engine.updateCurrentQuestionStatus('answered');

            expect(engine.preferredNextKind('answered')).toBe('follow_up');
        });

        it('should change topic after two follow-ups in a row', () => {
            engine.setCurrentQuestion(question('q-2', 'follow_up'), 0, 0);
            engine.setCurrentQuestion(question('q-3', 'follow_up'), 0, 0);
            engine.updateCurrentQuestionStatus('pending_validation');
            engine.updateCurrentQuestionStatus('answered');

            expect(engine.preferredNextKind('answered')).toBe('new_topic');
        });

        it('should change topic when the last two questions share a kind', () => {
            engine.setCurrentQuestion(question('q-2'), 0, 0);

            expect(engine.preferredNextKind('interval')).toBe('new_topic');
        });

        it('should default otherwise', () => {
            expect(engine.preferredNextKind('silence')).toBe('default');
        });
    });

    it('should build recent text from the last three lines', () => {
        expect(engine.buildRecentText(['a.', 'b.', 'c.'], 'd')).toBe('b. c. d');
        expect(engine.buildRecentText(['a.', 'b.'], '  ')).toBe('a. b.');
    });

    it('should forget everything on reset', () => {
        engine.reset();

        expect(engine.currentQuestion).toBeNull();
        expect(engine.questionHistory).toEqual([]);
    });
});
