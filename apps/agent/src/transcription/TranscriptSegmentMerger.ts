// Transcript Segment Merger
// Folds recognizer segments into committed lines and one live line

import type { SpeechSegment } from './TranscriptionTypes.js';
import { combineTranscript, endsWithTerminalPunctuation, ensureTerminalPunctuation } from './transcriptText.js';

export interface SegmentMergerOptions {
    /** Segments whose start times differ by less than this are the same token */
    matchToleranceSec?: number;
    /** A pause longer than this closes the line */
    silenceThresholdSec?: number;
    /** Gap inserted between the timeline of one recognition task and the next */
    taskRestartGapSec?: number;
}

interface TimedSegment extends SpeechSegment {
    endTime: number;
}

const DEFAULT_OPTIONS: Required<SegmentMergerOptions> = {
    matchToleranceSec: 0.04,
    silenceThresholdSec: 1.2,
    taskRestartGapSec: 1.3,
};

function timed(segment: SpeechSegment, offset: number = 0): TimedSegment {
    const startTime = segment.startTime + offset;
    return {
        startTime,
        duration: segment.duration,
        text: segment.text,
        endTime: startTime + segment.duration,
    };
}

/**
 * Merges the segments of successive recognition tasks onto one session
 * timeline. Committed lines are append-only; only the current line changes.
 */
export class TranscriptSegmentMerger {
    private readonly options: Required<SegmentMergerOptions>;
    private readonly committed: string[] = [];
    private current: TimedSegment[] = [];
    private segmentOffset = 0;
    private lastCommittedEndTime = 0;
    private lastSeenEndTime = 0;
    /** End of the last committed segment of the running task, task-relative */
    private taskCommittedEnd = 0;

    constructor(options: SegmentMergerOptions = {}) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    get committedLines(): readonly string[] {
        return this.committed;
    }

    get currentLine(): string {
        return this.current.map(segment => segment.text).join(' ').trim();
    }

    get timelineOffset(): number {
        return this.segmentOffset;
    }

    transcript(): string {
        return combineTranscript(this.committed.join('\n'), this.currentLine);
    }

    /**
     * Starts the timeline of a new recognition task. Whatever is still live
     * from the previous task is committed first, never dropped.
     */
    beginTask(): void {
        this.finalizeCurrent();
        const anchor = Math.max(this.lastCommittedEndTime, this.lastSeenEndTime);
        this.segmentOffset = anchor > 0 ? anchor + this.options.taskRestartGapSec : 0;
        this.taskCommittedEnd = 0;
    }

    /**
     * Merges the recognizer's latest view of the current task, then commits
     * every segment up to the last line boundary. Recognizers report the whole
     * task each time, so segments already committed are skipped.
     */
    ingest(segments: readonly SpeechSegment[]): void {
        const watermark = this.taskCommittedEnd - this.options.matchToleranceSec;
        const incoming = segments
            .map(segment => ({ ...segment, text: segment.text.trim() }))
            .filter(segment => segment.text.length > 0 && segment.startTime >= watermark);
        if (incoming.length === 0) return;

        for (const segment of incoming) {
            this.mergeSegment(timed(segment));
        }

        const maxEnd = Math.max(...this.current.map(segment => segment.endTime));
        this.lastSeenEndTime = Math.max(this.lastSeenEndTime, this.segmentOffset + maxEnd);

        this.flushStableSegments();
    }

    /**
     * Commits every live segment, closing the line
     */
    finalizeCurrent(): void {
        if (this.current.length === 0) return;
        this.commit(this.current);
        this.current = [];
    }

    reset(): void {
        this.committed.length = 0;
        this.current = [];
        this.segmentOffset = 0;
        this.lastCommittedEndTime = 0;
        this.lastSeenEndTime = 0;
        this.taskCommittedEnd = 0;
    }

    private mergeSegment(segment: TimedSegment): void {
        const tolerance = this.options.matchToleranceSec;
        const match = this.current.findIndex(existing => Math.abs(existing.startTime - segment.startTime) < tolerance);
        if (match >= 0) {
            const existing = this.current[match];
            this.current[match] = { ...existing, text: segment.text, duration: segment.duration, endTime: existing.startTime + segment.duration };
            return;
        }

        const insertAt = this.current.findIndex(existing => existing.startTime > segment.startTime);
        if (insertAt >= 0) {
            this.current.splice(insertAt, 0, segment);
        } else {
            this.current.push(segment);
        }
    }

    private flushStableSegments(): void {
        let boundary = -1;
        let lastEnd: number | null = null;

        this.current.forEach((segment, index) => {
            const gap = lastEnd === null ? 0 : Math.max(0, segment.startTime - lastEnd);
            if (gap > this.options.silenceThresholdSec && index > 0) {
                boundary = index - 1;
            }
            if (endsWithTerminalPunctuation(segment.text)) {
                boundary = index;
            }
            lastEnd = segment.endTime;
        });

        if (boundary < 0) return;
        this.commit(this.current.slice(0, boundary + 1));
        this.current = this.current.slice(boundary + 1);
    }

    /**
     * Appends closed lines built from task-relative segments
     */
    private commit(segments: readonly TimedSegment[]): void {
        this.taskCommittedEnd = Math.max(this.taskCommittedEnd, ...segments.map(segment => segment.endTime));
        const shifted = segments.map(segment => timed(segment, this.segmentOffset));
        let line = '';
        let lastEnd: number | null = null;

        const closeLine = (appendPeriod: boolean): void => {
            const trimmed = line.trim();
            if (trimmed) {
                this.committed.push(appendPeriod ? ensureTerminalPunctuation(trimmed) : trimmed);
            }
            line = '';
        };

        for (const segment of shifted) {
            const gap = lastEnd === null ? 0 : Math.max(0, segment.startTime - lastEnd);
            if (gap > this.options.silenceThresholdSec) {
                closeLine(true);
            }
            line = line ? `${line} ${segment.text}` : segment.text;
            if (endsWithTerminalPunctuation(segment.text)) {
                closeLine(false);
            }
            lastEnd = segment.endTime;
        }
        closeLine(true);

        const maxEnd = Math.max(...shifted.map(segment => segment.endTime));
        this.lastCommittedEndTime = Math.max(this.lastCommittedEndTime, maxEnd);
        this.lastSeenEndTime = Math.max(this.lastSeenEndTime, this.lastCommittedEndTime);
    }
}
