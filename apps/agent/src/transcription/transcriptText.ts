// Transcript Text Helpers
// Normalization and line handling shared by every provider

const TERMINAL_PUNCTUATION = /[.!?]$/;
const SENTENCE_BREAK = /([.!?])\s+/g;

export function endsWithTerminalPunctuation(text: string): boolean {
    return TERMINAL_PUNCTUATION.test(text.trim());
}

export function ensureTerminalPunctuation(line: string): string {
    return endsWithTerminalPunctuation(line) ? line : `${line}.`;
}

/**
 * Trims, unifies newlines and breaks the line after every sentence-ending mark
 */
export function normalizeTranscript(text: string): string {
    const trimmed = text.trim();
    if (!trimmed) return '';
    return trimmed.replace(/\r\n/g, '\n').replace(SENTENCE_BREAK, '$1\n');
}

export function combineTranscript(committed: string, current: string): string {
    const trimmedCommitted = committed.trim();
    const trimmedCurrent = current.trim();
    if (!trimmedCommitted) return trimmedCurrent;
    if (!trimmedCurrent) return trimmedCommitted;
    return `${trimmedCommitted}\n${trimmedCurrent}`;
}

export function splitTranscriptLines(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0);
}

/**
 * Tail of the transcript sent as a continuation hint, or undefined when empty
 */
export function promptSuffix(text: string, limit: number): string | undefined {
    const trimmed = text.trim();
    if (!trimmed) return undefined;
    if (trimmed.length <= limit) return trimmed;
    return trimmed.slice(trimmed.length - limit);
}

export function countWords(text: string): number {
    return text.split(/[^\p{L}\p{N}]+/u).filter(token => token.length > 0).length;
}

/**
 * Keeps final transcripts monotonic: a final that would truncate an earlier
 * final to one of its prefixes is replaced by the earlier text.
 */
export class FinalTranscriptGate {
    private last = '';

    accept(text: string): string {
        if (this.last && text.length < this.last.length && this.last.startsWith(text)) {
            return this.last;
        }
        this.last = text;
        return text;
    }

    get lastDelivered(): string {
        return this.last;
    }

    reset(seed: string = ''): void {
        this.last = seed;
    }
}
