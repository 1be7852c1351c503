// Transcription Types
// The contract every transcription strategy implements

export type TranscriptCallback = (text: string) => void;
export type TranscriptionErrorCallback = (error: Error) => void;

export type AppLifecycleEvent = 'background' | 'foreground';

export interface TranscriptionProvider {
    /** Only on-device recognition needs the platform speech authorization prompt */
    readonly requiresPlatformSpeechAuthorization: boolean;
    /** Finished audio of the last stopped segment, when the strategy records one */
    readonly recordingFilePath: string | null;

    onPartial?: TranscriptCallback;
    onFinal?: TranscriptCallback;
    onError?: TranscriptionErrorCallback;

    /** Rejects on device or session failure */
    start(): Promise<void>;
    /** Flushes the final transcript and releases capture; partial results are kept */
    stop(): Promise<void>;
    /** Hard abort; idempotent, discards buffered audio and state */
    cancel(): Promise<void>;
    /** Forgets the transcript after an entry is saved; the finished recording stays on disk */
    reset(): Promise<void>;
    handleAppLifecycle?(event: AppLifecycleEvent): void;
}

export interface SpeechSegment {
    /** Seconds from the start of the reporting recognition task */
    startTime: number;
    duration: number;
    text: string;
}
