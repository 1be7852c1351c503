// On-Device Segmented Transcriber
// Drives a local continuous recognizer, rotating tasks without losing words

import type { AudioInput } from '../audio/AudioCapture.js';
import type { AudioFrame } from '../audio/AudioCapture.js';
import { DeviceUnavailableError, toError } from '../utils/errors.js';
import { TranscriptSegmentMerger } from './TranscriptSegmentMerger.js';
import type { SegmentMergerOptions } from './TranscriptSegmentMerger.js';
import type {
    SpeechSegment,
    TranscriptCallback,
    TranscriptionErrorCallback,
    TranscriptionProvider,
} from './TranscriptionTypes.js';
import { FinalTranscriptGate } from './transcriptText.js';

// ============================================
// RECOGNIZER CAPABILITY
// ============================================

export interface RecognitionResult {
    /** Every segment of the task so far, timestamps relative to the task start */
    segments: SpeechSegment[];
    isFinal: boolean;
}

export interface RecognitionTaskHandlers {
    onResult(result: RecognitionResult): void;
    onError(error: Error): void;
}

export interface RecognitionTask {
    append(frame: AudioFrame): void;
    endAudio(): void;
    cancel(): void;
}

export interface SpeechRecognizer {
    readonly isAvailable: boolean;
    startTask(handlers: RecognitionTaskHandlers): RecognitionTask;
}

// ============================================
// TRANSCRIBER
// ============================================

export type OnDeviceState = 'idle' | 'capturing' | 'recognizing' | 'restarting';

export interface OnDeviceTranscriberOptions {
    restartDelayMs?: number;
    merger?: SegmentMergerOptions;
}

const DEFAULT_RESTART_DELAY_MS = 350;

export class OnDeviceSegmentedTranscriber implements TranscriptionProvider {
    readonly requiresPlatformSpeechAuthorization = true;
    readonly recordingFilePath = null;

    onPartial?: TranscriptCallback;
    onFinal?: TranscriptCallback;
    onError?: TranscriptionErrorCallback;

    private readonly merger: TranscriptSegmentMerger;
    private readonly finalGate = new FinalTranscriptGate();
    private readonly restartDelayMs: number;
    private task: RecognitionTask | null = null;
    private restartTimer: NodeJS.Timeout | null = null;
    private isRecording = false;
    private isTapInstalled = false;
    private _state: OnDeviceState = 'idle';

    constructor(
        private readonly recognizer: SpeechRecognizer,
        private readonly audioInput: AudioInput,
        options: OnDeviceTranscriberOptions = {}
    ) {
        this.merger = new TranscriptSegmentMerger(options.merger);
        this.restartDelayMs = options.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS;
    }

    get state(): OnDeviceState {
        return this._state;
    }

    get committedLines(): readonly string[] {
        return this.merger.committedLines;
    }

    get currentLine(): string {
        return this.merger.currentLine;
    }

    async start(): Promise<void> {
        if (!this.recognizer.isAvailable) {
            throw new DeviceUnavailableError('Speech recognizer is not available right now.');
        }
        if (!this.audioInput.isInputAvailable) {
            throw new DeviceUnavailableError('Audio engine is unavailable.', this.audioInput.routeSummary());
        }

        this.isRecording = true;
        this.clearRestartTimer();

        if (!this.isTapInstalled) {
            await this.audioInput.start(frame => this.task?.append(frame));
            this.isTapInstalled = true;
        }

        this._state = 'capturing';
        this.startRecognitionTask();
    }

    async stop(): Promise<void> {
        this.isRecording = false;
        this.clearRestartTimer();
        this.merger.finalizeCurrent();
        this.removeTap();

        const task = this.task;
        this.task = null;
        task?.endAudio();
        this._state = 'idle';

        this.deliverFinal(this.merger.transcript());
    }

    async cancel(): Promise<void> {
        this.isRecording = false;
        this.clearRestartTimer();
        this.removeTap();

        const task = this.task;
        this.task = null;
        task?.cancel();

        this.merger.reset();
        this.finalGate.reset();
        this._state = 'idle';
    }

    /** Nothing is written to disk, so this is a cancel */
    async reset(): Promise<void> {
        await this.cancel();
    }

    private startRecognitionTask(): void {
        const previous = this.task;
        this.task = null;
        previous?.cancel();
        this.merger.beginTask();

        const task: RecognitionTask = this.recognizer.startTask({
            onResult: result => {
                if (this.task === task) this.handleResult(result);
            },
            onError: error => {
                if (this.task === task) this.handleRecognitionError(error);
            },
        });
        this.task = task;
        this._state = 'recognizing';
    }

    private handleResult(result: RecognitionResult): void {
        this.merger.ingest(result.segments);

        if (result.isFinal) {
            this.merger.finalizeCurrent();
            this.deliverFinal(this.merger.transcript());
            if (this.isRecording && this.recognizer.isAvailable) {
                this.startRecognitionTask();
            }
            return;
        }

        const output = this.merger.transcript();
        if (output) {
            this.onPartial?.(output);
        }
    }

    private handleRecognitionError(error: unknown): void {
        console.warn(`[on-device] Recognition task failed: ${toError(error).message}`);
        this.onError?.(toError(error));
        if (this.isRecording) {
            this.scheduleRecognitionRestart();
        }
    }

    /**
     * Live segments are committed right away; the new task starts after a
     * short delay as long as recording is still requested.
     */
    private scheduleRecognitionRestart(): void {
        this.clearRestartTimer();
        this.merger.finalizeCurrent();
        this._state = 'restarting';

        this.restartTimer = setTimeout(() => {
            this.restartTimer = null;
            if (!this.isRecording || !this.recognizer.isAvailable) {
                return;
            }
            this.startRecognitionTask();
        }, this.restartDelayMs);
    }

    private deliverFinal(text: string): void {
        if (!text || text === this.finalGate.lastDelivered) return;
        this.onFinal?.(this.finalGate.accept(text));
    }

    private removeTap(): void {
        if (this.isTapInstalled) {
            this.audioInput.stop();
            this.isTapInstalled = false;
        }
    }

    private clearRestartTimer(): void {
        if (this.restartTimer) {
            clearTimeout(this.restartTimer);
            this.restartTimer = null;
        }
    }
}
