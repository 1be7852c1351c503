// Polling Transcriber
// Re-uploads the growing capture segment to the batch endpoint on a fixed interval

import { randomUUID } from 'node:crypto';
import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { TranscribeRequest } from '@reverie/contracts';
import type { AudioFrame, AudioInput } from '../audio/AudioCapture.js';
import { AudioFrameConverter, int16ToBuffer } from '../audio/AudioFrameConverter.js';
import { WAV_HEADER_BYTES, encodeWav } from '../audio/wav.js';
import type { TranscriptionBackendClient } from '../services/transcriptionBackend.js';
import {
    BackendHttpError,
    DeviceUnavailableError,
    PayloadError,
    TranscriptionError,
    TransportError,
    errorMessage,
    logError,
    toError,
} from '../utils/errors.js';
import { FirstPartialTracker, track } from './telemetry.js';
import type { TranscriptCallback, TranscriptionErrorCallback, TranscriptionProvider } from './TranscriptionTypes.js';
import { FinalTranscriptGate, combineTranscript, normalizeTranscript, promptSuffix } from './transcriptText.js';

export interface PollingTranscriberOptions {
    backend: TranscriptionBackendClient;
    audioInput: AudioInput;
    /** Where finished segments are written as WAV files; none are written without it */
    recordingsDir?: string;
    /** Transcript already shown to the user, e.g. handed over by a failed stream */
    initialTranscript?: string;
    /** Label used in telemetry, usually the backend function name */
    label?: string;
    intervalMs?: number;
    minimumAudioBytes?: number;
    maxAudioBytes?: number;
    promptLimit?: number;
    sampleRate?: number;
    /** Consecutive failed polling cycles tolerated before the failure is surfaced */
    maxConsecutiveFailures?: number;
}

const RECORDING_MIME_TYPE = 'audio/wav';
const RECORDING_FILE_NAME = 'recording.wav';
const CORRUPTED_AUDIO_MARKERS = ['audio file might be corrupted or unsupported', '"code":"invalid_value"'];

/**
 * The batch endpoint rejects a partially written segment now and then; those
 * 400s are expected while polling and the next cycle uploads a longer buffer.
 */
export function isIgnorablePartialError(error: unknown): boolean {
    if (!(error instanceof BackendHttpError) || error.status !== 400) {
        return false;
    }
    const body = error.body.toLowerCase();
    return CORRUPTED_AUDIO_MARKERS.some(marker => body.includes(marker));
}

function detailedError(error: unknown): TranscriptionError {
    if (error instanceof TranscriptionError) {
        return error;
    }
    if (error instanceof BackendHttpError) {
        return new TransportError('batch_http_error', `Transcription failed (HTTP ${error.status}). ${error.body}`.trim(), error);
    }
    return new TransportError('batch_request_failed', errorMessage(error), error);
}

export class PollingTranscriber implements TranscriptionProvider {
    readonly requiresPlatformSpeechAuthorization = false;

    onPartial?: TranscriptCallback;
    onFinal?: TranscriptCallback;
    onError?: TranscriptionErrorCallback;

    private readonly backend: TranscriptionBackendClient;
    private readonly audioInput: AudioInput;
    private readonly recordingsDir?: string;
    private readonly label: string;
    private readonly intervalMs: number;
    private readonly minimumAudioBytes: number;
    private readonly maxAudioBytes: number;
    private readonly promptLimit: number;
    private readonly sampleRate: number;
    private readonly maxConsecutiveFailures: number;
    private readonly converter: AudioFrameConverter;
    private readonly finalGate = new FinalTranscriptGate();
    private readonly firstPartial = new FirstPartialTracker('polling');

    private segmentChunks: Buffer[] = [];
    private segmentBytes = 0;
    private lastUploadedBytes = 0;
    private segmentGeneration = 0;
    private hasSegment = false;
    private shouldStartNewSegment = false;
    private isCapturing = false;

    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;
    private hasEmittedSizeLimitError = false;
    private consecutiveFailures = 0;

    private lastTranscript: string;
    private committedTranscript: string;
    private currentSegmentTranscript = '';
    private _recordingFilePath: string | null = null;

    constructor(options: PollingTranscriberOptions) {
        this.backend = options.backend;
        this.audioInput = options.audioInput;
        this.recordingsDir = options.recordingsDir;
        this.label = options.label ?? 'transcribe';
        this.intervalMs = options.intervalMs ?? 2200;
        this.minimumAudioBytes = options.minimumAudioBytes ?? 2000;
        this.maxAudioBytes = options.maxAudioBytes ?? 8 * 1024 * 1024;
        this.promptLimit = options.promptLimit ?? 2000;
        this.sampleRate = options.sampleRate ?? 16000;
        this.maxConsecutiveFailures = options.maxConsecutiveFailures ?? 3;
        this.converter = new AudioFrameConverter(this.sampleRate);

        const seeded = (options.initialTranscript ?? '').trim();
        this.lastTranscript = seeded;
        this.committedTranscript = seeded;
        this.finalGate.reset(seeded);
    }

    get recordingFilePath(): string | null {
        return this._recordingFilePath;
    }

    /** Best transcript known so far, committed prefix included */
    get transcript(): string {
        return this.lastTranscript;
    }

    async start(): Promise<void> {
        if (this.isCapturing) return;

        if (!this.audioInput.isInputAvailable) {
            throw new DeviceUnavailableError('Audio input unavailable.', this.audioInput.routeSummary());
        }

        if (!this.hasSegment || this.shouldStartNewSegment) {
            this.beginSegment();
        }

        await this.audioInput.start(frame => this.appendFrame(frame));
        this.isCapturing = true;

        this.firstPartial.begin();
        track('transcription_session_started', { transport: 'polling', function: this.label });
        this.startTimer();
    }

    async stop(): Promise<void> {
        if (!this.isCapturing && !this.hasSegment) return;

        this.audioInput.stop();
        this.isCapturing = false;
        this.stopTimer();
        this.shouldStartNewSegment = true;

        await this.writeRecordingFile();
        await this.transcribeFinal();
    }

    async cancel(): Promise<void> {
        this.audioInput.stop();
        this.isCapturing = false;
        this.stopTimer();
        this.segmentGeneration++;

        const recordingPath = this._recordingFilePath;
        this._recordingFilePath = null;
        if (recordingPath) {
            await rm(recordingPath, { force: true });
        }

        this.clearState();
    }

    /**
     * Starts the next entry from an empty transcript, seed included; the
     * recording written by the last stop stays where it is
     */
    async reset(): Promise<void> {
        if (this.isCapturing) {
            this.audioInput.stop();
            this.isCapturing = false;
        }
        this.stopTimer();
        this.segmentGeneration++;
        this.clearState();
    }

    private clearState(): void {
        this.segmentChunks = [];
        this.segmentBytes = 0;
        this.lastUploadedBytes = 0;
        this.hasSegment = false;
        this.shouldStartNewSegment = false;
        this.hasEmittedSizeLimitError = false;
        this.consecutiveFailures = 0;
        this.lastTranscript = '';
        this.committedTranscript = '';
        this.currentSegmentTranscript = '';
        this.finalGate.reset();
    }

    private beginSegment(): void {
        this.segmentGeneration++;
        this.segmentChunks = [];
        this.segmentBytes = 0;
        this.lastUploadedBytes = 0;
        this.currentSegmentTranscript = '';
        this.hasSegment = true;
        this.shouldStartNewSegment = false;
        this.hasEmittedSizeLimitError = false;
        this.converter.reset();
    }

    private appendFrame(frame: AudioFrame): void {
        if (!this.isCapturing) return;
        const pcm = this.converter.convert(frame);
        if (pcm.length === 0) return;
        const chunk = int16ToBuffer(pcm);
        this.segmentChunks.push(chunk);
        this.segmentBytes += chunk.length;
    }

    private startTimer(): void {
        this.stopTimer();
        this.timer = setInterval(() => {
            this.transcribePartial().catch(error => logError(error, 'polling'));
        }, this.intervalMs);
    }

    private stopTimer(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }

    private segmentWav(): Buffer {
        const pcm = Buffer.concat(this.segmentChunks, this.segmentBytes);
        return encodeWav(pcm, { sampleRate: this.sampleRate, channels: 1 });
    }

    private buildRequest(wav: Buffer): TranscribeRequest {
        const request: TranscribeRequest = {
            audioBase64: wav.toString('base64'),
            mimeType: RECORDING_MIME_TYPE,
            fileName: RECORDING_FILE_NAME,
        };
        const prompt = promptSuffix(this.lastTranscript, this.promptLimit);
        if (prompt) {
            request.prompt = prompt;
        }
        return request;
    }

    private async transcribePartial(): Promise<void> {
        if (this.inFlight) return;
        if (this.segmentBytes === this.lastUploadedBytes) return;

        const wavBytes = WAV_HEADER_BYTES + this.segmentBytes;
        if (wavBytes < this.minimumAudioBytes) return;
        if (wavBytes > this.maxAudioBytes) {
            this.emitSizeLimitErrorIfNeeded(wavBytes);
            return;
        }

        this.hasEmittedSizeLimitError = false;
        this.lastUploadedBytes = this.segmentBytes;
        const generation = this.segmentGeneration;
        const request = this.buildRequest(this.segmentWav());

        const upload = (async () => {
            try {
                const response = await this.backend.transcribe(request);
                this.consecutiveFailures = 0;
                if (generation !== this.segmentGeneration) return;

                const normalized = normalizeTranscript(response.text);
                if (!normalized) return;
                this.firstPartial.mark();
                this.currentSegmentTranscript = normalized;

                const combined = combineTranscript(this.committedTranscript, normalized);
                if (combined !== this.lastTranscript) {
                    this.lastTranscript = combined;
                    this.onPartial?.(combined);
                }
            } catch (error) {
                this.handlePartialFailure(error);
            }
        })();

        this.inFlight = upload;
        try {
            await upload;
        } finally {
            this.inFlight = null;
        }
    }

    private handlePartialFailure(error: unknown): void {
        if (isIgnorablePartialError(error)) {
            console.warn(`[polling:${this.label}] Ignoring rejected partial segment`);
            return;
        }

        this.consecutiveFailures++;
        track('transcription_error', { transport: 'polling', message: errorMessage(error) });
        if (this.consecutiveFailures >= this.maxConsecutiveFailures) {
            this.consecutiveFailures = 0;
            this.onError?.(detailedError(error));
        }
    }

    /**
     * One last upload of the stopped segment; its text is authoritative and
     * becomes part of the committed prefix. On failure the last partial text is
     * committed instead so nothing already shown disappears.
     */
    private async transcribeFinal(): Promise<void> {
        if (this.inFlight) {
            await this.inFlight;
        }

        const generation = this.segmentGeneration;
        const wavBytes = WAV_HEADER_BYTES + this.segmentBytes;

        try {
            if (this.segmentBytes === 0 || wavBytes < this.minimumAudioBytes) {
                return;
            }
            if (wavBytes > this.maxAudioBytes) {
                this.onError?.(new PayloadError(
                    `Final transcription payload too large (${wavBytes} bytes). Pause and resume to start a new segment.`,
                    wavBytes
                ));
                return;
            }

            const response = await this.backend.transcribe(this.buildRequest(this.segmentWav()));
            if (generation !== this.segmentGeneration) return;

            const normalized = normalizeTranscript(response.text);
            if (!normalized) return;
            this.firstPartial.mark();
            this.currentSegmentTranscript = normalized;
            const combined = combineTranscript(this.committedTranscript, normalized);
            this.lastTranscript = this.finalGate.accept(combined);
            this.onFinal?.(this.lastTranscript);
        } catch (error) {
            this.onError?.(detailedError(error));
        } finally {
            if (generation === this.segmentGeneration) {
                this.absorbCurrentSegment();
            }
        }
    }

    private absorbCurrentSegment(): void {
        if (this.currentSegmentTranscript) {
            this.committedTranscript = combineTranscript(this.committedTranscript, this.currentSegmentTranscript);
            this.currentSegmentTranscript = '';
        }
        this.lastTranscript = combineTranscript(this.committedTranscript, '');
    }

    private emitSizeLimitErrorIfNeeded(byteLength: number): void {
        if (this.hasEmittedSizeLimitError) return;
        this.hasEmittedSizeLimitError = true;
        this.onError?.(new PayloadError(
            'Transcription segment reached size limit. Pause and resume recording to start a new segment.',
            byteLength
        ));
    }

    private async writeRecordingFile(): Promise<void> {
        if (!this.recordingsDir || this.segmentBytes === 0) return;
        const path = join(this.recordingsDir, `recording-${randomUUID()}.wav`);
        try {
            await writeFile(path, this.segmentWav());
            this._recordingFilePath = path;
        } catch (error) {
            this.onError?.(toError(error));
        }
    }
}
