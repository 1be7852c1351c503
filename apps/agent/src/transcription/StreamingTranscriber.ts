// Streaming Transcriber
// Realtime socket transcription with a one-shot fallback to batch polling

import { randomUUID } from 'node:crypto';
import { rm } from 'node:fs/promises';
import type { RealtimeClientEvent, RealtimeServerEvent, SessionUpdateEvent } from '@reverie/contracts';
import type { AudioFrame, AudioInput } from '../audio/AudioCapture.js';
import { AudioFrameConverter, int16ToBuffer } from '../audio/AudioFrameConverter.js';
import { PcmScratchFile } from '../audio/PcmScratchFile.js';
import type { TranscriptionBackendClient } from '../services/transcriptionBackend.js';
import { SerialQueue } from '../utils/SerialQueue.js';
import { DeviceUnavailableError, errorMessage, logError, toError } from '../utils/errors.js';
import { PollingTranscriber } from './PollingTranscriber.js';
import { connectRealtimeSocket } from './realtimeSocket.js';
import type { RealtimeSocket, RealtimeSocketFactory } from './realtimeSocket.js';
import { FirstPartialTracker, track } from './telemetry.js';
import type {
    AppLifecycleEvent,
    TranscriptCallback,
    TranscriptionErrorCallback,
    TranscriptionProvider,
} from './TranscriptionTypes.js';
import { FinalTranscriptGate, combineTranscript, normalizeTranscript } from './transcriptText.js';

export type FallbackReason =
    | 'stream_setup_failed'
    | 'socket_send_failed'
    | 'socket_receive_failed'
    | 'provider_error_event';

export interface StreamingTranscriberOptions {
    backend: TranscriptionBackendClient;
    audioInput: AudioInput;
    realtimeUrl: string;
    model: string;
    recordingsDir: string;
    connect?: RealtimeSocketFactory;
    /** Builds the polling provider taking over after a failure, seeded with the transcript so far */
    createFallback?: (initialTranscript: string) => TranscriptionProvider;
    sampleRate?: number;
}

const STREAM_SAMPLE_RATE = 24000;

export function buildSessionUpdate(model: string, sampleRate: number = STREAM_SAMPLE_RATE): SessionUpdateEvent {
    return {
        type: 'session.update',
        session: {
            type: 'transcription',
            audio: {
                input: {
                    format: { type: 'audio/pcm', rate: sampleRate },
                    transcription: { model },
                    turn_detection: {
                        type: 'server_vad',
                        threshold: 0.5,
                        prefix_padding_ms: 300,
                        silence_duration_ms: 500,
                    },
                },
            },
        },
    };
}

export class StreamingTranscriber implements TranscriptionProvider {
    readonly requiresPlatformSpeechAuthorization = false;

    onPartial?: TranscriptCallback;
    onFinal?: TranscriptCallback;
    onError?: TranscriptionErrorCallback;

    private readonly sessionId = randomUUID().slice(0, 8);
    private readonly backend: TranscriptionBackendClient;
    private readonly audioInput: AudioInput;
    private readonly realtimeUrl: string;
    private readonly model: string;
    private readonly recordingsDir: string;
    private readonly connect: RealtimeSocketFactory;
    private readonly createFallback: (initialTranscript: string) => TranscriptionProvider;
    private readonly sampleRate: number;
    private readonly converter: AudioFrameConverter;
    private readonly sendQueue: SerialQueue;
    private readonly finalGate = new FinalTranscriptGate();
    private readonly firstPartial = new FirstPartialTracker('streaming');

    private socket: RealtimeSocket | null = null;
    private socketGeneration = 0;
    private scratch: PcmScratchFile | null = null;
    private isActive = false;
    private isCapturing = false;
    private reconnectOnForeground = false;

    private hasFallenBack = false;
    private fallback: TranscriptionProvider | null = null;
    private fallbackTransition: Promise<void> | null = null;

    private itemOrder: string[] = [];
    private readonly partials = new Map<string, string>();
    private readonly completed = new Map<string, string>();
    private activePartialId: string | null = null;
    /** Transcript carried over from earlier segments of this session */
    private carriedTranscript = '';
    private committedTranscript = '';
    private lastTranscript = '';
    private _recordingFilePath: string | null = null;

    constructor(options: StreamingTranscriberOptions) {
        this.backend = options.backend;
        this.audioInput = options.audioInput;
        this.realtimeUrl = options.realtimeUrl;
        this.model = options.model;
        this.recordingsDir = options.recordingsDir;
        this.connect = options.connect ?? connectRealtimeSocket;
        this.sampleRate = options.sampleRate ?? STREAM_SAMPLE_RATE;
        this.createFallback = options.createFallback ?? (initialTranscript => new PollingTranscriber({
            backend: this.backend,
            audioInput: this.audioInput,
            recordingsDir: this.recordingsDir,
            initialTranscript,
        }));
        this.converter = new AudioFrameConverter(this.sampleRate);
        this.sendQueue = new SerialQueue(`streaming:${this.sessionId}:send`);
    }

    get recordingFilePath(): string | null {
        return this.fallback?.recordingFilePath ?? this._recordingFilePath;
    }

    get hasFallenBackToPolling(): boolean {
        return this.hasFallenBack;
    }

    /**
     * Last published transcript, or the committed text plus the live partial
     */
    bestKnownTranscript(): string {
        if (this.lastTranscript) {
            return this.lastTranscript;
        }
        return combineTranscript(this.committedTranscript, this.activePartialText());
    }

    // ============================================
    // PROVIDER CONTRACT
    // ============================================

    async start(): Promise<void> {
        if (this.fallbackTransition) {
            await this.fallbackTransition;
        }
        if (this.fallback) {
            await this.fallback.start();
            return;
        }
        if (this.isCapturing) return;

        if (!this.audioInput.isInputAvailable) {
            throw new DeviceUnavailableError('Audio input unavailable.', this.audioInput.routeSummary());
        }

        this.isActive = true;
        this.firstPartial.begin();
        track('transcription_session_started', { transport: 'streaming' });
        track('transcription_transport', { transport: 'streaming' });

        await this.beginStreaming();
    }

    async stop(): Promise<void> {
        this.isActive = false;
        this.reconnectOnForeground = false;

        if (this.fallbackTransition) {
            await this.fallbackTransition;
        }
        if (this.fallback) {
            await this.fallback.stop();
            return;
        }

        if (this.socket) {
            this.sendCommit();
            await this.sendQueue.drain();
        }
        this.teardownSocket();
        this.stopCapture();
        await this.finalizeRecording();

        const finalText = this.bestKnownTranscript();
        this.carryOverTranscript(finalText);
        if (finalText && finalText !== this.finalGate.lastDelivered) {
            this.onFinal?.(this.finalGate.accept(finalText));
        }
        console.log(`[streaming:${this.sessionId}] Stopped`);
    }

    async cancel(): Promise<void> {
        this.isActive = false;
        this.reconnectOnForeground = false;

        this.stopCapture();
        this.teardownSocket();

        if (this.fallbackTransition) {
            await this.fallbackTransition;
        }
        if (this.fallback) {
            await this.fallback.cancel();
        }

        await this.sendQueue.drain();
        const scratch = this.scratch;
        this.scratch = null;
        if (scratch) {
            await scratch.discard();
        }
        const recordingPath = this._recordingFilePath;
        this._recordingFilePath = null;
        if (recordingPath) {
            await rm(recordingPath, { force: true });
        }

        this.clearTranscriptState();
    }

    async reset(): Promise<void> {
        this.isActive = false;
        this.reconnectOnForeground = false;

        if (this.fallbackTransition) {
            await this.fallbackTransition;
        }
        if (this.fallback) {
            await this.fallback.reset();
        }

        this.stopCapture();
        this.teardownSocket();
        await this.sendQueue.drain();
        const scratch = this.scratch;
        this.scratch = null;
        if (scratch) {
            await scratch.discard();
        }

        this.clearTranscriptState();
    }

    handleAppLifecycle(event: AppLifecycleEvent): void {
        if (this.fallback) {
            this.fallback.handleAppLifecycle?.(event);
            return;
        }

        if (event === 'background') {
            if (!this.isCapturing) return;
            this.reconnectOnForeground = true;
            this.suspend().catch(error => logError(error, `streaming:${this.sessionId}`));
            return;
        }

        if (!this.reconnectOnForeground || !this.isActive) return;
        this.reconnectOnForeground = false;
        this.beginStreaming().catch(error => this.onError?.(toError(error)));
    }

    // ============================================
    // SOCKET
    // ============================================

    private async beginStreaming(): Promise<void> {
        try {
            await this.openSocket();
        } catch (error) {
            await this.fallBack('stream_setup_failed', error);
            return;
        }

        if (!this.scratch) {
            this.scratch = new PcmScratchFile(this.recordingsDir, 'stream', {
                sampleRate: this.sampleRate,
                channels: 1,
            });
        }

        try {
            await this.audioInput.start(frame => this.handleFrame(frame));
            this.isCapturing = true;
        } catch (error) {
            this.teardownSocket();
            throw error;
        }
    }

    private async openSocket(): Promise<void> {
        const secret = await this.backend.createRealtimeSession(this.model);
        const generation = ++this.socketGeneration;
        console.log(`[streaming:${this.sessionId}] Connecting to realtime transcription...`);

        const socket = await this.connect(
            this.realtimeUrl,
            {
                Authorization: `Bearer ${secret}`,
                'OpenAI-Beta': 'realtime=v1',
            },
            {
                onMessage: text => {
                    if (generation === this.socketGeneration) this.handleMessage(text);
                },
                onError: error => {
                    if (generation === this.socketGeneration) this.requestFallback('socket_receive_failed', error);
                },
                onClose: (code, reason) => {
                    if (generation !== this.socketGeneration) return;
                    this.requestFallback('socket_receive_failed', new Error(`Socket closed (${code}) ${reason}`.trim()));
                },
            }
        );

        if (generation !== this.socketGeneration) {
            socket.close();
            throw new Error('Realtime session superseded while connecting');
        }

        this.socket = socket;
        await socket.send(JSON.stringify(buildSessionUpdate(this.model, this.sampleRate)));
        console.log(`[streaming:${this.sessionId}] Connected`);
    }

    private enqueueSend(event: RealtimeClientEvent): void {
        const socket = this.socket;
        if (!socket) return;
        const generation = this.socketGeneration;
        const payload = JSON.stringify(event);

        this.sendQueue.enqueue(async () => {
            try {
                await socket.send(payload);
            } catch (error) {
                if (generation === this.socketGeneration) {
                    this.requestFallback('socket_send_failed', error);
                }
            }
        });
    }

    private sendCommit(): void {
        this.enqueueSend({ type: 'input_audio_buffer.commit' });
    }

    private teardownSocket(): void {
        this.socketGeneration++;
        const socket = this.socket;
        this.socket = null;
        socket?.close();
    }

    private async suspend(): Promise<void> {
        const generation = this.socketGeneration;
        const socket = this.socket;
        this.sendCommit();
        this.stopCapture();
        await this.sendQueue.drain();

        // A foreground during the drain may already have opened the next socket
        if (this.socketGeneration === generation) {
            this.teardownSocket();
        } else {
            socket?.close();
        }
        console.log(`[streaming:${this.sessionId}] Suspended until foreground`);
    }

    // ============================================
    // AUDIO
    // ============================================

    private handleFrame(frame: AudioFrame): void {
        if (!this.isCapturing || this.hasFallenBack) return;
        const pcm = this.converter.convert(frame);
        if (pcm.length === 0) return;

        const chunk = int16ToBuffer(pcm);
        this.scratch?.append(chunk);
        this.enqueueSend({ type: 'input_audio_buffer.append', audio: chunk.toString('base64') });
    }

    private stopCapture(): void {
        if (this.isCapturing) {
            this.audioInput.stop();
            this.isCapturing = false;
        }
        this.converter.reset();
    }

    private async finalizeRecording(): Promise<void> {
        const scratch = this.scratch;
        this.scratch = null;
        if (!scratch) return;
        const path = await scratch.finalize();
        if (path) {
            this._recordingFilePath = path;
        }
    }

    // ============================================
    // INBOUND EVENTS
    // ============================================

    private handleMessage(text: string): void {
        if (this.hasFallenBack) return;

        let event: RealtimeServerEvent;
        try {
            event = JSON.parse(text) as RealtimeServerEvent;
        } catch (error) {
            console.warn(`[streaming:${this.sessionId}] Failed to parse message: ${errorMessage(error)}`);
            return;
        }

        switch (event.type) {
            case 'input_audio_buffer.committed':
                if (event.item_id) this.recordItem(event.item_id);
                break;

            case 'conversation.item.input_audio_transcription.delta':
                if (!event.item_id) break;
                this.partials.set(event.item_id, (this.partials.get(event.item_id) ?? '') + (event.delta ?? ''));
                this.activePartialId = event.item_id;
                this.publishPartial();
                break;

            case 'conversation.item.input_audio_transcription.completed':
                if (!event.item_id) break;
                this.completeItem(event.item_id, event.transcript || undefined);
                break;

            case 'error':
                this.requestFallback('provider_error_event', new Error(event.error?.message ?? 'Realtime provider error'));
                break;

            default:
                break;
        }
    }

    private recordItem(itemId: string): void {
        if (!this.itemOrder.includes(itemId)) {
            this.itemOrder.push(itemId);
        }
    }

    /**
     * A completion without text keeps whatever the item's deltas spelled out
     */
    private completeItem(itemId: string, transcript: string | undefined): void {
        const text = normalizeTranscript(transcript ?? this.partials.get(itemId) ?? '');
        if (!text) return;

        this.recordItem(itemId);
        this.completed.set(itemId, text);
        this.partials.delete(itemId);
        if (this.activePartialId === itemId) {
            this.activePartialId = null;
        }

        const items = this.itemOrder
            .map(id => this.completed.get(id) ?? '')
            .filter(text => text.length > 0)
            .join('\n');
        this.committedTranscript = combineTranscript(this.carriedTranscript, items);
        this.lastTranscript = combineTranscript(this.committedTranscript, this.activePartialText());

        if (this.committedTranscript) {
            this.firstPartial.mark();
            this.onFinal?.(this.finalGate.accept(this.committedTranscript));
        }
    }

    private clearTranscriptState(): void {
        this.itemOrder = [];
        this.partials.clear();
        this.completed.clear();
        this.activePartialId = null;
        this.carriedTranscript = '';
        this.committedTranscript = '';
        this.lastTranscript = '';
        this.finalGate.reset();
    }

    private publishPartial(): void {
        const combined = combineTranscript(this.committedTranscript, this.activePartialText());
        if (!combined || combined === this.lastTranscript) return;
        this.lastTranscript = combined;
        this.firstPartial.mark();
        this.onPartial?.(combined);
    }

    private activePartialText(): string {
        if (!this.activePartialId) return '';
        return normalizeTranscript(this.partials.get(this.activePartialId) ?? '');
    }

    /**
     * Text of a stopped segment becomes the prefix of the next one; item ids
     * are per connection and start over.
     */
    private carryOverTranscript(text: string): void {
        this.carriedTranscript = text;
        this.committedTranscript = text;
        this.lastTranscript = text;
        this.itemOrder = [];
        this.partials.clear();
        this.completed.clear();
        this.activePartialId = null;
    }

    // ============================================
    // FALLBACK
    // ============================================

    private requestFallback(reason: FallbackReason, error: unknown): void {
        this.fallBack(reason, error).catch(failure => this.onError?.(toError(failure)));
    }

    /**
     * Latched hand-off to polling. The socket and capture tap are released
     * first, then the polling provider takes over the same callbacks.
     */
    private fallBack(reason: FallbackReason, error: unknown): Promise<void> {
        if (this.hasFallenBack) {
            return this.fallbackTransition ?? Promise.resolve();
        }
        this.hasFallenBack = true;
        this.fallbackTransition = this.performFallback(reason, error).finally(() => {
            this.fallbackTransition = null;
        });
        return this.fallbackTransition;
    }

    private async performFallback(reason: FallbackReason, error: unknown): Promise<void> {
        console.warn(`[streaming:${this.sessionId}] Falling back to polling (${reason}): ${errorMessage(error)}`);
        track('transcription_fallback_triggered', { reason, message: errorMessage(error) });

        this.teardownSocket();
        this.stopCapture();
        await this.finalizeRecording();

        const fallback = this.createFallback(this.bestKnownTranscript());
        fallback.onPartial = text => this.onPartial?.(text);
        fallback.onFinal = text => this.onFinal?.(this.finalGate.accept(text));
        fallback.onError = failure => this.onError?.(failure);
        this.fallback = fallback;
        track('transcription_transport', { transport: 'polling', reason });

        if (this.isActive) {
            await fallback.start();
        }
    }
}
