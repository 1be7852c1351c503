import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { TranscribeRequest, TranscribeResponse } from '@reverie/contracts';
import type { AudioFrame, AudioFrameHandler, AudioInput } from '../audio/AudioCapture.js';
import { BackendHttpError, PayloadError } from '../utils/errors.js';
import { PollingTranscriber, isIgnorablePartialError } from './PollingTranscriber.js';

class FakeAudioInput implements AudioInput {
    isInputAvailable = true;
    private handler: AudioFrameHandler | null = null;

    start = vi.fn(async (onFrame: AudioFrameHandler) => {
        this.handler = onFrame;
    });

    stop = vi.fn(() => {
        this.handler = null;
    });

    routeSummary(): string {
        return 'in=test-mic out=test-speaker';
    }

    emit(frame: AudioFrame): void {
        this.handler?.(frame);
    }
}

/** Mono 16kHz float frame; every sample becomes two bytes of PCM */
function speech(samples: number): AudioFrame {
    return { samples: new Float32Array(samples).fill(0.1), sampleRate: 16000, channels: 1 };
}

function makeBackend() {
    return {
        createRealtimeSession: vi.fn(async (_model: string): Promise<string> => 'test-secret'),
        transcribe: vi.fn(async (_request: TranscribeRequest): Promise<TranscribeResponse> => ({ text: '' })),
    };
}

describe('isIgnorablePartialError', () => {
    it('should match corrupted-audio rejections only', () => {
        expect(isIgnorablePartialError(
            new BackendHttpError('function transcribe', 400, '{"error":{"message":"Audio file might be corrupted or unsupported."}}')
        )).toBe(true);
        expect(isIgnorablePartialError(
            new BackendHttpError('function transcribe', 400, '{"error":{"code":"invalid_value"}}')
        )).toBe(true);
        expect(isIgnorablePartialError(
            new BackendHttpError('function transcribe', 500, '{"error":{"code":"invalid_value"}}')
        )).toBe(false);
        expect(isIgnorablePartialError(new Error('audio file might be corrupted or unsupported'))).toBe(false);
    });
});

describe('PollingTranscriber', () => {
    let input: FakeAudioInput;
    let backend: ReturnType<typeof makeBackend>;
    let partials: string[];
    let finals: string[];
    let errors: Error[];

    function create(options: Partial<ConstructorParameters<typeof PollingTranscriber>[0]> = {}): PollingTranscriber {
        const transcriber = new PollingTranscriber({ backend, audioInput: input, ...options });
        transcriber.onPartial = text => partials.push(text);
        transcriber.onFinal = text => finals.push(text);
        transcriber.onError = error => errors.push(error);
        return transcriber;
    }

    beforeEach(() => {
        vi.useFakeTimers();
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        input = new FakeAudioInput();
        backend = makeBackend();
        partials = [];
        finals = [];
        errors = [];
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('should upload the grown buffer as WAV with the seeded prompt', async () => {
        backend.transcribe.mockResolvedValue({ text: 'Hello there. How' });
        const transcriber = create({ initialTranscript: 'I went for a walk' });

        await transcriber.start();
        input.emit(speech(1600));
        await vi.advanceTimersByTimeAsync(2200);

        await vi.waitFor(() => expect(partials).toEqual(['I went for a walk\nHello there.\nHow']));
        const request = backend.transcribe.mock.calls[0][0];
        expect(request.mimeType).toBe('audio/wav');
        expect(request.fileName).toBe('recording.wav');
        expect(request.prompt).toBe('I went for a walk');

        const wav = Buffer.from(request.audioBase64, 'base64');
        expect(wav).toHaveLength(3244);
        expect(wav.readUInt32LE(24)).toBe(16000);

        await transcriber.cancel();
    });

    it('should skip a cycle when no audio arrived since the last upload', async () => {
        backend.transcribe.mockResolvedValue({ text: 'Hello.' });
        const transcriber = create();

        await transcriber.start();
        input.emit(speech(1600));
        await vi.advanceTimersByTimeAsync(2200);
        await vi.advanceTimersByTimeAsync(2200);

        expect(backend.transcribe).toHaveBeenCalledTimes(1);
        await transcriber.cancel();
    });

    it('should wait for the minimum amount of audio', async () => {
        const transcriber = create();

        await transcriber.start();
        input.emit(speech(100));
        await vi.advanceTimersByTimeAsync(2200);

        expect(backend.transcribe).not.toHaveBeenCalled();
        await transcriber.cancel();
    });

    it('should stay silent about corrupted-audio rejections while polling', async () => {
        backend.transcribe.mockRejectedValue(
            new BackendHttpError('function transcribe', 400, 'Audio file might be corrupted or unsupported')
        );
        const transcriber = create();

        await transcriber.start();
        for (let cycle = 0; cycle < 3; cycle++) {
            input.emit(speech(1600));
            await vi.advanceTimersByTimeAsync(2200);
        }
        await vi.advanceTimersByTimeAsync(100);

        expect(backend.transcribe).toHaveBeenCalledTimes(3);
        expect(errors).toEqual([]);
        await transcriber.cancel();
    });

    it('should surface repeated polling failures once', async () => {
        backend.transcribe.mockRejectedValue(new BackendHttpError('function transcribe', 500, 'upstream unavailable'));
        const transcriber = create();

        await transcriber.start();
        for (let cycle = 0; cycle < 3; cycle++) {
            input.emit(speech(1600));
            await vi.advanceTimersByTimeAsync(2200);
        }

        await vi.waitFor(() => expect(errors).toHaveLength(1));
        expect(errors[0].message).toBe('Transcription failed (HTTP 500). upstream unavailable');
        await transcriber.cancel();
    });

    it('should report the size limit once per segment', async () => {
        const transcriber = create({ maxAudioBytes: 3000 });

        await transcriber.start();
        input.emit(speech(1600));
        await vi.advanceTimersByTimeAsync(2200);
        input.emit(speech(1600));
        await vi.advanceTimersByTimeAsync(2200);

        expect(backend.transcribe).not.toHaveBeenCalled();
        expect(errors).toHaveLength(1);
        expect(errors[0]).toBeInstanceOf(PayloadError);
        expect(errors[0].message).toBe(
            'Transcription segment reached size limit. Pause and resume recording to start a new segment.'
        );
        await transcriber.cancel();
    });

    it('should deliver the final upload on stop and start a fresh segment on resume', async () => {
        const transcriber = create({ initialTranscript: 'I went for a walk' });

        backend.transcribe.mockResolvedValueOnce({ text: 'and it was nice.' });
        await transcriber.start();
        input.emit(speech(1600));
        await transcriber.stop();

        expect(finals).toEqual(['I went for a walk\nand it was nice.']);
        expect(transcriber.transcript).toBe('I went for a walk\nand it was nice.');

        backend.transcribe.mockResolvedValueOnce({ text: 'Then home.' });
        await transcriber.start();
        input.emit(speech(1600));
        await transcriber.stop();

        expect(finals[1]).toBe('I went for a walk\nand it was nice.\nThen home.');
        const second = backend.transcribe.mock.calls[1][0];
        expect(second.prompt).toBe('I went for a walk\nand it was nice.');
        expect(Buffer.from(second.audioBase64, 'base64')).toHaveLength(3244);
    });

    it('should refuse an oversized final upload', async () => {
        const transcriber = create({ maxAudioBytes: 3000 });

        await transcriber.start();
        input.emit(speech(1600));
        await transcriber.stop();

        expect(backend.transcribe).not.toHaveBeenCalled();
        expect(errors.map(error => error.message)).toEqual([
            'Final transcription payload too large (3244 bytes). Pause and resume to start a new segment.',
        ]);
    });

    it('should keep the last partial when the final upload fails', async () => {
        backend.transcribe
            .mockResolvedValueOnce({ text: 'Hello there.' })
            .mockRejectedValueOnce(new BackendHttpError('function transcribe', 502, 'bad gateway'));
        const transcriber = create();

        await transcriber.start();
        input.emit(speech(1600));
        await vi.advanceTimersByTimeAsync(2200);
        await vi.waitFor(() => expect(partials).toEqual(['Hello there.']));

        input.emit(speech(1600));
        await transcriber.stop();

        expect(errors.map(error => error.message)).toEqual(['Transcription failed (HTTP 502). bad gateway']);
        expect(transcriber.transcript).toBe('Hello there.');
    });

    it('should reject start without an audio input', async () => {
        input.isInputAvailable = false;
        const transcriber = create();

        await expect(transcriber.start()).rejects.toThrow(
            'Audio input unavailable. route=in=test-mic out=test-speaker.'
        );
    });

    it('should write the stopped segment to a WAV file and delete it on cancel', async () => {
        const recordingsDir = await mkdtemp(join(tmpdir(), 'reverie-polling-'));
        try {
            backend.transcribe.mockResolvedValue({ text: 'Saved.' });
            const transcriber = create({ recordingsDir });

            await transcriber.start();
            input.emit(speech(1600));
            await transcriber.stop();

            const path = transcriber.recordingFilePath;
            expect(path).not.toBeNull();
            if (!path) return;
            expect(path.endsWith('.wav')).toBe(true);
            expect(await readFile(path)).toHaveLength(3244);

            await transcriber.cancel();
            expect(transcriber.recordingFilePath).toBeNull();
            await expect(stat(path)).rejects.toThrow();
            expect(transcriber.transcript).toBe('');
        } finally {
            await rm(recordingsDir, { recursive: true, force: true });
        }
    });

    it('should start the next entry empty after a reset and keep the finished recording', async () => {
        const recordingsDir = await mkdtemp(join(tmpdir(), 'reverie-polling-'));
        try {
            backend.transcribe
                .mockResolvedValueOnce({ text: 'First entry.' })
                .mockResolvedValueOnce({ text: 'Second entry.' });
            const transcriber = create({ recordingsDir, initialTranscript: 'I went for a walk' });

            await transcriber.start();
            input.emit(speech(1600));
            await transcriber.stop();
            const path = transcriber.recordingFilePath;

            await transcriber.reset();

            expect(transcriber.transcript).toBe('');
            expect(transcriber.recordingFilePath).toBe(path);
            if (!path) return;
            expect(await readFile(path)).toHaveLength(3244);

            await transcriber.start();
            input.emit(speech(1600));
            await transcriber.stop();

            expect(finals).toEqual(['I went for a walk\nFirst entry.', 'Second entry.']);
            expect(backend.transcribe.mock.calls[1][0].prompt).toBeUndefined();
        } finally {
            await rm(recordingsDir, { recursive: true, force: true });
        }
    });
});
