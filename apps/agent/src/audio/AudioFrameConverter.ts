// Audio Frame Converter
// Downmixes and resamples captured float frames to mono 16-bit PCM

import type { AudioFrame } from './AudioCapture.js';

function clampInt16(n: number): number {
    if (n > 32767) return 32767;
    if (n < -32768) return -32768;
    return n | 0;
}

/**
 * Float sample in [-1, 1] to a signed 16-bit sample
 */
export function floatToInt16(sample: number): number {
    const clamped = Math.max(-1, Math.min(1, sample));
    return clampInt16(Math.round(clamped < 0 ? clamped * 32768 : clamped * 32767));
}

export function int16ToBuffer(samples: Int16Array): Buffer {
    const buffer = Buffer.alloc(samples.length * 2);
    for (let i = 0; i < samples.length; i++) {
        buffer.writeInt16LE(samples[i], i * 2);
    }
    return buffer;
}

/**
 * Stateful linear resampler. The fractional read position and the last input
 * sample carry over between frames so consecutive frames join without clicks.
 */
export class AudioFrameConverter {
    private position = 0;
    private lastSample = 0;
    private sourceRate: number | null = null;

    constructor(readonly targetSampleRate: number) {
        if (!Number.isFinite(targetSampleRate) || targetSampleRate <= 0) {
            throw new RangeError(`Invalid target sample rate: ${targetSampleRate}`);
        }
    }

    convert(frame: AudioFrame): Int16Array {
        const mono = this.downmix(frame);
        if (mono.length === 0) {
            return new Int16Array(0);
        }

        if (this.sourceRate !== frame.sampleRate) {
            this.sourceRate = frame.sampleRate;
            this.position = 0;
        }

        if (frame.sampleRate === this.targetSampleRate) {
            const out = new Int16Array(mono.length);
            for (let i = 0; i < mono.length; i++) {
                out[i] = floatToInt16(mono[i]);
            }
            this.lastSample = mono[mono.length - 1];
            return out;
        }

        const step = frame.sampleRate / this.targetSampleRate;
        const lastIndex = mono.length - 1;
        const count = this.position > lastIndex ? 0 : Math.floor((lastIndex - this.position) / step) + 1;
        const out = new Int16Array(count);

        for (let k = 0; k < count; k++) {
            const pos = this.position + k * step;
            const index = Math.floor(pos);
            const frac = pos - index;
            // index is -1 only for the bridge between the previous frame and this one
            const a = index < 0 ? this.lastSample : mono[index];
            const b = index + 1 <= lastIndex ? mono[index + 1] : a;
            out[k] = floatToInt16(a + (b - a) * frac);
        }

        this.position = this.position + count * step - mono.length;
        this.lastSample = mono[lastIndex];
        return out;
    }

    reset(): void {
        this.position = 0;
        this.lastSample = 0;
        this.sourceRate = null;
    }

    private downmix(frame: AudioFrame): Float32Array {
        const channels = Math.max(1, frame.channels);
        if (channels === 1) {
            return frame.samples;
        }

        const length = Math.floor(frame.samples.length / channels);
        const mono = new Float32Array(length);
        for (let i = 0; i < length; i++) {
            let sum = 0;
            for (let c = 0; c < channels; c++) {
                sum += frame.samples[i * channels + c];
            }
            mono[i] = sum / channels;
        }
        return mono;
    }
}
