import { describe, it, expect } from 'vitest';
import { WAV_HEADER_BYTES, encodeWav, wavHeader } from './wav.js';

describe('wavHeader', () => {
    it('should describe 16-bit mono PCM', () => {
        const header = wavHeader(100, { sampleRate: 16000, channels: 1 });

        expect(header).toHaveLength(WAV_HEADER_BYTES);
        expect(header.toString('ascii', 0, 4)).toBe('RIFF');
        expect(header.readUInt32LE(4)).toBe(136);
        expect(header.toString('ascii', 8, 12)).toBe('WAVE');
        expect(header.toString('ascii', 12, 16)).toBe('fmt ');
        expect(header.readUInt16LE(20)).toBe(1);
        expect(header.readUInt16LE(22)).toBe(1);
        expect(header.readUInt32LE(24)).toBe(16000);
        expect(header.readUInt32LE(28)).toBe(32000);
        expect(header.readUInt16LE(32)).toBe(2);
        expect(header.readUInt16LE(34)).toBe(16);
        expect(header.toString('ascii', 36, 40)).toBe('data');
        expect(header.readUInt32LE(40)).toBe(100);
    });

    it('should account for every channel in the byte rate', () => {
        const header = wavHeader(0, { sampleRate: 24000, channels: 2 });
        expect(header.readUInt32LE(28)).toBe(96000);
        expect(header.readUInt16LE(32)).toBe(4);
    });
});

describe('encodeWav', () => {
    it('should prefix the PCM with the header', () => {
        const pcm = Buffer.from([1, 2, 3, 4]);
        const wav = encodeWav(pcm, { sampleRate: 24000, channels: 1 });

        expect(wav).toHaveLength(48);
        expect(wav.readUInt32LE(40)).toBe(4);
        expect([...wav.subarray(44)]).toEqual([1, 2, 3, 4]);
    });
});
