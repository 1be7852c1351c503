// WAV Helpers
// Canonical 44-byte RIFF header for 16-bit PCM and whole-buffer WAV encoding

export const WAV_HEADER_BYTES = 44;

export interface PcmFormat {
    sampleRate: number;
    channels: number;
}

export function wavHeader(pcmDataBytes: number, format: PcmFormat): Buffer {
    const bytesPerSample = 2;
    const blockAlign = format.channels * bytesPerSample;
    const byteRate = format.sampleRate * blockAlign;

    const header = Buffer.alloc(WAV_HEADER_BYTES);
    header.write('RIFF', 0, 'ascii');
    header.writeUInt32LE(36 + pcmDataBytes, 4);
    header.write('WAVE', 8, 'ascii');
    header.write('fmt ', 12, 'ascii');
    header.writeUInt32LE(16, 16);
    header.writeUInt16LE(1, 20);
    header.writeUInt16LE(format.channels, 22);
    header.writeUInt32LE(format.sampleRate, 24);
    header.writeUInt32LE(byteRate, 28);
    header.writeUInt16LE(blockAlign, 32);
    header.writeUInt16LE(bytesPerSample * 8, 34);
    header.write('data', 36, 'ascii');
    header.writeUInt32LE(pcmDataBytes, 40);
    return header;
}

export function encodeWav(pcm: Buffer, format: PcmFormat): Buffer {
    return Buffer.concat([wavHeader(pcm.length, format), pcm]);
}
