// PCM Scratch File
// Appends raw PCM on a serial write queue, then finalizes it into a WAV file

import { createReadStream, createWriteStream } from 'node:fs';
import { open, rm } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { SerialQueue } from '../utils/SerialQueue.js';
import { logError } from '../utils/errors.js';
import { wavHeader } from './wav.js';
import type { PcmFormat } from './wav.js';

export class PcmScratchFile {
    readonly pcmPath: string;
    readonly wavPath: string;

    private handle: FileHandle | null = null;
    private opening: Promise<void> | null = null;
    private readonly writeQueue: SerialQueue;
    private bytesWritten = 0;
    private finalized: Promise<string | null> | null = null;

    constructor(dir: string, prefix: string, private readonly format: PcmFormat) {
        const id = randomUUID();
        this.pcmPath = join(dir, `${prefix}-${id}.pcm`);
        this.wavPath = join(dir, `${prefix}-${id}.wav`);
        this.writeQueue = new SerialQueue(`scratch:${prefix}`);
    }

    get byteLength(): number {
        return this.bytesWritten;
    }

    /**
     * Queue a chunk for writing; never blocks the caller
     */
    append(chunk: Buffer): void {
        if (chunk.length === 0 || this.finalized) return;
        this.writeQueue.enqueue(async () => {
            const handle = await this.ensureOpen();
            await handle.write(chunk);
            this.bytesWritten += chunk.length;
        });
    }

    /**
     * Waits for pending writes, closes the scratch file and writes the WAV file.
     * Resolves to the WAV path, or null when nothing was captured.
     */
    finalize(): Promise<string | null> {
        if (!this.finalized) {
            this.finalized = this.writeWav();
        }
        return this.finalized;
    }

    private async writeWav(): Promise<string | null> {
        await this.writeQueue.drain();
        await this.closeHandle();

        try {
            const size = this.bytesWritten;
            if (size === 0) {
                return null;
            }
            const out = createWriteStream(this.wavPath);
            out.write(wavHeader(size, this.format));
            await pipeline(createReadStream(this.pcmPath), out);
            return this.wavPath;
        } catch (error) {
            logError(error, 'scratch:finalize');
            await rm(this.wavPath, { force: true });
            return null;
        } finally {
            await rm(this.pcmPath, { force: true });
        }
    }

    /**
     * Drops pending writes' results and deletes both files
     */
    async discard(): Promise<void> {
        await this.writeQueue.drain();
        await this.closeHandle();
        await rm(this.pcmPath, { force: true });
        await rm(this.wavPath, { force: true });
    }

    private async ensureOpen(): Promise<FileHandle> {
        if (!this.handle) {
            if (!this.opening) {
                this.opening = open(this.pcmPath, 'a').then(handle => {
                    this.handle = handle;
                });
            }
            await this.opening;
        }
        if (!this.handle) {
            throw new Error(`Scratch file ${this.pcmPath} is not open`);
        }
        return this.handle;
    }

    private async closeHandle(): Promise<void> {
        const handle = this.handle;
        this.handle = null;
        this.opening = null;
        if (handle) {
            await handle.close();
        }
    }
}
