// Realtime Socket
// Thin promise-based wrapper around a ws connection carrying JSON text frames

import WebSocket from 'ws';

export interface RealtimeSocketHandlers {
    onMessage(text: string): void;
    onError(error: Error): void;
    onClose(code: number, reason: string): void;
}

export interface RealtimeSocket {
    /** Resolves once the frame is flushed, rejects when the socket refuses it */
    send(text: string): Promise<void>;
    close(): void;
}

export type RealtimeSocketFactory = (
    url: string,
    headers: Record<string, string>,
    handlers: RealtimeSocketHandlers
) => Promise<RealtimeSocket>;

const CONNECT_TIMEOUT_MS = 10000;

class WsRealtimeSocket implements RealtimeSocket {
    private closed = false;

    constructor(private readonly ws: WebSocket) {}

    send(text: string): Promise<void> {
        if (this.closed || this.ws.readyState !== WebSocket.OPEN) {
            return Promise.reject(new Error('Realtime socket is not open'));
        }
        return new Promise<void>((resolve, reject) => {
            this.ws.send(text, error => {
                if (error) {
                    reject(error);
                } else {
                    resolve();
                }
            });
        });
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.ws.removeAllListeners();
        // A late error after close must not crash the process
        this.ws.on('error', () => undefined);
        if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
            this.ws.close(1000, 'Client disconnect');
        }
    }
}

/**
 * Opens a ws connection and waits for it to be ready
 */
export const connectRealtimeSocket: RealtimeSocketFactory = async (url, headers, handlers) => {
    const ws = new WebSocket(url, { headers });

    await new Promise<void>((resolve, reject) => {
        const timeout = setTimeout(() => {
            ws.removeAllListeners();
            ws.on('error', () => undefined);
            ws.terminate();
            reject(new Error('Connection timeout'));
        }, CONNECT_TIMEOUT_MS);

        ws.once('open', () => {
            clearTimeout(timeout);
            resolve();
        });

        ws.once('error', error => {
            clearTimeout(timeout);
            reject(error);
        });
    });

    ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
        if (isBinary) return;
        handlers.onMessage(data.toString());
    });

    ws.on('error', (error: Error) => {
        handlers.onError(error);
    });

    ws.on('close', (code: number, reason: Buffer) => {
        handlers.onClose(code, reason.toString());
    });

    return new WsRealtimeSocket(ws);
};
