import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { WebSocketServer } from 'ws';
import type { WebSocket } from 'ws';
import { connectRealtimeSocket } from './realtimeSocket.js';
import type { RealtimeSocketHandlers } from './realtimeSocket.js';

async function listen(): Promise<{ server: WebSocketServer; url: string }> {
    const server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    await new Promise<void>(resolve => server.once('listening', () => resolve()));
    const address = server.address();
    if (typeof address !== 'object' || address === null) {
        throw new Error('server has no TCP address');
    }
    return { server, url: `ws://127.0.0.1:${address.port}` };
}

function closeServer(server: WebSocketServer): Promise<void> {
    for (const client of server.clients) {
        client.terminate();
    }
    return new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
    });
}

describe('connectRealtimeSocket', () => {
    let server: WebSocketServer;
    let url: string;
    let peers: WebSocket[];
    let authorization: string | undefined;
    let received: string[];
    let messages: string[];
    let closes: Array<[number, string]>;
    let handlers: RealtimeSocketHandlers;

    beforeEach(async () => {
        ({ server, url } = await listen());
        peers = [];
        received = [];
        messages = [];
        closes = [];
        server.on('connection', (peer, request) => {
            authorization = request.headers.authorization;
            peer.on('message', data => received.push(data.toString()));
            peers.push(peer);
        });
        handlers = {
            onMessage: text => messages.push(text),
            onError: vi.fn(),
            onClose: (code, reason) => closes.push([code, reason]),
        };
    });

    afterEach(async () => {
        await closeServer(server);
    });

    it('should send the handshake headers and exchange text frames', async () => {
        const socket = await connectRealtimeSocket(url, { Authorization: 'Bearer test-secret' }, handlers);

        await socket.send('{"type":"session.update"}');
        await vi.waitFor(() => expect(received).toEqual(['{"type":"session.update"}']));
        expect(authorization).toBe('Bearer test-secret');

        peers[0].send(Buffer.from([1, 2, 3]), { binary: true });
        peers[0].send('{"type":"input_audio_buffer.committed"}');
        await vi.waitFor(() => expect(messages).toEqual(['{"type":"input_audio_buffer.committed"}']));

        socket.close();
    });

    it('should report a close from the server', async () => {
        await connectRealtimeSocket(url, {}, handlers);
        await vi.waitFor(() => expect(peers).toHaveLength(1));

        peers[0].close(4000, 'session expired');

        await vi.waitFor(() => expect(closes).toEqual([[4000, 'session expired']]));
    });

    it('should refuse to send after close', async () => {
        const socket = await connectRealtimeSocket(url, {}, handlers);

        socket.close();
        socket.close();

        await expect(socket.send('late')).rejects.toThrow('Realtime socket is not open');
        expect(closes).toEqual([]);
    });

    it('should reject when nothing is listening', async () => {
        const stopped = await listen();
        await closeServer(stopped.server);

        await expect(connectRealtimeSocket(stopped.url, {}, handlers)).rejects.toThrow();
    });
});
