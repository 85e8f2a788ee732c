import { once } from "node:events";
import * as net from "node:net";
import WebSocket, { WebSocketServer } from "ws";
import { decodeState } from "../src/framing.js";
import type { StateFrame } from "../src/protocol.js";

export function wait(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

/** Poll `condition` every 10ms until it holds or `timeoutMs` passes. */
export async function waitFor(
    condition: () => boolean,
    timeoutMs = 2000,
    label = "condition",
): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!condition()) {
        if (Date.now() > deadline) {
            throw new Error(`Timed out waiting for ${label}`);
        }
        await wait(10);
    }
}

/** A bare WebSocket server on a free loopback port, for driving clients from a test. */
export interface TestServer {
    port: number;
    url: string;
    sockets: WebSocket[];
    received: string[];
    close(): Promise<void>;
}

export async function startTestServer(port = 0): Promise<TestServer> {
    const wss = new WebSocketServer({ host: "127.0.0.1", port });
    await once(wss, "listening");

    const sockets: WebSocket[] = [];
    const received: string[] = [];
    wss.on("connection", (socket) => {
        sockets.push(socket);
        socket.on("error", () => { /* peer resets are expected in tests */ });
        socket.on("message", (data) => received.push(data.toString()));
    });

    const addr = wss.address();
    if (typeof addr !== "object" || addr === null) {
        throw new Error("Test server has no TCP address");
    }

    return {
        port: addr.port,
        url: `ws://127.0.0.1:${addr.port}`,
        sockets,
        received,
        async close() {
            for (const socket of sockets) socket.terminate();
            await new Promise<void>((resolve) => wss.close(() => resolve()));
        },
    };
}

/** A loopback port with nothing listening on it. */
export async function freePort(): Promise<number> {
    const server = net.createServer();
    server.listen(0, "127.0.0.1");
    await once(server, "listening");
    const addr = server.address();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (typeof addr !== "object" || addr === null) {
        throw new Error("No TCP address");
    }
    return addr.port;
}

/** A TCP server that accepts connections but never answers the WebSocket handshake. */
export async function startSilentServer(): Promise<{ url: string; close(): Promise<void> }> {
    const sockets: net.Socket[] = [];
    const server = net.createServer((socket) => {
        sockets.push(socket);
        socket.on("error", () => { /* client aborts the handshake */ });
    });
    server.listen(0, "127.0.0.1");
    await once(server, "listening");
    const addr = server.address();
    if (typeof addr !== "object" || addr === null) {
        throw new Error("No TCP address");
    }
    return {
        url: `ws://127.0.0.1:${addr.port}`,
        async close() {
            for (const socket of sockets) socket.destroy();
            await new Promise<void>((resolve) => server.close(() => resolve()));
        },
    };
}

/** A raw WebSocket client that records every state frame it receives. */
export interface StateClient {
    socket: WebSocket;
    states: StateFrame[];
    /** Wait until the latest state frame carries `positions`. */
    settlesAt(positions: readonly number[], timeoutMs?: number): Promise<void>;
    close(): Promise<void>;
}

export async function connectClient(url: string | null): Promise<StateClient> {
    if (url === null) throw new Error("Endpoint is not listening");
    const socket = new WebSocket(url);
    const states: StateFrame[] = [];
    socket.on("message", (data) => {
        const result = decodeState(data);
        if (result.ok) states.push(result.frame);
    });
    socket.on("error", () => { /* surfaced through close in tests */ });
    await once(socket, "open");

    const latest = () => states[states.length - 1]?.joint_pos;
    return {
        socket,
        states,
        settlesAt: (positions, timeoutMs = 2000) =>
            waitFor(
                () => JSON.stringify(latest()) === JSON.stringify(positions),
                timeoutMs,
                `state ${JSON.stringify(positions)}`,
            ),
        async close() {
            if (socket.readyState === WebSocket.CLOSED) return;
            const closed = once(socket, "close");
            socket.close();
            await closed;
        },
    };
}
