import { describe, it, afterEach } from "node:test";
import assert from "node:assert/strict";
import { ConnectionManager, type ConnectionManagerOptions } from "../src/connection.js";
import { frameText } from "../src/framing.js";
import {
    AlreadyConnectedError,
    ConnectionFailedError,
    NotConnectedError,
    TransportClosedError,
} from "../src/errors.js";
import {
    type TestServer,
    freePort,
    startSilentServer,
    startTestServer,
    wait,
    waitFor,
} from "./helpers.js";

describe("ConnectionManager", () => {
    const servers: Array<{ close(): Promise<void> }> = [];
    const managers: ConnectionManager[] = [];

    function manager(options: ConnectionManagerOptions): ConnectionManager {
        const m = new ConnectionManager(options);
        managers.push(m);
        return m;
    }

    async function server(port?: number): Promise<TestServer> {
        const s = await startTestServer(port);
        servers.push(s);
        return s;
    }

    afterEach(async () => {
        for (const m of managers) {
            if (m.connected) await m.disconnect();
        }
        managers.length = 0;
        for (const s of servers.reverse()) await s.close();
        servers.length = 0;
    });

    it("connects to a listening endpoint", async () => {
        const s = await server();
        const m = manager({ url: s.url });
        let connected = false;
        m.on("connect", () => { connected = true; });

        await m.connect();

        assert.equal(m.connected, true);
        assert.equal(connected, true);
        assert.equal(m.url, s.url);
        await waitFor(() => s.sockets.length === 1);
    });

    it("refuses a second connect without disturbing the first", async () => {
        const s = await server();
        const m = manager({ url: s.url });
        await m.connect();

        await assert.rejects(m.connect(), AlreadyConnectedError);

        assert.equal(m.connected, true);
        m.send("still here");
        await waitFor(() => s.received.length === 1);
        assert.deepEqual(s.received, ["still here"]);
        assert.equal(s.sockets.length, 1);
    });

    it("refuses a connect while another is in progress", async () => {
        const port = await freePort();
        const m = manager({ url: `ws://127.0.0.1:${port}`, attempts: 3, retryDelayMs: 50 });
        const first = m.connect();
        await assert.rejects(m.connect(), AlreadyConnectedError);
        await assert.rejects(first, ConnectionFailedError);
    });

    it("fails after exhausting its attempts", async () => {
        const port = await freePort();
        const m = manager({
            url: `ws://127.0.0.1:${port}`,
            attempts: 3,
            attemptTimeoutMs: 500,
            retryDelayMs: 10,
        });
        const failures: number[] = [];
        m.on("attempt-failed", (attempt: number) => failures.push(attempt));

        await assert.rejects(m.connect(), (err: unknown) => {
            assert.ok(err instanceof ConnectionFailedError);
            assert.equal(err.attempts, 3);
            assert.equal(err.message, `Cannot connect to ws://127.0.0.1:${port} after 3 attempts`);
            return true;
        });
        assert.deepEqual(failures, [1, 2, 3]);
        assert.equal(m.connected, false);
    });

    it("connects once the endpoint comes up", async () => {
        const port = await freePort();
        const m = manager({ url: `ws://127.0.0.1:${port}`, attempts: 40, retryDelayMs: 25 });
        const pending = m.connect();

        await wait(100);
        await server(port);

        await pending;
        assert.equal(m.connected, true);
    });

    it("times out an attempt that never completes the handshake", async () => {
        const silent = await startSilentServer();
        servers.push(silent);
        const m = manager({ url: silent.url, attempts: 2, attemptTimeoutMs: 100, retryDelayMs: 10 });

        await assert.rejects(m.connect(), (err: unknown) => {
            assert.ok(err instanceof ConnectionFailedError);
            assert.ok(err.cause instanceof Error);
            assert.equal(err.cause.message, "timed out after 100ms");
            return true;
        });
    });

    it("stops retrying when aborted", async () => {
        const port = await freePort();
        const m = manager({ url: `ws://127.0.0.1:${port}`, attempts: 1000, retryDelayMs: 50 });
        const controller = new AbortController();
        const pending = m.connect({ signal: controller.signal });

        await wait(80);
        controller.abort();

        await assert.rejects(pending, ConnectionFailedError);
        assert.equal(m.connected, false);
    });

    it("requires a connection to send or disconnect", async () => {
        const m = manager({ url: "ws://127.0.0.1:1" });
        assert.throws(() => m.send("x"), NotConnectedError);
        await assert.rejects(m.disconnect(), NotConnectedError);
        assert.equal(m.tryReceive(), null);
    });

    it("queues inbound frames for polling", async () => {
        const s = await server();
        const m = manager({ url: s.url });
        await m.connect();
        assert.equal(m.tryReceive(), null);

        await waitFor(() => s.sockets.length === 1);
        s.sockets[0]?.send("one");
        s.sockets[0]?.send("two");
        await waitFor(() => m.pending === 2);

        const first = m.tryReceive();
        const second = m.tryReceive();
        assert.ok(first !== null && second !== null);
        assert.equal(frameText(first), "one");
        assert.equal(frameText(second), "two");
        assert.equal(m.tryReceive(), null);
        assert.equal(m.connected, true);
    });

    it("drops the oldest frame when the queue is full", async () => {
        const s = await server();
        const m = manager({ url: s.url, maxQueue: 2 });
        await m.connect();
        await waitFor(() => s.sockets.length === 1);

        for (const text of ["one", "two", "three"]) s.sockets[0]?.send(text);
        await waitFor(() => m.droppedFrames === 1);

        const received = [m.tryReceive(), m.tryReceive()].map((d) => (d === null ? null : frameText(d)));
        assert.deepEqual(received, ["two", "three"]);
    });

    it("reports a peer close and clears the handle on the next send", async () => {
        const s = await server();
        const m = manager({ url: s.url });
        await m.connect();
        let disconnected = false;
        m.on("disconnect", () => { disconnected = true; });

        await waitFor(() => s.sockets.length === 1);
        s.sockets[0]?.terminate();
        await waitFor(() => disconnected);

        assert.equal(m.connected, false);
        assert.throws(() => m.send("x"), TransportClosedError);
        assert.throws(() => m.send("x"), NotConnectedError);
    });

    it("clears a closed handle when polled", async () => {
        const s = await server();
        const m = manager({ url: s.url });
        await m.connect();
        await waitFor(() => s.sockets.length === 1);

        s.sockets[0]?.close();
        await waitFor(() => !m.connected);

        assert.equal(m.tryReceive(), null);
        assert.throws(() => m.send("x"), NotConnectedError);
        await m.connect();
        assert.equal(m.connected, true);
    });

    it("disconnects cleanly after the peer has already closed", async () => {
        const s = await server();
        const m = manager({ url: s.url });
        await m.connect();
        let disconnected = false;
        m.on("disconnect", () => { disconnected = true; });

        await waitFor(() => s.sockets.length === 1);
        s.sockets[0]?.terminate();
        await waitFor(() => disconnected);

        await m.disconnect();
        assert.equal(m.connected, false);
        assert.throws(() => m.send("x"), NotConnectedError);
        await assert.rejects(m.disconnect(), NotConnectedError);
    });

    it("ignores a late close from a connection it has replaced", async () => {
        const s = await server();
        const m = manager({ url: s.url });
        await m.connect();
        let disconnects = 0;
        m.on("disconnect", () => { disconnects++; });

        await waitFor(() => s.sockets.length === 1);
        const old = s.sockets[0];
        assert.ok(old);
        // The peer starts closing but does not read the reply, so the
        // client socket stays in CLOSING until the peer is torn down.
        old.close();
        old.pause();
        await waitFor(() => !m.connected);

        assert.equal(m.tryReceive(), null);
        await m.connect();
        assert.equal(m.connected, true);

        old.terminate();
        await wait(200);

        assert.equal(disconnects, 0);
        assert.equal(m.connected, true);
    });

    it("disconnects quietly and can reconnect", async () => {
        const s = await server();
        const m = manager({ url: s.url });
        let disconnected = false;
        m.on("disconnect", () => { disconnected = true; });

        await m.connect();
        await m.disconnect();

        assert.equal(m.connected, false);
        assert.equal(disconnected, false);
        assert.throws(() => m.send("x"), NotConnectedError);

        await m.connect();
        assert.equal(m.connected, true);
    });
});
