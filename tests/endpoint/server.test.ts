import { describe, it, afterEach } from "node:test";
import assert from "node:assert/strict";
import { once } from "node:events";
import { EndpointServer, type EndpointServerOptions } from "../../src/endpoint/server.js";
import { encode } from "../../src/framing.js";
import { commandFrame } from "../../src/protocol.js";
import { silentLogger } from "../../src/logger.js";
import { ConfigError } from "../../src/errors.js";
import { type StateClient, connectClient, waitFor } from "../helpers.js";

describe("EndpointServer", () => {
    const cleanup: Array<{ stop(): Promise<void> } | { close(): Promise<void> }> = [];

    afterEach(async () => {
        for (const item of cleanup.reverse()) {
            if ("stop" in item) await item.stop();
            else await item.close();
        }
        cleanup.length = 0;
    });

    async function startServer(options: EndpointServerOptions = {}): Promise<EndpointServer> {
        const server = new EndpointServer({
            host: "127.0.0.1",
            port: 0,
            jointNames: ["a", "b"],
            publishHz: 100,
            logger: silentLogger,
            ...options,
        });
        await server.start();
        cleanup.push(server);
        return server;
    }

    async function client(server: EndpointServer): Promise<StateClient> {
        const c = await connectClient(server.url);
        cleanup.push(c);
        return c;
    }

    it("listens on an ephemeral port", async () => {
        const server = await startServer();
        const port = server.address?.port;
        assert.ok(port !== undefined && port > 0);
        assert.equal(server.url, `ws://127.0.0.1:${port}`);
    });

    it("has no address before it starts", () => {
        const server = new EndpointServer({ port: 0, logger: silentLogger });
        assert.equal(server.address, null);
        assert.equal(server.url, null);
    });

    it("refuses to start twice", async () => {
        const server = await startServer();
        await assert.rejects(server.start(), /Endpoint already running/);
    });

    it("fails to start on a port in use", async () => {
        const first = await startServer();
        const second = new EndpointServer({ host: "127.0.0.1", port: first.address?.port, logger: silentLogger });
        await assert.rejects(second.start(), { code: "EADDRINUSE" });
        assert.equal(second.url, null);
    });

    it("rejects an invalid configuration", () => {
        assert.throws(() => new EndpointServer({ publishHz: -1 }), ConfigError);
    });

    it("gives every client its own state", async () => {
        const server = await startServer();
        const ids: string[] = [];
        server.on("session-start", (id: string) => ids.push(id));

        const one = await client(server);
        const two = await client(server);
        await waitFor(() => server.sessionCount === 2);
        assert.deepEqual(ids, ["session-0", "session-1"]);

        one.socket.send(encode(commandFrame(1, { names: ["a", "b"], positions: [0.3, 0.4] }, 0)));
        await one.settlesAt([0.3, 0.4]);

        assert.deepEqual(server.session("session-0")?.state.positions, [0.3, 0.4]);
        assert.deepEqual(server.session("session-1")?.state.positions, [0, 0]);
        await two.settlesAt([0, 0]);
    });

    it("serves a new client after one leaves", async () => {
        const server = await startServer();
        const first = await client(server);
        await waitFor(() => server.sessionCount === 1);
        await first.close();
        await waitFor(() => server.sessionCount === 0);

        const second = await client(server);
        await waitFor(() => server.sessionCount === 1);
        assert.ok(server.session("session-1"));
        assert.equal(server.session("session-0"), undefined);
        await second.settlesAt([0, 0]);
    });

    it("closes clients when stopped", async () => {
        const server = new EndpointServer({ host: "127.0.0.1", port: 0, logger: silentLogger });
        await server.start();
        const c = await connectClient(server.url);
        await waitFor(() => server.sessionCount === 1);

        const closed = once(c.socket, "close");
        await server.stop();
        const [code]: unknown[] = await closed;

        assert.equal(code, 1001);
        assert.equal(server.sessionCount, 0);
        assert.equal(server.url, null);
    });
});
