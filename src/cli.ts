/**
 * jointlink-endpoint: run the reference endpoint.
 *
 *   jointlink-endpoint [--host 127.0.0.1] [--port 8765] [--joints a,b,c] [--rate 60]
 *
 * Flags override JOINTLINK_HOST / JOINTLINK_PORT / JOINTLINK_JOINTS /
 * JOINTLINK_PUBLISH_HZ.
 */

import { parseArgs } from "node:util";
import { type EndpointConfigInput, endpointConfigFromEnv, parseList } from "./config.js";
import { EndpointServer } from "./endpoint/server.js";
import { toError } from "./errors.js";
import { createLogger } from "./logger.js";

const USAGE = "usage: jointlink-endpoint [--host HOST] [--port PORT] [--joints a,b,c] [--rate HZ]";

export function parseEndpointArgs(
    argv: string[],
    env: NodeJS.ProcessEnv = process.env,
): EndpointConfigInput & { help: boolean } {
    const { values } = parseArgs({
        args: argv,
        options: {
            host: { type: "string" },
            port: { type: "string" },
            joints: { type: "string" },
            rate: { type: "string" },
            help: { type: "boolean", short: "h" },
        },
        strict: true,
    });

    const input: EndpointConfigInput = endpointConfigFromEnv(env);
    if (values.host !== undefined) input.host = values.host;
    if (values.port !== undefined) input.port = Number(values.port);
    const joints = parseList(values.joints);
    if (joints) input.jointNames = joints;
    if (values.rate !== undefined) input.publishHz = Number(values.rate);
    return { ...input, help: values.help ?? false };
}

/** Start the endpoint from `argv` and keep it running until SIGINT/SIGTERM. */
export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
    const logger = createLogger("jointlink:endpoint");
    const { help, ...input } = parseEndpointArgs(argv);
    if (help) {
        console.log(USAGE);
        return;
    }

    const server = new EndpointServer({ ...input, logger });
    await server.start();

    const shutdown = (signal: string) => {
        logger.info(`${signal} received, shutting down`);
        server.stop().then(
            () => process.exit(0),
            (err) => {
                logger.error(`shutdown failed: ${toError(err).message}`);
                process.exit(1);
            },
        );
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
}
