#!/usr/bin/env node
import { main } from "../cli.js";
import { toError } from "../errors.js";

main().catch((err) => {
    console.error(`[jointlink:endpoint] ${toError(err).message}`);
    process.exit(1);
});
