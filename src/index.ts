#!/usr/bin/env node
import { Command } from "./command";
import { LocalError, UsageError } from "./constants";
import { logger } from "./logger";

import "./commands/index";
import { listenOnCloseEvents } from "./process";

const main = async () => {
    listenOnCloseEvents();

    const command = Command.fromArgs(process.argv.slice(2));

    await command.processOptions();

    logger.debug("debug logs active");

    // Run command
    await command.run();
};

main().catch((err: unknown) => {
    if (err instanceof LocalError) {
        // Errors caught by this script
        logger.error(err.message);
        if (err instanceof UsageError) {
            console.error(Command.usage());
        }
        process.exitCode = 1;
    } else {
        throw err;
    }
});
