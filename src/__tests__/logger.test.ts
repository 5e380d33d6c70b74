import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { setDebug } from "../constants";
import { logger } from "../logger";

describe("logger", () => {
    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "debug").mockImplementation(() => {});
    });

    afterEach(() => {
        logger.setScope(null);
        setDebug(false);
        vi.restoreAllMocks();
    });

    it("labels lines with the level", () => {
        logger.info("starting services");
        const [prefix, message] = vi.mocked(console.log).mock.calls[0];
        expect(prefix).toMatch(/^\x1b\[0m\d{2}:\d{2}:\d{2}\.\d{3} \x1b\[34;1m\[INFO\]\x1b\[0m$/);
        expect(message).toBe("starting services");
    });

    it("tags lines with the scope of the process", () => {
        logger.setScope("root");
        logger.info("installing");
        logger.section("done");
        const calls = vi.mocked(console.log).mock.calls;
        expect(calls[0][0]).toMatch(/\[INFO\]\x1b\[0m \(root\)$/);
        expect(calls[1][0]).toMatch(/---\x1b\[0m \(root\)$/);
        expect(calls[1][1]).toBe("done");
    });

    it("prints debug lines only in debug mode", () => {
        logger.debug("hidden");
        expect(console.debug).not.toHaveBeenCalled();
        setDebug(true);
        logger.debug("shown");
        expect(vi.mocked(console.debug).mock.calls[0][1]).toBe("shown");
    });
});
