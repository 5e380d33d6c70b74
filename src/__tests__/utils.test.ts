import { describe, expect, it } from "vitest";
import { formatError, plural, resolve, shellQuote, stringify } from "../utils";

describe("shellQuote", () => {
    it("leaves plain arguments alone", () => {
        expect(shellQuote("/usr/bin/node")).toBe("/usr/bin/node");
        expect(shellQuote("--post-install")).toBe("--post-install");
    });

    it("quotes arguments with spaces or quotes", () => {
        expect(shellQuote("/home/dev/my odoo")).toBe("'/home/dev/my odoo'");
        expect(shellQuote("it's")).toBe(`'it'\\''s'`);
        expect(shellQuote("")).toBe("''");
        expect(shellQuote("$HOME")).toBe("'$HOME'");
    });
});

describe("formatError", () => {
    it("drops the failed command line and squeezes white space", () => {
        const error = new Error("Command failed: docker info\n  Cannot   connect  \n");
        expect(formatError(error)).toBe("Cannot connect");
    });

    it("accepts non-error values", () => {
        expect(formatError("exit code 2")).toBe("exit code 2");
        expect(formatError(null)).toBe("error");
    });
});

describe("helpers", () => {
    it("pluralizes words", () => {
        expect(plural("process", 1, "es")).toBe("process");
        expect(plural("process", 2, "es")).toBe("processes");
        expect(plural("version", 3)).toBe("versions");
    });

    it("quotes values for messages", () => {
        expect(stringify("odoo")).toBe(`"odoo"`);
        expect(stringify(`say "hi"`)).toBe(`'say "hi"'`);
    });

    it("resolves plain and computed values", async () => {
        expect(await resolve(["a"])).toEqual(["a"]);
        expect(await resolve(() => ["b"])).toEqual(["b"]);
        expect(await resolve(async () => ["c"])).toEqual(["c"]);
    });
});
