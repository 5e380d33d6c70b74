import { isDebug } from "./constants";

const timestamp = () => new Date().toISOString().slice(11, 23);

const COLORS = {
    blue: "\x1b[34;1m",
    green: "\x1b[32;1m",
    purple: "\x1b[35;20m",
    red: "\x1b[31;20m",
    reset: "\x1b[0m",
    yellow: "\x1b[33;20m",
};

type Color = keyof typeof COLORS;

/**
 * Console logger. Lines carry the scope of the process that wrote them, since
 * a bootstrap run prints from itself, its `sudo` child and its `sg` child to
 * the same terminal.
 */
class Logger {
    scope: string | null = null;

    debug(...args: unknown[]) {
        if (isDebug()) {
            console.debug(...this.logArgs("debug", "purple", ...args));
        }
    }

    error(...args: unknown[]) {
        console.error(...this.logArgs("error", "red", ...args));
    }

    info(...args: unknown[]) {
        console.log(...this.logArgs("info", "blue", ...args));
    }

    section(title: string) {
        console.log(this.prefix("---", "green"), title);
    }

    setScope(scope: string | null) {
        this.scope = scope;
    }

    warn(...args: unknown[]) {
        console.warn(...this.logArgs("warning", "yellow", ...args));
    }

    logArgs(label: string, color: Color, ...args: unknown[]) {
        return [this.prefix(`[${label.toUpperCase()}]`, color), ...args];
    }

    prefix(tag: string, color: Color) {
        const scope = this.scope ? ` (${this.scope})` : "";
        return `${COLORS.reset}${timestamp()} ${COLORS[color]}${tag}${COLORS.reset}${scope}`;
    }
}

export const logger = new Logger();
