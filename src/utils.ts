export type Resolver<T> = T | (() => T | PromiseLike<T>);

const DOUBLE_QUOTES = `"`;
const SINGLE_QUOTE = "'";
const BACKTICK = "`";

const R_SHELL_SAFE = /^[\w@%+=:,./-]+$/;
const R_WHITE_SPACE = /\s+/g;

export function formatError(error: unknown) {
    let message: string;
    if (error instanceof Error) {
        message = String(error.message);
    } else {
        message = String(error ?? "error");
    }
    return message
        .split("\n")
        .map((line) => {
            const trimmedLine = line.trim();
            if (trimmedLine.startsWith("Command failed:")) {
                return "";
            } else {
                return trimmedLine.replaceAll(R_WHITE_SPACE, " ");
            }
        })
        .filter(Boolean)
        .join("\n");
}

export function plural(word: string, count: number, suffix = "s") {
    return count === 1 ? word : word + suffix;
}

function isResolverFunction<T>(value: Resolver<T>): value is () => T | PromiseLike<T> {
    return typeof value === "function";
}

export async function resolve<T>(value: Resolver<T>): Promise<T> {
    return isResolverFunction(value) ? value() : value;
}

/**
 * Quotes a single argument for a POSIX shell (`sh -c`, `sg -c`).
 */
export function shellQuote(arg: string) {
    if (arg && R_SHELL_SAFE.test(arg)) {
        return arg;
    }
    return SINGLE_QUOTE + arg.replaceAll(SINGLE_QUOTE, `'\\''`) + SINGLE_QUOTE;
}

export function stringify(value: unknown) {
    const strValue = String(value);
    if (strValue.includes(DOUBLE_QUOTES)) {
        if (strValue.includes(SINGLE_QUOTE)) {
            return BACKTICK + strValue + BACKTICK;
        }
        return SINGLE_QUOTE + strValue + SINGLE_QUOTE;
    }
    return DOUBLE_QUOTES + strValue + DOUBLE_QUOTES;
}
