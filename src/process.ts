import { exec, spawn, type ChildProcess } from "child_process";
import { logger } from "./logger";
import { plural } from "./utils";

export interface SpawnOptions {
    cwd?: string;
    /** Added on top of the current environment */
    env?: Record<string, string>;
    /** Resolve with the exit code instead of rejecting on failure */
    ignoreFail?: boolean;
}

const callExit = (signal: NodeJS.Signals) => {
    logger.debug(`<signal>:`, signal);
    lastExitCode = SIGNAL_EXIT_CODES[signal] ?? 1;
    process.exit(lastExitCode);
};

const onExit = (code: number) => {
    const actualCode = lastExitCode ?? code;
    const time = Math.round(performance.now() - startTime) / 1000;
    const logs: unknown[] = [
        `exit code`,
        actualCode,
        `received: terminating process (total time:`,
        time,
        `s)`,
    ];
    if (children.size) {
        logs.push(`and`, children.size, `child ${plural("process", children.size, "es")}`);
        for (const child of children) {
            child.kill();
        }
        children.clear();
    }

    logger.debug(...logs);
    if (actualCode) {
        logger.info(`process terminated with code`, actualCode);
    } else {
        logger.info(`process ended`);
    }
};

const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
    SIGINT: 130,
    SIGQUIT: 131,
    SIGTERM: 143,
};

const children: Set<ChildProcess> = new Set();
let lastExitCode: number | null = null;
const startTime = performance.now();

/**
 * Runs a shell command and resolves its trimmed standard output. Rejects when
 * the command exits with a non-zero code.
 */
export async function $(...args: Parameters<typeof String.raw>): Promise<string> {
    const command = String.raw(...args);
    logger.debug("<exec>:", command);
    return new Promise((resolve, reject) => {
        exec(command, (error, stdout) => {
            if (error) {
                reject(error);
            } else {
                resolve(stdout.trim());
            }
        });
    });
}

/**
 * Whether a shell command exits with code 0. Output is discarded.
 */
export async function commandSucceeds(command: string) {
    try {
        await $`${command} > /dev/null 2>&1`;
        return true;
    } catch {
        return false;
    }
}

export function listenOnCloseEvents() {
    process.on("exit", onExit);

    process.on("SIGINT", callExit); // CTRL+C
    process.on("SIGQUIT", callExit); // Keyboard quit
    process.on("SIGTERM", callExit); // `kill` command
}

export function spawnProcess(args: string[], options?: SpawnOptions): Promise<number> {
    logger.debug("<spawn>", ...args);
    const { cwd, env, ignoreFail } = options || {};
    const [command, ...commandArgs] = args;
    // Inherited stdio: sudo and sg prompt on the terminal
    const child = spawn(command, commandArgs, {
        cwd,
        env: env && { ...process.env, ...env },
        stdio: "inherit",
    });
    children.add(child);
    return new Promise((resolve, reject) => {
        child.on("error", (error) => {
            children.delete(child);
            reject(error);
        });
        child.on("exit", (code) => {
            children.delete(child);
            const exitCode = code ?? 1;
            if (exitCode && !ignoreFail) {
                reject(new Error(`${args.join(" ")} exited with code ${exitCode}`));
            } else {
                resolve(exitCode);
            }
        });
    });
}

/**
 * Command line that runs this program again: the node binary, its loader
 * flags and the entry script.
 */
export function selfCommand() {
    return [process.execPath, ...process.execArgv, process.argv[1]];
}

export function isRoot() {
    return process.getuid?.() === 0;
}
