import { bootstrap, type BootstrapFlags, type BootstrapOptions } from "./bootstrap";
import { Command } from "./command";
import { DEFAULT_REPOSITORY } from "./constants";
import { logger } from "./logger";

function bootstrapOptions(
    command: Command,
    args: string[],
    overrides?: Partial<BootstrapFlags>
): BootstrapOptions {
    return {
        directory: command.value("directory"),
        repository: command.has("repository")
            ? command.value("repository")
            : DEFAULT_REPOSITORY,
        fresh: command.has("fresh"),
        delete: command.has("delete"),
        restart: command.has("restart"),
        postInstall: command.has("post-install"),
        forwardedArgs: args,
        sudoUser: process.env.SUDO_USER || undefined,
        ...overrides,
    };
}

async function runBootstrap(options: BootstrapOptions) {
    process.exitCode = await bootstrap(options);
}

export async function help() {
    console.log(Command.usage());
}

export async function remove(command: Command, args: string[]) {
    await runBootstrap(bootstrapOptions(command, args, { delete: true }));
}

export async function restart(command: Command, args: string[]) {
    await runBootstrap(bootstrapOptions(command, args, { restart: true }));
}

export async function setup(command: Command, args: string[]) {
    const options = bootstrapOptions(command, args);
    logger.debug("bootstrap options:", options);
    await runBootstrap(options);
}
