import { LocalError } from "./constants";
import { commandSucceeds, spawnProcess, type SpawnOptions } from "./process";
import { formatError } from "./utils";

export interface ComposeDownOptions {
    volumes?: boolean;
}

export interface ComposeUpOptions {
    build?: boolean;
}

export function hasDocker() {
    return commandSucceeds("command -v docker");
}

export function hasCompose() {
    return commandSucceeds("docker compose version");
}

export function isDaemonReachable() {
    return commandSucceeds("docker info");
}

export async function compose(args: string[], options?: SpawnOptions) {
    try {
        return await spawnProcess(["docker", "compose", ...args], options);
    } catch (error) {
        throw new LocalError(`docker compose ${args[0]} failed: ${formatError(error)}`);
    }
}

export function composeDown({ volumes }: ComposeDownOptions, options?: SpawnOptions) {
    const args = ["down"];
    if (volumes) {
        args.push("--volumes");
    }
    args.push("--remove-orphans");
    return compose(args, options);
}

export function composeUp({ build }: ComposeUpOptions, options?: SpawnOptions) {
    const args = ["up", "-d"];
    if (build) {
        args.push("--build");
    }
    args.push("--remove-orphans", "--wait");
    return compose(args, options);
}
