import { DOCKER_GROUP, LocalError, POST_INSTALL_FLAG } from "./constants";
import { hasCompose, hasDocker, isDaemonReachable } from "./docker";
import { installComposePlugin, installDocker } from "./install";
import { logger } from "./logger";
import { $, isRoot, selfCommand, spawnProcess } from "./process";
import { prepareAddonDirectories } from "./scaffold";
import { deleteServices, manageServices, restartServices } from "./services";
import { shellQuote } from "./utils";
import { createEnvFile } from "./versions";

export interface BootstrapFlags {
    /** Remove volumes when restarting the services */
    fresh: boolean;
    /** Remove containers and volumes, then stop */
    delete: boolean;
    /** Cycle the services, then stop */
    restart: boolean;
}

export interface BootstrapContext extends BootstrapFlags {
    isRoot: boolean;
    /** Re-entered after installing Docker, under the new group */
    postInstall: boolean;
    hasDocker: boolean;
    hasCompose: boolean;
}

export type BootstrapStage =
    | { kind: "delete" }
    | { kind: "restart" }
    | { kind: "install" }
    | { kind: "post-install" }
    | { kind: "escalate"; installDocker: boolean; installCompose: boolean }
    | { kind: "provision" };

export interface BootstrapOptions extends BootstrapFlags {
    directory: string;
    repository: string;
    postInstall: boolean;
    /** Arguments given again to the re-executed process */
    forwardedArgs: string[];
    sudoUser?: string;
}

const DAEMON_UNREACHABLE_MESSAGE = [
    "cannot connect to the Docker daemon.",
    "This can happen if the service is not running or if you haven't logged in again after a previous installation.",
    "Please try the following:",
    "1. Ensure the Docker service is running: sudo systemctl start docker",
    "2. If that doesn't work, log out and log back in.",
].join("\n");

export function detectStage(context: BootstrapContext): BootstrapStage {
    if (context.delete) {
        return { kind: "delete" };
    }
    if (context.restart) {
        return { kind: "restart" };
    }
    if (context.isRoot) {
        return { kind: "install" };
    }
    if (context.postInstall) {
        return { kind: "post-install" };
    }
    if (!context.hasDocker || !context.hasCompose) {
        return {
            kind: "escalate",
            installDocker: !context.hasDocker,
            installCompose: !context.hasCompose,
        };
    }
    return { kind: "provision" };
}

async function install(context: BootstrapContext, sudoUser: string | undefined) {
    logger.info("running with root privileges for installation");
    if (context.hasDocker) {
        logger.info("Docker is already installed");
    } else {
        await installDocker(sudoUser);
    }

    // The engine installer may bring the plugin along
    if (context.hasDocker && context.hasCompose) {
        logger.info("Docker Compose is already installed");
    } else if (await hasCompose()) {
        logger.info("Docker Compose is already installed:", await $`docker compose version`);
    } else {
        await installComposePlugin();
    }
    logger.section("installation tasks complete: exiting root mode");
    return 0;
}

async function quickAction(
    kind: "delete" | "restart",
    context: BootstrapContext,
    directory: string
) {
    if (!context.hasCompose) {
        throw new LocalError(
            `Docker Compose is not available or the Docker daemon is not running.\nCannot perform a quick ${kind}: please ensure Docker is installed and running.`
        );
    }
    if (kind === "delete") {
        logger.info("'-d' (delete) flag detected");
        await deleteServices(directory);
    } else {
        logger.info("'-r' (restart) flag detected");
        await restartServices(directory);
    }
    return 0;
}

/**
 * Runs the installation as root, then re-enters as the current user. When the
 * engine itself was installed, the re-entry happens under `sg` so that the
 * fresh docker group membership applies without a new login session.
 */
async function escalate(
    stage: Extract<BootstrapStage, { kind: "escalate" }>,
    options: BootstrapOptions
) {
    logger.section("installation of Docker and/or Docker Compose is required");
    if (stage.installDocker) {
        logger.info("Docker is not installed");
    } else {
        logger.info("Docker Compose plugin is not installed");
    }
    logger.info("re-running with sudo");
    const sudoCode = await spawnProcess(
        ["sudo", "--", ...selfCommand(), ...options.forwardedArgs],
        { ignoreFail: true }
    );
    if (sudoCode) {
        throw new LocalError(`installation with root privileges failed (exit code ${sudoCode})`);
    }

    if (!stage.installDocker) {
        logger.info("Docker Compose installation finished: continuing");
        return null;
    }

    logger.section("installation finished: re-executing with new group permissions");
    const shellCommand = [...selfCommand(), POST_INSTALL_FLAG, ...options.forwardedArgs]
        .map(shellQuote)
        .join(" ");
    return spawnProcess(["sg", DOCKER_GROUP, "-c", shellCommand], { ignoreFail: true });
}

async function provision(options: BootstrapOptions, checkDaemon: boolean) {
    if (checkDaemon) {
        if (!(await isDaemonReachable())) {
            throw new LocalError(DAEMON_UNREACHABLE_MESSAGE);
        }
        logger.info("successfully connected to the Docker daemon");
    } else {
        logger.info("running post-installation tasks with new permissions");
    }

    const triple = await createEnvFile(options.directory, options.repository);
    await prepareAddonDirectories(options.directory, triple);
    await manageServices(options.directory, { fresh: options.fresh });

    logger.section("all done!");
    logger.info("you can place your addons in the created directories for each version");
    logger.info("restart the servers with the '-r' flag after adding new modules");
    return 0;
}

export async function probeContext(options: BootstrapOptions): Promise<BootstrapContext> {
    const [docker, compose] = await Promise.all([hasDocker(), hasCompose()]);
    return {
        fresh: options.fresh,
        delete: options.delete,
        restart: options.restart,
        isRoot: isRoot(),
        postInstall: options.postInstall,
        hasDocker: docker,
        hasCompose: compose,
    };
}

/**
 * Runs the bootstrap sequence and returns the process exit code.
 */
export async function bootstrap(options: BootstrapOptions) {
    const context = await probeContext(options);
    const stage = detectStage(context);
    if (stage.kind === "install") {
        logger.setScope("root");
    } else if (stage.kind === "post-install") {
        logger.setScope(POST_INSTALL_FLAG.slice(2));
    }
    logger.debug("bootstrap stage:", stage.kind);
    switch (stage.kind) {
        case "delete":
        case "restart": {
            return quickAction(stage.kind, context, options.directory);
        }
        case "install": {
            return install(context, options.sudoUser);
        }
        case "post-install": {
            return provision(options, false);
        }
        case "escalate": {
            const code = await escalate(stage, options);
            if (code !== null) {
                return code;
            }
            logger.info("Docker and Docker Compose are installed");
            return provision(options, true);
        }
        case "provision": {
            logger.info("Docker and Docker Compose are installed");
            return provision(options, true);
        }
    }
}
