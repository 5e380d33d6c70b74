import { access } from "fs/promises";
import { join } from "path";
import { COMPOSE_FILE_NAMES } from "./constants";
import { composeDown, composeUp } from "./docker";
import { logger } from "./logger";
import { type SpawnOptions } from "./process";

export interface ManageServicesOptions {
    /** Drop the volumes along with the containers */
    fresh?: boolean;
}

/**
 * Compose runs inside `directory`, with the ids of the invoking user exposed
 * to the manifest as `HOST_UID` and `HOST_GID`.
 */
function composeOptions(directory: string): SpawnOptions {
    const env: Record<string, string> = {};
    const uid = process.getuid?.();
    const gid = process.getgid?.();
    if (uid !== undefined && gid !== undefined) {
        env.HOST_UID = String(uid);
        env.HOST_GID = String(gid);
    }
    return { cwd: directory, env };
}

export async function findComposeFile(directory: string) {
    for (const fileName of COMPOSE_FILE_NAMES) {
        const path = join(directory, fileName);
        try {
            await access(path);
            return path;
        } catch {
            // Try the next name
        }
    }
    return null;
}

export async function manageServices(directory: string, { fresh }: ManageServicesOptions) {
    logger.section("checking for a docker-compose file to manage services");
    const composeFile = await findComposeFile(directory);
    if (!composeFile) {
        logger.info(
            `no ${COMPOSE_FILE_NAMES.join(" or ")} found in ${directory}: skipping service management`
        );
        return false;
    }
    const options = composeOptions(directory);

    logger.info(`found ${composeFile}: shutting down existing services`);
    if (fresh) {
        logger.info("'-f' (fresh) flag detected: removing volumes for a fresh start");
    }
    await composeDown({ volumes: fresh }, options);

    const user = options.env?.HOST_UID ? `${options.env.HOST_UID}:${options.env.HOST_GID}` : "?";
    logger.info(`starting services with the latest configuration (as user ${user})`);
    await composeUp({ build: true }, options);
    logger.info("docker compose services have been started");
    return true;
}

export async function deleteServices(directory: string) {
    logger.info("removing all containers and volumes");
    await composeDown({ volumes: true }, composeOptions(directory));
    logger.info("all services and associated volumes have been deleted");
}

export async function restartServices(directory: string) {
    logger.info("stopping and starting services");
    const options = composeOptions(directory);
    await composeDown({}, options);
    await composeUp({}, options);
    logger.info("all services have been restarted");
}
