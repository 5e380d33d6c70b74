import { chmod, mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { machine, platform, tmpdir } from "os";
import { join } from "path";
import { z } from "zod";
import {
    COMPOSE_PLUGIN_DIR,
    COMPOSE_PLUGIN_NAME,
    COMPOSE_RELEASES_URL,
    COMPOSE_REPOSITORY,
    DOCKER_GROUP,
    DOCKER_INSTALL_SCRIPT_URL,
    GITHUB_API_URL,
    LocalError,
    R_COMPOSE_TAG,
} from "./constants";
import { logger } from "./logger";
import { spawnProcess } from "./process";
import { formatError } from "./utils";

const releaseSchema = z.object({
    tag_name: z.string().regex(R_COMPOSE_TAG),
});

async function run(args: string[]) {
    try {
        await spawnProcess(args);
    } catch (error) {
        throw new LocalError(formatError(error));
    }
}

async function download(url: string, failureMessage: string) {
    try {
        const response = await fetch(url, { redirect: "follow" });
        if (!response.ok) {
            throw new Error(`HTTP ${response.status}`);
        }
        return Buffer.from(await response.arrayBuffer());
    } catch (error) {
        throw new LocalError(`${failureMessage} (${formatError(error)})`);
    }
}

export async function fetchLatestComposeVersion() {
    logger.info("fetching the latest Docker Compose version");
    const url = `${GITHUB_API_URL}/repos/${COMPOSE_REPOSITORY}/releases/latest`;
    const failureMessage = "could not determine the latest Docker Compose version";
    const content = (await download(url, failureMessage)).toString("utf-8");
    let body: unknown;
    try {
        body = JSON.parse(content);
    } catch (error) {
        throw new LocalError(`${failureMessage} (${formatError(error)})`);
    }
    const parsed = releaseSchema.safeParse(body);
    if (!parsed.success) {
        throw new LocalError(failureMessage);
    }
    return parsed.data.tag_name;
}

/**
 * Name of the release asset matching this machine, e.g.
 * "docker-compose-linux-x86_64".
 */
export function composeAssetName(kernel: string = platform(), architecture = machine()) {
    return `${COMPOSE_PLUGIN_NAME}-${kernel.toLowerCase()}-${architecture}`;
}

export async function installDocker(sudoUser: string | undefined) {
    logger.section("Docker not found: installing Docker Engine");
    const script = await download(
        DOCKER_INSTALL_SCRIPT_URL,
        "failed to download the Docker installation script, please check your internet connection"
    );
    const scriptDir = await mkdtemp(join(tmpdir(), "get-docker-"));
    const scriptPath = join(scriptDir, "get-docker.sh");
    try {
        await writeFile(scriptPath, script);
        await run(["sh", scriptPath]);
    } finally {
        await rm(scriptDir, { force: true, recursive: true });
    }

    logger.info("starting and enabling the Docker service");
    await run(["systemctl", "start", "docker"]);
    await run(["systemctl", "enable", "docker"]);

    if (sudoUser) {
        logger.info(`adding user "${sudoUser}" to the "${DOCKER_GROUP}" group`);
        await run(["usermod", "-aG", DOCKER_GROUP, sudoUser]);
        logger.info(
            `user "${sudoUser}" must log out and log back in for group changes to take effect in other terminals`
        );
    } else {
        logger.warn(
            `could not determine the original user: you may need to run 'sudo usermod -aG ${DOCKER_GROUP} $USER'`
        );
    }

    logger.info("Docker installed successfully");
}

export async function installComposePlugin(pluginDir = COMPOSE_PLUGIN_DIR) {
    logger.section("Docker Compose not found: installing the plugin");
    await mkdir(pluginDir, { recursive: true });

    const version = await fetchLatestComposeVersion();
    logger.info(`latest version is ${version}`);

    const url = `${COMPOSE_RELEASES_URL}/${version}/${composeAssetName()}`;
    const destination = join(pluginDir, COMPOSE_PLUGIN_NAME);
    logger.info(`downloading Docker Compose from ${url}`);
    const binary = await download(url, "Docker Compose download failed");
    await writeFile(destination, binary);
    await chmod(destination, 0o755);

    logger.info("Docker Compose plugin was installed successfully");
}
