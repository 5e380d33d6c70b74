let debug = false;

export function isDebug() {
    return debug;
}

export function setDebug(value: boolean) {
    debug = value;
}

export class LocalError extends Error {}

/**
 * Raised on malformed command lines: the CLI prints the usage text along
 * with the message.
 */
export class UsageError extends LocalError {}

export const DEFAULT_REPOSITORY = "odoo/odoo";
export const DOCKER_GROUP = "docker";
export const POST_INSTALL_FLAG = "--post-install";

export const ENV_FILE_NAME = ".env";
export const COMPOSE_FILE_NAMES = ["docker-compose.yml", "docker-compose.yaml"] as const;
export const ADDON_FOLDERS = ["custom", "design", "enterprise"] as const;
export const ENV_KEYS = ["VERSION_1", "VERSION_2", "VERSION_3"] as const;

export const COMPOSE_PLUGIN_DIR = "/usr/local/lib/docker/cli-plugins";
export const COMPOSE_PLUGIN_NAME = "docker-compose";

export const DOCKER_INSTALL_SCRIPT_URL = "https://get.docker.com";
export const GITHUB_API_URL = "https://api.github.com";
export const COMPOSE_RELEASES_URL = "https://github.com/docker/compose/releases/download";
export const COMPOSE_REPOSITORY = "docker/compose";

export const METADATA_TIMEOUT_MS = 5_000;

export const R_COMPOSE_TAG = /^v\d+\.\d+\.\d+$/;
export const R_FULL_MATCH = /^--(?<name>[\w-]+)(?:=(?<value>.*))?$/;
export const R_SHORT_MATCH = /^-(?<names>\w+)$/;
export const R_VERSION_NUMBER = /^\d+$/;
