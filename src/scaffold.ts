import { mkdir } from "fs/promises";
import { join } from "path";
import { ADDON_FOLDERS, ENV_FILE_NAME } from "./constants";
import { logger } from "./logger";
import { readEnvFile, versionsOf, type VersionTriple } from "./versions";

/**
 * The triple derived during this run wins; otherwise the one left in the env
 * file by a previous run is used.
 */
export async function resolveVersionTriple(directory: string, derived: VersionTriple | null) {
    if (derived) {
        return derived;
    }
    const persisted = await readEnvFile(directory);
    if (persisted) {
        logger.info(`using versions from existing ${ENV_FILE_NAME} file`);
    }
    return persisted;
}

/**
 * Creates `<version>/{custom,design,enterprise}` for each version (as
 * `mkdir -p` would) and returns the created paths.
 */
export async function scaffoldAddonDirectories(directory: string, triple: VersionTriple) {
    const paths: string[] = [];
    for (const version of versionsOf(triple)) {
        logger.info(`creating directories for Odoo version ${version}`);
        for (const folder of ADDON_FOLDERS) {
            const path = join(directory, String(version), folder);
            await mkdir(path, { recursive: true });
            paths.push(path);
        }
    }
    return paths.sort();
}

export async function prepareAddonDirectories(directory: string, derived: VersionTriple | null) {
    logger.section("pre-creating addon directories");
    const triple = await resolveVersionTriple(directory, derived);
    if (!triple) {
        logger.warn(
            `no ${ENV_FILE_NAME} file found: skipping directory creation (volumes might be owned by root)`
        );
        return [];
    }
    return scaffoldAddonDirectories(directory, triple);
}
