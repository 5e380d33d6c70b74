import { readFile, writeFile } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import {
    ENV_FILE_NAME,
    ENV_KEYS,
    GITHUB_API_URL,
    METADATA_TIMEOUT_MS,
    R_VERSION_NUMBER,
} from "./constants";
import { logger } from "./logger";
import { formatError, stringify } from "./utils";

/**
 * Three consecutive major versions: `latest = middle + 1 = oldest + 2`.
 */
export interface VersionTriple {
    oldest: number;
    middle: number;
    latest: number;
}

const repositorySchema = z.object({
    default_branch: z.string().min(1),
});

const MIN_LATEST_VERSION = 2;

const R_ENV_LINE = /^\s*(?<key>[A-Z_][A-Z0-9_]*)\s*=\s*(?<value>.*?)\s*$/;

export function versionsOf(triple: VersionTriple) {
    return [triple.oldest, triple.middle, triple.latest];
}

/**
 * Derives the version triple from a branch name such as "18.0". Only the part
 * before the first dot is read, and it must be a plain number: "master" or
 * "saas-17.4" give `null`, as does any major below 2 (no triple of
 * non-negative versions ends there).
 */
export function parseVersionTriple(branch: string): VersionTriple | null {
    const [major] = branch.trim().split(".");
    if (!R_VERSION_NUMBER.test(major)) {
        return null;
    }
    const latest = Number(major);
    if (latest < MIN_LATEST_VERSION) {
        return null;
    }
    return { oldest: latest - 2, middle: latest - 1, latest };
}

export function formatEnvFile(triple: VersionTriple) {
    return versionsOf(triple)
        .map((version, i) => `${ENV_KEYS[i]}=${version}`)
        .concat("")
        .join("\n");
}

/**
 * Reads the version triple written by a previous run, if any.
 */
export async function readEnvFile(directory: string): Promise<VersionTriple | null> {
    let content: string;
    try {
        content = await readFile(join(directory, ENV_FILE_NAME), "utf-8");
    } catch (error) {
        logger.debug("could not read env file:", formatError(error));
        return null;
    }
    const entries: Record<string, string> = Object.create(null);
    for (const line of content.split("\n")) {
        const match = line.match(R_ENV_LINE);
        if (match?.groups) {
            entries[match.groups.key] = match.groups.value;
        }
    }
    const versions: number[] = [];
    for (const key of ENV_KEYS) {
        const value = entries[key];
        if (value === undefined || !R_VERSION_NUMBER.test(value)) {
            return null;
        }
        versions.push(Number(value));
    }
    const [oldest, middle, latest] = versions;
    return { oldest, middle, latest };
}

/**
 * Returns the default branch of a GitHub repository, or `null` (with a
 * warning) when it cannot be fetched.
 */
export async function fetchDefaultBranch(repository: string) {
    const url = `${GITHUB_API_URL}/repos/${repository}`;
    logger.debug("fetching repository information from", url);
    let body: unknown;
    try {
        const response = await fetch(url, {
            headers: { Accept: "application/vnd.github+json" },
            signal: AbortSignal.timeout(METADATA_TIMEOUT_MS),
        });
        if (!response.ok) {
            logger.warn(
                `could not fetch repository information for ${repository}: HTTP ${response.status}`
            );
            return null;
        }
        body = await response.json();
    } catch (error) {
        logger.warn(
            `could not fetch repository information for ${repository}:`,
            formatError(error)
        );
        return null;
    }
    const parsed = repositorySchema.safeParse(body);
    if (!parsed.success) {
        logger.warn(`could not determine the default branch of ${repository}`);
        return null;
    }
    return parsed.data.default_branch;
}

/**
 * Writes the `.env` file holding the three latest major versions of the given
 * repository and returns them. Nothing is written when the versions cannot be
 * determined.
 */
export async function createEnvFile(directory: string, repository: string) {
    logger.section("creating env file with Odoo versions");
    const branch = await fetchDefaultBranch(repository);
    if (branch === null) {
        logger.warn("skipping env file creation");
        return null;
    }
    const triple = parseVersionTriple(branch);
    if (!triple) {
        logger.warn(
            `failed to parse a version number from branch ${stringify(branch)}: skipping env file creation`
        );
        return null;
    }
    const envPath = join(directory, ENV_FILE_NAME);
    logger.info(`latest Odoo version detected: ${triple.latest}.0`);
    logger.info(
        `writing versions ${versionsOf(triple)
            .map((version) => `${version}.0`)
            .join(", ")} to`,
        envPath
    );
    await writeFile(envPath, formatEnvFile(triple), "utf-8");
    return triple;
}
