import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LocalError } from "../constants";
import { spawnProcess } from "../process";
import { deleteServices, findComposeFile, manageServices, restartServices } from "../services";

vi.mock("../process", () => ({
    commandSucceeds: vi.fn(),
    spawnProcess: vi.fn(),
}));

const spawnMock = vi.mocked(spawnProcess);

const DOWN = ["docker", "compose", "down", "--remove-orphans"];
const DOWN_VOLUMES = ["docker", "compose", "down", "--volumes", "--remove-orphans"];

describe("services", () => {
    let directory: string;
    let spawnOptions: object;

    beforeEach(async () => {
        directory = await mkdtemp(join(tmpdir(), "odoo-dev-services-"));
        spawnOptions = {
            cwd: directory,
            env: { HOST_UID: String(process.getuid?.()), HOST_GID: String(process.getgid?.()) },
        };
        spawnMock.mockReset();
        spawnMock.mockResolvedValue(0);
        vi.spyOn(console, "log").mockImplementation(() => {});
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(directory, { force: true, recursive: true });
    });

    it("finds either compose file name", async () => {
        expect(await findComposeFile(directory)).toBeNull();
        await writeFile(join(directory, "docker-compose.yaml"), "services: {}\n");
        expect(await findComposeFile(directory)).toBe(join(directory, "docker-compose.yaml"));
        await writeFile(join(directory, "docker-compose.yml"), "services: {}\n");
        expect(await findComposeFile(directory)).toBe(join(directory, "docker-compose.yml"));
    });

    it("skips everything without a compose file", async () => {
        expect(await manageServices(directory, { fresh: true })).toBe(false);
        expect(spawnMock).not.toHaveBeenCalled();
    });

    it("keeps volumes on a normal start", async () => {
        await writeFile(join(directory, "docker-compose.yml"), "services: {}\n");
        expect(await manageServices(directory, { fresh: false })).toBe(true);
        expect(spawnMock.mock.calls).toEqual([
            [DOWN, spawnOptions],
            [
                ["docker", "compose", "up", "-d", "--build", "--remove-orphans", "--wait"],
                spawnOptions,
            ],
        ]);
    });

    it("removes volumes on a fresh start", async () => {
        await writeFile(join(directory, "docker-compose.yml"), "services: {}\n");
        await manageServices(directory, { fresh: true });
        expect(spawnMock).toHaveBeenCalledTimes(2);
        expect(spawnMock.mock.calls[0]).toEqual([DOWN_VOLUMES, spawnOptions]);
    });

    it("deletes containers and volumes", async () => {
        await deleteServices(directory);
        expect(spawnMock.mock.calls).toEqual([[DOWN_VOLUMES, spawnOptions]]);
    });

    it("restarts without rebuilding", async () => {
        await restartServices(directory);
        expect(spawnMock.mock.calls).toEqual([
            [DOWN, spawnOptions],
            [["docker", "compose", "up", "-d", "--remove-orphans", "--wait"], spawnOptions],
        ]);
    });

    it("reports compose failures", async () => {
        spawnMock.mockRejectedValue(new Error("docker compose down exited with code 1"));
        const result = deleteServices(directory);
        await expect(result).rejects.toThrow(LocalError);
        await expect(result).rejects.toThrow(
            "docker compose down failed: docker compose down exited with code 1"
        );
    });
});
