import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { userCommand } from "../src/commands/user.js";
import { getUserConfigPath, saveUserIdentity } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("userCommand", () => {
	let dir: string;
	let previousConfigDir: string | undefined;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "podlaunch-user-"));
		previousConfigDir = process.env.PODLAUNCH_CONFIG_DIR;
		process.env.PODLAUNCH_CONFIG_DIR = dir;
		vi.spyOn(console, "log").mockImplementation(() => {});
	});

	afterEach(() => {
		if (previousConfigDir === undefined) {
			delete process.env.PODLAUNCH_CONFIG_DIR;
		} else {
			process.env.PODLAUNCH_CONFIG_DIR = previousConfigDir;
		}
		rmSync(dir, { recursive: true, force: true });
		vi.restoreAllMocks();
	});

	const savedIdentity = () => JSON.parse(readFileSync(getUserConfigPath(), "utf-8"));

	it("saves a validated name", () => {
		userCommand("Alice");
		expect(savedIdentity()).toEqual({ name: "alice" });
	});

	it("updates git details without changing the name", () => {
		saveUserIdentity({ name: "alice" });
		userCommand(undefined, { gitName: "Alice", gitEmail: "alice@example.test" });
		expect(savedIdentity()).toEqual({ name: "alice", gitName: "Alice", gitEmail: "alice@example.test" });
	});

	it("shows the saved identity", () => {
		saveUserIdentity({ name: "alice", gitName: "Alice", gitEmail: "alice@example.test" });
		userCommand();
		expect(console.log).toHaveBeenCalledWith("Git: Alice <alice@example.test>");
	});

	it("rejects an invalid name", () => {
		expect(() => userCommand("not valid")).toThrow(ConfigError);
	});
});
