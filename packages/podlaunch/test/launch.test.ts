import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ensureSession } from "../src/commands/launch.js";
import { FatalError } from "../src/errors.js";
import type { PodPort } from "../src/types.js";
import { fakeShell } from "./helpers.js";

const app: PodPort = { ip: "203.0.113.10", privatePort: 8080, publicPort: 40080, type: "tcp" };

const options = {
	sessionName: "job-p1",
	logFile: "/workspace/job-p1.log",
	command: "python3 -m http.server 8080",
	restart: false,
	app,
};

describe("ensureSession", () => {
	beforeEach(() => {
		vi.spyOn(console, "log").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("leaves a running session alone", async () => {
		const { shell, commands } = fakeShell({ "tmux has-session": { stdout: "exists\n" } });
		const checkHttp = vi.fn(async () => true);
		const sleep = vi.fn(async () => {});

		const result = await ensureSession(shell, { ...options, checkHttp, sleep });

		expect(result).toBe("skipped");
		expect(commands).toEqual(["tmux has-session -t job-p1 2>/dev/null && echo exists"]);
		expect(checkHttp).toHaveBeenCalledWith("203.0.113.10", 40080);
		expect(sleep).not.toHaveBeenCalled();
	});

	it("restarts a running session when asked to", async () => {
		const { shell, commands } = fakeShell({ "tmux has-session": { stdout: "exists\n" } });
		const sleep = vi.fn(async () => {});

		const result = await ensureSession(shell, { ...options, restart: true, checkHttp: async () => true, sleep });

		expect(result).toBe("restarted");
		expect(commands).toEqual([
			"tmux has-session -t job-p1 2>/dev/null && echo exists",
			"tmux kill-session -t job-p1",
			"tmux new-session -d -s job-p1 bash -i -c 'python3 -m http.server 8080'",
			"tmux pipe-pane -t job-p1 -o 'cat >> /workspace/job-p1.log'",
		]);
		expect(sleep).toHaveBeenCalledWith(5000);
	});

	it("starts the command when the server is not answering", async () => {
		const { shell, commands } = fakeShell({ "tmux has-session": { stdout: "exists\n" } });

		const result = await ensureSession(shell, {
			...options,
			checkHttp: async () => false,
			sleep: async () => {},
		});

		expect(result).toBe("started");
		expect(commands[1]).toBe("tmux new-session -d -s job-p1 bash -i -c 'python3 -m http.server 8080'");
	});

	it("creates the session without killing anything when only the server answers", async () => {
		const { shell, commands } = fakeShell();
		const sleep = vi.fn(async () => {});

		const result = await ensureSession(shell, { ...options, checkHttp: async () => true, sleep });

		expect(result).toBe("started");
		expect(commands).toEqual([
			"tmux has-session -t job-p1 2>/dev/null && echo exists",
			"tmux new-session -d -s job-p1 bash -i -c 'python3 -m http.server 8080'",
			"tmux pipe-pane -t job-p1 -o 'cat >> /workspace/job-p1.log'",
		]);
		expect(sleep).toHaveBeenCalledWith(5000);
	});

	it("fails when the session cannot be created", async () => {
		const { shell } = fakeShell({ "tmux new-session": { stderr: "no server running" } });

		await expect(
			ensureSession(shell, { ...options, checkHttp: async () => false, sleep: async () => {} }),
		).rejects.toThrow(new FatalError("Failed to create tmux session"));
	});
});
