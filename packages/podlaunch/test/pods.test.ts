import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { destroyLatestPod, listGpuTypes, pauseLatestPod } from "../src/commands/pods.js";
import type { LatestPodStore } from "../src/config.js";
import { FatalError } from "../src/errors.js";

const memoryStore = (initial?: string) => {
	let current = initial;
	const store: LatestPodStore = {
		read: () => current,
		save: (podId) => {
			current = podId;
		},
		clear: () => {
			current = undefined;
		},
	};
	return store;
};

describe("pod commands", () => {
	beforeEach(() => {
		vi.spyOn(console, "log").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("terminates the latest pod and forgets it", async () => {
		const terminatePod = vi.fn(async (_podId: string) => true);
		const store = memoryStore("p1");

		await destroyLatestPod({ terminatePod }, store);

		expect(terminatePod).toHaveBeenCalledWith("p1");
		expect(store.read()).toBeUndefined();
	});

	it("keeps the latest pod when termination fails", async () => {
		const store = memoryStore("p1");

		await expect(destroyLatestPod({ terminatePod: async () => false }, store)).rejects.toThrow(
			new FatalError("Failed to shut down pod p1"),
		);
		expect(store.read()).toBe("p1");
	});

	it("fails when there is no latest pod", async () => {
		const terminatePod = vi.fn(async (_podId: string) => true);

		await expect(destroyLatestPod({ terminatePod }, memoryStore())).rejects.toThrow(
			new FatalError("No pod found in .latest_pod file\nCannot determine which pod to shutdown"),
		);
		expect(terminatePod).not.toHaveBeenCalled();
	});

	it("stops the latest pod and keeps it for reuse", async () => {
		const stopPod = vi.fn(async (_podId: string) => true);
		const store = memoryStore("p1");

		await pauseLatestPod({ stopPod }, store);

		expect(stopPod).toHaveBeenCalledWith("p1");
		expect(store.read()).toBe("p1");
	});

	it("fails to pause without a latest pod", async () => {
		await expect(pauseLatestPod({ stopPod: async () => true }, memoryStore())).rejects.toThrow(
			new FatalError("No pod found in .latest_pod file\nCannot determine which pod to pause"),
		);
	});

	it("lists GPU types with their memory", async () => {
		await listGpuTypes({
			getGpuTypes: async () => [
				{ id: "NVIDIA A40", displayName: "A40", memoryInGb: 48 },
				{ id: "NVIDIA RTX 4090", displayName: "RTX 4090", memoryInGb: null },
			],
		});

		expect(console.log).toHaveBeenCalledWith("Available GPU types:");
		expect(console.log).toHaveBeenCalledWith(expect.stringContaining("A40 (48 GB)"));
		expect(console.log).toHaveBeenCalledWith(expect.stringContaining("RTX 4090 (?)"));
	});
});
