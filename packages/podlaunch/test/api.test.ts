import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RunPodClient } from "../src/api.js";
import { RunPodApiError } from "../src/errors.js";

interface RecordedCall {
	url: string;
	operationName: string;
	query: string;
	variables: Record<string, unknown>;
}

type Handler = (operationName: string, variables: Record<string, unknown>) => unknown;

/** 按 operationName 分派的假 GraphQL 端点 */
const fakeEndpoint = (handler: Handler) => {
	const calls: RecordedCall[] = [];
	const fetchFn: typeof fetch = async (input, init) => {
		const body: { operationName: string; query: string; variables: Record<string, unknown> } = JSON.parse(
			String(init?.body),
		);
		calls.push({ url: String(input), ...body });
		return new Response(JSON.stringify(handler(body.operationName, body.variables)), {
			status: 200,
			headers: { "content-type": "application/json" },
		});
	};
	return { fetchFn, calls };
};

const API_URL = "https://api.example.test/graphql";

const GPU_CATALOG = {
	gpuTypes: [
		{ id: "NVIDIA A100", displayName: "A100", memoryInGb: 80 },
		{ id: "NVIDIA A40", displayName: "A40", memoryInGb: 48 },
		{ id: "NVIDIA RTX 4090", displayName: "RTX 4090", memoryInGb: 24 },
	],
};

const readyPod = (id: string) => ({
	id,
	name: "alice-job",
	desiredStatus: "RUNNING",
	machine: { gpuTypeId: "NVIDIA A40" },
	runtime: {
		uptimeInSeconds: 12,
		ports: [{ ip: "203.0.113.10", isIpPublic: true, privatePort: 22, publicPort: 40022, type: "tcp" }],
	},
});

const createOptions = {
	templateId: "tmpl-1",
	name: "alice-job",
	gpuType: "NVIDIA A40",
	gpuCount: 1,
	appPort: 8080,
	volumeInGb: 20,
	containerDiskInGb: 20,
	volumeMountPath: "/workspace",
};

describe("RunPodClient", () => {
	beforeEach(() => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		vi.spyOn(console, "error").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	describe("queries", () => {
		it("sends the api key as a query parameter and ids as variables", async () => {
			const podId = 'p1"){ evil }';
			const { fetchFn, calls } = fakeEndpoint(() => ({ data: { pod: readyPod("p1") } }));
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn });

			const pod = await client.getPod(podId);

			expect(pod?.id).toBe("p1");
			expect(calls).toHaveLength(1);
			expect(calls[0].url).toBe("https://api.example.test/graphql?api_key=test-key");
			expect(calls[0].variables).toEqual({ input: { podId } });
			expect(calls[0].query).not.toContain(podId);
		});

		it("returns undefined for a pod the server does not know", async () => {
			const { fetchFn } = fakeEndpoint(() => ({ data: { pod: null } }));
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn });
			expect(await client.getPod("gone")).toBeUndefined();
		});

		it("returns an empty list when the account has no pods", async () => {
			const { fetchFn } = fakeEndpoint(() => ({ data: { myself: null } }));
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn });
			expect(await client.listPods()).toEqual([]);
		});

		it("lists pods in server order", async () => {
			const { fetchFn } = fakeEndpoint(() => ({
				data: { myself: { pods: [readyPod("b"), { id: "a", name: "alice-job-2", runtime: null }] } },
			}));
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn });
			const pods = await client.listPods();
			expect(pods.map((p) => p.id)).toEqual(["b", "a"]);
		});

		it("caches the GPU type catalog", async () => {
			const { fetchFn, calls } = fakeEndpoint(() => ({ data: GPU_CATALOG }));
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn });

			const first = await client.getGpuTypes();
			const second = await client.getGpuTypes();

			expect(first.map((g) => g.id)).toEqual(["NVIDIA A100", "NVIDIA A40", "NVIDIA RTX 4090"]);
			expect(second).toBe(first);
			expect(calls).toHaveLength(1);
		});

		it("returns an empty env list for a template without env", async () => {
			const { fetchFn, calls } = fakeEndpoint(() => ({ data: { podTemplate: null } }));
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn });
			expect(await client.getTemplateEnv("tmpl-1")).toEqual([]);
			expect(calls[0].variables).toEqual({ id: "tmpl-1" });
		});

		it("treats an empty account key as missing", async () => {
			const { fetchFn } = fakeEndpoint(() => ({ data: { myself: { pubKey: "" } } }));
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn });
			expect(await client.getAccountSshPublicKey()).toBeUndefined();
		});
	});

	describe("transport errors", () => {
		it("throws RunPodApiError with the HTTP status on a non-2xx response", async () => {
			const fetchFn: typeof fetch = async () =>
				new Response("upstream down", { status: 500, statusText: "Internal Server Error" });
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn });

			const error = await client.getPod("p1").catch((e: unknown) => e);

			expect(error).toBeInstanceOf(RunPodApiError);
			if (error instanceof RunPodApiError) {
				expect(error.status).toBe(500);
				expect(error.body).toBe("upstream down");
				expect(error.message).toBe("Pod: HTTP 500 Internal Server Error");
			}
		});

		it("rejects a malformed pod record", async () => {
			const { fetchFn } = fakeEndpoint(() => ({ data: { pod: { id: 42 } } }));
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn });
			await expect(client.getPod("p1")).rejects.toThrow(RunPodApiError);
		});
	});

	describe("createPod", () => {
		it("returns suggestions for an unknown GPU type without issuing a mutation", async () => {
			const { fetchFn, calls } = fakeEndpoint(() => ({ data: GPU_CATALOG }));
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn });

			const result = await client.createPod({ ...createOptions, gpuType: "a100" });

			expect(result.ok).toBe(false);
			if (!result.ok && result.reason === "invalid-gpu-type") {
				expect(result.gpuType).toBe("a100");
				expect(result.suggestions[0]).toBe("NVIDIA A100");
				expect(result.validGpuTypes).toEqual(["NVIDIA A100", "NVIDIA A40", "NVIDIA RTX 4090"]);
			} else {
				expect.unreachable("expected an invalid-gpu-type result");
			}
			expect(calls.map((c) => c.operationName)).toEqual(["GpuTypes"]);
		});

		it("merges the account key and HF token into the template env", async () => {
			const { fetchFn, calls } = fakeEndpoint((op) => {
				switch (op) {
					case "GpuTypes":
						return { data: GPU_CATALOG };
					case "Myself":
						return { data: { myself: { pubKey: "ssh-ed25519 AAAA test" } } };
					case "PodTemplate":
						return {
							data: {
								podTemplate: {
									env: [
										{ key: "JUPYTER_PASSWORD", value: "x" },
										{ key: "PUBLIC_KEY", value: "old" },
									],
								},
							},
						};
					default:
						return { data: { podFindAndDeployOnDemand: { id: "new1", name: "alice-job" } } };
				}
			});
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn });

			const result = await client.createPod({ ...createOptions, hfToken: "test-hf" });

			expect(result).toEqual({ ok: true, podId: "new1" });
			const deploy = calls[calls.length - 1];
			expect(deploy.variables).toEqual({
				input: {
					name: "alice-job",
					templateId: "tmpl-1",
					gpuTypeId: "NVIDIA A40",
					gpuCount: 1,
					ports: "22/tcp,8080/tcp",
					volumeInGb: 20,
					containerDiskInGb: 20,
					volumeMountPath: "/workspace",
					env: [
						{ key: "JUPYTER_PASSWORD", value: "x" },
						{ key: "PUBLIC_KEY", value: "ssh-ed25519 AAAA test" },
						{ key: "HF_TOKEN", value: "test-hf" },
					],
				},
			});
		});

		it("leaves the template env alone when there is nothing to override", async () => {
			const { fetchFn, calls } = fakeEndpoint((op) => {
				if (op === "GpuTypes") {
					return { data: GPU_CATALOG };
				}
				if (op === "Myself") {
					return { data: { myself: { pubKey: null } } };
				}
				return { data: { podFindAndDeployOnDemand: { id: "new2" } } };
			});
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn });

			const result = await client.createPod({ ...createOptions, cloudType: "SECURE" });

			expect(result).toEqual({ ok: true, podId: "new2" });
			expect(calls.map((c) => c.operationName)).not.toContain("PodTemplate");
			const input = calls[calls.length - 1].variables.input;
			expect(input).toMatchObject({ cloudType: "SECURE" });
			expect(input).not.toHaveProperty("env");
		});

		it("reports GraphQL errors as an api-error result", async () => {
			const { fetchFn } = fakeEndpoint((op) => {
				if (op === "GpuTypes") {
					return { data: GPU_CATALOG };
				}
				if (op === "Myself") {
					return { data: { myself: null } };
				}
				return { data: null, errors: [{ message: "No GPUs available" }] };
			});
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn });

			const result = await client.createPod(createOptions);

			expect(result).toEqual({ ok: false, reason: "api-error", errors: [{ message: "No GPUs available" }] });
		});
	});

	describe("lifecycle mutations", () => {
		it("returns false when the server reports errors", async () => {
			const { fetchFn } = fakeEndpoint(() => ({ data: null, errors: [{ message: "not enough GPUs" }] }));
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn });
			expect(await client.resumePod("p1")).toBe(false);
			expect(await client.stopPod("p1")).toBe(false);
			expect(await client.terminatePod("p1")).toBe(false);
		});

		it("returns true on success and passes the GPU count to resume", async () => {
			const { fetchFn, calls } = fakeEndpoint(() => ({ data: { podResume: { id: "p1" } } }));
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn });
			expect(await client.resumePod("p1", 2)).toBe(true);
			expect(calls[0].variables).toEqual({ input: { podId: "p1", gpuCount: 2 } });
		});
	});

	describe("waitForPodReady", () => {
		/** 调用 sleep 时推进时间的假时钟 */
		const fakeClock = () => {
			let now = 0;
			const sleeps: number[] = [];
			return {
				now: () => now,
				sleep: async (ms: number) => {
					sleeps.push(ms);
					now += ms;
				},
				sleeps,
			};
		};

		it("returns true as soon as the pod exposes ports", async () => {
			const responses = [
				{ id: "p1", name: "alice-job", runtime: null },
				{ id: "p1", name: "alice-job", runtime: { ports: [] } },
				readyPod("p1"),
			];
			let polls = 0;
			const { fetchFn } = fakeEndpoint(() => ({ data: { pod: responses[polls++] } }));
			const clock = fakeClock();
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn, now: clock.now, sleep: clock.sleep });

			expect(await client.waitForPodReady("p1", 300)).toBe(true);
			expect(polls).toBe(3);
			expect(clock.sleeps).toEqual([10_000, 10_000]);
		});

		it("gives up after the timeout", async () => {
			let polls = 0;
			const { fetchFn } = fakeEndpoint(() => {
				polls++;
				return { data: { pod: { id: "p1", name: "alice-job", runtime: null } } };
			});
			const clock = fakeClock();
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn, now: clock.now, sleep: clock.sleep });

			expect(await client.waitForPodReady("p1", 30)).toBe(false);
			expect(polls).toBe(3);
			expect(clock.sleeps).toEqual([10_000, 10_000, 10_000]);
		});

		it("stops polling once the signal is aborted", async () => {
			const controller = new AbortController();
			controller.abort();
			const { fetchFn, calls } = fakeEndpoint(() => ({ data: { pod: readyPod("p1") } }));
			const client = new RunPodClient("test-key", API_URL, { fetch: fetchFn });

			expect(await client.waitForPodReady("p1", 30, controller.signal)).toBe(false);
			expect(calls).toHaveLength(0);
		});
	});
});
