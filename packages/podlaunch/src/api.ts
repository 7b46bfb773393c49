/**
 * @file RunPod API 客户端
 *
 * 封装 RunPod GraphQL 接口中与 Pod 生命周期相关的操作：
 * - 查询：getPod、listPods、getGpuTypes、getTemplateEnv、getAccountSshPublicKey
 * - 变更：createPod、stopPod、resumePod、terminatePod
 * - 轮询：waitForPodReady，等待 Pod 运行并暴露端口
 *
 * API Key 以查询参数的形式附加在请求 URL 上。
 * "Pod 不存在"、"模板没有环境变量"之类的预期缺失以 undefined / 空数组表示；
 * 服务端返回的错误列表在变更操作中表现为 false / 失败结果，而传输层错误直接抛出。
 */
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import chalk from "chalk";
import { mergeEnv } from "./env.js";
import { RunPodApiError } from "./errors.js";
import { suggestGpuTypes } from "./gpu-match.js";
import {
	accountPubKeyQuery,
	deployPodMutation,
	formatErrors,
	type GraphQLError,
	type GraphQLRequest,
	type GraphQLResponse,
	gpuTypesQuery,
	listPodsQuery,
	podQuery,
	resumePodMutation,
	stopPodMutation,
	templateEnvQuery,
	terminatePodMutation,
} from "./graphql.js";
import {
	type CloudType,
	type EnvVar,
	EnvVarListSchema,
	type GpuType,
	GpuTypeListSchema,
	type Pod,
	PodListSchema,
	PodSchema,
} from "./types.js";
import { type SleepFn, sleep } from "./utils.js";

/** 默认的就绪轮询间隔 */
const DEFAULT_POLL_INTERVAL_MS = 10_000;
/** 单次请求超时 */
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** 客户端可选依赖，测试中用于替换网络与时钟 */
export interface RunPodClientOptions {
	fetch?: typeof fetch;
	sleep?: SleepFn;
	now?: () => number;
	/** waitForPodReady 的轮询间隔（毫秒） */
	pollIntervalMs?: number;
	requestTimeoutMs?: number;
}

/** createPod 参数 */
export interface CreatePodOptions {
	templateId: string;
	name: string;
	gpuType: string;
	gpuCount: number;
	/** 除 22 之外需要暴露的应用端口 */
	appPort: number;
	volumeInGb: number;
	containerDiskInGb: number;
	volumeMountPath: string;
	cloudType?: CloudType;
	/** 写入 HF_TOKEN 环境变量 */
	hfToken?: string;
}

/** createPod 结果 */
export type CreatePodResult =
	| { ok: true; podId: string }
	| {
			ok: false;
			reason: "invalid-gpu-type";
			gpuType: string;
			/** 最相近的在前 */
			suggestions: string[];
			validGpuTypes: string[];
	  }
	| { ok: false; reason: "api-error"; errors: GraphQLError[] };

/**
 * 读取 data 下的某个字段，并用 schema 校验
 * 字段为 null / 缺失时返回 undefined，类型不符时视为格式错误抛出
 */
const readField = <T extends TSchema>(
	data: Record<string, unknown> | null | undefined,
	key: string,
	schema: T,
): Static<T> | undefined => {
	const value = data?.[key];
	if (value === null || value === undefined) {
		return undefined;
	}
	if (!Value.Check(schema, value)) {
		const first = Value.Errors(schema, value).First();
		const where = first ? ` at ${key}${first.path}: ${first.message}` : "";
		throw new RunPodApiError(`Malformed response for '${key}'${where}`);
	}
	return value;
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
	return typeof value === "object" && value !== null && !Array.isArray(value);
};

const toGraphQLError = (value: unknown): GraphQLError => {
	const message = isRecord(value) ? value.message : undefined;
	if (typeof message === "string") {
		return { message };
	}
	return { message: JSON.stringify(value) };
};

export class RunPodClient {
	private readonly fetchFn: typeof fetch;
	private readonly sleepFn: SleepFn;
	private readonly now: () => number;
	private readonly pollIntervalMs: number;
	private readonly requestTimeoutMs: number;
	/** GPU 类型目录，首次成功获取后缓存到实例生命周期结束 */
	private gpuTypesCache?: GpuType[];

	constructor(
		private readonly apiKey: string,
		private readonly apiUrl: string,
		options: RunPodClientOptions = {},
	) {
		this.fetchFn = options.fetch ?? fetch;
		this.sleepFn = options.sleep ?? sleep;
		this.now = options.now ?? Date.now;
		this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
		this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
	}

	/**
	 * 执行一次 GraphQL 请求
	 * 非 2xx 或响应不是 JSON 对象时打印原始响应并抛出 RunPodApiError
	 */
	private async execute(req: GraphQLRequest<object>): Promise<GraphQLResponse> {
		const url = new URL(this.apiUrl);
		url.searchParams.set("api_key", this.apiKey);

		let body = "";
		let status: number | undefined;
		try {
			const response = await this.fetchFn(url, {
				method: "POST",
				headers: { "content-type": "application/json" },
				body: JSON.stringify({ operationName: req.operationName, query: req.query, variables: req.variables }),
				signal: AbortSignal.timeout(this.requestTimeoutMs),
			});
			status = response.status;
			body = await response.text();
			if (!response.ok) {
				throw new RunPodApiError(`${req.operationName}: HTTP ${response.status} ${response.statusText}`, status, body);
			}
			const parsed: unknown = JSON.parse(body);
			if (!isRecord(parsed)) {
				throw new RunPodApiError(`${req.operationName}: response is not a JSON object`, status, body);
			}
			const data = parsed.data;
			const errors = parsed.errors;
			return {
				data: isRecord(data) ? data : null,
				errors: Array.isArray(errors) ? errors.map(toGraphQLError) : undefined,
			};
		} catch (e) {
			const error =
				e instanceof RunPodApiError
					? e
					: new RunPodApiError(`${req.operationName}: ${e instanceof Error ? e.message : String(e)}`, status, body);
			console.error(chalk.red(`API Error: ${error.message}`));
			console.error(chalk.gray(`Response: ${body || "No response"}`));
			throw error;
		}
	}

	/**
	 * 获取单个 Pod 的详细信息
	 * @returns Pod 信息，服务端没有该记录时返回 undefined
	 */
	async getPod(podId: string): Promise<Pod | undefined> {
		const result = await this.execute(podQuery(podId));
		return readField(result.data, "pod", PodSchema);
	}

	/** 列出当前账户下所有 Pod，顺序与服务端返回一致 */
	async listPods(): Promise<Pod[]> {
		const result = await this.execute(listPodsQuery());
		const myself = result.data?.myself;
		if (!isRecord(myself)) {
			return [];
		}
		return readField(myself, "pods", PodListSchema) ?? [];
	}

	/** 获取 GPU 类型目录，结果会被缓存 */
	async getGpuTypes(): Promise<GpuType[]> {
		if (this.gpuTypesCache) {
			return this.gpuTypesCache;
		}
		const result = await this.execute(gpuTypesQuery());
		const gpuTypes = readField(result.data, "gpuTypes", GpuTypeListSchema);
		if (!gpuTypes) {
			throw new RunPodApiError("GpuTypes: response has no gpuTypes");
		}
		this.gpuTypesCache = gpuTypes;
		return gpuTypes;
	}

	/**
	 * 获取模板声明的环境变量
	 * @returns 按模板顺序排列的键值对，模板未声明时为空数组
	 */
	async getTemplateEnv(templateId: string): Promise<EnvVar[]> {
		const result = await this.execute(templateEnvQuery(templateId));
		const template = result.data?.podTemplate;
		if (!isRecord(template)) {
			return [];
		}
		return readField(template, "env", EnvVarListSchema) ?? [];
	}

	/** 获取账户中保存的 SSH 公钥 */
	async getAccountSshPublicKey(): Promise<string | undefined> {
		const result = await this.execute(accountPubKeyQuery());
		const myself = result.data?.myself;
		const pubKey = isRecord(myself) ? myself.pubKey : undefined;
		if (typeof pubKey !== "string" || pubKey === "") {
			return undefined;
		}
		return pubKey;
	}

	/**
	 * 创建一个按需 Pod
	 *
	 * 1. 校验 GPU 类型；不在目录中时直接返回建议，不发出任何变更请求
	 * 2. 获取账户 SSH 公钥（缺失只是警告）
	 * 3. 取回模板环境变量并合并 PUBLIC_KEY / HF_TOKEN
	 * 4. 发出创建请求，暴露 22 端口和应用端口（TCP）
	 */
	async createPod(options: CreatePodOptions): Promise<CreatePodResult> {
		const validGpuTypes = (await this.getGpuTypes()).map((g) => g.id);
		if (!validGpuTypes.includes(options.gpuType)) {
			return {
				ok: false,
				reason: "invalid-gpu-type",
				gpuType: options.gpuType,
				suggestions: suggestGpuTypes(options.gpuType, validGpuTypes),
				validGpuTypes,
			};
		}

		console.log(
			`   Creating pod with template ${options.templateId}, GPU: ${options.gpuType}, Count: ${options.gpuCount}`,
		);
		console.log(`   Volume: ${options.volumeInGb}GB, Container Disk: ${options.containerDiskInGb}GB`);

		const publicKey = await this.getAccountSshPublicKey();
		if (publicKey) {
			console.log("   SSH keys retrieved from account");
		} else {
			console.log(chalk.yellow("   WARNING: No SSH keys found in account"));
		}

		const overrides: Record<string, string> = {};
		if (publicKey) {
			overrides.PUBLIC_KEY = publicKey;
		}
		if (options.hfToken) {
			overrides.HF_TOKEN = options.hfToken;
		}

		// 没有覆盖项时不传 env，保留模板自带的环境变量
		let env: EnvVar[] | undefined;
		if (Object.keys(overrides).length > 0) {
			const templateEnv = await this.getTemplateEnv(options.templateId);
			env = mergeEnv(templateEnv, overrides);
			console.log(chalk.gray(`   Env variables: ${env.map((e) => e.key).join(", ")}`));
		}

		const result = await this.execute(
			deployPodMutation({
				name: options.name,
				templateId: options.templateId,
				gpuTypeId: options.gpuType,
				gpuCount: options.gpuCount,
				ports: `22/tcp,${options.appPort}/tcp`,
				volumeInGb: options.volumeInGb,
				containerDiskInGb: options.containerDiskInGb,
				volumeMountPath: options.volumeMountPath,
				...(options.cloudType ? { cloudType: options.cloudType } : {}),
				...(env ? { env } : {}),
			}),
		);

		if (result.errors && result.errors.length > 0) {
			console.log(chalk.red(`   Errors creating pod: ${formatErrors(result.errors)}`));
			return { ok: false, reason: "api-error", errors: result.errors };
		}

		const deployed = result.data?.podFindAndDeployOnDemand;
		const podId = isRecord(deployed) ? deployed.id : undefined;
		if (typeof podId !== "string" || podId === "") {
			return { ok: false, reason: "api-error", errors: [{ message: "Response did not include a pod id" }] };
		}
		return { ok: true, podId };
	}

	/**
	 * 停止 Pod（不删除），之后可以 resume，省去重新调度 GPU 和初始化的时间
	 */
	async stopPod(podId: string): Promise<boolean> {
		console.log(`Stopping pod ${podId}...`);
		const result = await this.execute(stopPodMutation(podId));
		if (result.errors && result.errors.length > 0) {
			console.log(chalk.red(`Errors stopping pod: ${formatErrors(result.errors)}`));
			return false;
		}
		console.log(chalk.green(`Pod ${podId} stopped successfully (can be resumed later)`));
		return true;
	}

	/** 恢复已停止的 Pod */
	async resumePod(podId: string, gpuCount = 1): Promise<boolean> {
		console.log(`   Resuming pod ${podId}...`);
		const result = await this.execute(resumePodMutation(podId, gpuCount));
		if (result.errors && result.errors.length > 0) {
			console.log(chalk.red(`   Errors resuming pod: ${formatErrors(result.errors)}`));
			return false;
		}
		console.log(chalk.green(`   Pod ${podId} resumed successfully`));
		return true;
	}

	/** 终止并删除 Pod */
	async terminatePod(podId: string): Promise<boolean> {
		console.log(`Terminating pod ${podId}...`);
		const result = await this.execute(terminatePodMutation(podId));
		if (result.errors && result.errors.length > 0) {
			console.log(chalk.red(`Errors terminating pod: ${formatErrors(result.errors)}`));
			return false;
		}
		console.log(chalk.green(`Pod ${podId} terminated successfully`));
		return true;
	}

	/**
	 * 轮询直到 Pod 运行并暴露了端口
	 * @param timeoutSeconds - 超过该时间仍未就绪则返回 false
	 * @param signal - 中止后立即返回 false
	 */
	async waitForPodReady(podId: string, timeoutSeconds = 300, signal?: AbortSignal): Promise<boolean> {
		console.log(`   Waiting for pod ${podId} to be ready (timeout: ${timeoutSeconds}s)...`);
		const start = this.now();
		const timeoutMs = timeoutSeconds * 1000;

		while (this.now() - start < timeoutMs) {
			if (signal?.aborted) {
				return false;
			}
			const pod = await this.getPod(podId);
			if (pod?.runtime?.ports && pod.runtime.ports.length > 0) {
				console.log(chalk.green(`   Pod ${podId} is ready!`));
				return true;
			}
			const elapsed = Math.floor((this.now() - start) / 1000);
			console.log(chalk.gray(`     [${elapsed}s] Still waiting for pod to initialize...`));
			await this.sleepFn(this.pollIntervalMs, signal);
		}

		console.log(chalk.yellow(`   Timeout waiting for pod ${podId}`));
		return false;
	}
}
