/**
 * @file Pod 获取流程
 *
 * 决定本次运行使用哪个 Pod：
 * 1. 配置了 targetPodId：直接使用，不做任何创建或恢复
 * 2. 启用复用且 .latest_pod 中有记录：
 *    - 服务端已不存在 → 新建
 *    - 正在运行 → 直接复用
 *    - 已停止且 GPU 类型一致 → 恢复；恢复请求本身失败则改为新建，恢复后等待超时则终止
 *    - 已停止但 GPU 类型不一致 → 在所有 Pod 中查找同名前缀、同 GPU 类型的已停止 Pod 并恢复，找不到则新建
 * 3. 新建：名称为 {user}-{podName}，创建失败或等待超时都终止
 *
 * 恢复请求失败时回退到新建，而恢复被接受后的等待超时直接终止，避免重复创建 Pod 产生额外费用。
 */
import chalk from "chalk";
import type { CreatePodOptions, CreatePodResult } from "./api.js";
import type { LatestPodStore } from "./config.js";
import { FatalError } from "./errors.js";
import { formatErrors } from "./graphql.js";
import { isPodRunning, type Pod, type PodPort, podGpuType } from "./types.js";

/**
 * 获取流程用到的 API 能力，RunPodClient 满足此接口
 */
export interface PodApi {
	getPod(podId: string): Promise<Pod | undefined>;
	listPods(): Promise<Pod[]>;
	resumePod(podId: string, gpuCount?: number): Promise<boolean>;
	createPod(options: CreatePodOptions): Promise<CreatePodResult>;
	waitForPodReady(podId: string, timeoutSeconds?: number, signal?: AbortSignal): Promise<boolean>;
}

/** 获取流程的输入 */
export interface AcquireOptions {
	api: PodApi;
	latestPod: LatestPodStore;
	userName: string;
	targetPodId?: string;
	reuse: boolean;
	podName: string;
	gpuTypeId: string;
	gpuCount: number;
	appPort: number;
	volumeInGb: number;
	containerDiskInGb: number;
	volumeMountPath: string;
	templateId: string;
	cloudType?: CreatePodOptions["cloudType"];
	hfToken?: string;
	/** 等待 Pod 就绪的超时（秒） */
	startupWait: number;
	signal?: AbortSignal;
}

/** Pod 名称（也是模糊查找时的名称前缀） */
export const podNameFor = (userName: string, podName: string): string => `${userName}-${podName}`;

/**
 * 在 Pod 列表中查找可恢复的 Pod：名称前缀匹配、GPU 类型一致且处于停止状态
 * 多个匹配时取列表中的第一个
 */
export const findStoppedPod = (pods: Pod[], namePrefix: string, gpuTypeId: string): Pod | undefined => {
	return pods.find((pod) => pod.name.startsWith(namePrefix) && podGpuType(pod) === gpuTypeId && !isPodRunning(pod));
};

/**
 * 打印创建失败的原因
 */
export const describeCreateFailure = (result: Exclude<CreatePodResult, { ok: true }>): string => {
	if (result.reason === "api-error") {
		return `Failed to create pod: ${formatErrors(result.errors)}`;
	}

	const lines = [`Unknown gpu_type: '${result.gpuType}'`];
	const [best, ...others] = result.suggestions;
	if (best !== undefined) {
		lines.push(`Did you mean: '${best}'`);
		if (others.length > 0) {
			lines.push("Other close matches:");
			lines.push(...others.map((s) => `  - ${s}`));
		}
	}
	lines.push("", "Valid gpu_type values are:");
	lines.push(...result.validGpuTypes.map((id) => `  - ${id}`));
	return lines.join("\n");
};

/** 等待 Pod 就绪，超时视为致命错误 */
const waitOrFail = async (options: AcquireOptions, podId: string, message: string): Promise<void> => {
	const ready = await options.api.waitForPodReady(podId, options.startupWait, options.signal);
	if (!ready) {
		throw new FatalError(message);
	}
};

/**
 * 尝试复用最近的 Pod
 * @returns 可用的 Pod ID，需要新建时返回 undefined
 */
const reuseLatest = async (options: AcquireOptions, latestPodId: string): Promise<string | undefined> => {
	const { api } = options;

	console.log(`\n1. Checking if latest pod ${latestPodId} is available...`);
	const existing = await api.getPod(latestPodId);

	if (!existing) {
		console.log(`   Latest pod ${latestPodId} not found (may have been deleted).`);
		console.log("   Will create a new pod.");
		return undefined;
	}

	if (isPodRunning(existing)) {
		console.log(chalk.green(`   Latest pod ${latestPodId} is available and running!`));
		console.log("   Reusing existing pod instead of creating a new one.");
		return latestPodId;
	}

	console.log(`   Latest pod ${latestPodId} is stopped.`);
	const podGpu = podGpuType(existing);

	if (podGpu === options.gpuTypeId) {
		console.log(`   GPU type matches (${podGpu}). Resuming pod...`);
		if (!(await api.resumePod(latestPodId, options.gpuCount))) {
			console.log(chalk.yellow(`   Failed to resume pod ${latestPodId}`));
			console.log("   Will create a new pod.");
			return undefined;
		}
		await waitOrFail(options, latestPodId, "Pod failed to start in time after resume");
		return latestPodId;
	}

	console.log(
		chalk.yellow(`   WARNING: Latest pod has GPU type '${podGpu}' but config specifies '${options.gpuTypeId}'`),
	);
	console.log("   Searching for stopped pods with matching GPU type...");

	const prefix = podNameFor(options.userName, options.podName);
	const match = findStoppedPod(await api.listPods(), prefix, options.gpuTypeId);
	if (!match) {
		console.log(`   No stopped pods found with GPU type '${options.gpuTypeId}'`);
		console.log("   Will create a new pod.");
		return undefined;
	}

	console.log(chalk.green(`   Found stopped pod ${match.id} with matching GPU type!`));
	if (!(await api.resumePod(match.id, options.gpuCount))) {
		console.log(chalk.yellow(`   Failed to resume pod ${match.id}`));
		console.log("   Will create a new pod.");
		return undefined;
	}
	options.latestPod.save(match.id);
	await waitOrFail(options, match.id, "Pod failed to start in time after resume");
	return match.id;
};

/**
 * 新建 Pod，保存为最近 Pod 并等待就绪
 */
const createNew = async (options: AcquireOptions): Promise<string> => {
	const name = podNameFor(options.userName, options.podName);
	console.log(`\n1. Creating new pod '${name}' with ${options.gpuTypeId} GPU and template ${options.templateId}`);

	const result = await options.api.createPod({
		templateId: options.templateId,
		name,
		gpuType: options.gpuTypeId,
		gpuCount: options.gpuCount,
		appPort: options.appPort,
		volumeInGb: options.volumeInGb,
		containerDiskInGb: options.containerDiskInGb,
		volumeMountPath: options.volumeMountPath,
		cloudType: options.cloudType,
		hfToken: options.hfToken,
	});

	if (!result.ok) {
		throw new FatalError(describeCreateFailure(result));
	}

	console.log(chalk.green(`   Pod created successfully! ID: ${result.podId}`));
	options.latestPod.save(result.podId);
	await waitOrFail(options, result.podId, "Pod failed to start in time");
	return result.podId;
};

/**
 * 获取一个可用的 Pod
 * @returns 就绪（或由调用方指定）的 Pod ID
 * @throws FatalError 创建失败、等待就绪超时
 */
export const acquirePod = async (options: AcquireOptions): Promise<string> => {
	if (options.targetPodId) {
		console.log(`\n1. Using existing pod: ${options.targetPodId}`);
		return options.targetPodId;
	}

	if (options.reuse) {
		const latestPodId = options.latestPod.read();
		if (latestPodId) {
			const reused = await reuseLatest(options, latestPodId);
			if (reused) {
				return reused;
			}
		}
	}

	return createNew(options);
};

/** Pod 的连接端点 */
export interface PodEndpoints {
	ssh: PodPort;
	app: PodPort;
}

/**
 * 从 Pod 的端口列表中找出 SSH 端口（TCP 22）和应用端口（TCP appPort）
 * @throws FatalError Pod 未运行或缺少任一端口
 */
export const resolveEndpoints = (pod: Pod, appPort: number): PodEndpoints => {
	const ports = pod.runtime?.ports;
	if (!ports) {
		throw new FatalError(`Pod ${pod.id} is not running`);
	}

	const ssh = ports.find((p) => p.type === "tcp" && p.privatePort === 22);
	if (!ssh) {
		throw new FatalError("No SSH port found for this pod");
	}

	const app = ports.find((p) => p.type === "tcp" && p.privatePort === appPort);
	if (!app) {
		throw new FatalError(`No TCP port found for app port ${appPort}`);
	}

	return { ssh, app };
};
