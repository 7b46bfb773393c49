/**
 * @file Pod 管理命令模块
 *
 * 针对 .latest_pod 中记录的 Pod 的管理命令：
 * - destroyLatestPod：终止并删除 Pod，同时清除 .latest_pod
 * - pauseLatestPod：停止 Pod（保留磁盘，之后可以通过复用功能恢复）
 * 以及查看 GPU 类型目录的 listGpuTypes。
 */
import chalk from "chalk";
import type { RunPodClient } from "../api.js";
import type { LatestPodStore } from "../config.js";
import { FatalError } from "../errors.js";
import { printSection } from "../utils.js";

/** 读取最近 Pod ID，没有记录时报错 */
const requireLatestPodId = (latestPod: LatestPodStore, action: string): string => {
	const podId = latestPod.read();
	if (!podId) {
		throw new FatalError(`No pod found in .latest_pod file\nCannot determine which pod to ${action}`);
	}
	console.log(`Found pod ID: ${podId}`);
	return podId;
};

/**
 * 终止最近的 Pod 并删除 .latest_pod
 */
export const destroyLatestPod = async (
	api: Pick<RunPodClient, "terminatePod">,
	latestPod: LatestPodStore,
): Promise<void> => {
	printSection("RunPod Shutdown");
	const podId = requireLatestPodId(latestPod, "shutdown");

	if (!(await api.terminatePod(podId))) {
		throw new FatalError(`Failed to shut down pod ${podId}`);
	}
	latestPod.clear();
	console.log(chalk.green(`\nSuccessfully shut down pod ${podId}`));
};

/**
 * 停止最近的 Pod，不删除
 */
export const pauseLatestPod = async (api: Pick<RunPodClient, "stopPod">, latestPod: LatestPodStore): Promise<void> => {
	printSection("RunPod Pause");
	const podId = requireLatestPodId(latestPod, "pause");

	if (!(await api.stopPod(podId))) {
		throw new FatalError(`Failed to pause pod ${podId}`);
	}
	console.log(chalk.green(`\nSuccessfully paused pod ${podId}`));
	console.log("Pod can be resumed later with the 'reuse' feature");
};

/**
 * 列出 GPU 类型目录
 */
export const listGpuTypes = async (api: Pick<RunPodClient, "getGpuTypes">): Promise<void> => {
	const gpuTypes = await api.getGpuTypes();
	if (gpuTypes.length === 0) {
		console.log("No GPU types available.");
		return;
	}

	const width = Math.max(...gpuTypes.map((g) => g.id.length));
	console.log("Available GPU types:");
	for (const gpu of gpuTypes) {
		const memory = gpu.memoryInGb === null ? "?" : `${gpu.memoryInGb} GB`;
		console.log(`  ${chalk.bold(gpu.id.padEnd(width))}  ${gpu.displayName} (${memory})`);
	}
};
