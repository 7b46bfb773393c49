/**
 * @file 通用工具函数
 *
 * - sleep：可被 AbortSignal 提前唤醒的等待
 * - printSection：打印分节标题
 * - checkHttpServer：探测 Pod 上的 HTTP 服务是否在响应
 * - openBrowser：用系统默认浏览器打开 URL
 */
import chalk from "chalk";
import { spawn } from "child_process";

/** 等待函数签名，便于在测试中替换 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * 等待指定毫秒数；signal 中止时立即返回（不抛错）
 */
export const sleep: SleepFn = (ms, signal) => {
	return new Promise((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
};

/** 分隔线宽度 */
const RULE_WIDTH = 80;

/** 打印一条分隔线 */
export const printRule = (): void => {
	console.log("=".repeat(RULE_WIDTH));
};

/** 打印分节标题 */
export const printSection = (title: string): void => {
	console.log("");
	printRule();
	console.log(chalk.bold(title));
	printRule();
};

/**
 * 检查 HTTP 服务是否在响应
 * @param ip - 公网 IP
 * @param publicPort - 公网端口
 * @param timeoutMs - 请求超时
 * @returns 响应状态码小于 400 时为 true，连接失败或超时为 false
 */
export const checkHttpServer = async (
	ip: string,
	publicPort: number,
	timeoutMs = 5000,
	fetchFn: typeof fetch = fetch,
): Promise<boolean> => {
	try {
		const response = await fetchFn(`http://${ip}:${publicPort}/`, { signal: AbortSignal.timeout(timeoutMs) });
		return response.status < 400;
	} catch {
		// 连接被拒绝或超时都视为服务未运行
		return false;
	}
};

/**
 * 用系统默认浏览器打开 URL
 * macOS 使用 open，Windows 使用 start，其它平台使用 xdg-open
 */
export const openBrowser = (url: string): Promise<void> => {
	const [command, args]: [string, string[]] =
		process.platform === "darwin"
			? ["open", [url]]
			: process.platform === "win32"
				? ["cmd", ["/c", "start", "", url]]
				: ["xdg-open", [url]];

	return new Promise((resolve, reject) => {
		const proc = spawn(command, args, { stdio: "ignore", detached: true });
		proc.on("error", reject);
		proc.on("spawn", () => {
			proc.unref();
			resolve();
		});
	});
};
