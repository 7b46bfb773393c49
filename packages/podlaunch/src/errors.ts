/**
 * @file 错误类型
 *
 * - ConfigError：配置错误（缺少 API Key、用户名非法等），在任何网络调用之前发现
 * - FatalError：流程中不可恢复的错误（Pod 启动超时、端口缺失、SSH 重试耗尽等）
 * - RunPodApiError：传输层错误（非 2xx 响应、响应格式错误）
 *
 * CLI 顶层统一捕获，打印 "ERROR:" 前缀信息后以非零状态码退出。
 */

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export class FatalError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "FatalError";
	}
}

export class RunPodApiError extends Error {
	/** HTTP 状态码，请求未得到响应时为 undefined */
	readonly status?: number;
	/** 原始响应内容 */
	readonly body?: string;

	constructor(message: string, status?: number, body?: string) {
		super(message);
		this.name = "RunPodApiError";
		this.status = status;
		this.body = body;
	}
}
