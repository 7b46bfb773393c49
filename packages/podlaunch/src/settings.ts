/**
 * @file 运行配置
 *
 * 配置来源（后者覆盖前者）：
 * 1. 代码中的默认值
 * 2. 工作目录下的 podlaunch.json
 * 3. 命令行参数 --kebab-case value / --key=value / --flag / --no-flag
 *
 * 合并后的结果用 TypeBox schema 做类型转换和校验，失败时抛出 ConfigError，
 * 这发生在任何网络调用之前。
 */
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { ConfigError } from "./errors.js";

/** 项目配置文件名 */
export const SETTINGS_FILE = "podlaunch.json";

/** 会话名、日志路径模板中的占位符 */
export const POD_ID_PLACEHOLDER = "{pod_id}";

export const SettingsSchema = Type.Object(
	{
		/** RunPod GraphQL 端点 */
		apiUrl: Type.String({ default: "https://api.runpod.io/graphql" }),
		/** 直接使用指定的 Pod，跳过获取流程 */
		targetPodId: Type.Optional(Type.String()),
		/** 是否尝试复用 .latest_pod 中记录的 Pod */
		reuse: Type.Boolean({ default: true }),
		/** 覆盖保存的用户名 */
		userName: Type.Optional(Type.String()),
		/** Pod 名称，实际名称为 {user}-{podName} */
		podName: Type.String({ minLength: 1, default: "job" }),
		gpuTypeId: Type.String({ minLength: 1, default: "NVIDIA A40" }),
		gpuCount: Type.Integer({ minimum: 1, default: 1 }),
		/** 应用监听的容器内端口 */
		appPort: Type.Integer({ minimum: 1, maximum: 65535, default: 8080 }),
		volumeInGb: Type.Integer({ minimum: 0, default: 20 }),
		containerDiskInGb: Type.Integer({ minimum: 1, default: 20 }),
		volumeMountPath: Type.String({ default: "/workspace" }),
		templateId: Type.String({ minLength: 1, default: "runpod-torch-v240" }),
		sshUsername: Type.String({ default: "root" }),
		/** 单次 SSH 连接超时（秒） */
		sshTimeout: Type.Integer({ minimum: 1, default: 30 }),
		tmuxSessionName: Type.String({ minLength: 1, default: "job-{pod_id}" }),
		tmuxLogFile: Type.String({ minLength: 1, default: "/workspace/job-{pod_id}.log" }),
		/** 在 tmux 会话中运行的命令 */
		remoteCommand: Type.String({ minLength: 1, default: "python3 -m http.server 8080 --directory /workspace" }),
		/** 会话和服务都在运行时是否强制重启 */
		restartCommand: Type.Boolean({ default: false }),
		/** 等待 Pod 就绪的超时（秒） */
		startupWait: Type.Integer({ minimum: 1, default: 600 }),
		/** 启动后是否持续输出日志 */
		streamOutput: Type.Boolean({ default: false }),
		cloudType: Type.Optional(Type.Union([Type.Literal("SECURE"), Type.Literal("COMMUNITY")])),
		/** 写入 Pod 环境变量 HF_TOKEN，默认取自环境变量 */
		hfToken: Type.Optional(Type.String()),
		/** 是否在 ~/.ssh/config 中写入以 Pod 名称命名的 Host 条目 */
		sshConfigAlias: Type.Boolean({ default: false }),
	},
	{ additionalProperties: false },
);

export type Settings = Static<typeof SettingsSchema>;

/** 命令行解析结果 */
export interface ParsedArgs {
	/** 位置参数（子命令等） */
	positionals: string[];
	/** 以 camelCase 为键的配置覆盖 */
	overrides: Record<string, string | boolean>;
}

/** 布尔类型的配置项，作为命令行开关时不消耗下一个参数 */
const BOOLEAN_KEYS = new Set(["reuse", "restartCommand", "streamOutput", "sshConfigAlias"]);

const kebabToCamel = (key: string): string => {
	return key.replace(/[-_]([a-z0-9])/g, (_, c: string) => c.toUpperCase());
};

/**
 * 解析命令行参数
 * - --key=value、--key value
 * - --flag（后面没有值时为 true）、--no-flag（false）
 */
export const parseArgs = (args: string[]): ParsedArgs => {
	const positionals: string[] = [];
	const overrides: Record<string, string | boolean> = {};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (!arg.startsWith("--") || arg === "--") {
			positionals.push(arg);
			continue;
		}

		const body = arg.slice(2);
		const eq = body.indexOf("=");
		if (eq !== -1) {
			overrides[kebabToCamel(body.slice(0, eq))] = body.slice(eq + 1);
			continue;
		}

		if (body.startsWith("no-")) {
			overrides[kebabToCamel(body.slice(3))] = false;
			continue;
		}

		const key = kebabToCamel(body);
		const next = args[i + 1];
		const takesValue = BOOLEAN_KEYS.has(key) ? next === "true" || next === "false" : next !== undefined;
		if (takesValue && next !== undefined && !next.startsWith("--")) {
			overrides[key] = next;
			i++;
		} else {
			overrides[key] = true;
		}
	}

	return { positionals, overrides };
};

/**
 * 读取工作目录下的 podlaunch.json
 * @returns 文件中的配置对象，文件不存在时为空对象
 */
export const readSettingsFile = (cwd: string): Record<string, unknown> => {
	const path = join(cwd, SETTINGS_FILE);
	if (!existsSync(path)) {
		return {};
	}
	let data: unknown;
	try {
		data = JSON.parse(readFileSync(path, "utf-8"));
	} catch (e) {
		throw new ConfigError(`Could not parse ${path}: ${e instanceof Error ? e.message : String(e)}`);
	}
	if (typeof data !== "object" || data === null || Array.isArray(data)) {
		throw new ConfigError(`${path} must contain a JSON object`);
	}
	return { ...data };
};

/**
 * 合并默认值、配置文件和命令行覆盖，并校验
 * 空字符串的 targetPodId / userName / hfToken 视为未设置
 */
export const loadSettings = (
	overrides: Record<string, string | boolean> = {},
	cwd: string = process.cwd(),
	env: NodeJS.ProcessEnv = process.env,
): Settings => {
	const merged: Record<string, unknown> = { ...readSettingsFile(cwd), ...overrides };

	if (merged.hfToken === undefined && env.HF_TOKEN) {
		merged.hfToken = env.HF_TOKEN;
	}
	for (const key of ["targetPodId", "userName", "hfToken"]) {
		if (merged[key] === "" || merged[key] === "null") {
			delete merged[key];
		}
	}

	const value = Value.Default(SettingsSchema, Value.Convert(SettingsSchema, merged));
	if (!Value.Check(SettingsSchema, value)) {
		const problems = [...Value.Errors(SettingsSchema, value)]
			.slice(0, 5)
			.map((e) => `${e.path.slice(1) || "(root)"}: ${e.message}`);
		throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
	}
	return value;
};

/** 将模板中的 {pod_id} 替换为实际 Pod ID（字面替换） */
export const withPodId = (template: string, podId: string): string => {
	return template.split(POD_ID_PLACEHOLDER).join(podId);
};

/**
 * 读取 RunPod API Key
 * @throws ConfigError 环境变量 RUNPOD_API_KEY 未设置
 */
export const requireApiKey = (env: NodeJS.ProcessEnv = process.env): string => {
	const apiKey = env.RUNPOD_API_KEY;
	if (!apiKey) {
		throw new ConfigError("RUNPOD_API_KEY not set in environment");
	}
	return apiKey;
};
