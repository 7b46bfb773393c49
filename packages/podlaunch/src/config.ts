/**
 * @file 本地状态管理模块
 *
 * 本文件负责两类本地持久化状态：
 * - 最近使用的 Pod ID：工作目录下的 .latest_pod 纯文本文件
 * - 用户身份：配置目录下的 user.json（用户名以及可选的 git 信息）
 *
 * 配置目录可通过 PODLAUNCH_CONFIG_DIR 环境变量自定义，默认为 ~/.podlaunch
 */
import { Value } from "@sinclair/typebox/value";
import chalk from "chalk";
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { createInterface } from "readline";
import { ConfigError } from "./errors.js";
import { type UserIdentity, UserIdentitySchema } from "./types.js";

/** 最近 Pod ID 文件名 */
export const LATEST_POD_FILE = ".latest_pod";

/** 用户名允许的字符 */
const USER_NAME_PATTERN = /^[a-z0-9_-]+$/;

/**
 * 获取配置目录路径
 * 优先使用 PODLAUNCH_CONFIG_DIR 环境变量，默认为 ~/.podlaunch
 * 如果目录不存在则自动创建
 */
export const getConfigDir = (): string => {
	const configDir = process.env.PODLAUNCH_CONFIG_DIR || join(homedir(), ".podlaunch");
	if (!existsSync(configDir)) {
		mkdirSync(configDir, { recursive: true });
	}
	return configDir;
};

/** user.json 的绝对路径 */
export const getUserConfigPath = (): string => {
	return join(getConfigDir(), "user.json");
};

/**
 * 最近 Pod ID 的存取接口
 * 任一时刻最多只有一个 "最近" Pod
 */
export interface LatestPodStore {
	read(): string | undefined;
	save(podId: string): void;
	clear(): void;
}

/**
 * 基于 .latest_pod 文件的实现
 * @param dir - 文件所在目录，默认为当前工作目录
 */
export const fileLatestPodStore = (dir: string = process.cwd()): LatestPodStore => {
	const path = join(dir, LATEST_POD_FILE);
	return {
		read: () => {
			if (!existsSync(path)) {
				return undefined;
			}
			try {
				const podId = readFileSync(path, "utf-8").trim();
				return podId || undefined;
			} catch (e) {
				console.log(chalk.yellow(`   Warning: Could not read ${LATEST_POD_FILE} file: ${e}`));
				return undefined;
			}
		},
		save: (podId) => {
			try {
				writeFileSync(path, podId);
				console.log(chalk.gray(`   Saved pod ID to ${LATEST_POD_FILE} file`));
			} catch (e) {
				console.log(chalk.yellow(`   Warning: Could not save pod ID to ${LATEST_POD_FILE}: ${e}`));
			}
		},
		clear: () => {
			rmSync(path, { force: true });
		},
	};
};

/**
 * 规范化并校验用户名
 * @throws ConfigError 用户名为空或包含非法字符
 */
export const validateUserName = (raw: string): string => {
	const name = raw.trim().toLowerCase();
	if (!name) {
		throw new ConfigError("Username cannot be empty");
	}
	if (!USER_NAME_PATTERN.test(name)) {
		throw new ConfigError("Username must be alphanumeric (hyphens/underscores allowed)");
	}
	return name;
};

/**
 * 加载 user.json
 * @returns 用户身份，文件不存在或内容无效时返回 undefined
 */
export const loadUserIdentity = (): UserIdentity | undefined => {
	const path = getUserConfigPath();
	if (!existsSync(path)) {
		return undefined;
	}
	try {
		const data: unknown = JSON.parse(readFileSync(path, "utf-8"));
		if (Value.Check(UserIdentitySchema, data)) {
			return data;
		}
		console.log(chalk.yellow(`Warning: Ignoring invalid user config in ${path}`));
	} catch (e) {
		console.log(chalk.yellow(`Warning: Could not read ${path}: ${e}`));
	}
	return undefined;
};

/**
 * 保存用户身份到 user.json
 */
export const saveUserIdentity = (identity: UserIdentity): void => {
	writeFileSync(getUserConfigPath(), JSON.stringify(identity, null, 2));
};

/** 向用户提问的函数 */
export type AskFn = (question: string) => Promise<string>;

/** 基于 readline 的提问实现 */
export const askOnTerminal: AskFn = async (question) => {
	const rl = createInterface({ input: process.stdin, output: process.stdout });
	try {
		return await new Promise<string>((resolve) => rl.question(question, resolve));
	} finally {
		rl.close();
	}
};

/**
 * 确定本次运行的用户身份
 *
 * 1. 命令行指定的用户名优先（非法时直接报错，不保存）
 * 2. 其次读取 user.json
 * 3. 都没有时交互式询问，校验通过后保存
 */
export const resolveUser = async (override?: string, ask: AskFn = askOnTerminal): Promise<UserIdentity> => {
	const saved = loadUserIdentity();

	if (override) {
		return { ...saved, name: validateUserName(override) };
	}

	if (saved) {
		return saved;
	}

	console.log("");
	console.log("=".repeat(80));
	console.log("Welcome! Please set up your user identity.");
	console.log("=".repeat(80));
	console.log("\nYour username will be used to:");
	console.log("  - Prefix pod names for easy identification");
	console.log("  - Track your running pods");
	console.log(`\nThis will be saved in ${getUserConfigPath()}`);

	for (;;) {
		const answer = await ask("\nEnter your username (lowercase, alphanumeric): ");
		let name: string;
		try {
			name = validateUserName(answer);
		} catch (e) {
			if (e instanceof ConfigError) {
				console.log(chalk.red(`ERROR: ${e.message}`));
				continue;
			}
			throw e;
		}

		const identity: UserIdentity = { name };
		saveUserIdentity(identity);
		console.log(chalk.green(`\nUser identity saved to ${getUserConfigPath()}`));
		return identity;
	}
};
