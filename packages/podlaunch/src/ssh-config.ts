/**
 * @file ~/.ssh/config 中的 Pod 主机别名
 *
 * 写入一个以 Pod 名称命名的 Host 条目，之后可以直接 `ssh <pod name>` 登录。
 * 已存在同名条目（"Host <name>" 行及其后所有缩进行）时整体替换，否则追加到文件末尾。
 */
import chalk from "chalk";
import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";

/** Host 条目的参数 */
export interface HostEntry {
	alias: string;
	host: string;
	port: number;
	username: string;
}

/** 渲染一个 Host 条目 */
export const renderHostEntry = ({ alias, host, port, username }: HostEntry): string => {
	return [
		`Host ${alias}`,
		`    HostName ${host}`,
		`    User ${username}`,
		`    Port ${port}`,
		"    ForwardAgent yes",
		"    StrictHostKeyChecking no",
		"    UserKnownHostsFile=/dev/null",
		"",
	].join("\n");
};

/**
 * 在配置文本中插入或替换 Host 条目
 * @returns 更新后的配置文本
 */
export const upsertHostEntry = (config: string, entry: HostEntry): string => {
	const rendered = renderHostEntry(entry);
	const lines = config.split("\n");
	const header = `Host ${entry.alias}`;

	const start = lines.findIndex((line) => line.trimEnd() === header);
	if (start === -1) {
		const base = config && !config.endsWith("\n") ? `${config}\n` : config;
		return `${base}\n${rendered}`;
	}

	let end = start + 1;
	while (end < lines.length && /^[ \t]+\S/.test(lines[end])) {
		end++;
	}

	const before = lines.slice(0, start).join("\n");
	const after = lines.slice(end).join("\n");
	return `${before}${start > 0 ? "\n" : ""}${rendered}${after}`;
};

/**
 * 更新 SSH 配置文件
 * @param path - 配置文件路径，默认 ~/.ssh/config
 * @returns 是否写入成功，失败只打印警告
 */
export const updateSshConfig = (entry: HostEntry, path: string = join(homedir(), ".ssh", "config")): boolean => {
	try {
		mkdirSync(dirname(path), { recursive: true, mode: 0o700 });
		const existing = existsSync(path) ? readFileSync(path, "utf-8") : "";
		writeFileSync(path, upsertHostEntry(existing, entry));
		if (process.platform !== "win32") {
			chmodSync(path, 0o600);
		}
		return true;
	} catch (e) {
		console.log(chalk.yellow(`   Warning: Failed to update SSH config: ${e}`));
		return false;
	}
};
