/**
 * @file tmux 会话管理
 *
 * 所有操作都只是构造 shell 命令并通过 RemoteShell 发送，本模块不保存任何状态：
 * - sessionExists：检查会话是否存在
 * - killSession：结束会话
 * - createSessionWithLogging：创建后台会话，并把窗格输出追加到日志文件
 * - streamOutput：持续输出日志文件内容，直到被中止
 * - configureGit：在 Pod 上设置 git 用户信息
 */
import chalk from "chalk";
import type { RemoteShell } from "./ssh.js";
import { printRule, type SleepFn, sleep } from "./utils.js";

/** 转义单引号，使命令可以放进 '...' 中 */
export const escapeSingleQuotes = (command: string): string => {
	return command.replace(/'/g, "'\\''");
};

/**
 * 检查 tmux 会话是否存在
 */
export const sessionExists = async (shell: RemoteShell, name: string): Promise<boolean> => {
	const { stdout } = await shell.executeCommand(`tmux has-session -t ${name} 2>/dev/null && echo exists`);
	return stdout.includes("exists");
};

/**
 * 结束 tmux 会话
 * @returns 没有错误输出时为 true
 */
export const killSession = async (shell: RemoteShell, name: string): Promise<boolean> => {
	const { stderr } = await shell.executeCommand(`tmux kill-session -t ${name}`);
	return stderr === "";
};

/**
 * 创建后台 tmux 会话并记录输出
 *
 * 命令在交互式登录 shell（bash -i）中运行，这样 .bashrc 会被完整加载，
 * 而不会在非交互模式下提前退出。会话创建成功后通过 pipe-pane 把输出追加到日志文件，
 * 日志配置失败只打印警告，会话仍视为创建成功。
 */
export const createSessionWithLogging = async (
	shell: RemoteShell,
	name: string,
	command: string,
	logFile: string,
): Promise<boolean> => {
	const createCmd = `tmux new-session -d -s ${name} bash -i -c '${escapeSingleQuotes(command)}'`;
	const created = await shell.executeCommand(createCmd);
	if (created.stderr) {
		console.log(chalk.red(`   Error creating tmux session: ${created.stderr.trim()}`));
		return false;
	}

	const pipeCmd = `tmux pipe-pane -t ${name} -o 'cat >> ${logFile}'`;
	const piped = await shell.executeCommand(pipeCmd);
	if (piped.stderr) {
		console.log(chalk.yellow(`   Warning: Could not configure logging: ${piped.stderr.trim()}`));
	}

	return true;
};

/** 输出流写入目标 */
export interface OutputSink {
	write(chunk: string): unknown;
}

export interface StreamOutputOptions {
	/** 中止后关闭通道并返回 */
	signal: AbortSignal;
	/** 默认为 process.stdout */
	output?: OutputSink;
	/** 轮询间隔（毫秒） */
	pollIntervalMs?: number;
	sleep?: SleepFn;
}

/**
 * 持续输出远程日志文件（tail -f），直到 signal 中止
 * 按固定间隔轮询通道，字节按 UTF-8 增量解码，多字节字符被拆开时不会产生乱码
 */
export const streamOutput = async (shell: RemoteShell, logFile: string, options: StreamOutputOptions): Promise<void> => {
	const output = options.output ?? process.stdout;
	const pollIntervalMs = options.pollIntervalMs ?? 100;
	const sleepFn = options.sleep ?? sleep;

	console.log(`\nStreaming output from ${logFile} (press Ctrl+C to stop)...`);
	printRule();

	const channel = shell.openChannel(`tail -f ${logFile}`);
	const decoder = new TextDecoder("utf-8");

	try {
		while (!options.signal.aborted) {
			if (channel.recvReady()) {
				const text = decoder.decode(channel.recv(), { stream: true });
				if (text) {
					output.write(text);
				}
			}
			await sleepFn(pollIntervalMs, options.signal);
		}
	} finally {
		const rest = decoder.decode();
		if (rest) {
			output.write(rest);
		}
		channel.close();
		console.log("");
		printRule();
		console.log("Stopped streaming output");
	}
};

/**
 * 在 Pod 上配置 git 的 user.name 和 user.email
 * @returns 任一命令有错误输出时打印警告并返回 false
 */
export const configureGit = async (shell: RemoteShell, gitName: string, gitEmail: string): Promise<boolean> => {
	const commands = [
		`git config --global user.name '${escapeSingleQuotes(gitName)}'`,
		`git config --global user.email '${escapeSingleQuotes(gitEmail)}'`,
	];

	for (const command of commands) {
		const { stderr } = await shell.executeCommand(command);
		if (stderr) {
			console.log(chalk.yellow(`   Warning: Git config command failed: ${stderr.trim()}`));
			return false;
		}
	}

	return true;
};
