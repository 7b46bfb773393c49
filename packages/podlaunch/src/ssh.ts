/**
 * @file SSH 远程执行模块
 *
 * 本文件封装了通过系统 ssh 客户端与 Pod 交互的功能：
 * - connect：带重试的连接建立（只使用 ssh-agent 或本地密钥，不使用密码）
 * - executeCommand：执行远程命令，前台模式捕获输出，后台模式启动后立即返回
 * - openChannel：打开一个持续输出的通道（如 tail -f）
 * - close：关闭连接
 *
 * 连接建立后使用 ControlMaster 复用同一个已认证的连接，后续每条命令都通过控制套接字发送。
 */
import { type ChildProcess, type SpawnOptions, spawn as nodeSpawn } from "child_process";
import chalk from "chalk";
import { createHash } from "crypto";
import { tmpdir } from "os";
import { join } from "path";
import { type SleepFn, sleep } from "./utils.js";

/**
 * 远程命令执行结果
 */
export interface CommandOutput {
	/** 标准输出内容 */
	stdout: string;
	/** 标准错误输出内容 */
	stderr: string;
}

/**
 * 持续输出的远程通道
 * 数据在后台累积，调用方按需轮询读取
 */
export interface RemoteChannel {
	/** 是否有尚未读取的数据 */
	recvReady(): boolean;
	/** 取出目前累积的全部字节 */
	recv(): Uint8Array;
	/** 关闭通道 */
	close(): void;
}

/**
 * 远程 shell 能力，tmux 会话管理只依赖这个接口
 */
export interface RemoteShell {
	executeCommand(command: string, background?: boolean): Promise<CommandOutput>;
	openChannel(command: string): RemoteChannel;
}

/** spawn 函数签名，便于在测试中替换 */
export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

/** SSH 连接参数 */
export interface SshTarget {
	host: string;
	port: number;
	/** 登录用户，RunPod 默认为 root */
	username: string;
	/** 单次连接超时（秒） */
	timeoutSeconds: number;
}

export interface SshSessionOptions {
	spawn?: SpawnFn;
	sleep?: SleepFn;
	/** 两次连接尝试之间的等待（毫秒） */
	retryDelayMs?: number;
	/** 后台命令发出后等待的时间（毫秒） */
	backgroundGraceMs?: number;
}

/** 后台命令的占位输出 */
export const BACKGROUND_STARTED = "Background command started";

/** 命令在日志中显示的最大长度 */
const PREVIEW_LENGTH = 100;

export class SshSession implements RemoteShell {
	private readonly spawnFn: SpawnFn;
	private readonly sleepFn: SleepFn;
	private readonly retryDelayMs: number;
	private readonly backgroundGraceMs: number;
	/** 控制套接字路径，每个主机端口对唯一 */
	private readonly controlPath: string;
	private connected = false;

	constructor(
		readonly target: SshTarget,
		options: SshSessionOptions = {},
	) {
		this.spawnFn = options.spawn ?? nodeSpawn;
		this.sleepFn = options.sleep ?? sleep;
		this.retryDelayMs = options.retryDelayMs ?? 15_000;
		this.backgroundGraceMs = options.backgroundGraceMs ?? 2_000;
		const digest = createHash("sha1").update(`${target.username}@${target.host}:${target.port}`).digest("hex");
		this.controlPath = join(tmpdir(), `podlaunch-${digest.slice(0, 12)}.sock`);
	}

	/** 是否已建立连接 */
	get isConnected(): boolean {
		return this.connected;
	}

	/** 等价的 ssh 命令，用于展示给用户 */
	sshCommand(): string {
		return `ssh -p ${this.target.port} ${this.target.username}@${this.target.host}`;
	}

	/**
	 * 构建 ssh 参数
	 * BatchMode=yes 禁止密码等交互认证；Pod 的 IP 会变化，因此不检查主机密钥
	 */
	buildArgs(command?: string, extra: string[] = []): string[] {
		const args = [
			"-p",
			String(this.target.port),
			"-o",
			"BatchMode=yes",
			"-o",
			`ConnectTimeout=${this.target.timeoutSeconds}`,
			"-o",
			"StrictHostKeyChecking=no",
			"-o",
			"UserKnownHostsFile=/dev/null",
			"-o",
			"LogLevel=ERROR",
			"-o",
			"ControlMaster=auto",
			"-o",
			`ControlPath=${this.controlPath}`,
			"-o",
			"ControlPersist=600",
			"-o",
			"ServerAliveInterval=30",
			...extra,
			`${this.target.username}@${this.target.host}`,
		];
		if (command !== undefined) {
			args.push(command);
		}
		return args;
	}

	/**
	 * 建立 SSH 连接，失败时每隔 retryDelayMs 重试
	 * @param podId - 用于在失败提示中给出控制台链接
	 * @param maxRetries - 最大尝试次数
	 * @param signal - 中止后不再重试
	 * @returns 是否连接成功
	 */
	async connect(podId: string, maxRetries = 30, signal?: AbortSignal): Promise<boolean> {
		for (let attempt = 1; attempt <= maxRetries; attempt++) {
			console.log(`   Attempting SSH connection (attempt ${attempt}/${maxRetries})...`);
			const result = await this.run(this.buildArgs("true"));
			if (result.exitCode === 0) {
				this.connected = true;
				console.log(chalk.green(`   Connected to ${this.target.host}:${this.target.port}`));
				return true;
			}

			console.log(
				chalk.yellow(
					`   SSH connection attempt ${attempt} failed, feel free to check the pod logs online if needed: https://console.runpod.io/pods?id=${podId}: ${result.stderr.trim()}`,
				),
			);
			if (attempt === maxRetries || signal?.aborted) {
				break;
			}
			await this.sleepFn(this.retryDelayMs, signal);
		}

		console.log(chalk.red("   All SSH connection attempts failed"));
		return false;
	}

	/**
	 * 执行远程命令
	 * @param command - 要执行的命令
	 * @param background - 后台模式：发出命令后等待片刻即返回，不再跟踪远程进程
	 */
	async executeCommand(command: string, background = false): Promise<CommandOutput> {
		if (!this.connected) {
			throw new Error("Not connected to SSH server");
		}

		const preview = command.length > PREVIEW_LENGTH ? `${command.slice(0, PREVIEW_LENGTH)}...` : command;

		if (background) {
			console.log(chalk.gray(`   Executing command in background: ${preview}`));
			const proc = this.spawnFn("ssh", this.buildArgs(command), { stdio: "ignore", detached: true });
			proc.on("error", (err) => {
				console.log(chalk.yellow(`   Background command failed to start: ${err.message}`));
			});
			proc.unref();
			await this.sleepFn(this.backgroundGraceMs);
			return { stdout: BACKGROUND_STARTED, stderr: "" };
		}

		console.log(chalk.gray(`   Executing command: ${preview}`));
		const { stdout, stderr } = await this.run(this.buildArgs(command));
		return { stdout, stderr };
	}

	/**
	 * 打开一个持续输出的通道，远程输出在本地缓冲，直到被 recv 取走
	 */
	openChannel(command: string): RemoteChannel {
		if (!this.connected) {
			throw new Error("Not connected to SSH server");
		}

		const proc = this.spawnFn("ssh", this.buildArgs(command), { stdio: ["ignore", "pipe", "pipe"] });
		let pending: Buffer[] = [];
		proc.stdout?.on("data", (chunk: Buffer) => {
			pending.push(chunk);
		});
		// 错误输出（如日志文件不存在）混入同一通道
		proc.stderr?.on("data", (chunk: Buffer) => {
			pending.push(chunk);
		});
		proc.on("error", (err) => {
			pending.push(Buffer.from(`\n[channel error: ${err.message}]\n`));
		});

		return {
			recvReady: () => pending.length > 0,
			recv: () => {
				const data = Buffer.concat(pending);
				pending = [];
				return data;
			},
			close: () => {
				proc.kill();
			},
		};
	}

	/**
	 * 关闭连接（结束 ControlMaster 进程），未连接时直接返回
	 */
	async close(): Promise<void> {
		if (!this.connected) {
			return;
		}
		this.connected = false;
		await this.run(this.buildArgs(undefined, ["-O", "exit"]));
	}

	/** 运行 ssh 并收集输出 */
	private run(args: string[]): Promise<CommandOutput & { exitCode: number }> {
		return new Promise((resolve) => {
			const proc = this.spawnFn("ssh", args, { stdio: ["ignore", "pipe", "pipe"] });
			const stdoutChunks: Buffer[] = [];
			const stderrChunks: Buffer[] = [];

			proc.stdout?.on("data", (data: Buffer) => {
				stdoutChunks.push(data);
			});
			proc.stderr?.on("data", (data: Buffer) => {
				stderrChunks.push(data);
			});

			proc.on("close", (code) => {
				resolve({
					stdout: Buffer.concat(stdoutChunks).toString("utf-8"),
					stderr: Buffer.concat(stderrChunks).toString("utf-8"),
					exitCode: code ?? 1,
				});
			});

			// 进程启动出错（如找不到 ssh）时返回错误信息
			proc.on("error", (err) => {
				resolve({ stdout: "", stderr: err.message, exitCode: 1 });
			});
		});
	}
}
