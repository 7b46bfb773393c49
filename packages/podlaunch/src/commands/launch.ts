/**
 * @file 默认命令：获取 Pod → SSH 连接 → 启动任务 → 打开浏览器
 *
 * 执行步骤：
 * 1. 获取可用的 Pod（复用 / 恢复 / 新建，见 acquire.ts）
 * 2. 重新读取 Pod 信息，找出 SSH 端口和应用端口
 * 3. 建立 SSH 连接（带重试）
 * 4. 检查 tmux 会话和 HTTP 服务是否已在运行，按需（重新）启动远程命令
 * 5. 在浏览器中打开应用地址，可选持续输出日志
 */
import chalk from "chalk";
import { acquirePod, resolveEndpoints } from "../acquire.js";
import { RunPodClient } from "../api.js";
import { fileLatestPodStore, resolveUser } from "../config.js";
import { FatalError } from "../errors.js";
import { requireApiKey, type Settings, withPodId } from "../settings.js";
import { type RemoteShell, SshSession } from "../ssh.js";
import { updateSshConfig } from "../ssh-config.js";
import { configureGit, createSessionWithLogging, killSession, sessionExists, streamOutput } from "../tmux.js";
import type { PodPort } from "../types.js";
import { checkHttpServer, openBrowser, printSection, type SleepFn, sleep } from "../utils.js";

/** 会话创建后等待 HTTP 服务初始化的时间 */
const SERVER_WARMUP_MS = 5000;

export interface EnsureSessionOptions {
	sessionName: string;
	logFile: string;
	/** 在会话中运行的命令 */
	command: string;
	/** 会话和服务都在运行时是否强制重启 */
	restart: boolean;
	/** 应用端口，用于探测 HTTP 服务 */
	app: PodPort;
	checkHttp?: (ip: string, publicPort: number) => Promise<boolean>;
	sleep?: SleepFn;
}

/** ensureSession 的结果 */
export type EnsureSessionResult = "skipped" | "started" | "restarted";

/**
 * 保证远程命令在 tmux 会话中运行
 *
 * 会话存在且 HTTP 服务有响应时跳过（除非要求重启）；
 * 否则创建新会话，创建失败视为致命错误。
 */
export const ensureSession = async (shell: RemoteShell, options: EnsureSessionOptions): Promise<EnsureSessionResult> => {
	const checkHttp = options.checkHttp ?? checkHttpServer;
	const sleepFn = options.sleep ?? sleep;

	const tmuxExists = await sessionExists(shell, options.sessionName);
	const httpRunning = await checkHttp(options.app.ip, options.app.publicPort);

	console.log("\n4. Checking existing session and server status...");
	console.log(`   TMux session '${options.sessionName}': ${tmuxExists ? "exists" : "not found"}`);
	console.log(`   HTTP server: ${httpRunning ? "running" : "not running"}`);

	let restarted = false;
	if (tmuxExists && httpRunning) {
		if (!options.restart) {
			console.log(chalk.green("   Both session and server are running - skipping command execution"));
			return "skipped";
		}
		console.log("   restartCommand=true - killing existing tmux session");
		await killSession(shell, options.sessionName);
		restarted = true;
	}

	console.log(`\n5. Starting HTTP server in tmux session '${options.sessionName}'...`);
	const created = await createSessionWithLogging(shell, options.sessionName, options.command, options.logFile);
	if (!created) {
		throw new FatalError("Failed to create tmux session");
	}

	console.log(chalk.green("   TMux session created successfully"));
	console.log("   Waiting for HTTP server to initialize...");
	await sleepFn(SERVER_WARMUP_MS);
	return restarted ? "restarted" : "started";
};

/**
 * 默认命令的完整流程
 */
export const launch = async (settings: Settings): Promise<void> => {
	const apiKey = requireApiKey();
	const user = await resolveUser(settings.userName);

	printSection("RunPod Launcher");
	console.log(`User: ${user.name}`);

	const client = new RunPodClient(apiKey, settings.apiUrl);

	// 第一步：获取 Pod
	const podId = await acquirePod({
		api: client,
		latestPod: fileLatestPodStore(),
		userName: user.name,
		targetPodId: settings.targetPodId,
		reuse: settings.reuse,
		podName: settings.podName,
		gpuTypeId: settings.gpuTypeId,
		gpuCount: settings.gpuCount,
		appPort: settings.appPort,
		volumeInGb: settings.volumeInGb,
		containerDiskInGb: settings.containerDiskInGb,
		volumeMountPath: settings.volumeMountPath,
		templateId: settings.templateId,
		cloudType: settings.cloudType,
		hfToken: settings.hfToken,
		startupWait: settings.startupWait,
	});

	// 第二步：读取 Pod 信息
	console.log("\n2. Fetching pod information...");
	const pod = await client.getPod(podId);
	if (!pod) {
		throw new FatalError(`Pod ${podId} not found`);
	}

	console.log(`   Pod Name: ${pod.name}`);
	console.log(`   Pod ID: ${pod.id}`);
	if (pod.runtime?.ports) {
		console.log("\n   Available Ports:");
		for (const port of pod.runtime.ports) {
			console.log(
				`   - Type: ${port.type}, IP: ${port.ip}, Port: ${port.publicPort}, Public: ${port.isIpPublic ?? "unknown"}`,
			);
		}
		console.log(`   Uptime: ${pod.runtime.uptimeInSeconds ?? 0} seconds`);
	}

	const endpoints = resolveEndpoints(pod, settings.appPort);

	// 第三步：SSH 连接
	console.log(`\n3. Connecting to SSH: ${endpoints.ssh.ip}:${endpoints.ssh.publicPort}`);
	const session = new SshSession({
		host: endpoints.ssh.ip,
		port: endpoints.ssh.publicPort,
		username: settings.sshUsername,
		timeoutSeconds: settings.sshTimeout,
	});

	if (!(await session.connect(podId))) {
		throw new FatalError("Failed to connect via SSH");
	}
	console.log(chalk.gray(`   Connect manually with: ${session.sshCommand()}`));

	try {
		if (user.gitName && user.gitEmail) {
			console.log("   Configuring git identity on the pod...");
			await configureGit(session, user.gitName, user.gitEmail);
		}

		if (settings.sshConfigAlias) {
			const written = updateSshConfig({
				alias: pod.name,
				host: endpoints.ssh.ip,
				port: endpoints.ssh.publicPort,
				username: settings.sshUsername,
			});
			if (written) {
				console.log(chalk.gray(`   SSH config updated, connect with: ssh ${pod.name}`));
			}
		}

		// 第四步：检查并启动远程命令
		const sessionName = withPodId(settings.tmuxSessionName, podId);
		const logFile = withPodId(settings.tmuxLogFile, podId);
		await ensureSession(session, {
			sessionName,
			logFile,
			command: settings.remoteCommand,
			restart: settings.restartCommand,
			app: endpoints.app,
		});

		// 第五步：打开浏览器
		const appUrl = `http://${endpoints.app.ip}:${endpoints.app.publicPort}/`;
		console.log(`\n6. Pod HTTP Endpoint: ${chalk.cyan(appUrl)}`);
		console.log(`\n7. Opening ${appUrl} in browser...`);
		try {
			await openBrowser(appUrl);
			console.log(chalk.green("   Browser opened successfully!"));
		} catch (e) {
			console.log(chalk.yellow(`   Failed to open browser: ${e instanceof Error ? e.message : String(e)}`));
			console.log(`   Please manually open: ${appUrl}`);
		}

		if (settings.streamOutput) {
			const controller = new AbortController();
			const onInterrupt = () => controller.abort();
			process.once("SIGINT", onInterrupt);
			try {
				await streamOutput(session, logFile, { signal: controller.signal });
			} finally {
				process.off("SIGINT", onInterrupt);
			}
		}
	} finally {
		await session.close();
	}

	printSection("Done!");
	console.log(`\nPod ID: ${podId}`);
	console.log(chalk.yellow("Remember to stop/delete the pod when you're done to avoid charges!"));
};
