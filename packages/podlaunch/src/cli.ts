#!/usr/bin/env node
/**
 * @file CLI 入口文件
 *
 * 本文件是 `podlaunch` 命令的入口点，负责：
 * - 解析命令行参数（子命令 + 配置覆盖）
 * - 默认命令：获取 Pod、SSH 连接、在 tmux 中启动任务并打开浏览器
 * - destroy / pause / stop：管理 .latest_pod 中记录的 Pod
 * - gpus：列出 GPU 类型目录
 * - user：查看或更新用户身份
 */
import chalk from "chalk";
import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { RunPodClient } from "./api.js";
import { launch } from "./commands/launch.js";
import { destroyLatestPod, listGpuTypes, pauseLatestPod } from "./commands/pods.js";
import { userCommand } from "./commands/user.js";
import { fileLatestPodStore } from "./config.js";
import { ConfigError, FatalError, RunPodApiError } from "./errors.js";
import { loadSettings, parseArgs, requireApiKey } from "./settings.js";

/** 当前文件所在目录的绝对路径 */
const __dirname = dirname(fileURLToPath(import.meta.url));

/** 从 package.json 中读取版本信息 */
const packageJson: { version: string } = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));

/**
 * 打印帮助信息
 */
function printHelp() {
	console.log(`podlaunch v${packageJson.version} - Run a job on a RunPod GPU pod

Usage:
  podlaunch [options]              Acquire a pod, start the remote command in tmux, open it in the browser
  podlaunch destroy                Terminate the pod recorded in .latest_pod
  podlaunch pause | stop           Stop (without deleting) the pod recorded in .latest_pod
  podlaunch gpus                   List valid GPU type ids
  podlaunch user [<name>]          Show or update the saved username
    --git-name <name>              Git user.name to configure on pods
    --git-email <email>            Git user.email to configure on pods

Options (also settable in ./podlaunch.json):
  --target-pod-id <id>             Use this pod as-is
  --reuse / --no-reuse             Reuse or resume the pod in .latest_pod (default: on)
  --user-name <name>               Override the saved username
  --pod-name <name>                Pod name, prefixed with "<user>-"
  --gpu-type-id <id>               GPU type (see 'podlaunch gpus')
  --gpu-count <n>                  Number of GPUs
  --app-port <port>                Container port of the HTTP endpoint
  --volume-in-gb <n>               Volume size
  --container-disk-in-gb <n>       Container disk size
  --volume-mount-path <path>       Volume mount path
  --template-id <id>               Pod template
  --cloud-type SECURE|COMMUNITY    Cloud placement
  --ssh-username <user>            SSH user (default: root)
  --ssh-timeout <seconds>          Timeout of each SSH connection attempt
  --tmux-session-name <name>       tmux session name, {pod_id} is substituted
  --tmux-log-file <path>           Remote log file, {pod_id} is substituted
  --remote-command <cmd>           Command to run in the tmux session
  --restart-command                Restart the session even if it is already serving
  --startup-wait <seconds>         How long to wait for the pod to become ready
  --stream-output                  Follow the remote log after launch (Ctrl+C to stop)
  --ssh-config-alias               Write a Host entry for the pod to ~/.ssh/config

Environment:
  RUNPOD_API_KEY         RunPod API key (required)
  HF_TOKEN               Passed to new pods as HF_TOKEN
  PODLAUNCH_CONFIG_DIR   Directory for user.json (default: ~/.podlaunch)`);
}

const { positionals, overrides } = parseArgs(process.argv.slice(2));
const command = positionals[0];

if (overrides.help !== undefined || command === "-h" || command === "help") {
	printHelp();
	process.exit(0);
}

if (overrides.version !== undefined || command === "-v") {
	console.log(packageJson.version);
	process.exit(0);
}

try {
	switch (command) {
		case undefined: {
			await launch(loadSettings(overrides));
			break;
		}
		case "destroy": {
			const settings = loadSettings(overrides);
			await destroyLatestPod(new RunPodClient(requireApiKey(), settings.apiUrl), fileLatestPodStore());
			break;
		}
		case "pause":
		case "stop": {
			const settings = loadSettings(overrides);
			await pauseLatestPod(new RunPodClient(requireApiKey(), settings.apiUrl), fileLatestPodStore());
			break;
		}
		case "gpus": {
			const settings = loadSettings(overrides);
			await listGpuTypes(new RunPodClient(requireApiKey(), settings.apiUrl));
			break;
		}
		case "user": {
			const gitName = typeof overrides.gitName === "string" ? overrides.gitName : undefined;
			const gitEmail = typeof overrides.gitEmail === "string" ? overrides.gitEmail : undefined;
			userCommand(positionals[1], { gitName, gitEmail });
			break;
		}
		default:
			console.error(chalk.red(`Unknown command: ${command}`));
			printHelp();
			process.exit(1);
	}
} catch (error) {
	if (error instanceof ConfigError || error instanceof FatalError || error instanceof RunPodApiError) {
		console.error(chalk.red(`ERROR: ${error.message}`));
	} else {
		console.error(chalk.red("ERROR:"), error);
	}
	process.exit(1);
}
