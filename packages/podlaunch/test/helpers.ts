import type { CommandOutput, RemoteChannel, RemoteShell } from "../src/ssh.js";

/** 记录命令的假远程 shell，按命令前缀返回预设输出 */
export const fakeShell = (responses: Record<string, Partial<CommandOutput>> = {}) => {
	const commands: string[] = [];
	const opened: string[] = [];
	let channel: RemoteChannel = { recvReady: () => false, recv: () => new Uint8Array(), close: () => {} };
	const shell: RemoteShell = {
		executeCommand: async (command) => {
			commands.push(command);
			const prefix = Object.keys(responses).find((p) => command.startsWith(p));
			const response: Partial<CommandOutput> = prefix === undefined ? {} : responses[prefix];
			return { stdout: response.stdout ?? "", stderr: response.stderr ?? "" };
		},
		openChannel: (command) => {
			opened.push(command);
			return channel;
		},
	};
	return {
		shell,
		commands,
		opened,
		setChannel: (c: RemoteChannel) => {
			channel = c;
		},
	};
};
