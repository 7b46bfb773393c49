import chalk from "chalk";
import { getUserConfigPath, loadUserIdentity, saveUserIdentity, validateUserName } from "../config.js";

/**
 * 查看或更新保存的用户身份
 * @param name - 新用户名，省略时只显示当前设置
 * @param git - 可选的 git 名字和邮箱，在 Pod 上配置 git 时使用
 */
export const userCommand = (name?: string, git: { gitName?: string; gitEmail?: string } = {}): void => {
	const saved = loadUserIdentity();

	if (!name && !git.gitName && !git.gitEmail) {
		if (!saved) {
			console.log("No user identity saved. Run 'podlaunch user <name>' to set one.");
			return;
		}
		console.log(`User: ${chalk.bold(saved.name)}`);
		if (saved.gitName || saved.gitEmail) {
			console.log(`Git: ${saved.gitName ?? ""} <${saved.gitEmail ?? ""}>`);
		}
		return;
	}

	const newName = name ? validateUserName(name) : saved?.name;
	if (!newName) {
		console.error(chalk.red("Usage: podlaunch user <name> [--git-name <name>] [--git-email <email>]"));
		process.exit(1);
	}

	saveUserIdentity({
		name: newName,
		gitName: git.gitName ?? saved?.gitName,
		gitEmail: git.gitEmail ?? saved?.gitEmail,
	});
	console.log(chalk.green(`✓ User identity saved to ${getUserConfigPath()}`));
};
