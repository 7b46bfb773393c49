import type { EnvVar } from "./types.js";

/**
 * 合并模板环境变量与覆盖项
 *
 * RunPod 创建 Pod 时传入的 env 会整体替换模板自带的环境变量，
 * 因此需要先取回模板的 env 再合并：
 * - 模板中已有的键保持原顺序，值被覆盖项替换
 * - 模板中没有的键按覆盖项的顺序追加到末尾
 */
export const mergeEnv = (templateEnv: EnvVar[], overrides: Record<string, string>): EnvVar[] => {
	const seen = new Set<string>();
	const merged: EnvVar[] = [];

	for (const { key, value } of templateEnv) {
		merged.push({ key, value: Object.hasOwn(overrides, key) ? overrides[key] : value });
		seen.add(key);
	}

	for (const [key, value] of Object.entries(overrides)) {
		if (!seen.has(key)) {
			merged.push({ key, value });
		}
	}

	return merged;
};
