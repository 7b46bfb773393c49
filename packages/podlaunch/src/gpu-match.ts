/**
 * @file GPU 类型模糊匹配
 *
 * 用户输入的 GPU 类型不在目录中时，给出 "did you mean" 建议。
 * 先做规范化（忽略大小写、标点折叠为空格），规范化后完全相同直接返回唯一结果；
 * 否则按字符相似度排序，取前 k 个。
 */
import { diffChars } from "diff";

/** 默认返回的建议数量 */
const DEFAULT_SUGGESTIONS = 5;

/**
 * 规范化字符串：转小写，所有非字母数字的连续片段折叠为单个空格，去掉首尾空白
 */
export const normalizeForMatch = (s: string): string => {
	return s
		.toLowerCase()
		.replace(/[^a-z0-9]+/g, " ")
		.trim();
};

/**
 * 计算两个字符串的相似度，范围 [0, 1]
 * 2 * 公共字符数 / 总长度，公共字符由逐字符 diff 得出
 */
export const similarity = (a: string, b: string): number => {
	const total = a.length + b.length;
	if (total === 0) {
		return 1;
	}
	let common = 0;
	for (const part of diffChars(a, b)) {
		if (!part.added && !part.removed) {
			common += part.value.length;
		}
	}
	return (2 * common) / total;
};

/**
 * 为未知的 GPU 类型生成建议
 * @param given - 用户给出的 GPU 类型
 * @param validIds - 目录中的全部 GPU 类型 ID
 * @param k - 最多返回的建议数
 * @returns 原始（未规范化）的 GPU 类型 ID 列表，最相近的在前
 */
export const suggestGpuTypes = (given: string, validIds: string[], k = DEFAULT_SUGGESTIONS): string[] => {
	const givenNorm = normalizeForMatch(given);

	// 规范化后的 ID -> 原始 ID，重复时保留第一个
	const byNorm = new Map<string, string>();
	for (const id of validIds) {
		const norm = normalizeForMatch(id);
		if (!byNorm.has(norm)) {
			byNorm.set(norm, id);
		}
	}

	const exact = byNorm.get(givenNorm);
	if (exact !== undefined) {
		return [exact];
	}

	const ranked = [...byNorm.entries()]
		.map(([norm, id], index) => ({ id, index, score: similarity(givenNorm, norm) }))
		.sort((a, b) => b.score - a.score || a.index - b.index);

	return ranked.slice(0, k).map((r) => r.id);
};
