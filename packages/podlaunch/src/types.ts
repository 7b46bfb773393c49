/**
 * @file 核心类型定义文件
 *
 * 本文件定义了 RunPod Pod 管理工具的核心数据类型，包括：
 * - RunPod API 返回的 Pod、端口、运行时信息
 * - GPU 类型目录条目
 * - 模板环境变量
 * - 本地保存的用户身份
 *
 * 类型以 TypeBox schema 的形式声明，既用于校验 API 响应，也通过 Static 推导出 TS 类型。
 */
import { type Static, Type } from "@sinclair/typebox";

/**
 * Pod 暴露的单个端口
 */
export const PodPortSchema = Type.Object({
	/** 外部 IP 地址 */
	ip: Type.String(),
	/** 是否为公网可达 IP */
	isIpPublic: Type.Optional(Type.Boolean()),
	/** 容器内部端口 */
	privatePort: Type.Integer(),
	/** 外部映射端口 */
	publicPort: Type.Integer(),
	/** 端口协议 */
	type: Type.Union([Type.Literal("tcp"), Type.Literal("http")]),
});
export type PodPort = Static<typeof PodPortSchema>;

/**
 * Pod 运行时信息，仅在 Pod 实际运行时存在
 */
export const PodRuntimeSchema = Type.Object({
	ports: Type.Union([Type.Array(PodPortSchema), Type.Null()]),
	uptimeInSeconds: Type.Optional(Type.Union([Type.Integer({ minimum: 0 }), Type.Null()])),
});
export type PodRuntime = Static<typeof PodRuntimeSchema>;

/**
 * RunPod 上的一个 Pod（远程 GPU 实例）
 */
export const PodSchema = Type.Object({
	id: Type.String(),
	name: Type.String(),
	/** 期望状态（RUNNING、EXITED、TERMINATED 等） */
	desiredStatus: Type.Optional(Type.Union([Type.String(), Type.Null()])),
	/** 调度到的机器，分配 GPU 之后才有 gpuTypeId */
	machine: Type.Optional(
		Type.Union([Type.Object({ gpuTypeId: Type.Optional(Type.Union([Type.String(), Type.Null()])) }), Type.Null()]),
	),
	runtime: Type.Optional(Type.Union([PodRuntimeSchema, Type.Null()])),
});
export type Pod = Static<typeof PodSchema>;
export const PodListSchema = Type.Array(PodSchema);

/**
 * GPU 类型目录条目
 */
export const GpuTypeSchema = Type.Object({
	/** GPU 类型 ID（如 "NVIDIA A40"），创建 Pod 时使用 */
	id: Type.String(),
	displayName: Type.String(),
	memoryInGb: Type.Union([Type.Number(), Type.Null()]),
});
export type GpuType = Static<typeof GpuTypeSchema>;
export const GpuTypeListSchema = Type.Array(GpuTypeSchema);

/** 模板中的一个环境变量 */
export const EnvVarSchema = Type.Object({
	key: Type.String(),
	value: Type.String(),
});
export type EnvVar = Static<typeof EnvVarSchema>;
export const EnvVarListSchema = Type.Array(EnvVarSchema);

/** 部署位置 */
export type CloudType = "SECURE" | "COMMUNITY";

/**
 * 本地保存的用户身份（user.json）
 */
export const UserIdentitySchema = Type.Object({
	/** 用户名，作为 Pod 名称前缀 */
	name: Type.String({ pattern: "^[a-z0-9_-]+$" }),
	/** 在 Pod 上配置 git 时使用的名字 */
	gitName: Type.Optional(Type.String()),
	/** 在 Pod 上配置 git 时使用的邮箱 */
	gitEmail: Type.Optional(Type.String()),
});
export type UserIdentity = Static<typeof UserIdentitySchema>;

/**
 * 判断 Pod 是否处于运行状态：有运行时信息即视为运行中
 */
export const isPodRunning = (pod: Pod): boolean => {
	return pod.runtime !== undefined && pod.runtime !== null;
};

/** 返回 Pod 分配到的 GPU 类型，未调度时返回空字符串 */
export const podGpuType = (pod: Pod): string => {
	return pod.machine?.gpuTypeId ?? "";
};
