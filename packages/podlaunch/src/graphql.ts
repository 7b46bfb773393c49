/**
 * @file RunPod GraphQL 请求构建
 *
 * 所有请求都是固定的 GraphQL 文档加上 variables 对象。
 * Pod 名称、模板 ID、令牌等不可信字符串只通过 variables 以 JSON 形式传递，
 * 不会拼接进查询文本，因此不存在注入查询语法的问题。
 */
import type { CloudType, EnvVar } from "./types.js";

/** 一次 GraphQL 请求 */
export interface GraphQLRequest<V extends object = Record<string, unknown>> {
	/** 操作名称，用于日志 */
	operationName: string;
	query: string;
	variables: V;
}

/** GraphQL 响应中的单个错误 */
export interface GraphQLError {
	message: string;
	path?: Array<string | number>;
	extensions?: Record<string, unknown>;
}

/** GraphQL 响应 */
export interface GraphQLResponse {
	data?: Record<string, unknown> | null;
	errors?: GraphQLError[];
}

/** Pod 查询共用的字段集合 */
const POD_FIELDS = `
	id
	name
	desiredStatus
	machine {
		gpuTypeId
	}
	runtime {
		ports {
			ip
			isIpPublic
			privatePort
			publicPort
			type
		}
		uptimeInSeconds
	}
`;

const request = <V extends object>(operationName: string, query: string, variables: V): GraphQLRequest<V> => ({
	operationName,
	query,
	variables,
});

export const podQuery = (podId: string) =>
	request(
		"Pod",
		`query Pod($input: PodFilter!) {
	pod(input: $input) {${POD_FIELDS}}
}`,
		{ input: { podId } },
	);

export const listPodsQuery = () =>
	request(
		"Pods",
		`query Pods {
	myself {
		pods {${POD_FIELDS}}
	}
}`,
		{},
	);

export const gpuTypesQuery = () =>
	request(
		"GpuTypes",
		`query GpuTypes {
	gpuTypes {
		id
		displayName
		memoryInGb
	}
}`,
		{},
	);

export const templateEnvQuery = (templateId: string) =>
	request(
		"PodTemplate",
		`query PodTemplate($id: String!) {
	podTemplate(id: $id) {
		env {
			key
			value
		}
	}
}`,
		{ id: templateId },
	);

export const accountPubKeyQuery = () =>
	request(
		"Myself",
		`query Myself {
	myself {
		pubKey
	}
}`,
		{},
	);

/** podFindAndDeployOnDemand 的输入 */
export interface DeployInput {
	name: string;
	templateId: string;
	gpuTypeId: string;
	gpuCount: number;
	/** 形如 "22/tcp,8080/tcp" */
	ports: string;
	volumeInGb: number;
	containerDiskInGb: number;
	volumeMountPath: string;
	cloudType?: CloudType;
	/** 给出时整体替换模板的环境变量 */
	env?: EnvVar[];
}

export const deployPodMutation = (input: DeployInput) =>
	request(
		"PodFindAndDeployOnDemand",
		`mutation PodFindAndDeployOnDemand($input: PodFindAndDeployOnDemandInput!) {
	podFindAndDeployOnDemand(input: $input) {
		id
		name
		imageName
	}
}`,
		{ input },
	);

export const stopPodMutation = (podId: string) =>
	request(
		"PodStop",
		`mutation PodStop($input: PodStopInput!) {
	podStop(input: $input) {
		id
		desiredStatus
	}
}`,
		{ input: { podId } },
	);

export const resumePodMutation = (podId: string, gpuCount: number) =>
	request(
		"PodResume",
		`mutation PodResume($input: PodResumeInput!) {
	podResume(input: $input) {
		id
		desiredStatus
		imageName
	}
}`,
		{ input: { podId, gpuCount } },
	);

export const terminatePodMutation = (podId: string) =>
	request(
		"PodTerminate",
		`mutation PodTerminate($input: PodTerminateInput!) {
	podTerminate(input: $input)
}`,
		{ input: { podId } },
	);

/** 将 GraphQL 错误列表格式化为一行文本 */
export const formatErrors = (errors: GraphQLError[]): string => {
	return errors.map((e) => e.message).join("; ");
};
