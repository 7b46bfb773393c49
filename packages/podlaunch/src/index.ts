/**
 * @file 库主入口文件
 *
 * 导出 RunPod 客户端、Pod 获取流程、SSH 会话与 tmux 管理等公共接口，
 * 供其它脚本在不经过 CLI 的情况下复用。
 */

export * from "./acquire.js";
export * from "./api.js";
export * from "./config.js";
export * from "./env.js";
export * from "./errors.js";
export * from "./gpu-match.js";
export * from "./settings.js";
export * from "./ssh.js";
export * from "./ssh-config.js";
export * from "./tmux.js";
export * from "./types.js";
