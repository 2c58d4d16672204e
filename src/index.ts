export * from "./buffer/index.ts";
export * from "./editor/index.ts";
export { compilePattern, findAll, formatPattern } from "./pattern/pattern.ts";
export type { Pattern, PatternEncoding, PatternToken } from "./pattern/pattern.ts";
export * from "./common/errors.ts";
export { Err, Ok } from "./common/result.ts";
export type { Result } from "./common/result.ts";
export { NodeFileStore } from "./node/file-store.ts";
export { ConfigSchema, DEFAULT_CONFIG, loadConfig, parseConfig } from "./node/config.ts";
export type { HexmodalConfig } from "./node/config.ts";
export { log } from "./node/log.ts";
