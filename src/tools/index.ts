export { ToolRegistry, toParameters } from './registry.js';
export { ToolDispatcher, DEFAULT_TOOL_TIMEOUT_MS, type ExecuteOptions } from './dispatcher.js';
export { checkMemoryTool, verifyCodeTool, searchCodesTool } from './builtin.js';
export type * from './types.js';
