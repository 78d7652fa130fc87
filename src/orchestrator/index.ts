export { buildPrompt, CLASSIFICATION_SYSTEM_PROMPT } from './prompt.js';
export {
  ToolCallingOrchestrator,
  DEFAULT_LIMITS,
  type OrchestratorLimits,
  type OrchestratorResult,
  type RunOptions,
  type StopReason,
  type ToolCallRound,
  type ToolInvocation
} from './tool-loop.js';
