/**
 * duet-harness
 *
 * Planner/executor harness for remote benchmark APIs.
 */

export const VERSION = '0.1.0';

export { ApiError, ConfigError, LlmRequestError, errorMessage, isApiError } from './api/errors.js';
export { HttpBenchmarkClient, type BenchmarkApiClient, type ApiPayload } from './api/client.js';
export { HttpSessionClient, type SessionBootstrap, type TaskInfo } from './api/session.js';
export { loadConfig, parseConfig, type DuetConfig, type ProfileName } from './core/config.js';
export { Logger, type LogLevel } from './core/logger.js';
export { OpenAiCompatibleClient, createLlmClient, type LlmClient, type ChatMessage } from './core/llm.js';
export { ActionLogger, EMPTY_TURN_LOG } from './agent/logging/action-logger.js';
export { paginate, fetchAllPages, type PaginationOptions } from './agent/tools/pagination.js';
export { createDispatcher } from './agent/tools/dispatch.js';
export { ToolRegistry } from './agent/tools/registry.js';
export type { ToolDefinition, ToolSetContext } from './agent/tools/types.js';
export { CompletionLatch, detectCompletion } from './agent/orchestrator/completion.js';
export { parsePlannerDecision, type PlannerDecision } from './agent/orchestrator/decision.js';
export { Coordinator, type CoordinatorEvents } from './agent/orchestrator/coordinator.js';
export type { CoordinatorResult, TurnRecord } from './agent/orchestrator/state.js';
export { runTask, runTaskWithRetry, runSession } from './agent/orchestrator/task_runner.js';
export { Planner } from './agent/planning/planner.js';
export { runContextExtraction } from './agent/planning/context_extractor.js';
export { Executor } from './agent/executor/executor.js';
export { getProfile, resolveProfileSettings, listProfiles } from './agent/profiles/registry.js';
export type { DomainProfile, ProfileSettings } from './agent/profiles/types.js';
