/**
 * Public API — everything a host application needs to embed the workflows.
 *
 * Dependency direction: index.ts → core, agents, providers
 * Used by: package.json "exports"
 */

export {
    AppError,
    ConfigError,
    ProviderError,
    WorkflowError,
    ValidationError,
    StageExecutionError,
} from './core/errors.js';

export { AgentWorkflow, type AgentWorkflowOptions } from './core/workflow/engine.js';
export { BasicChatWorkflow, type BasicChatWorkflowOptions } from './core/workflow/basic-chat.js';
export {
    detectQuestionType,
    shapeQuestion,
    loadQuestionTypeRules,
    type QuestionType,
    type QuestionTypeRules,
} from './core/workflow/question-type.js';
export {
    createWorkflow,
    getWorkflow,
    registerWorkflow,
    getAvailableWorkflows,
    type WorkflowFactory,
    type WorkflowFactoryOptions,
} from './core/workflow/registry.js';
export { WorkflowSessions } from './core/workflow/sessions.js';
export { WorkflowStage, STAGE_LABELS } from './core/workflow/stages.js';
export type { WorkflowState, WorkflowPlan, ExecutionResult, StageTransition } from './core/workflow/state.js';
export {
    isPlanApproved,
    shouldCompleteWorkflow,
    shouldDoAdditionalWork,
    shouldStartNewRequest,
    classifyReviewFeedback,
    loadIntentLexicon,
    type IntentLexicon,
    type ReviewDecision,
} from './core/workflow/intent.js';
export { buildFullContext, summarizeExecutionResults, createFinalSummary } from './core/workflow/summary.js';
export { TokenTracker } from './core/workflow/token-tracker.js';
export type {
    Workflow,
    WorkflowAgent,
    WorkflowInfo,
    CompletionResult,
    TaskExecutionResult,
    StreamingCallback,
} from './core/workflow/types.js';

export type { AppConfig, ProviderConfig, WorkflowConfig, AgentConfig } from './core/config/types.js';
export { loadConfig, saveConfig, getDefaultConfig } from './core/config/manager.js';

export { ProviderAgent } from './agents/provider-agent.js';
export { createWorkflowAgent } from './agents/factory.js';
export { createProvider, getSupportedProviders } from './providers/registry.js';
export type { LLMProvider, LLMProviderName, ChatMessage, ChatOptions, ChatResponse, ChatChunk } from './providers/types.js';
