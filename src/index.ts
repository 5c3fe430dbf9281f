export * from "./core/types.js";
export type * from "./config/types.js";
export { createDefaultConfig, FEATURE_WHITELIST } from "./config/defaults.js";
export { resolveConfig, type ResolveConfigOptions, type ResolveConfigResult } from "./config/resolve-config.js";
export { temperatureFromMu, lambdaFromMu, TEMPERATURE_MIN, TEMPERATURE_MAX } from "./influence/functions.js";
export { FeedbackAccumulator } from "./influence/feedback.js";
export { deriveInfluenceProfile, type InfluenceProfile } from "./influence/profile.js";
export { requestValidatedPayload, type ValidatedPayloadResult } from "./protocol/validator.js";
export { Agent, scorePeerTurn } from "./agents/agent.js";
export { mixFeatureWeights } from "./agents/mixing.js";
export { runConversation } from "./conversation/runner.js";
export { transition, evaluateTermination, INITIAL_STATE, type ConversationState } from "./conversation/state-machine.js";
export * from "./metrics/metrics.js";
export { assembleResultRow, isFailedRow } from "./metrics/result-row.js";
export { loadLedger, LedgerWriter, type LedgerSnapshot } from "./ledger/ledger.js";
export { enumerateGrid, gridPointKey } from "./engine/grid.js";
export { runBatchWithWorkers } from "./engine/batch-executor.js";
export { runGridEvaluation, type GridEvaluationOptions, type SweepSummary } from "./engine/harness.js";
export { EventBus } from "./events/event-bus.js";
export type { Event, EventType, EventPayloadMap } from "./events/types.js";
export type { InferenceService, InferenceRequest, InferenceResponse } from "./inference/service.js";
export { createLiveInferenceService } from "./inference/service.js";
export { createMockInferenceService } from "./inference/mock-service.js";
export { InferenceServiceError } from "./inference/client.js";
export { ConfigurationError, LedgerError, LedgerWriteError } from "./utils/errors.js";
