// Runtime
export { createRuntime } from './runtime.js'
export type { Runtime, RuntimeOverrides } from './runtime.js'
export { loadConfig, REQUEST_TIMEOUT_MS } from './config.js'
export type { BenchDuoConfig } from './config.js'
export { consoleLogger, silentLogger } from './logger.js'
export type { Logger, LogLevel } from './logger.js'
export { BenchDuoError, ConfigurationError, ConnectorError, NotFoundError, TurnFailure } from './errors.js'

// Domain
export type * from './domain/types.js'

// Store
export { createMemoryStore, createSnapshotStore } from './store/memory.js'
export type { SnapshotBackend } from './store/memory.js'
export { createJsonFileStore } from './store/json-file.js'
export type { JsonFileStoreOptions } from './store/json-file.js'
export type { Store, Session, TableSession, StoreSnapshot } from './store/types.js'

// Connectors
export { createConnectorFactory, ollama, mlx, tensorrt, makeConnector, detectBackend, probeBackend } from './connectors/index.js'
export type { ConnectorFactory, Connector, ChatMessage, ChatSettings, ChatResult, ProbeResult } from './connectors/index.js'

// Turn engine
export { createTurnEngine, resolvePairing } from './engine/conversation.js'
export type { TurnEngine, TurnEngineDeps, DuelInput, ConversationOutcome, RunOptions } from './engine/conversation.js'
export { createDuelQueue } from './engine/duel-queue.js'
export type { DuelQueue, DuelQueueOptions } from './engine/duel-queue.js'
export { createSerialQueue } from './engine/queue.js'
export type { SerialQueue } from './engine/queue.js'
export { createBroadcaster } from './engine/broadcaster.js'
export type { EventBroadcaster, Broadcaster, Viewer, DuelEvent, TurnEvent, EndEvent } from './engine/broadcaster.js'
export { getConversationView, listConversations } from './engine/history.js'
export { countTokens } from './engine/tokens.js'

// Batch scheduler
export { createBatchScheduler } from './batch/scheduler.js'
export type { BatchScheduler, BatchSchedulerDeps, BatchJobInput } from './batch/scheduler.js'
export { batchJobView } from './batch/view.js'
export type { BatchJobView } from './batch/view.js'

// Readiness
export { computeModelStatus, computeAgentStatus, readinessColor } from './status/readiness.js'
export type { EngineState, LoadState, ModelStatus, AgentReadiness } from './status/readiness.js'
export { createStatusService } from './status/service.js'
export type { StatusService, ModelStatusPayload, AgentStatusPayload } from './status/service.js'
export { createStatusLog } from './status/log.js'
export type { StatusLog } from './status/log.js'

// Evaluation
export { createEvaluationService } from './evaluation/service.js'
export type { EvaluationService, EvaluationInput } from './evaluation/service.js'
export { codeAggregate } from './evaluation/aggregate.js'
export { extractJsonBlock, normalizeJudgeOutput } from './evaluation/parse.js'
export { runJudge, runAggregator } from './evaluation/judge.js'
export { conversationToText } from './evaluation/transcript.js'

// Registry & maintenance
export { createRegistry } from './registry.js'
export type { Registry, ModelInput, AgentInput } from './registry.js'
export { purgeOlderThan } from './maintenance/purge.js'
