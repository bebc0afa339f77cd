export type WithId<F> = F & { id: number }

export const BACKEND_KINDS = ['ollama', 'mlx', 'tensorrt'] as const
export type BackendKind = (typeof BACKEND_KINDS)[number]

export type Reachability = 'green' | 'yellow' | 'red'
export type WarmStatus = 'cold' | 'loading' | 'warm' | 'error'

export interface ModelFields {
  name: string
  host: string
  port: number
  backend: BackendKind
  /** Identifier the backend knows the model by */
  modelName: string
  /** Overrides `modelName` when warming */
  selectedModel: string | null
  status: Reachability
  warmStatus: WarmStatus
  lastWarmedAt: string | null
  lastLoadAttemptAt: string | null
  lastLoadMessage: string | null
  lastEngineCheckAt: string | null
  lastEngineMessage: string | null
  createdAt: string
  updatedAt: string
}

export type ModelRecord = WithId<ModelFields>

export type AgentStatus = 'ready' | 'disabled'

export interface AgentFields {
  name: string
  modelId: number
  systemPrompt: string
  maxTokens: number
  temperature: number
  status: AgentStatus
  createdAt: string
  updatedAt: string
}

export type AgentRecord = WithId<AgentFields>

export type ConversationStatus = 'pending' | 'running' | 'finished'

export interface ConversationFields {
  title: string
  agent1Id: number
  agent2Id: number
  ttl: number
  randomSeed: number | null
  status: ConversationStatus
  finishedAt: string | null
  createdAt: string
  updatedAt: string
}

export type ConversationRecord = WithId<ConversationFields>

export type SenderRole = 'user' | 'agent1' | 'agent2'

export interface MessageFields {
  conversationId: number
  senderRole: SenderRole
  agentId: number | null
  content: string
  tokens: number
  raw: unknown
  createdAt: string
}

export type MessageRecord = WithId<MessageFields>

export type BatchJobStatus = 'queued' | 'running' | 'completed' | 'cancelled' | 'failed'

export const TERMINAL_BATCH_STATUSES: ReadonlySet<BatchJobStatus> = new Set(['completed', 'cancelled', 'failed'])

export interface BatchSummary {
  totalMessages: number
  totalTokens: number
  totalElapsedSeconds: number
  conversationIds: number[]
  error: string | null
}

export interface BatchJobFields {
  agent1Id: number
  agent2Id: number
  prompt: string
  ttl: number
  numRuns: number
  completedRuns: number
  seed: number | null
  cancelRequested: boolean
  /** Scheduler currently processing the job; its claim lapses once `heartbeatAt` goes stale */
  workerId: string | null
  heartbeatAt: string | null
  summary: BatchSummary
  status: BatchJobStatus
  startTime: string | null
  endTime: string | null
  createdAt: string
  updatedAt: string
}

export type BatchJobRecord = WithId<BatchJobFields>

export type EvaluationStatus = 'pending' | 'running' | 'completed' | 'failed'

export interface JudgeIssue {
  messageIndex: number | null
  category: string
  excerpt: string
  severity: number
}

export interface JudgeResult {
  judgeModelId: number
  judgeModelName: string
  issues: JudgeIssue[]
  completionScore: number | null
  realisticScore: number | null
  notes: string
  /** Set when the judge's output could not be read as JSON, or its call failed */
  error?: string
}

export interface FlaggedInstance extends JudgeIssue {
  judgeModelId: number | null
}

export interface FlaggedLine {
  messageId: number
  messageIndex: number
  reason: string
  excerpt: string
  severity: number
}

export interface EvaluationReport {
  summary: string
  overallScore: number
  totalIssues: number
  highestSeverity: number
  completionScore: number
  realisticScore: number
  flaggedInstances: FlaggedInstance[]
  /** Which path produced the report */
  source: 'aggregator' | 'code'
  scores?: {
    overall: number
    completion: number
    realistic: number
    highestSeverity: number
  }
  flaggedLines?: FlaggedLine[]
}

export interface EvaluationJobFields {
  conversationId: number
  batchId: number | null
  mainModelId: number
  judgeModelIds: number[]
  results: { judges: JudgeResult[] } | { error: string } | null
  report: EvaluationReport | null
  status: EvaluationStatus
  createdAt: string
  updatedAt: string
}

export type EvaluationJobRecord = WithId<EvaluationJobFields>

