import type { BackendKind } from '../domain/types.js'

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

export interface ChatSettings {
  model: string
  temperature?: number
  maxTokens?: number
  seed?: number | null
  timeoutMs?: number
  /** JSON schema the reply should satisfy; backends without schema support fall back to plain JSON mode */
  format?: Record<string, unknown>
}

export interface ChatResult {
  text: string
  latencyMs: number
  raw?: unknown
}

export interface ProbeResult {
  ok: true
  endpoint: string
  data?: unknown
}

/** One inference backend. Every method is a single request and throws ConnectorError on failure. */
export interface Connector {
  readonly backend: BackendKind
  readonly baseURL: string
  probe(): Promise<ProbeResult>
  listModels(): Promise<string[]>
  chat(messages: ChatMessage[], settings: ChatSettings): Promise<ChatResult>
  /** Ask the backend to load `model` into memory */
  warm(model: string, timeoutMs?: number): Promise<void>
}

export interface ConnectorOptions {
  timeoutMs?: number
}
