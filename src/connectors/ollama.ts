import { z } from 'zod'
import { REQUEST_TIMEOUT_MS } from '../config.js'
import { ConnectorError, errorMessage } from '../errors.js'
import type { ChatMessage, ChatResult, ChatSettings, Connector, ConnectorOptions, ProbeResult } from './types.js'

const tagsSchema = z.object({
  models: z.array(z.object({ name: z.string().optional() }).passthrough()).default([]),
})

const chatResponseSchema = z.object({
  message: z.object({ content: z.string().optional() }).passthrough().optional(),
}).passthrough()

/** Endpoints tried in order when probing; the first 2xx wins */
const PROBE_ENDPOINTS = ['/api/version', '/api/tags']

export interface OllamaConnectorOptions extends ConnectorOptions {
  host?: string
  port?: number
}

export function ollama(options?: OllamaConnectorOptions): Connector {
  const host = options?.host ?? 'localhost'
  const port = options?.port ?? 11434
  const baseURL = `http://${host}:${port}`
  const defaultTimeout = options?.timeoutMs ?? REQUEST_TIMEOUT_MS

  async function request(path: string, init: RequestInit & { timeoutMs?: number }): Promise<unknown> {
    const { timeoutMs, ...rest } = init
    const res = await fetch(`${baseURL}${path}`, {
      ...rest,
      signal: AbortSignal.timeout(timeoutMs ?? defaultTimeout),
    })
    if (!res.ok) {
      const text = await res.text()
      throw new Error(`${res.status} ${text}`.trim())
    }
    const text = await res.text()
    return text ? JSON.parse(text) : {}
  }

  function post(path: string, body: unknown, timeoutMs?: number): Promise<unknown> {
    return request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      timeoutMs,
    })
  }

  return {
    backend: 'ollama',
    baseURL,

    async probe(): Promise<ProbeResult> {
      let lastError: unknown
      for (const endpoint of PROBE_ENDPOINTS) {
        try {
          const data = await request(endpoint, { method: 'GET' })
          return { ok: true, endpoint, data }
        } catch (err) {
          lastError = err
        }
      }
      throw new ConnectorError(`Ollama probe failed: ${errorMessage(lastError)}`, { cause: lastError })
    },

    async listModels(): Promise<string[]> {
      let payload: unknown
      try {
        payload = await request('/api/tags', { method: 'GET' })
      } catch (err) {
        throw new ConnectorError(`Failed to list Ollama models: ${errorMessage(err)}`, { cause: err })
      }
      const parsed = tagsSchema.safeParse(payload)
      if (!parsed.success) {
        throw new ConnectorError('Failed to list Ollama models: unexpected response shape')
      }
      return parsed.data.models.flatMap((m) => (m.name ? [m.name] : []))
    },

    async chat(messages: ChatMessage[], settings: ChatSettings): Promise<ChatResult> {
      if (!settings.model) {
        throw new ConnectorError('Ollama chat requires a model')
      }

      const options: Record<string, number> = {}
      if (settings.temperature !== undefined) options.temperature = settings.temperature
      if (settings.maxTokens !== undefined) options.num_predict = settings.maxTokens
      if (settings.seed !== undefined && settings.seed !== null) options.seed = settings.seed

      const body: Record<string, unknown> = {
        model: settings.model,
        messages,
        stream: false,
        options,
      }
      if (settings.format) body.format = settings.format

      const start = Date.now()
      let payload: unknown
      try {
        payload = await post('/api/chat', body, settings.timeoutMs)
      } catch (err) {
        throw new ConnectorError(`Ollama chat failed: ${errorMessage(err)}`, { cause: err })
      }

      const parsed = chatResponseSchema.safeParse(payload)
      const content = parsed.success ? parsed.data.message?.content : undefined
      if (!content) {
        throw new ConnectorError('Ollama chat response missing message content')
      }
      return { text: content, latencyMs: Date.now() - start, raw: payload }
    },

    async warm(model: string, timeoutMs?: number): Promise<void> {
      try {
        // An empty prompt makes Ollama load the weights without generating
        await post('/api/generate', { model, prompt: '', stream: false }, timeoutMs)
      } catch (err) {
        throw new ConnectorError(`Ollama warm-up of ${model} failed: ${errorMessage(err)}`, { cause: err })
      }
    },
  }
}
