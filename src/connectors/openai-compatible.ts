import OpenAI from 'openai'
import { REQUEST_TIMEOUT_MS } from '../config.js'
import { ConnectorError, errorMessage } from '../errors.js'
import type { ChatMessage, ChatResult, ChatSettings, Connector, ConnectorOptions, ProbeResult } from './types.js'

/** System message added when the caller asks for JSON output. */
export const JSON_SYSTEM_MESSAGE = 'Respond with valid JSON matching the requested schema.'

export interface OpenAICompatibleOptions extends ConnectorOptions {
  host: string
  port: number
  apiKey?: string
}

type CompatibleBackend = 'mlx' | 'tensorrt'

const LABELS: Record<CompatibleBackend, string> = {
  mlx: 'MLX',
  tensorrt: 'TensorRT-LLM',
}

/** mlx_lm.server speaks the OpenAI chat API under /v1 */
export function mlx(options: OpenAICompatibleOptions): Connector {
  return makeConnector('mlx', clientFor(options), `http://${options.host}:${options.port}`)
}

/** trtllm-serve speaks the OpenAI chat API under /v1 */
export function tensorrt(options: OpenAICompatibleOptions): Connector {
  return makeConnector('tensorrt', clientFor(options), `http://${options.host}:${options.port}`)
}

function clientFor(options: OpenAICompatibleOptions): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey ?? 'no-key',
    baseURL: `http://${options.host}:${options.port}/v1`,
    timeout: options.timeoutMs ?? REQUEST_TIMEOUT_MS,
    maxRetries: 0,
  })
}

export function makeConnector(backend: CompatibleBackend, client: OpenAI, baseURL: string): Connector {
  const label = LABELS[backend]

  async function listModels(): Promise<string[]> {
    const page = await client.models.list()
    return page.data.map((m) => m.id).filter((id) => id.length > 0)
  }

  return {
    backend,
    baseURL,

    async probe(): Promise<ProbeResult> {
      try {
        const models = await listModels()
        return { ok: true, endpoint: '/v1/models', data: { models } }
      } catch (err) {
        throw new ConnectorError(`${label} probe failed: ${errorMessage(err)}`, { cause: err })
      }
    },

    async listModels(): Promise<string[]> {
      try {
        return await listModels()
      } catch (err) {
        throw new ConnectorError(`Failed to list ${label} models: ${errorMessage(err)}`, { cause: err })
      }
    },

    async chat(messages: ChatMessage[], settings: ChatSettings): Promise<ChatResult> {
      if (!settings.model) {
        throw new ConnectorError(`${label} chat requires a model`)
      }

      const params: OpenAI.ChatCompletionCreateParamsNonStreaming = {
        model: settings.model,
        messages: messages.map(toOpenAIMessage),
      }
      if (settings.temperature !== undefined) params.temperature = settings.temperature
      if (settings.maxTokens !== undefined) params.max_tokens = settings.maxTokens
      if (settings.seed !== undefined && settings.seed !== null) params.seed = settings.seed

      // Structured output: plain JSON mode is the lowest common denominator across local servers
      if (settings.format) {
        params.response_format = { type: 'json_object' }
        params.messages = [{ role: 'system', content: JSON_SYSTEM_MESSAGE }, ...params.messages]
      }

      const start = Date.now()
      let response: OpenAI.ChatCompletion
      try {
        response = await client.chat.completions.create(
          params,
          settings.timeoutMs !== undefined ? { timeout: settings.timeoutMs } : undefined,
        )
      } catch (err) {
        throw new ConnectorError(`${label} chat failed: ${errorMessage(err)}`, { cause: err })
      }

      const content = response.choices[0]?.message?.content
      if (!content) {
        throw new ConnectorError(`${label} chat response missing assistant message content`)
      }
      return { text: content, latencyMs: Date.now() - start, raw: response }
    },

    async warm(model: string, timeoutMs?: number): Promise<void> {
      try {
        await client.chat.completions.create(
          { model, messages: [{ role: 'user', content: '.' }], max_tokens: 1 },
          timeoutMs !== undefined ? { timeout: timeoutMs } : undefined,
        )
      } catch (err) {
        throw new ConnectorError(`${label} warm-up of ${model} failed: ${errorMessage(err)}`, { cause: err })
      }
    },
  }
}

function toOpenAIMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content }
    case 'assistant':
      return { role: 'assistant', content: message.content }
    case 'user':
      return { role: 'user', content: message.content }
  }
}
