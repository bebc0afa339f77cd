import type { ModelRecord } from '../domain/types.js'
import { ollama } from './ollama.js'
import { mlx, tensorrt } from './openai-compatible.js'
import type { Connector, ConnectorOptions } from './types.js'

/** Resolves the connector for a registered model. Injected so tests can stub backends. */
export type ConnectorFactory = (model: Pick<ModelRecord, 'backend' | 'host' | 'port'>) => Connector

export function createConnectorFactory(options?: ConnectorOptions): ConnectorFactory {
  return (model) => {
    const target = { host: model.host, port: model.port, timeoutMs: options?.timeoutMs }
    switch (model.backend) {
      case 'ollama':
        return ollama(target)
      case 'mlx':
        return mlx(target)
      case 'tensorrt':
        return tensorrt(target)
    }
  }
}

export { ollama } from './ollama.js'
export { mlx, tensorrt, makeConnector } from './openai-compatible.js'
export { detectBackend, probeBackend } from './detect.js'
export type { Connector, ChatMessage, ChatSettings, ChatResult, ProbeResult } from './types.js'
