import { z } from 'zod'
import type { BackendKind } from '../domain/types.js'
import { ConnectorError, errorMessage } from '../errors.js'

const DETECT_TIMEOUT_MS = 3_000

export interface DetectedBackend {
  backend: BackendKind
  version: string | null
  models: string[]
}

const ollamaTags = z.object({
  version: z.string().optional(),
  models: z.array(z.object({ name: z.string().optional() }).passthrough()).default([]),
})

const openaiModels = z.object({
  version: z.string().optional(),
  data: z.array(z.object({ id: z.string().optional() }).passthrough()).default([]),
})

const tensorrtModels = z.object({
  version: z.string().optional(),
  models: z.array(z.unknown()).default([]),
})

interface Probe {
  backend: BackendKind
  path: string
  read(payload: unknown): { version: string | null; models: string[] } | null
}

const PROBES: Probe[] = [
  {
    backend: 'ollama',
    path: '/api/tags',
    read(payload) {
      const parsed = ollamaTags.safeParse(payload)
      if (!parsed.success) return null
      return {
        version: parsed.data.version ?? null,
        models: parsed.data.models.flatMap((m) => (m.name ? [m.name] : [])),
      }
    },
  },
  {
    backend: 'mlx',
    path: '/v1/models',
    read(payload) {
      const parsed = openaiModels.safeParse(payload)
      if (!parsed.success) return null
      return {
        version: parsed.data.version ?? null,
        models: parsed.data.data.flatMap((m) => (m.id ? [m.id] : [])),
      }
    },
  },
  {
    backend: 'tensorrt',
    path: '/models',
    read(payload) {
      const parsed = tensorrtModels.safeParse(payload)
      if (!parsed.success) return null
      return {
        version: parsed.data.version ?? null,
        models: parsed.data.models.filter((m): m is string => typeof m === 'string'),
      }
    },
  },
]

async function getJson(url: string, timeoutMs: number): Promise<unknown> {
  const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) })
  if (!res.ok) throw new Error(`${res.status} ${res.statusText}`.trim())
  try {
    return await res.json()
  } catch {
    return {}
  }
}

/**
 * Guess which kind of server listens at host:port by trying each backend's
 * model-listing endpoint in turn. Returns null when none answers.
 */
export async function detectBackend(
  host: string,
  port: number,
  timeoutMs: number = DETECT_TIMEOUT_MS,
): Promise<DetectedBackend | null> {
  const base = `http://${host}:${port}`

  for (const probe of PROBES) {
    let payload: unknown
    try {
      payload = await getJson(`${base}${probe.path}`, timeoutMs)
    } catch {
      continue // not this backend
    }
    const read = probe.read(payload)
    if (read) return { backend: probe.backend, ...read }
  }

  return null
}

/** List the models a known backend kind reports at host:port. */
export async function probeBackend(
  host: string,
  port: number,
  backend: BackendKind,
  timeoutMs: number = DETECT_TIMEOUT_MS,
): Promise<string[]> {
  const probe = PROBES.find((p) => p.backend === backend)
  if (!probe) throw new ConnectorError(`Unknown backend: ${backend}`)

  let payload: unknown
  try {
    payload = await getJson(`http://${host}:${port}${probe.path}`, timeoutMs)
  } catch (err) {
    throw new ConnectorError(`Probe of ${backend} at ${host}:${port} failed: ${errorMessage(err)}`, { cause: err })
  }

  const read = probe.read(payload)
  if (!read) throw new ConnectorError(`Unexpected ${backend} response from ${host}:${port}${probe.path}`)
  return read.models
}
