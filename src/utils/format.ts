const DASH = '—'

/** Seconds with one decimal, or a dash when unknown. */
export function formatSeconds(seconds: number | null | undefined): string {
  if (seconds === null || seconds === undefined) return DASH
  return `${seconds.toFixed(1)}s`
}

export function formatRate(tokensPerSec: number | null | undefined): string {
  if (tokensPerSec === null || tokensPerSec === undefined) return DASH
  return `${tokensPerSec.toFixed(1)} tok/s`
}

/** 0–1 score as a whole percentage. */
export function formatScore(score: number): string {
  return `${Math.round(score * 100)}%`
}

/** Collapse whitespace and cut to `max` characters, marking the cut with an ellipsis. */
export function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ').trim()
  if (flat.length <= max) return flat
  return `${flat.slice(0, Math.max(0, max - 1))}…`
}
