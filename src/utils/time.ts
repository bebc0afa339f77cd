/** Current time as an ISO-8601 string, the format every record stores. */
export function now(): string {
  return new Date().toISOString()
}

/** "YYYY-MM-DD HH:MM" in UTC, or "never". */
export function toHuman(iso: string | null): string {
  if (!iso) return 'never'
  const date = new Date(iso)
  if (Number.isNaN(date.getTime())) return 'never'
  return date.toISOString().slice(0, 16).replace('T', ' ')
}
