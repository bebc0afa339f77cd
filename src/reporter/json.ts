/** Wrap any CLI result in a timestamped envelope for `--json` output. */
export function jsonReporter(kind: string, data: unknown): string {
  return JSON.stringify(
    {
      timestamp: new Date().toISOString(),
      kind,
      data,
    },
    null,
    2
  )
}
