/**
 * Keep the keys that start with `prefix`, with the prefix stripped
 * (`RESPKV_PORT` → `PORT`). An empty or missing prefix keeps everything.
 */
export function stripPrefix<V>(
  record: Record<string, V>,
  prefix: string | undefined,
): Record<string, V> {
  if (!prefix) return { ...record }

  const filtered: Record<string, V> = {}

  for (const [key, value] of Object.entries(record)) {
    if (key.startsWith(prefix)) {
      filtered[key.slice(prefix.length)] = value
    }
  }

  return filtered
}
