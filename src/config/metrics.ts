export type Metrics = {
  started_at: string
  calls_total: number
  errors_total: number
  timeouts_total: number
  retries_total: number
  rejected_total: number
  rate_limited_total: number
  p95_ms: number
  last_ms: number
}

export function createMetrics() {
  const metrics: Metrics = {
    started_at: new Date().toISOString(),
    calls_total: 0,
    errors_total: 0,
    timeouts_total: 0,
    retries_total: 0,
    rejected_total: 0,
    rate_limited_total: 0,
    p95_ms: 0,
    last_ms: 0,
  }
  const last: number[] = []

  function recordLatency(ms: number) {
    metrics.last_ms = ms
    last.push(ms)
    if (last.length > 200) last.shift()
    const s = [...last].sort((a, b) => a - b)
    const i = Math.floor(0.95 * (s.length - 1))
    metrics.p95_ms = s[i] ?? ms
  }

  return { metrics, recordLatency }
}

export type MetricsRecorder = ReturnType<typeof createMetrics>
