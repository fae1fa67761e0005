// Process-wide counters for /metrics. Reset only by restarting the service.
let requestCount = 0;
let errorCount = 0;
let startedAt = Date.now();

export function recordRequest(): void {
  requestCount++;
}

export function recordError(): void {
  errorCount++;
}

export interface StatsSnapshot {
  requests_processed: number;
  error_count: number;
  error_rate: number;
  uptime_seconds: number;
}

export function snapshot(now: number = Date.now()): StatsSnapshot {
  return {
    requests_processed: requestCount,
    error_count: errorCount,
    error_rate: errorCount / Math.max(requestCount, 1),
    uptime_seconds: Math.floor((now - startedAt) / 1000),
  };
}

export function resetStats(now: number = Date.now()): void {
  requestCount = 0;
  errorCount = 0;
  startedAt = now;
}
