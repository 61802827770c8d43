export interface TestResult {
  operation: string;
  success: boolean;
  duration: number;
  statusCode?: number;
}

function percentile(sorted: number[], p: number): number {
  return sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * p))];
}

function summarize(label: string, group: TestResult[]): string {
  const sorted = group.map((r) => r.duration).sort((a, b) => a - b);
  const ok = group.filter((r) => r.success).length;
  const [p50, p95, p99, max] = [0.5, 0.95, 0.99, 1].map((p) => percentile(sorted, p).toFixed(2));
  return `  ${label.padEnd(13)} n=${group.length} ok=${ok} p50=${p50}ms p95=${p95}ms p99=${p99}ms max=${max}ms`;
}

/**
 * Latency report lines: overall, then one per operation in first-seen order
 */
export function formatStats(results: TestResult[]): string[] {
  if (results.length === 0) {
    return ['No requests completed.'];
  }

  const failed = results.filter((r) => !r.success).length;
  const lines = [`Requests: ${results.length}, failed: ${failed}`, summarize('ALL', results)];

  const byOperation = new Map<string, TestResult[]>();
  for (const r of results) {
    byOperation.set(r.operation, [...(byOperation.get(r.operation) ?? []), r]);
  }
  for (const [op, group] of byOperation) {
    lines.push(summarize(op, group));
  }
  return lines;
}
