/**
 * Request counters and the plain-text /metrics exposition.
 */

export interface MetricsSnapshot {
  uptimeSeconds: number;
  ramMb: number;
  cpuPercent: number;
  requests: number;
  errors: number;
  sessions: number;
}

interface Gauge {
  name: string;
  help: string;
  value: string;
}

export class RequestStats {
  requests = 0;
  errors = 0;
  private readonly startedAt: number;
  private lastCpu = process.cpuUsage();
  private lastSampleAt: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
    this.lastSampleAt = this.startedAt;
  }

  recordRequest(): void {
    this.requests++;
  }

  recordError(): void {
    this.errors++;
  }

  /** Process CPU share since the previous sample, in percent of one core. */
  sampleCpuPercent(): number {
    const at = this.now();
    const usage = process.cpuUsage(this.lastCpu);
    const elapsedMs = at - this.lastSampleAt;

    this.lastCpu = process.cpuUsage();
    this.lastSampleAt = at;

    if (elapsedMs <= 0) return 0;
    return ((usage.user + usage.system) / 1000 / elapsedMs) * 100;
  }

  snapshot(sessions: number): MetricsSnapshot {
    return {
      uptimeSeconds: Math.floor((this.now() - this.startedAt) / 1000),
      ramMb: process.memoryUsage().rss / 1024 / 1024,
      cpuPercent: this.sampleCpuPercent(),
      requests: this.requests,
      errors: this.errors,
      sessions,
    };
  }
}

export function renderMetrics(snapshot: MetricsSnapshot): string {
  const gauges: Gauge[] = [
    { name: "bot_uptime", help: "Uptime in seconds", value: String(snapshot.uptimeSeconds) },
    { name: "bot_ram_mb", help: "RAM usage MB", value: snapshot.ramMb.toFixed(2) },
    { name: "bot_cpu", help: "CPU usage percent", value: snapshot.cpuPercent.toFixed(1) },
    { name: "bot_requests_total", help: "Total HTTP requests", value: String(snapshot.requests) },
    { name: "bot_errors_total", help: "Total errors", value: String(snapshot.errors) },
    { name: "bot_history_entries", help: "Number of chat history entries", value: String(snapshot.sessions) },
  ];

  return (
    gauges
      .map((g) => `# HELP ${g.name} ${g.help}\n# TYPE ${g.name} gauge\n${g.name} ${g.value}`)
      .join("\n") + "\n"
  );
}
