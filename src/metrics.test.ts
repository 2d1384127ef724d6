import { describe, expect, it } from "vitest";
import { renderMetrics, RequestStats } from "./metrics";

describe("renderMetrics", () => {
  it("renders every gauge with help and type lines", () => {
    const text = renderMetrics({
      uptimeSeconds: 3600,
      ramMb: 87.456,
      cpuPercent: 1.25,
      requests: 120,
      errors: 4,
      sessions: 17,
    });

    expect(text).toBe(
      [
        "# HELP bot_uptime Uptime in seconds",
        "# TYPE bot_uptime gauge",
        "bot_uptime 3600",
        "# HELP bot_ram_mb RAM usage MB",
        "# TYPE bot_ram_mb gauge",
        "bot_ram_mb 87.46",
        "# HELP bot_cpu CPU usage percent",
        "# TYPE bot_cpu gauge",
        "bot_cpu 1.3",
        "# HELP bot_requests_total Total HTTP requests",
        "# TYPE bot_requests_total gauge",
        "bot_requests_total 120",
        "# HELP bot_errors_total Total errors",
        "# TYPE bot_errors_total gauge",
        "bot_errors_total 4",
        "# HELP bot_history_entries Number of chat history entries",
        "# TYPE bot_history_entries gauge",
        "bot_history_entries 17",
        "",
      ].join("\n"),
    );
  });
});

describe("RequestStats", () => {
  it("counts requests and errors", () => {
    const stats = new RequestStats();
    stats.recordRequest();
    stats.recordRequest();
    stats.recordError();

    const snapshot = stats.snapshot(2);

    expect(snapshot.requests).toBe(2);
    expect(snapshot.errors).toBe(1);
    expect(snapshot.sessions).toBe(2);
    expect(snapshot.ramMb).toBeGreaterThan(0);
  });

  it("reports whole seconds of uptime", () => {
    let now = 1_000_000;
    const stats = new RequestStats(() => now);
    now += 90_500;

    expect(stats.snapshot(0).uptimeSeconds).toBe(90);
  });

  it("reports zero CPU when no time has passed", () => {
    const stats = new RequestStats(() => 5_000);

    expect(stats.sampleCpuPercent()).toBe(0);
  });
});
