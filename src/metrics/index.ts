import { Counter, Histogram, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

// outcome: alert|clear|suppressed|failed
export const monitorCyclesTotal = new Counter({
  name: 'monitor_cycles_total',
  help: 'Monitor cycles run, by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const monitorCycleDurationSeconds = new Histogram({
  name: 'monitor_cycle_duration_seconds',
  help: 'Wall time of one monitor cycle (seconds)',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

export const unacknowledgedFailures = new Gauge({
  name: 'unacknowledged_failed_builds',
  help: 'Broken builds nobody has taken responsibility for, as of the last detection',
  registers: [registry],
});

export const buildServerRequestsTotal = new Counter({
  name: 'build_server_requests_total',
  help: 'Build server REST queries, by outcome',
  labelNames: ['outcome'] as const, // success|http_error|transport_error|invalid_document
  registers: [registry],
});

export const sirenCommandsTotal = new Counter({
  name: 'siren_commands_total',
  help: 'Commands sent to the siren, by command and status',
  labelNames: ['command', 'status'] as const,
  registers: [registry],
});

// Poll loop last tick (unix seconds)
export const pollLoopLastTickSeconds = new Gauge({
  name: 'poll_loop_last_tick_seconds',
  help: 'Unix timestamp (seconds) of last poll loop tick',
  registers: [registry],
});

export function metricsSummary() {
  return registry.metrics();
}
