import { describe, it, expect, afterEach } from 'vitest';
import { buildServer } from '../../src/api/server.js';
import { SirenProtocolError } from '../../src/core/errors.js';
import { fail, ok } from '../../src/core/result.js';
import { monitorCyclesTotal } from '../../src/metrics/index.js';
import type { CycleFailure, CycleReport } from '../../src/services/monitorCycle.js';
import { MonitorScheduler } from '../../src/services/scheduler.js';

type TestServer = Awaited<ReturnType<typeof buildServer>>;
let app: TestServer | null = null;

afterEach(async () => {
  await app?.close();
  app = null;
});

function scheduler() {
  return new MonitorScheduler(
    {
      run: async () =>
        ok<CycleReport>({
          startedAt: new Date(),
          states: ['IDLE', 'CHECKING_HOURS', 'DETECTING', 'DECIDING', 'SIGNALING', 'IDLE'],
          suppressed: false,
          unacknowledged: [],
          alert: false,
          command: 'SIREN_OFF',
        }),
    },
    { intervalSeconds: 10 },
  );
}

describe('health endpoint', () => {
  it('returns ok with monitor loop info', async () => {
    const loop = scheduler();
    await loop.runOnce();
    app = await buildServer({ scheduler: loop });
    const res = await app.inject({ method: 'GET', url: '/healthz' });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe('ok');
    expect(body).toHaveProperty('build.version');
    expect(body.monitor).toMatchObject({
      running: false,
      intervalSeconds: 10,
      cyclesRun: 1,
      cyclesFailed: 0,
      lastOutcome: 'clear',
    });
  });
});

describe('health endpoint after a failed cycle', () => {
  function failingScheduler() {
    const error = new SirenProtocolError('The siren is not working correctly: no response', 'SIREN_OFF');
    return new MonitorScheduler(
      { run: async () => fail<CycleFailure>({ stage: 'SIGNALING', states: [], error }) },
      { intervalSeconds: 60 },
    );
  }

  it('reports degraded while the loop is running', async () => {
    const loop = failingScheduler();
    loop.start();
    await loop.runOnce();
    app = await buildServer({ scheduler: loop });
    try {
      const body = (await app.inject({ method: 'GET', url: '/healthz' })).json();
      expect(body.status).toBe('degraded');
      expect(body.monitor).toMatchObject({
        running: true,
        lastOutcome: 'failed',
        lastError: 'The siren is not working correctly: no response',
      });
    } finally {
      await loop.stop();
    }
  });

  it('reports ok once the loop is stopped', async () => {
    const loop = failingScheduler();
    await loop.runOnce();
    app = await buildServer({ scheduler: loop });
    const body = (await app.inject({ method: 'GET', url: '/healthz' })).json();
    expect(body.status).toBe('ok');
    expect(body.monitor.lastOutcome).toBe('failed');
  });
});

describe('metrics endpoint', () => {
  it('exposes cycle counters in Prometheus format', async () => {
    const loop = scheduler();
    await loop.runOnce();
    app = await buildServer({ scheduler: loop });
    const res = await app.inject({ method: 'GET', url: '/metrics' });
    expect(res.statusCode).toBe(200);
    const { values } = await monitorCyclesTotal.get();
    const clear = values.find((v) => v.labels.outcome === 'clear')?.value;
    expect(clear).toBeGreaterThanOrEqual(1);
    expect(res.body).toContain(`monitor_cycles_total{outcome="clear"} ${clear}`);
    expect(res.body).toContain('# TYPE monitor_cycle_duration_seconds histogram');
  });
});
