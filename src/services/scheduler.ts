import type { Logger } from 'pino';
import {
  monitorCycleDurationSeconds,
  monitorCyclesTotal,
  pollLoopLastTickSeconds,
} from '../metrics/index.js';
import { getLogger } from '../utils/logging.js';
import type { CycleResult, CycleRunner } from './monitorCycle.js';

export interface SchedulerInfo {
  running: boolean;
  intervalSeconds: number;
  cyclesRun: number;
  cyclesFailed: number;
  lastTickAt: string | null;
  lastOutcome: 'alert' | 'clear' | 'suppressed' | 'failed' | null;
  lastError: string | null;
}

function outcomeOf(result: CycleResult): NonNullable<SchedulerInfo['lastOutcome']> {
  if (!result.ok) return 'failed';
  if (result.value.suppressed) return 'suppressed';
  return result.value.alert ? 'alert' : 'clear';
}

/**
 * Fixed-rate loop: the first cycle fires immediately, later ones every
 * interval measured start to start. The next tick is only armed once the
 * current cycle settles, so cycles never overlap; a slow cycle just delays
 * the next one. Every tick is independent: a failed cycle is logged and the
 * loop carries on, with no retry or backoff.
 */
export class MonitorScheduler {
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private cyclesRun = 0;
  private cyclesFailed = 0;
  private lastTickAt: Date | null = null;
  private lastOutcome: SchedulerInfo['lastOutcome'] = null;
  private lastError: string | null = null;

  constructor(
    private readonly cycle: CycleRunner,
    opts: { intervalSeconds: number; logger?: Logger },
  ) {
    this.intervalMs = opts.intervalSeconds * 1000;
    this.logger = opts.logger ?? getLogger();
  }

  start() {
    if (this.running) return;
    this.running = true;
    // A cycle still settling from before stop() re-arms the loop itself
    if (this.inFlight) return;
    this.arm(0);
  }

  async stop() {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }

  /** Runs one cycle and records its outcome. Never rejects. */
  async runOnce(): Promise<CycleResult | null> {
    const started = Date.now();
    this.lastTickAt = new Date(started);
    pollLoopLastTickSeconds.set(Math.floor(started / 1000));
    try {
      const result = await this.cycle.run();
      this.settle(result);
      return result;
    } catch (err) {
      this.record('failed', err instanceof Error ? err.message : String(err));
      this.logger.fatal({ err }, 'Monitor cycle crashed');
      return null;
    } finally {
      monitorCycleDurationSeconds.observe((Date.now() - started) / 1000);
    }
  }

  info(): SchedulerInfo {
    return {
      running: this.running,
      intervalSeconds: this.intervalMs / 1000,
      cyclesRun: this.cyclesRun,
      cyclesFailed: this.cyclesFailed,
      lastTickAt: this.lastTickAt?.toISOString() ?? null,
      lastOutcome: this.lastOutcome,
      lastError: this.lastError,
    };
  }

  private settle(result: CycleResult) {
    if (result.ok) {
      this.record(outcomeOf(result), null);
      return;
    }
    const { stage, error } = result.error;
    this.record('failed', error.message);
    this.logger.fatal({ err: error, stage, code: error.code }, 'Monitor cycle aborted');
  }

  private record(outcome: NonNullable<SchedulerInfo['lastOutcome']>, error: string | null) {
    this.cyclesRun += 1;
    if (outcome === 'failed') this.cyclesFailed += 1;
    this.lastOutcome = outcome;
    this.lastError = error;
    monitorCyclesTotal.inc({ outcome });
  }

  private arm(delayMs: number) {
    this.timer = setTimeout(() => {
      this.timer = null;
      const tick: Promise<void> = this.tick().finally(() => {
        if (this.inFlight === tick) this.inFlight = null;
      });
      this.inFlight = tick;
    }, delayMs);
  }

  private async tick() {
    const started = Date.now();
    await this.runOnce();
    if (this.running && !this.timer) {
      this.arm(Math.max(0, this.intervalMs - (Date.now() - started)));
    }
  }
}
