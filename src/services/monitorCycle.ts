import type { Logger } from 'pino';
import type { MonitorError } from '../core/errors.js';
import { fail, ok, type Result } from '../core/result.js';
import type { BrokenBuildRef, CycleState, SirenCommand } from '../core/types.js';
import { unacknowledgedFailures } from '../metrics/index.js';
import { getLogger } from '../utils/logging.js';
import { isSuppressed } from './afterHours.js';
import type { UnacknowledgedFailureSource } from './failureDetector.js';
import type { SirenSignal } from './siren.js';

export interface CycleReport {
  startedAt: Date;
  states: CycleState[];
  suppressed: boolean;
  unacknowledged: BrokenBuildRef[];
  alert: boolean;
  command: SirenCommand;
}

export interface CycleFailure {
  stage: 'DETECTING' | 'SIGNALING';
  states: CycleState[];
  error: MonitorError;
}

export type CycleResult = Result<CycleReport, CycleFailure>;

export interface CycleRunner {
  run(): Promise<CycleResult>;
}

export interface MonitorCycleOptions {
  detector: UnacknowledgedFailureSource;
  siren: SirenSignal;
  suppressAfterHours: boolean;
  timeZone?: string;
  clock?: () => Date;
  logger?: Logger;
}

export function decideAlert(unacknowledged: readonly BrokenBuildRef[]): boolean {
  return unacknowledged.length > 0;
}

export function commandFor(alert: boolean): SirenCommand {
  return alert ? 'SIREN_ON' : 'SIREN_OFF';
}

function signalMessage(alert: boolean, suppressed: boolean): string {
  if (alert) return 'Builds are failing. Siren ON.';
  return suppressed ? 'After hours. Siren OFF.' : 'There are no failed builds. Siren OFF.';
}

/**
 * One pass of IDLE → CHECKING_HOURS → (SUPPRESSED | DETECTING → DECIDING)
 * → SIGNALING → IDLE. Holds no state between runs.
 */
export class MonitorCycle implements CycleRunner {
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(private readonly opts: MonitorCycleOptions) {
    this.clock = opts.clock ?? (() => new Date());
    this.logger = opts.logger ?? getLogger();
  }

  async run(): Promise<CycleResult> {
    const startedAt = this.clock();
    const states: CycleState[] = ['IDLE', 'CHECKING_HOURS'];

    let suppressed = false;
    let unacknowledged: BrokenBuildRef[] = [];
    if (this.opts.suppressAfterHours && isSuppressed(startedAt, this.opts.timeZone)) {
      states.push('SUPPRESSED');
      suppressed = true;
      this.logger.info('Suppressing siren operation, it is after hours');
    } else {
      states.push('DETECTING');
      const detected = await this.opts.detector.detectUnacknowledgedFailures();
      if (!detected.ok) {
        return fail<CycleFailure>({ stage: 'DETECTING', states, error: detected.error });
      }
      unacknowledged = detected.value;
      unacknowledgedFailures.set(unacknowledged.length);
      states.push('DECIDING');
    }

    const alert = !suppressed && decideAlert(unacknowledged);
    if (alert) {
      this.logger.info(
        { builds: unacknowledged.map((b) => b.href) },
        `Detected ${unacknowledged.length} failed builds that no one took responsibility for! Red Alert!`,
      );
    }
    const command = commandFor(alert);
    this.logger.info({ command }, signalMessage(alert, suppressed));

    states.push('SIGNALING');
    const signalled = await this.opts.siren.sendCommand(command);
    if (!signalled.ok) {
      return fail<CycleFailure>({ stage: 'SIGNALING', states, error: signalled.error });
    }
    states.push('IDLE');
    return ok({ startedAt, states, suppressed, unacknowledged, alert, command });
  }
}
