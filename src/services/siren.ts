import net from 'net';
import { SirenProtocolError } from '../core/errors.js';
import { fail, ok, type Result } from '../core/result.js';
import type { SirenCommand } from '../core/types.js';
import { sirenCommandsTotal } from '../metrics/index.js';
import { getLogger } from '../utils/logging.js';

export const SIREN_ACK = 'OK';

export interface SirenSignal {
  sendCommand(command: SirenCommand): Promise<Result<void, SirenProtocolError>>;
}

export interface SirenAddress {
  host: string;
  port: number;
}

export interface SirenControllerOptions extends SirenAddress {
  /** 0 or undefined means wait indefinitely for the response line. */
  timeoutMs?: number;
}

/**
 * One TCP session per command: write `COMMAND\n`, read a single line, close.
 * Anything but a literal `OK` leaves the device state unknown.
 */
export class SirenController implements SirenSignal {
  constructor(private readonly opts: SirenControllerOptions) {}

  get address(): string {
    return `${this.opts.host}:${this.opts.port}`;
  }

  async sendCommand(command: SirenCommand): Promise<Result<void, SirenProtocolError>> {
    let line: string | undefined;
    try {
      line = await this.exchange(`${command}\n`);
    } catch (err) {
      sirenCommandsTotal.inc({ command, status: 'unreachable' });
      const reason = err instanceof Error ? err.message : String(err);
      return fail(
        new SirenProtocolError(`Siren at ${this.address} failed: ${reason}`, command, undefined, err),
      );
    }
    if (line !== SIREN_ACK) {
      sirenCommandsTotal.inc({ command, status: 'rejected' });
      const got = line === undefined ? 'no response' : `response "${line}"`;
      return fail(
        new SirenProtocolError(`The siren is not working correctly: ${got}`, command, line),
      );
    }
    sirenCommandsTotal.inc({ command, status: 'ok' });
    getLogger().debug({ command, siren: this.address }, 'siren-ack');
    return ok(undefined);
  }

  /** Resolves with the first line, or undefined if the peer closes without one. */
  private exchange(payload: string): Promise<string | undefined> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: this.opts.host, port: this.opts.port });
      let buffered = '';
      let settled = false;
      const finish = (err: Error | null, line?: string) => {
        if (settled) return;
        settled = true;
        socket.destroy();
        if (err) reject(err);
        else resolve(line);
      };

      const timeoutMs = this.opts.timeoutMs ?? 0;
      if (timeoutMs > 0) {
        socket.setTimeout(timeoutMs, () =>
          finish(new Error(`no response within ${timeoutMs}ms`)),
        );
      }
      socket.on('connect', () => {
        socket.write(payload);
      });
      socket.setEncoding('utf8');
      socket.on('data', (chunk: string) => {
        buffered += chunk;
        const eol = buffered.indexOf('\n');
        if (eol !== -1) finish(null, buffered.slice(0, eol).replace(/\r$/, ''));
      });
      // A final line without a terminator still counts, like a line reader at EOF
      socket.on('end', () => finish(null, buffered === '' ? undefined : buffered.replace(/\r$/, '')));
      socket.on('close', () => finish(null, undefined));
      socket.on('error', (err) => finish(err));
    });
  }
}
