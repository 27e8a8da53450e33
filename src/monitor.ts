import { buildServer } from './api/server.js';
import type { AppConfig } from './config/index.js';
import { FailureDetector } from './services/failureDetector.js';
import { MonitorCycle } from './services/monitorCycle.js';
import { MonitorScheduler } from './services/scheduler.js';
import { SirenController } from './services/siren.js';
import { BuildServerClient } from './teamcity/client.js';
import { configureLogger, getLogger } from './utils/logging.js';

export interface Monitor {
  client: BuildServerClient;
  detector: FailureDetector;
  siren: SirenController;
  cycle: MonitorCycle;
  scheduler: MonitorScheduler;
}

export function createMonitor(cfg: AppConfig, deps?: { fetch?: typeof fetch }): Monitor {
  const m = cfg.monitor;
  const client = new BuildServerClient({
    serverBaseUrl: m.serverBaseUrl,
    contextRoot: m.contextRoot,
    credential: m.credential,
    timeoutMs: m.requestTimeoutMs,
    fetch: deps?.fetch,
  });
  const detector = new FailureDetector(client);
  const siren = new SirenController({ ...m.sirenAddress, timeoutMs: m.sirenTimeoutMs });
  const cycle = new MonitorCycle({
    detector,
    siren,
    suppressAfterHours: m.suppressAfterHours,
    timeZone: m.timeZone,
  });
  const scheduler = new MonitorScheduler(cycle, { intervalSeconds: m.pollIntervalSeconds });
  return { client, detector, siren, cycle, scheduler };
}

export function logStartupParameters(cfg: AppConfig) {
  const m = cfg.monitor;
  const log = getLogger();
  log.info(' ============ Startup Parameters ============ ');
  log.info(`   TeamCity URL: ${m.serverBaseUrl}${m.contextRoot}`);
  log.info(`   Siren Address: ${m.sirenAddress.host}:${m.sirenAddress.port}`);
  log.info(`   Refresh state: every ${m.pollIntervalSeconds} seconds.`);
  log.info(`   Suppress Siren after hours: ${m.suppressAfterHours}`);
  log.info(`   Time zone: ${m.timeZone ?? Intl.DateTimeFormat().resolvedOptions().timeZone}`);
  log.info(' ============================================ ');
}

/**
 * Boots the loop and, when enabled, the health server. The returned stop
 * waits for an in-flight cycle before closing the server.
 */
export async function startMonitor(cfg: AppConfig): Promise<{ stop: () => Promise<void> }> {
  configureLogger(cfg.logging);
  logStartupParameters(cfg);
  const { scheduler } = createMonitor(cfg);
  const server = cfg.http.enabled ? await buildServer({ scheduler }) : null;
  if (server) {
    await server.listen({ port: cfg.http.port, host: cfg.http.host });
  }
  scheduler.start();
  return {
    stop: async () => {
      await scheduler.stop();
      if (server) await server.close();
    },
  };
}

export function stopOnSignals(handle: { stop: () => Promise<void> }) {
  const shutdown = (signal: NodeJS.Signals) => {
    getLogger().info({ signal }, 'Shutting down');
    handle
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        getLogger().error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
