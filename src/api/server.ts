import Fastify from 'fastify';
import { getLogger } from '../utils/logging.js';
import { metricsSummary, registry } from '../metrics/index.js';
import type { MonitorScheduler } from '../services/scheduler.js';

export async function buildServer(opts: { scheduler: MonitorScheduler }) {
  const app = Fastify({ logger: getLogger() });
  const { scheduler } = opts;

  app.get('/healthz', async () => {
    const loop = scheduler.info();
    return {
      status: loop.running && loop.lastOutcome === 'failed' ? 'degraded' : 'ok',
      time: new Date().toISOString(),
      build: {
        version: process.env.npm_package_version || 'dev',
        node: process.version,
      },
      monitor: loop,
    };
  });

  app.get('/metrics', async (_req, reply) => {
    const body = await metricsSummary();
    reply.header('Content-Type', registry.contentType);
    return reply.send(body);
  });

  app.setErrorHandler((error, _req, reply) => {
    app.log.error({ err: error }, 'Unhandled error');
    return reply
      .status(500)
      .send({ error: { code: 'INTERNAL', message: 'Internal Server Error' } });
  });

  return app;
}
