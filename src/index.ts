import { loadConfig } from './config/index.js';
import { startMonitor, stopOnSignals } from './monitor.js';

async function main() {
  const cfg = loadConfig(process.env.BUILD_SIREN_CONFIG);
  stopOnSignals(await startMonitor(cfg));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
