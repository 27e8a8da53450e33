#!/usr/bin/env node
import { Command } from 'commander';
import { DEFAULT_CONFIG_FILE, loadConfig, type AppConfig } from '../config/index.js';
import type { SirenCommand } from '../core/types.js';
import { auditMessage } from '../services/responsibilityResolver.js';
import { createMonitor, startMonitor, stopOnSignals } from '../monitor.js';
import { configureLogger } from '../utils/logging.js';

const program = new Command();

program
  .name('build-siren')
  .description('Sounds a siren while TeamCity builds are broken and unclaimed')
  .version('0.1.0')
  .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_FILE);

function configPath(): string {
  return program.opts<{ config?: string }>().config ?? DEFAULT_CONFIG_FILE;
}

function load(): AppConfig {
  const cfg = loadConfig(configPath());
  configureLogger(cfg.logging);
  return cfg;
}

program
  .command('run', { isDefault: true })
  .description('Poll the build server and drive the siren until interrupted')
  .action(async () => {
    stopOnSignals(await startMonitor(loadConfig(configPath())));
  });

program
  .command('check')
  .description('Run one detection pass and print the result as JSON (the siren is not touched)')
  .action(async () => {
    const { detector } = createMonitor(load());
    const report = await detector.detect();
    if (!report.ok) {
      console.error(`${report.error.code}: ${report.error.message}`);
      process.exit(1);
    }
    const { brokenBuilds, verdicts, unacknowledged } = report.value;
    console.log(
      JSON.stringify(
        {
          broken: brokenBuilds.length,
          unacknowledged: unacknowledged.map((b) => b.href),
          builds: verdicts.map((v) => ({
            href: v.buildRef.href,
            name: v.buildTypeName ?? null,
            taken: v.taken,
            state: v.investigationState ?? null,
            summary: auditMessage(v),
          })),
        },
        null,
        2,
      ),
    );
    if (unacknowledged.length > 0) process.exitCode = 2;
  });

program
  .command('siren')
  .argument('<state>', 'on | off')
  .description('Send a single command to the siren')
  .action(async (state: string) => {
    const normalized = state.toLowerCase();
    if (normalized !== 'on' && normalized !== 'off') {
      console.error('state must be "on" or "off"');
      process.exit(2);
    }
    const command: SirenCommand = normalized === 'on' ? 'SIREN_ON' : 'SIREN_OFF';
    const { siren } = createMonitor(load());
    const res = await siren.sendCommand(command);
    if (!res.ok) {
      console.error(res.error.message);
      process.exit(1);
    }
    console.log(`${command} acknowledged by ${siren.address}`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
