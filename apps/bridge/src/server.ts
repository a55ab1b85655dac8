#!/usr/bin/env node
import 'dotenv/config';
import { ConfigError } from '@uas-bridge/domain';
import { createLogger, setLogLevel } from '@uas-bridge/adapters';
import { parseCli, toSettingsOverrides } from './config/cli.js';
import { loadSettings, resolveSettingsPath } from './config/settings.js';
import { startBridge } from './services/bridge/bridge.js';

const log = createLogger('server');

async function main() {
  const cli = parseCli(process.argv.slice(2));
  const settingsPath = resolveSettingsPath(cli.config, process.env);
  const config = await loadSettings(settingsPath, toSettingsOverrides(cli), process.env);
  setLogLevel(config.logLevel);
  log.info(`settings loaded from ${settingsPath}`);

  const bridge = await startBridge(config);
  const sinks = [config.amqp && 'AMQP', config.mqtt && 'MQTT'].filter(Boolean).join(' + ');
  log.info(`bridging ${config.mavlink.device} to ${sinks}`);

  const shutdown = (signal: NodeJS.Signals) => {
    bridge.stop(`received ${signal}`).catch((err: unknown) => log.error('shutdown failed', err));
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  await bridge.run();
  await bridge.stop('telemetry source ended');
}

main()
  .then(() => process.exit(0))
  .catch((err: unknown) => {
    if (err instanceof ConfigError) {
      console.error(`[server] ${err.message}`);
    } else {
      console.error('[server] fatal startup error', err);
    }
    process.exit(1);
  });
