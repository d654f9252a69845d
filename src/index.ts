import { createServer } from 'node:http';
import { WebSocketServer } from 'ws';
import { WebSocketBroadcaster } from './server/broadcaster.js';
import { createApp } from './server/http.js';
import {
  ConfigStore,
  DEFAULT_CERT_DIR,
  DEFAULT_CONFIG_FILE,
  YamlConfigFile,
} from './services/config.js';
import { MeterCoordinator } from './services/coordinator.js';
import { logError, logInfo } from './utils/logger/index.js';

const COMPONENT = 'Main';

const PORT = Number.parseInt(process.env.PORT || '5000', 10);
const CONFIG_FILE = process.env.CONFIG_FILE || DEFAULT_CONFIG_FILE;
const CERT_DIR = process.env.CERT_DIR || DEFAULT_CERT_DIR;

async function main() {
  try {
    const configStore = new ConfigStore({
      backingStore: new YamlConfigFile(CONFIG_FILE),
      certDir: CERT_DIR,
    });
    const config = await configStore.load();

    const server = createServer();
    const broadcaster = new WebSocketBroadcaster(
      new WebSocketServer({ server, path: '/ws' })
    );
    const coordinator = new MeterCoordinator({
      configStore,
      broadcast: broadcaster,
    });
    broadcaster.attach(coordinator.controlHandler('UI'));
    server.on('request', createApp(configStore, coordinator));

    logInfo(COMPONENT, 'Configuration Summary:');
    logInfo(
      COMPONENT,
      `- Load interval: ${config.interval_consumed_lower}-${config.interval_consumed_upper}s`
    );
    logInfo(
      COMPONENT,
      `- Generator interval: ${config.interval_generated_lower}-${config.interval_generated_upper}s`
    );
    logInfo(
      COMPONENT,
      `- MQTT broker: ${config.mqtt_host ? `${config.mqtt_host}:${config.mqtt_port}` : 'not configured'} (publish ${config.mqtt_publish_enabled ? 'enabled' : 'disabled'})`
    );

    await coordinator.start();

    server.listen(PORT, '0.0.0.0', () => {
      logInfo(COMPONENT, `HTTP on http://0.0.0.0:${PORT}, WebSocket on ws://0.0.0.0:${PORT}/ws`);
    });

    const shutdown = () => {
      logInfo(COMPONENT, 'Stopping services...');
      coordinator
        .stop()
        .catch((error) => logError(COMPONENT, 'Error during shutdown', error))
        .finally(() => {
          server.close();
          process.exit(0);
        });
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (error) {
    logError(COMPONENT, 'Service startup error', error);
    process.exit(1);
  }
}

void main();
