import { randomBytes } from 'node:crypto';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { ConnectionOptions } from 'node:tls';
import mqtt, { type IClientOptions } from 'mqtt';
import type { MeterConfig } from '../types/config.js';
import type { ControlHandler } from '../types/control.js';
import { logDebug, logError, logInfo, logWarn } from '../utils/logger/index.js';
import { Mutex } from '../utils/mutex.js';
import { DEFAULT_CERT_DIR } from './config.js';

const COMPONENT = 'MqttService';

export const PUB_TOPIC = 'mock/energy_meter/id001/data';
export const SUB_TOPIC = 'mock/energy_meter/id001/control';
export const CONNECT_TIMEOUT_MS = 10_000;

/** The part of an MQTT client this service relies on. */
export interface BusConnection {
  readonly connected: boolean;
  on(event: 'connect', listener: () => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'offline', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(
    event: 'message',
    listener: (topic: string, payload: Buffer) => void
  ): unknown;
  removeListener(event: 'connect', listener: () => void): unknown;
  removeListener(event: 'error', listener: (error: Error) => void): unknown;
  subscribeAsync(topic: string): Promise<unknown>;
  publishAsync(topic: string, message: string): Promise<unknown>;
  endAsync(force?: boolean): Promise<void>;
}

export type MqttClientOptions = IClientOptions &
  Pick<ConnectionOptions, 'checkServerIdentity'>;

export type BusConnector = (
  brokerUrl: string,
  options: MqttClientOptions
) => BusConnection;

interface BusSession {
  readonly connection: BusConnection;
  readonly config: Readonly<MeterConfig>;
  readonly clientId: string;
}

export interface MqttServiceOptions {
  controlHandler?: ControlHandler;
  connector?: BusConnector;
  certDir?: string;
  connectTimeoutMs?: number;
}

const defaultConnector: BusConnector = (brokerUrl, options) =>
  mqtt.connect(brokerUrl, options);

export class MqttService {
  private session?: BusSession;
  private readonly lock = new Mutex();
  private readonly connector: BusConnector;
  private readonly certDir: string;
  private readonly connectTimeoutMs: number;
  private readonly controlHandler?: ControlHandler;

  constructor(
    private config: Readonly<MeterConfig>,
    options: MqttServiceOptions = {}
  ) {
    this.connector = options.connector ?? defaultConnector;
    this.certDir = options.certDir ?? DEFAULT_CERT_DIR;
    this.connectTimeoutMs = options.connectTimeoutMs ?? CONNECT_TIMEOUT_MS;
    this.controlHandler = options.controlHandler;
  }

  public startClient(): Promise<void> {
    return this.lock.runExclusive(() => this.start());
  }

  public stopClient(): Promise<void> {
    return this.lock.runExclusive(() => this.stop());
  }

  /** Replaces the whole session: the connection has no in-place update. */
  public reconfigure(config: Readonly<MeterConfig>): Promise<void> {
    return this.lock.runExclusive(async () => {
      await this.stop();
      this.config = config;
      await this.start();
    });
  }

  public isConnected(): boolean {
    return this.session?.connection.connected ?? false;
  }

  /**
   * Publishes on whichever session is live right now. Runs outside the lock
   * so a pending connect never holds up the reading feed.
   */
  public async safePublish(payload: unknown): Promise<void> {
    if (!this.config.mqtt_publish_enabled) return;

    const connection = this.session?.connection;
    if (!connection?.connected) {
      logWarn(COMPONENT, 'Cannot publish: not connected to MQTT broker');
      return;
    }

    try {
      const message =
        typeof payload === 'string' ? payload : JSON.stringify(payload);
      logInfo(COMPONENT, `MQTT outbound: ${message}`);
      await connection.publishAsync(PUB_TOPIC, message);
    } catch (error) {
      logError(COMPONENT, `Error publishing to topic ${PUB_TOPIC}`, error);
    }
  }

  private async start(): Promise<void> {
    await this.stop();

    const config = this.config;
    const host = config.mqtt_host?.trim();
    if (!host) {
      logWarn(COMPONENT, 'MQTT host not configured, skipping MQTT startup');
      return;
    }

    const clientId = `mock-meter-${randomBytes(4).toString('hex')}`;
    const options: MqttClientOptions = {
      clientId,
      clean: true,
      keepalive: 60,
      reconnectPeriod: 2000,
      connectTimeout: this.connectTimeoutMs,
    };

    if (config.mqtt_username || config.mqtt_password) {
      options.username = config.mqtt_username ?? '';
      options.password = config.mqtt_password ?? '';
    }

    const secure = this.applyTls(config, options);
    const brokerUrl = `${secure ? 'mqtts' : 'mqtt'}://${host}:${config.mqtt_port}`;

    let connection: BusConnection | undefined;
    try {
      connection = this.connector(brokerUrl, options);
      this.setupEventHandlers(connection);
      await this.waitForConnect(connection);
      this.session = { connection, config, clientId };
      logInfo(
        COMPONENT,
        `Connected to MQTT broker ${host}:${config.mqtt_port} (client id ${clientId})`
      );
    } catch (error) {
      logError(COMPONENT, `MQTT connection to ${brokerUrl} failed`, error);
      if (connection) {
        await this.endQuietly(connection);
      }
    }
  }

  private async stop(): Promise<void> {
    const session = this.session;
    try {
      if (session) {
        await session.connection.endAsync();
        logInfo(COMPONENT, 'MQTT client stopped');
      }
    } catch (error) {
      logError(COMPONENT, 'MQTT stop failed', error);
    } finally {
      this.session = undefined;
    }
  }

  private applyTls(
    config: Readonly<MeterConfig>,
    options: MqttClientOptions
  ): boolean {
    const certFilename = config.mqtt_cert_filename;
    const certPath = certFilename ? join(this.certDir, certFilename) : undefined;
    if (!certPath || !existsSync(certPath)) {
      logInfo(COMPONENT, 'No MQTT certificate found, connecting without TLS');
      return false;
    }

    try {
      options.ca = readFileSync(certPath);
      options.rejectUnauthorized = true;
      if (!config.mqtt_tls_verify_hostname) {
        options.checkServerIdentity = () => undefined;
      }
      logInfo(COMPONENT, `TLS enabled using cert: ${certPath}`);
      return true;
    } catch (error) {
      logError(COMPONENT, 'Failed to set up TLS, connecting without it', error);
      return false;
    }
  }

  private setupEventHandlers(connection: BusConnection): void {
    connection.on('connect', () => {
      logInfo(COMPONENT, 'Connected to MQTT broker');
      void this.subscribeControl(connection);
    });

    connection.on('close', () => {
      logWarn(COMPONENT, 'MQTT connection closed');
    });

    connection.on('offline', () => {
      logWarn(COMPONENT, 'MQTT connection offline');
    });

    connection.on('error', (error) => {
      logError(COMPONENT, 'MQTT connection error', error);
    });

    connection.on('message', (topic, payload) => {
      this.handleMessage(topic, payload);
    });
  }

  private async subscribeControl(connection: BusConnection): Promise<void> {
    try {
      await connection.subscribeAsync(SUB_TOPIC);
      logInfo(COMPONENT, `Subscribed to ${SUB_TOPIC}`);
    } catch (error) {
      logError(COMPONENT, `Failed to subscribe to ${SUB_TOPIC}`, error);
    }
  }

  private handleMessage(topic: string, payload: Buffer): void {
    const message = payload.toString('utf8');
    logInfo(COMPONENT, `MQTT received on ${topic}: ${message}`);
    if (!this.controlHandler) return;

    try {
      this.controlHandler.handleControl(message);
    } catch (error) {
      logError(COMPONENT, 'Message callback error', error);
    }
  }

  private waitForConnect(connection: BusConnection): Promise<void> {
    if (connection.connected) return Promise.resolve();

    return new Promise((resolve, reject) => {
      let settled = false;
      const timeout = setTimeout(() => {
        settle(new Error('Connection timeout'));
      }, this.connectTimeoutMs);

      const onConnect = () => settle();
      const onError = (error: Error) => settle(error);

      const settle = (error?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        connection.removeListener('connect', onConnect);
        connection.removeListener('error', onError);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      connection.on('connect', onConnect);
      connection.on('error', onError);
    });
  }

  private async endQuietly(connection: BusConnection): Promise<void> {
    try {
      await connection.endAsync(true);
    } catch (error) {
      logDebug(COMPONENT, 'Ending failed MQTT client raised', { err: error });
    }
  }
}
