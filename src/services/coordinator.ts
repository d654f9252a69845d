import type { ConfigChangeListener, MeterConfig } from '../types/config.js';
import type {
  ActionOrigin,
  BroadcastEvent,
  BroadcastSink,
  ControlAction,
  ControlHandler,
} from '../types/control.js';
import type {
  ChannelKey,
  Reading,
  ReadingPayload,
  ReadingSink,
} from '../types/reading.js';
import { logError, logInfo, logWarn } from '../utils/logger/index.js';
import { Mutex } from '../utils/mutex.js';
import type { RandomSource } from '../utils/simulator.js';
import type { ConfigStore } from './config.js';
import { MqttService, type MqttServiceOptions } from './mqtt.js';
import { ReadingSource } from './reading-source.js';

const COMPONENT = 'Coordinator';

export interface MeterCoordinatorOptions {
  configStore: ConfigStore;
  broadcast: BroadcastSink;
  mqtt?: Omit<MqttServiceOptions, 'controlHandler' | 'certDir'>;
  random?: RandomSource;
  ipAddress?: string;
}

export function parseControlAction(action: unknown): ControlAction | null {
  if (typeof action !== 'string') return null;
  const normalized = action.trim().toUpperCase();
  return normalized === 'PAUSE' || normalized === 'RESUME' ? normalized : null;
}

function wrapReading(channel: ChannelKey, reading: Reading): ReadingPayload {
  return channel === 'consumed' ? { consumed: reading } : { generated: reading };
}

class ChannelSink implements ReadingSink {
  constructor(
    private readonly coordinator: MeterCoordinator,
    private readonly channel: ChannelKey
  ) {}

  deliver(reading: Reading): Promise<void> {
    return this.coordinator.fanOut(wrapReading(this.channel, reading));
  }
}

class OriginControlHandler implements ControlHandler {
  constructor(
    private readonly coordinator: MeterCoordinator,
    private readonly origin: ActionOrigin
  ) {}

  handleControl(action: string): void {
    this.coordinator.applyAction(action, this.origin);
  }
}

/**
 * Owns the two meter channels and the MQTT client for the life of the
 * process. Config changes, control actions and readings all pass through
 * here.
 */
export class MeterCoordinator implements ConfigChangeListener {
  public readonly consumer: ReadingSource;
  public readonly generator: ReadingSource;
  public readonly bus: MqttService;
  private readonly configStore: ConfigStore;
  private readonly broadcast: BroadcastSink;
  private readonly fanOutLock = new Mutex();

  constructor(options: MeterCoordinatorOptions) {
    this.configStore = options.configStore;
    this.broadcast = options.broadcast;
    const config = this.configStore.all();

    this.consumer = new ReadingSource({
      name: 'Load',
      interval: {
        lower: config.interval_consumed_lower,
        upper: config.interval_consumed_upper,
      },
      sink: new ChannelSink(this, 'consumed'),
      random: options.random,
      ipAddress: options.ipAddress,
    });
    this.generator = new ReadingSource({
      name: 'Generator',
      interval: {
        lower: config.interval_generated_lower,
        upper: config.interval_generated_upper,
      },
      sink: new ChannelSink(this, 'generated'),
      random: options.random,
      ipAddress: options.ipAddress,
    });
    this.bus = new MqttService(config, {
      ...options.mqtt,
      certDir: this.configStore.certDir,
      controlHandler: this.controlHandler('MQTT'),
    });
  }

  public async start(): Promise<void> {
    this.consumer.start();
    this.generator.start();
    await this.bus.startClient();
    this.configStore.onChange(this);
    logInfo(COMPONENT, 'Meter started');
  }

  public async stop(): Promise<void> {
    this.consumer.stop();
    this.generator.stop();
    await this.bus.stopClient();
    logInfo(COMPONENT, 'Meter stopped');
  }

  public controlHandler(origin: ActionOrigin): ControlHandler {
    return new OriginControlHandler(this, origin);
  }

  public async onConfigChange(config: Readonly<MeterConfig>): Promise<void> {
    await this.applyConfig(config);
  }

  public async applyConfig(config: Readonly<MeterConfig>): Promise<void> {
    try {
      logInfo(COMPONENT, 'Applying new configuration');
      this.consumer.setIntervalBounds(
        config.interval_consumed_lower,
        config.interval_consumed_upper
      );
      this.generator.setIntervalBounds(
        config.interval_generated_lower,
        config.interval_generated_upper
      );
      await this.bus.reconfigure(config);
    } catch (error) {
      logError(COMPONENT, 'Error applying configuration', error);
    }
  }

  /** Applies PAUSE or RESUME to both channels; anything else is ignored. */
  public applyAction(action: unknown, origin: ActionOrigin): ControlAction | null {
    const parsed = parseControlAction(action);
    if (!parsed) {
      logWarn(COMPONENT, `Unknown action '${String(action)}' from ${origin}`);
      return null;
    }

    if (parsed === 'PAUSE') {
      this.consumer.pause();
      this.generator.pause();
    } else {
      this.consumer.resume();
      this.generator.resume();
    }
    logInfo(COMPONENT, `Action '${parsed}' executed from ${origin}`);

    this.safeEmit('mqtt_message', { message: `Action: ${parsed} (${origin})` });
    return parsed;
  }

  /** Publish and broadcast one reading; pairs never interleave. */
  public fanOut(payload: ReadingPayload): Promise<void> {
    return this.fanOutLock.runExclusive(async () => {
      await this.bus.safePublish(payload);
      this.safeEmit('meter_reading', payload);
    });
  }

  private safeEmit(event: BroadcastEvent, payload: unknown): void {
    try {
      this.broadcast.emit(event, payload);
    } catch (error) {
      logError(COMPONENT, 'Failed to emit message to clients', error);
    }
  }
}
