import type {
  IntervalBounds,
  Reading,
  ReadingSink,
  SourceState,
} from '../types/reading.js';
import { logDebug, logError, logInfo, logWarn } from '../utils/logger/index.js';
import { getLocalIpAddress } from '../utils/network.js';
import {
  formatTimestamp,
  generateSensorValue,
  roundTo,
  sampleInterval,
  type RandomSource,
} from '../utils/simulator.js';

const COMPONENT = 'ReadingSource';

export const VOLTAGE_RANGE = { min: 210, max: 240 } as const;
export const CURRENT_RANGE = { min: 0.1, max: 10.0 } as const;
export const ERROR_BACKOFF_MS = 1000;

export interface ReadingSourceOptions {
  name: string;
  interval: IntervalBounds;
  sink: ReadingSink;
  random?: RandomSource;
  ipAddress?: string;
  clock?: () => Date;
}

/**
 * One simulated meter channel. Once started, the loop runs until `stop()`;
 * pausing only skips the production step, so `resume()` picks up on the
 * next cycle.
 */
export class ReadingSource {
  public readonly name: string;
  private state: SourceState = 'stopped';
  private loopStarted = false;
  private stopped = false;
  private interval: IntervalBounds;
  private sleepTimer?: NodeJS.Timeout;
  private wake?: () => void;
  private readonly sink: ReadingSink;
  private readonly random: RandomSource;
  private readonly clock: () => Date;
  private readonly ipAddr: string;

  constructor(options: ReadingSourceOptions) {
    this.name = options.name;
    this.interval = { ...options.interval };
    this.sink = options.sink;
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? (() => new Date());
    this.ipAddr = options.ipAddress ?? getLocalIpAddress();
  }

  public getState(): SourceState {
    return this.state;
  }

  public getIntervalBounds(): IntervalBounds {
    return { ...this.interval };
  }

  public setIntervalBounds(lower: number, upper: number): void {
    this.interval = { lower, upper };
    logInfo(COMPONENT, `[${this.name}] Interval set to ${lower}-${upper}s`);
  }

  public start(): void {
    if (this.loopStarted || this.stopped) {
      logWarn(COMPONENT, `[${this.name}] Generation loop already started`);
      return;
    }

    this.loopStarted = true;
    this.state = 'running';
    void this.run();
    logInfo(COMPONENT, `[${this.name}] Generation loop started`);
  }

  public pause(): void {
    if (this.state !== 'running') {
      logDebug(COMPONENT, `[${this.name}] Pause ignored in state ${this.state}`);
      return;
    }
    this.state = 'paused';
    logInfo(COMPONENT, `[${this.name}] Paused`);
  }

  public resume(): void {
    if (this.state !== 'paused') {
      logDebug(COMPONENT, `[${this.name}] Resume ignored in state ${this.state}`);
      return;
    }
    this.state = 'running';
    logInfo(COMPONENT, `[${this.name}] Resumed`);
  }

  /** Ends the loop for good; the source cannot be started again. */
  public stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.state = 'stopped';
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = undefined;
    }
    this.wake?.();
    logInfo(COMPONENT, `[${this.name}] Stopped`);
  }

  public generateReading(): Reading {
    const voltage = generateSensorValue(
      VOLTAGE_RANGE.min,
      VOLTAGE_RANGE.max,
      2,
      this.random
    );
    const current = generateSensorValue(
      CURRENT_RANGE.min,
      CURRENT_RANGE.max,
      2,
      this.random
    );

    return Object.freeze({
      voltage,
      current,
      power: roundTo(voltage * current, 2),
      ipAddr: this.ipAddr,
      timestamp: formatTimestamp(this.clock()),
    });
  }

  private async run(): Promise<void> {
    while (!this.stopped) {
      try {
        if (this.state === 'running') {
          await this.produce();
        }

        const seconds = sampleInterval(
          this.interval.lower,
          this.interval.upper,
          this.random
        );
        logDebug(COMPONENT, `[${this.name}] Sleeping for ${seconds.toFixed(2)}s`);
        await this.sleep(seconds * 1000);
      } catch (error) {
        logError(COMPONENT, `[${this.name}] Generation loop error`, error);
        await this.sleep(ERROR_BACKOFF_MS);
      }
    }
  }

  private async produce(): Promise<void> {
    const reading = this.generateReading();
    logInfo(
      COMPONENT,
      `[${this.name}] Reading: V=${reading.voltage}V, I=${reading.current}A, P=${reading.power}W at ${reading.timestamp}`
    );

    try {
      await this.sink.deliver(reading);
    } catch (error) {
      logError(COMPONENT, `[${this.name}] Delivery error`, error);
    }
  }

  private sleep(ms: number): Promise<void> {
    if (this.stopped) return Promise.resolve();
    return new Promise((resolve) => {
      this.wake = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = undefined;
        this.wake = undefined;
        resolve();
      }, ms);
    });
  }
}
