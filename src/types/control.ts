export type ControlAction = 'PAUSE' | 'RESUME';

export type ActionOrigin = 'UI' | 'MQTT';

export type BroadcastEvent = 'meter_reading' | 'mqtt_message';

export interface ControlHandler {
  handleControl(action: string): void;
}

/** Live viewers. Delivery is best effort. */
export interface BroadcastSink {
  emit(event: BroadcastEvent, payload: unknown): void;
}
