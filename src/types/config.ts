import { z } from 'zod';

const intervalBound = z.number().finite().nonnegative();
const optionalText = z.string().nullable().default(null);

const MeterConfigShape = z.object({
  interval_consumed_lower: intervalBound.default(2.0),
  interval_consumed_upper: intervalBound.default(5.0),
  interval_generated_lower: intervalBound.default(2.0),
  interval_generated_upper: intervalBound.default(5.0),
  mqtt_publish_enabled: z.boolean().default(false),
  mqtt_host: optionalText,
  mqtt_port: z.number().int().min(1).max(65535).default(1883),
  mqtt_username: optionalText,
  mqtt_password: optionalText,
  mqtt_cert_filename: optionalText,
  // Off: a CA-signed server certificate is required but its host name may differ
  mqtt_tls_verify_hostname: z.boolean().default(false),
});

export const MeterConfigSchema = MeterConfigShape.superRefine((config, ctx) => {
  if (config.interval_consumed_lower > config.interval_consumed_upper) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['interval_consumed_lower'],
      message: 'Consumed interval lower bound must not exceed the upper bound',
    });
  }
  if (config.interval_generated_lower > config.interval_generated_upper) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['interval_generated_lower'],
      message: 'Generated interval lower bound must not exceed the upper bound',
    });
  }
});

/** Partial update; keys left out keep their stored value. */
export const MeterConfigUpdateSchema = MeterConfigShape.partial();

export type MeterConfig = z.infer<typeof MeterConfigSchema>;

export type MeterConfigKey = keyof MeterConfig;

export type MeterConfigUpdate = z.infer<typeof MeterConfigUpdateSchema>;

export const DEFAULT_CONFIG: Readonly<MeterConfig> = Object.freeze(
  MeterConfigSchema.parse({})
);

export interface ConfigChangeListener {
  onConfigChange(config: Readonly<MeterConfig>): void | Promise<void>;
}

export interface ConfigBackingStore {
  /** Resolves `undefined` when nothing has been stored yet. */
  load(): Promise<unknown>;
  save(config: Readonly<MeterConfig>): Promise<void>;
}
