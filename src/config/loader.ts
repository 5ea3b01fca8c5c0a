import { readFileSync } from 'fs';
import { parse } from 'yaml';
import { z } from 'zod';
import { VALUE_TYPES } from '../codecs/types.js';
import { ConfigError, errorMessage } from '../errors.js';

const valueTypeSchema = z.enum(VALUE_TYPES);

const userAuthSchema = z.object({
  username: z.string(),
  password: z.string(),
});

const certificateAuthSchema = z.object({
  certFile: z.string(),
  privateKeyFile: z.string(),
});

export const mqttConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(1883),
  clientId: z.string().min(1),
  auth: z.union([userAuthSchema, certificateAuthSchema]).optional(),
  caFile: z.string().optional(),
  /** Seconds. */
  connectTimeout: z.number().positive().optional(),
  /** Seconds; MQTT carries keepalive as a 16-bit value. */
  keepAlive: z.number().int().min(0).max(65535).optional(),
});

const influxDbSchema = z.object({
  type: z.literal('influxdb'),
  url: z.string().url(),
  auth: userAuthSchema.optional(),
  token: z.string().optional(),
  org: z.string().default(''),
  dbName: z.string().min(1),
  retentionPolicy: z.string().optional(),
  measurement: z.string().min(1),
});

const databaseSchema = z.discriminatedUnion('type', [influxDbSchema]);

const tagValueSchema = z.object({
  type: valueTypeSchema,
  value: z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v)),
});

const payloadSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('json'),
    valueFieldPath: z.string().min(1),
    timestampFieldPath: z.string().min(1).optional(),
  }),
]);

export const mappingSchema = z.object({
  topic: z.string().min(1),
  payload: payloadSchema.optional(),
  fieldName: z.string().min(1),
  valueType: valueTypeSchema,
  tags: z.record(tagValueSchema).default({}),
});

export const apiConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8080),
  host: z.string().default('0.0.0.0'),
  apiKeys: z.array(z.string().min(1)).default([]),
  tls: z
    .object({
      key: z.string(),
      cert: z.string(),
      ca: z.string().optional(),
    })
    .optional(),
});

export const appConfigSchema = z.object({
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  mqtt: mqttConfigSchema,
  databases: z.array(databaseSchema).min(1),
  api: apiConfigSchema.optional(),
  mappings: z.array(mappingSchema).min(1),
});

export type MqttConfig = z.infer<typeof mqttConfigSchema>;
export type InfluxDbConfig = z.infer<typeof influxDbSchema>;
export type DatabaseConfig = z.infer<typeof databaseSchema>;
export type TagValueConfig = z.infer<typeof tagValueSchema>;
export type PayloadConfig = z.infer<typeof payloadSchema>;
export type MappingConfig = z.infer<typeof mappingSchema>;
export type ApiConfig = z.infer<typeof apiConfigSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

export function parseConfig(raw: unknown): AppConfig {
  const result = appConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError('InvalidConfig', `Invalid configuration: ${issues}`, { cause: result.error });
  }
  return result.data;
}

export function loadConfig(path: string): AppConfig {
  let raw: unknown;
  try {
    raw = parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ConfigError('InvalidConfig', `Unable to read ${path}: ${errorMessage(err)}`, { cause: err });
  }
  return parseConfig(raw);
}
