import fs from 'node:fs';
import path from 'node:path';
import config from 'config';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type VideoConfig = {
  source: string;
  framesPerSecond: number;
  inputArgs?: string[];
  rtspTransport?: string;
  ffmpegPath?: string;
  startTimeoutMs?: number;
  idleTimeoutMs?: number;
  restartDelayMs?: number;
  restartMaxDelayMs?: number;
  forceKillTimeoutMs?: number;
};

export type MotionConfig = {
  diffThreshold: number;
  minArea: number;
  learningRate?: number;
};

export type PipelineConfig = {
  confirmFrames: number;
  cooldownSeconds: number;
  maxFps: number;
};

export type SnapshotConfig = {
  directory: string;
};

export type AlarmConfig = {
  enabled: boolean;
};

export type WebhookChannelConfig = {
  url: string;
};

export type TelegramChannelConfig = {
  token: string;
  chatId: string;
  apiBaseUrl?: string;
};

export type DiscordChannelConfig = {
  webhookUrl: string;
  username?: string;
};

export type NotifyConfig = {
  webhook: WebhookChannelConfig;
  telegram: TelegramChannelConfig;
  discord: DiscordChannelConfig;
  textTimeoutMs?: number;
  imageTimeoutMs?: number;
};

export type ShutdownConfig = {
  drainTimeoutMs: number;
};

export type SmartCamConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  video: VideoConfig;
  motion: MotionConfig;
  pipeline: PipelineConfig;
  snapshots: SnapshotConfig;
  alarm: AlarmConfig;
  notify: NotifyConfig;
  shutdown?: ShutdownConfig;
};

type DeepPartial<T> = {
  [K in keyof T]?: NonNullable<T[K]> extends unknown[]
    ? NonNullable<T[K]>
    : NonNullable<T[K]> extends object
      ? DeepPartial<NonNullable<T[K]>>
      : T[K];
};

export type SmartCamConfigOverrides = DeepPartial<SmartCamConfig>;

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  exclusiveMinimum?: number;
  maximum?: number;
  integer?: boolean;
};

const timeoutSchema: JsonSchema = { type: 'number', minimum: 0 };

const smartcamConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'video', 'motion', 'pipeline', 'snapshots', 'alarm', 'notify'],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    video: {
      type: 'object',
      required: ['source', 'framesPerSecond'],
      additionalProperties: false,
      properties: {
        source: { type: 'string' },
        framesPerSecond: { type: 'number', exclusiveMinimum: 0 },
        inputArgs: { type: 'array', items: { type: 'string' } },
        rtspTransport: { type: 'string', enum: ['tcp', 'udp', 'http', 'udp_multicast'] },
        ffmpegPath: { type: 'string' },
        startTimeoutMs: timeoutSchema,
        idleTimeoutMs: timeoutSchema,
        restartDelayMs: timeoutSchema,
        restartMaxDelayMs: timeoutSchema,
        forceKillTimeoutMs: timeoutSchema
      }
    },
    motion: {
      type: 'object',
      required: ['diffThreshold', 'minArea'],
      additionalProperties: false,
      properties: {
        diffThreshold: { type: 'number', minimum: 0, maximum: 255 },
        minArea: { type: 'number', minimum: 0, maximum: 1 },
        learningRate: { type: 'number', exclusiveMinimum: 0, maximum: 1 }
      }
    },
    pipeline: {
      type: 'object',
      required: ['confirmFrames', 'cooldownSeconds', 'maxFps'],
      additionalProperties: false,
      properties: {
        confirmFrames: { type: 'number', minimum: 1, integer: true },
        cooldownSeconds: { type: 'number', minimum: 0 },
        maxFps: { type: 'number', exclusiveMinimum: 0 }
      }
    },
    snapshots: {
      type: 'object',
      required: ['directory'],
      additionalProperties: false,
      properties: {
        directory: { type: 'string' }
      }
    },
    alarm: {
      type: 'object',
      required: ['enabled'],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' }
      }
    },
    notify: {
      type: 'object',
      required: ['webhook', 'telegram', 'discord'],
      additionalProperties: false,
      properties: {
        webhook: {
          type: 'object',
          required: ['url'],
          additionalProperties: false,
          properties: {
            url: { type: 'string' }
          }
        },
        telegram: {
          type: 'object',
          required: ['token', 'chatId'],
          additionalProperties: false,
          properties: {
            token: { type: 'string' },
            chatId: { type: 'string' },
            apiBaseUrl: { type: 'string' }
          }
        },
        discord: {
          type: 'object',
          required: ['webhookUrl'],
          additionalProperties: false,
          properties: {
            webhookUrl: { type: 'string' },
            username: { type: 'string' }
          }
        },
        textTimeoutMs: { type: 'number', exclusiveMinimum: 0 },
        imageTimeoutMs: { type: 'number', exclusiveMinimum: 0 }
      }
    },
    shutdown: {
      type: 'object',
      required: ['drainTimeoutMs'],
      additionalProperties: false,
      properties: {
        drainTimeoutMs: timeoutSchema
      }
    }
  }
};

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isPlainObject(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    const additional = schema.additionalProperties;
    if (additional === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (additional && typeof additional === 'object') {
      for (const key of Object.keys(value)) {
        if (definedProperties.has(key)) {
          continue;
        }
        errors.push(...validateAgainstSchema(additional, value[key], `${pathLabel}.${key}`));
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const items = schema.items;
    if (items) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (schema.integer && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.exclusiveMinimum === 'number' && value <= schema.exclusiveMinimum) {
      errors.push(`${pathLabel} must be > ${schema.exclusiveMinimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean') {
    if (typeof value !== 'boolean') {
      errors.push(`${pathLabel} must be a boolean`);
    }
    return errors;
  }

  return errors;
}

function validateLogicalConfig(config: SmartCamConfig) {
  const messages: string[] = [];

  if (config.video.source.trim().length === 0) {
    messages.push('config.video.source must be a non-empty string');
  }

  const { restartDelayMs, restartMaxDelayMs } = config.video;
  if (
    typeof restartDelayMs === 'number' &&
    typeof restartMaxDelayMs === 'number' &&
    restartMaxDelayMs < restartDelayMs
  ) {
    messages.push('config.video.restartMaxDelayMs must be greater than or equal to restartDelayMs');
  }

  if (config.snapshots.directory.trim().length === 0) {
    messages.push('config.snapshots.directory must be a non-empty string');
  }

  const baseUrl = config.notify.telegram.apiBaseUrl;
  if (typeof baseUrl === 'string' && baseUrl.length > 0 && !/^https?:\/\//i.test(baseUrl)) {
    messages.push('config.notify.telegram.apiBaseUrl must be an http(s) URL');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export function validateConfig(config: unknown): asserts config is SmartCamConfig {
  const errors = validateAgainstSchema(smartcamConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  validateLogicalConfig(config as SmartCamConfig);
}

export function parseConfig(contents: string): SmartCamConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`, { cause: error });
  }

  validateConfig(parsed);
  return freezeConfig(parsed);
}

export function loadConfigFromFile(filePath: string): SmartCamConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

/**
 * Reads the layered configuration (default, NODE_ENV specific and
 * environment-variable mappings) resolved by the `config` package.
 */
export function loadConfig(): SmartCamConfig {
  const resolved: unknown = config.util.toObject();
  validateConfig(resolved);
  return freezeConfig(resolved);
}

/**
 * Merges overrides (usually parsed from the command line) on top of a loaded
 * configuration. The result is validated again and frozen.
 */
export function applyConfigOverrides(
  base: SmartCamConfig,
  overrides: SmartCamConfigOverrides
): SmartCamConfig {
  const merged = mergeDeep(cloneValue(base), overrides);
  validateConfig(merged);
  return freezeConfig(merged);
}

export function resolveShutdownConfig(config: SmartCamConfig): ShutdownConfig {
  return config.shutdown ?? { drainTimeoutMs: 2000 };
}

function mergeDeep(target: unknown, source: unknown): unknown {
  if (!isPlainObject(target) || !isPlainObject(source)) {
    return typeof source === 'undefined' ? target : cloneValue(source);
  }

  const result: Record<string, unknown> = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'undefined') {
      continue;
    }
    result[key] = mergeDeep(result[key], value);
  }
  return result;
}

function cloneValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(item => cloneValue(item));
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, cloneValue(entry)]));
  }
  return value;
}

function freezeConfig<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const entry of Object.values(value)) {
      freezeConfig(entry);
    }
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export { smartcamConfigSchema };
