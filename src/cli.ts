import fs from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, isLogLevel } from './logger.js';
import {
  applyConfigOverrides,
  loadConfig,
  loadConfigFromFile,
  type SmartCamConfig,
  type SmartCamConfigOverrides
} from './config/index.js';
import { startSmartCam, type SmartCamRuntime, type SmartCamStartOptions } from './run-smartcam.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

type SignalSource = {
  once(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
};

export type CliDependencies = {
  start?: (options: SmartCamStartOptions) => SmartCamRuntime;
  signals?: SignalSource;
};

export type CliArgs = {
  configPath: string | null;
  overrides: SmartCamConfigOverrides;
  help: boolean;
  version: boolean;
};

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };
const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

const USAGE_LINES = [
  'SmartCam motion alerts',
  '',
  'Usage:',
  '  smartcam [options]',
  '',
  'Options:',
  '  --config <file>            Load configuration from a JSON file instead of config/',
  '  --source <src>             Camera index, video file or stream URL (default: 0)',
  '  --min-area <ratio>         Fraction of the frame that must change (default: 0.01)',
  '  --min-motion-frames <n>    Consecutive motion frames needed to confirm (default: 5)',
  '  --cooldown <seconds>       Minimum seconds between alerts (default: 20)',
  '  --save-dir <dir>           Directory for event snapshots (default: events)',
  '  --max-fps <fps>            Maximum frames evaluated per second (default: 8)',
  '  --no-alarm                 Disable the local audible alarm',
  '  --webhook-url <url>        Generic JSON webhook',
  '  --telegram-token <token>   Telegram bot token',
  '  --telegram-chat-id <id>    Telegram chat id',
  '  --discord-webhook <url>    Discord webhook URL',
  '  --log-level <level>        Log level',
  '  -h, --help                 Show this help',
  '  -v, --version              Print the version'
];

type ValueFlag = {
  apply: (overrides: SmartCamConfigOverrides, value: string, flag: string) => void;
};

function parseNumber(flag: string, value: string, options: { integer?: boolean } = {}) {
  const parsed = Number(value);
  if (value.trim().length === 0 || !Number.isFinite(parsed)) {
    throw new CliUsageError(`Invalid number for ${flag}: ${value}`);
  }
  if (options.integer && !Number.isInteger(parsed)) {
    throw new CliUsageError(`Expected an integer for ${flag}: ${value}`);
  }
  return parsed;
}

const VALUE_FLAGS: Record<string, ValueFlag> = {
  '--source': {
    apply: (overrides, value) => {
      overrides.video = { ...overrides.video, source: value };
    }
  },
  '--min-area': {
    apply: (overrides, value, flag) => {
      overrides.motion = { ...overrides.motion, minArea: parseNumber(flag, value) };
    }
  },
  '--min-motion-frames': {
    apply: (overrides, value, flag) => {
      overrides.pipeline = {
        ...overrides.pipeline,
        confirmFrames: parseNumber(flag, value, { integer: true })
      };
    }
  },
  '--cooldown': {
    apply: (overrides, value, flag) => {
      overrides.pipeline = { ...overrides.pipeline, cooldownSeconds: parseNumber(flag, value) };
    }
  },
  '--max-fps': {
    apply: (overrides, value, flag) => {
      overrides.pipeline = { ...overrides.pipeline, maxFps: parseNumber(flag, value) };
    }
  },
  '--save-dir': {
    apply: (overrides, value) => {
      overrides.snapshots = { ...overrides.snapshots, directory: value };
    }
  },
  '--webhook-url': {
    apply: (overrides, value) => {
      overrides.notify = { ...overrides.notify, webhook: { url: value } };
    }
  },
  '--telegram-token': {
    apply: (overrides, value) => {
      overrides.notify = {
        ...overrides.notify,
        telegram: { ...overrides.notify?.telegram, token: value }
      };
    }
  },
  '--telegram-chat-id': {
    apply: (overrides, value) => {
      overrides.notify = {
        ...overrides.notify,
        telegram: { ...overrides.notify?.telegram, chatId: value }
      };
    }
  },
  '--discord-webhook': {
    apply: (overrides, value) => {
      overrides.notify = {
        ...overrides.notify,
        discord: { ...overrides.notify?.discord, webhookUrl: value }
      };
    }
  },
  '--log-level': {
    apply: (overrides, value, flag) => {
      if (!isLogLevel(value)) {
        throw new CliUsageError(
          `Invalid value for ${flag}: ${value} (available: ${getAvailableLogLevels().join(', ')})`
        );
      }
      overrides.logging = { level: value.trim().toLowerCase() };
    }
  }
};

export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { configPath: null, overrides: {}, help: false, version: false };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    const [flag, inlineValue] = splitInlineValue(token);

    if (flag === '--help' || flag === '-h') {
      result.help = true;
      continue;
    }
    if (flag === '--version' || flag === '-v') {
      result.version = true;
      continue;
    }
    if (flag === '--no-alarm') {
      if (inlineValue !== null) {
        throw new CliUsageError('--no-alarm does not take a value');
      }
      result.overrides.alarm = { enabled: false };
      continue;
    }

    const isConfigFlag = flag === '--config';
    const handler = VALUE_FLAGS[flag];
    if (!isConfigFlag && !handler) {
      throw new CliUsageError(`Unknown option: ${token}`);
    }

    let value = inlineValue;
    if (value === null) {
      const next = argv[index + 1];
      if (next === undefined || (next.startsWith('--') && next.length > 2)) {
        throw new CliUsageError(`Missing value for ${flag}`);
      }
      value = next;
      index += 1;
    }

    if (isConfigFlag) {
      result.configPath = value;
    } else {
      handler.apply(result.overrides, value, flag);
    }
  }

  return result;
}

function splitInlineValue(token: string): [string, string | null] {
  if (!token.startsWith('--')) {
    return [token, null];
  }
  const separator = token.indexOf('=');
  if (separator === -1) {
    return [token, null];
  }
  return [token.slice(0, separator), token.slice(separator + 1)];
}

export function readPackageVersion(): string {
  const candidates = ['../package.json', '../../package.json'];
  for (const candidate of candidates) {
    const filePath = fileURLToPath(new URL(candidate, import.meta.url));
    if (!fs.existsSync(filePath)) {
      continue;
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  }
  return '0.0.0';
}

export function resolveConfig(args: CliArgs): SmartCamConfig {
  const base = args.configPath ? loadConfigFromFile(args.configPath) : loadConfig();
  return applyConfigOverrides(base, args.overrides);
}

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  dependencies: CliDependencies = {}
): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.stderr.write(`${error.message}\n\n${USAGE_LINES.join('\n')}\n`);
      return 1;
    }
    throw error;
  }

  if (args.help) {
    io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
    return 0;
  }

  if (args.version) {
    io.stdout.write(`${readPackageVersion()}\n`);
    return 0;
  }

  let config: SmartCamConfig;
  try {
    config = resolveConfig(args);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Invalid configuration: ${message}\n`);
    return 1;
  }

  const start = dependencies.start ?? startSmartCam;
  const signals = dependencies.signals ?? process;

  let runtime: SmartCamRuntime;
  try {
    runtime = start({ config });
  } catch (error) {
    logger.error({ err: error }, 'SmartCam failed to start');
    io.stderr.write('SmartCam failed to start. Check logs for details.\n');
    return 1;
  }

  const handleSignal = () => {
    logger.info('Stopping SmartCam');
    void runtime.stop().catch(error => {
      logger.error({ err: error }, 'Error during shutdown');
    });
  };
  for (const signal of SHUTDOWN_SIGNALS) {
    signals.once(signal, handleSignal);
  }

  try {
    await runtime.done;
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`SmartCam stopped: ${message}\n`);
    return 1;
  } finally {
    for (const signal of SHUTDOWN_SIGNALS) {
      signals.off(signal, handleSignal);
    }
    await runtime.stop();
  }
}

function isEntryPoint() {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return fs.realpathSync(path.resolve(entry)) === fs.realpathSync(fileURLToPath(import.meta.url));
  } catch (error) {
    logger.debug({ err: error }, 'Unable to resolve entry point');
    return false;
  }
}

if (process.env.SMARTCAM_DISABLE_AUTO_START !== '1' && isEntryPoint()) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'SmartCam CLI failed');
      process.exit(1);
    }
  );
}
