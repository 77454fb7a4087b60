import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import {
  applyConfigOverrides,
  loadConfig,
  loadConfigFromFile,
  parseConfig,
  resolveShutdownConfig
} from '../src/config/index.js';

function baseDocument(): Record<string, unknown> {
  return JSON.parse(JSON.stringify(loadConfig()));
}

describe('ConfigLoading', () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('loads layered defaults with the test overrides applied', () => {
    const config = loadConfig();

    expect(config.logging.level).toBe('silent');
    expect(config.alarm.enabled).toBe(false);
    expect(config.pipeline).toEqual({ confirmFrames: 5, cooldownSeconds: 20, maxFps: 8 });
    expect(config.motion).toEqual({ diffThreshold: 25, minArea: 0.01, learningRate: 0.1 });
    expect(Object.isFrozen(config.pipeline)).toBe(true);
  });

  it('reads a configuration file from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'smartcam-config-'));
    tempDirs.push(dir);
    const filePath = path.join(dir, 'smartcam.json');
    const document = baseDocument();
    document.video = { source: 'rtsp://camera.local/stream', framesPerSecond: 10 };
    fs.writeFileSync(filePath, JSON.stringify(document));

    const config = loadConfigFromFile(filePath);

    expect(config.video).toEqual({ source: 'rtsp://camera.local/stream', framesPerSecond: 10 });
  });

  it('rejects malformed JSON', () => {
    expect(() => parseConfig('{')).toThrow(/^Failed to parse configuration: /);
  });

  it('reports every schema violation', () => {
    const document = baseDocument();
    document.pipeline = { confirmFrames: 0, cooldownSeconds: 20, maxFps: 0 };

    expect(() => parseConfig(JSON.stringify(document))).toThrow(
      'config.pipeline.confirmFrames must be >= 1; config.pipeline.maxFps must be > 0'
    );
  });

  it('rejects unknown and missing keys', () => {
    const extra = baseDocument();
    extra.motion = { diffThreshold: 25, minArea: 0.01, extra: true };
    expect(() => parseConfig(JSON.stringify(extra))).toThrow('config.motion.extra is not allowed');

    const missing = baseDocument();
    delete missing.notify;
    expect(() => parseConfig(JSON.stringify(missing))).toThrow('config.notify is required');
  });

  it('requires integer confirmation windows', () => {
    const document = baseDocument();
    document.pipeline = { confirmFrames: 2.5, cooldownSeconds: 20, maxFps: 8 };

    expect(() => parseConfig(JSON.stringify(document))).toThrow('config.pipeline.confirmFrames must be an integer');
  });
});

describe('ConfigOverrides', () => {
  it('merges overrides without touching the base configuration', () => {
    const base = loadConfig();

    const merged = applyConfigOverrides(base, {
      pipeline: { cooldownSeconds: 5 },
      video: { inputArgs: ['-an'] }
    });

    expect(merged.pipeline).toEqual({ confirmFrames: 5, cooldownSeconds: 5, maxFps: 8 });
    expect(merged.video.inputArgs).toEqual(['-an']);
    expect(base.pipeline.cooldownSeconds).toBe(20);
    expect(base.video.inputArgs).toBeUndefined();
    expect(Object.isFrozen(merged)).toBe(true);
  });

  it('validates merged values', () => {
    const base = loadConfig();

    expect(() => applyConfigOverrides(base, { motion: { minArea: 2 } })).toThrow(
      'config.motion.minArea must be <= 1'
    );
    expect(() => applyConfigOverrides(base, { video: { source: '  ' } })).toThrow(
      'config.video.source must be a non-empty string'
    );
  });

  it('rejects a restart ceiling below the initial delay', () => {
    expect(() =>
      applyConfigOverrides(loadConfig(), { video: { restartDelayMs: 1000, restartMaxDelayMs: 500 } })
    ).toThrow('config.video.restartMaxDelayMs must be greater than or equal to restartDelayMs');
  });

  it('requires an http(s) Telegram API base URL', () => {
    expect(() =>
      applyConfigOverrides(loadConfig(), { notify: { telegram: { apiBaseUrl: 'ftp://telegram.example.test' } } })
    ).toThrow('config.notify.telegram.apiBaseUrl must be an http(s) URL');
  });

  it('falls back to the default drain timeout', () => {
    const config = loadConfig();

    expect(resolveShutdownConfig(config)).toEqual({ drainTimeoutMs: 2000 });
    expect(resolveShutdownConfig({ ...config, shutdown: undefined })).toEqual({ drainTimeoutMs: 2000 });
    expect(
      resolveShutdownConfig(applyConfigOverrides(config, { shutdown: { drainTimeoutMs: 50 } }))
    ).toEqual({ drainTimeoutMs: 50 });
  });
});
