import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig, parseByteSize, resolveHubToken } from '../utils/config.js';
import { ConfigError } from '../utils/errors.js';

describe('loadConfig', () => {
  const base = { HF_HOME: '/nonexistent/hf-home' };

  it('applies defaults for an empty environment', () => {
    const config = loadConfig(base);

    expect(config).toEqual({
      baseImage: 'neuronx-tgi:latest',
      dockerSocketPath: '/var/run/docker.sock',
      logLevel: 'info',
      serviceLogLevel: 'info,text_generation_router=debug',
      cacheRepo: 'optimum/neuron-testing-cache',
      containerNamePrefix: 'tgi-tests',
      containerPort: 80,
      devices: ['/dev/neuron0'],
      shmSizeBytes: 1024 * 1024 * 1024,
      healthCheckTimeoutSeconds: 60,
      stopTimeoutSeconds: 60,
      portRange: { min: 8000, max: 10000 },
      requestTimeoutMs: 120_000,
      hubToken: undefined,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      ...base,
      DOCKER_IMAGE: 'my-tgi:dev',
      CONTAINER_DEVICES: '/dev/neuron0, /dev/neuron1,',
      SHM_SIZE: '512m',
      HEALTH_CHECK_TIMEOUT_S: '300',
      PORT_RANGE_MIN: '9000',
      PORT_RANGE_MAX: '9100',
      HF_TOKEN: 'test-token',
    });

    expect(config.baseImage).toBe('my-tgi:dev');
    expect(config.devices).toEqual(['/dev/neuron0', '/dev/neuron1']);
    expect(config.shmSizeBytes).toBe(512 * 1024 * 1024);
    expect(config.healthCheckTimeoutSeconds).toBe(300);
    expect(config.portRange).toEqual({ min: 9000, max: 9100 });
    expect(config.hubToken).toBe('test-token');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ ...base, LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
    expect(() => loadConfig({ ...base, HEALTH_CHECK_TIMEOUT_S: '0' })).toThrow(/HEALTH_CHECK_TIMEOUT_S/);
    expect(() => loadConfig({ ...base, PORT_RANGE_MIN: '9500', PORT_RANGE_MAX: '9000' })).toThrow(
      'PORT_RANGE_MIN must not exceed PORT_RANGE_MAX',
    );
    expect(() => loadConfig({ ...base, SHM_SIZE: 'lots' })).toThrow('Invalid size format: lots');
  });
});

describe('parseByteSize', () => {
  it('parses docker-style sizes', () => {
    expect(parseByteSize('512m')).toBe(512 * 1024 * 1024);
    expect(parseByteSize('1G')).toBe(1024 * 1024 * 1024);
    expect(parseByteSize('2gb')).toBe(2 * 1024 * 1024 * 1024);
    expect(parseByteSize('1024k')).toBe(1024 * 1024);
    expect(parseByteSize('4096')).toBe(4096);
  });

  it('rejects malformed sizes', () => {
    expect(() => parseByteSize('')).toThrow('Invalid size format');
    expect(() => parseByteSize('1.5g')).toThrow('Invalid size format');
    expect(() => parseByteSize('10t')).toThrow('Invalid size format');
  });
});

describe('resolveHubToken', () => {
  let hfHome: string;

  beforeEach(async () => {
    hfHome = await mkdtemp(join(tmpdir(), 'hf-home-'));
  });

  afterEach(async () => {
    await rm(hfHome, { recursive: true, force: true });
  });

  it('prefers HF_TOKEN over the legacy variable and the token file', async () => {
    await writeFile(join(hfHome, 'token'), 'file-token\n');

    expect(resolveHubToken({ HF_HOME: hfHome, HF_TOKEN: 'env-token', HUGGING_FACE_HUB_TOKEN: 'legacy' })).toBe(
      'env-token',
    );
    expect(resolveHubToken({ HF_HOME: hfHome, HUGGING_FACE_HUB_TOKEN: 'legacy' })).toBe('legacy');
  });

  it('falls back to the token file', async () => {
    await writeFile(join(hfHome, 'token'), 'file-token\n');

    expect(resolveHubToken({ HF_HOME: hfHome })).toBe('file-token');
  });

  it('returns undefined when no token is configured', () => {
    expect(resolveHubToken({ HF_HOME: hfHome })).toBeUndefined();
  });
});
