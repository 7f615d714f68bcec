import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { parseCliArgs } from '../cli.js';

describe('parseCliArgs', () => {
  it('applies defaults', () => {
    expect(parseCliArgs(['--service', 'gpt2', '--model', 'gpt2'])).toEqual({
      service: 'gpt2',
      model: 'gpt2',
      trustRemoteCode: false,
      prompt: 'It was a bright cold day in April, and the clocks were striking thirteen.',
      maxNewTokens: 20,
      concurrency: 4,
      timeout: undefined,
      devices: undefined,
      env: [],
      host: 'localhost',
    });
  });

  it('reads every option', () => {
    const options = parseCliArgs([
      '--service', 'local',
      '--model', './models/gpt2',
      '--trust-remote-code',
      '--prompt', 'Hello',
      '--max-new-tokens', '5',
      '--concurrency', '8',
      '--timeout', '120',
      '--device', '/dev/neuron0',
      '--device', '/dev/neuron1',
      '--env', 'HF_BATCH_SIZE=4',
      '--host', '127.0.0.1',
    ]);

    expect(options).toEqual({
      service: 'local',
      model: './models/gpt2',
      trustRemoteCode: true,
      prompt: 'Hello',
      maxNewTokens: 5,
      concurrency: 8,
      timeout: 120,
      devices: ['/dev/neuron0', '/dev/neuron1'],
      env: ['HF_BATCH_SIZE=4'],
      host: '127.0.0.1',
    });
  });

  it('returns help before validating', () => {
    expect(parseCliArgs(['-h'])).toBe('help');
  });

  it('rejects missing and malformed values', () => {
    expect(() => parseCliArgs(['--model', 'gpt2'])).toThrow(ZodError);
    expect(() => parseCliArgs(['--service', 'gpt2', '--model', 'gpt2', '--concurrency', '0'])).toThrow(ZodError);
    expect(() => parseCliArgs(['--service', 'gpt2', '--model', 'gpt2', '--env', 'NOVALUE'])).toThrow('--env expects KEY=VALUE');
  });

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['--service', 'gpt2', '--model', 'gpt2', '--verbose'])).toThrow();
  });
});
