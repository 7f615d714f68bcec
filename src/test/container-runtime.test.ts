import { describe, expect, it } from 'vitest';
import { demuxLogs, isNotFound } from '../services/container-runtime.js';
import { RuntimeNotFoundError } from '../utils/errors.js';

function frame(stream: number, text: string): Buffer {
  const payload = Buffer.from(text, 'utf-8');
  const header = Buffer.alloc(8);
  header[0] = stream;
  header.writeUInt32BE(payload.length, 4);
  return Buffer.concat([header, payload]);
}

describe('demuxLogs', () => {
  it('joins stdout and stderr frames in order', () => {
    const buffer = Buffer.concat([frame(1, 'Starting shard 0\n'), frame(2, 'WARN slow download\n'), frame(1, 'Connected\n')]);

    expect(demuxLogs(buffer)).toBe('Starting shard 0\nWARN slow download\nConnected\n');
  });

  it('returns unframed output unchanged', () => {
    expect(demuxLogs(Buffer.from('plain tty output\n'))).toBe('plain tty output\n');
  });

  it('returns truncated frames unchanged', () => {
    const truncated = frame(1, 'Connected\n').subarray(0, 12);

    expect(demuxLogs(truncated)).toBe(truncated.toString('utf-8'));
  });

  it('handles an empty buffer', () => {
    expect(demuxLogs(Buffer.alloc(0))).toBe('');
  });
});

describe('isNotFound', () => {
  it('recognizes engine 404s and missing resources', () => {
    expect(isNotFound(new RuntimeNotFoundError('container tgi-tests-gpt2-8123'))).toBe(true);
    expect(isNotFound(Object.assign(new Error('no such container'), { statusCode: 404 }))).toBe(true);
    expect(isNotFound(Object.assign(new Error('conflict'), { statusCode: 409 }))).toBe(false);
    expect(isNotFound('404')).toBe(false);
  });
});
