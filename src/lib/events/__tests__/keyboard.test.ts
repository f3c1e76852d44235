import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { createKeySource } from '../keyboard.js';

describe('createKeySource', () => {
  it('reads decoded key presses', async () => {
    const stream = new PassThrough();
    const source = createKeySource(stream);
    stream.write('p');
    await expect(source.next()).resolves.toEqual({ type: 'key', code: 'p', ctrl: false, alt: false });
    source.close();
  });

  it('splits a chunk into several events', async () => {
    const stream = new PassThrough();
    const source = createKeySource(stream);
    stream.write(' q');
    await expect(source.next()).resolves.toEqual({ type: 'key', code: 'space', ctrl: false, alt: false });
    await expect(source.next()).resolves.toEqual({ type: 'key', code: 'q', ctrl: false, alt: false });
    source.close();
  });

  it('keeps a character split across reads whole', async () => {
    const stream = new PassThrough();
    const source = createKeySource(stream);
    const bytes = Buffer.from('é', 'utf8');
    stream.write(bytes.subarray(0, 1));
    stream.write(bytes.subarray(1));
    await expect(source.next()).resolves.toEqual({ type: 'key', code: 'é', ctrl: false, alt: false });
    source.close();
  });

  it('reports the end of the stream as closed', async () => {
    const stream = new PassThrough();
    const source = createKeySource(stream);
    stream.end();
    await expect(source.next()).resolves.toEqual({ type: 'closed' });
  });

  it('rejects reads after a stream error', async () => {
    const stream = new PassThrough();
    const source = createKeySource(stream);
    const error = new Error('EIO');
    stream.emit('error', error);
    await expect(source.next()).rejects.toBe(error);
    source.close();
  });

  it('detaches and pauses the stream on close', async () => {
    const stream = new PassThrough();
    const source = createKeySource(stream);
    expect(stream.listenerCount('data')).toBe(1);

    source.close();
    expect(stream.listenerCount('data')).toBe(0);
    expect(stream.listenerCount('error')).toBe(0);
    expect(stream.isPaused()).toBe(true);
    await expect(source.next()).resolves.toEqual({ type: 'closed' });
  });
});
