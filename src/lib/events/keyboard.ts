import type { Readable } from 'node:stream';
import { decodeKeys } from '../terminal/index.js';
import type { InputEvent } from '../terminal/index.js';
import { AsyncQueue } from './queue.js';
import type { InputSource } from './types.js';

/**
 * Read key presses from a raw-mode stream such as `process.stdin`.
 * Raw mode itself is switched by the terminal, not here.
 */
export function createKeySource(stream: Readable): InputSource {
  const queue = new AsyncQueue<InputEvent>();

  // The stream's decoder holds back a character split across reads.
  const onData = (chunk: string) => {
    for (const event of decodeKeys(chunk)) queue.push(event);
  };
  const onEnd = () => queue.close();
  const onError = (err: Error) => queue.fail(err);

  function detach() {
    stream.off('data', onData);
    stream.off('end', onEnd);
    stream.off('close', onEnd);
    stream.off('error', onError);
  }

  stream.setEncoding('utf8');
  stream.on('data', onData);
  stream.on('end', onEnd);
  stream.on('close', onEnd);
  stream.on('error', onError);
  stream.resume();

  return {
    async next() {
      const result = await queue.next();
      return result.done ? { type: 'closed' } : result.value;
    },
    close() {
      detach();
      stream.pause();
      queue.close();
    },
  };
}
