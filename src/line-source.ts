/**
 * Line sources: where input requests get their text from
 *
 * A source yields one line per readLine() call and rejects with a
 * StreamError once the input has ended or failed. An empty line is a
 * normal line, not the end of input.
 */

import { createInterface } from 'node:readline';
import { StreamError, toStreamError } from './errors.js';

export interface LineSource {
  /** Resolve with the next line, or reject with a StreamError */
  readLine(): Promise<string>;
  /** Release the underlying stream, if any */
  close?(): void;
}

/**
 * Read lines from a readable stream (stdin by default) through node:readline.
 * Line terminators are removed by readline.
 */
export function createReadlineSource(input: NodeJS.ReadableStream = process.stdin): LineSource {
  const rl = createInterface({ input, terminal: false, crlfDelay: Infinity });
  // Create the iterator up front so lines arriving before the first read are buffered
  const lines = rl[Symbol.asyncIterator]();
  let ended = false;

  return {
    async readLine() {
      if (ended) {
        throw new StreamError('end_of_input');
      }
      let next: IteratorResult<string>;
      try {
        next = await lines.next();
      } catch (err) {
        ended = true;
        throw toStreamError(err);
      }
      if (next.done) {
        ended = true;
        throw new StreamError('end_of_input');
      }
      return next.value;
    },
    close() {
      ended = true;
      rl.close();
    },
  };
}

/**
 * Serve a fixed list of lines, then report end of input.
 * Useful for scripted answers and tests.
 */
export function createScriptedSource(lines: Iterable<string>): LineSource & { remaining(): number } {
  const queue = Array.from(lines);
  let position = 0;

  return {
    async readLine() {
      if (position >= queue.length) {
        throw new StreamError('end_of_input');
      }
      return queue[position++];
    },
    remaining() {
      return queue.length - position;
    },
  };
}
