/**
 * Prompt-parse-retry loop
 *
 * Each attempt writes the prompt, reads one line, strips it and parses it.
 * A parse failure runs the error handler and starts over with the same
 * prompt; a line source failure ends the request with a StreamError.
 */

import { AttemptsExhaustedError, toStreamError } from './errors.js';
import type { InputEmitter } from './events.js';
import type { LineSource } from './line-source.js';
import type { ErrorHandler, OutputChannel, ParseFailure, Parser } from './types.js';

/**
 * Everything one request needs besides its parser and prompt
 */
export interface EngineContext {
  lineSource: LineSource;
  output: OutputChannel;
  onError: ErrorHandler;
  emitter: InputEmitter;
  showType: boolean;
  trim: boolean;
  maxAttempts: number | undefined;
}

const LINE_TERMINATOR = /\r?\n$/;

/**
 * Text written before each read. An empty prompt writes nothing.
 */
export function formatPrompt(prompt: string, expected: string, showType: boolean): string {
  if (prompt === '' || !showType) return prompt;
  return `${prompt} (${expected}): `;
}

/**
 * Remove the line terminator and, when trimming, surrounding whitespace
 */
export function normalizeLine(line: string, trim: boolean): string {
  const stripped = line.replace(LINE_TERMINATOR, '');
  return trim ? stripped.trim() : stripped;
}

/**
 * Prompt until the parser accepts a line.
 *
 * Retries are unbounded unless `maxAttempts` is set.
 *
 * @throws StreamError when the line source ends or fails
 * @throws AttemptsExhaustedError when `maxAttempts` failed parses have occurred
 */
export async function requestValue<T>(parser: Parser<T>, prompt: string, ctx: EngineContext): Promise<T> {
  const promptText = formatPrompt(prompt, parser.name, ctx.showType);

  for (let attempt = 1; ; attempt++) {
    ctx.emitter.emit('prompt', prompt, attempt);
    if (promptText !== '') {
      ctx.output.write(promptText);
    }

    let line: string;
    try {
      line = await ctx.lineSource.readLine();
    } catch (err) {
      const streamError = toStreamError(err);
      ctx.emitter.emit('stream_error', streamError);
      throw streamError;
    }

    const input = normalizeLine(line, ctx.trim);
    const result = parser.parse(input);
    if (result.ok) {
      ctx.emitter.emit('value', result.value, parser.name);
      return result.value;
    }

    const failure: ParseFailure = {
      input,
      expected: parser.name,
      reason: result.reason,
      prompt,
      attempt,
    };
    ctx.emitter.emit('parse_error', failure);
    await ctx.onError(failure);

    if (ctx.maxAttempts !== undefined && attempt >= ctx.maxAttempts) {
      const exhausted = new AttemptsExhaustedError(attempt, failure);
      ctx.emitter.emit('attempts_exhausted', exhausted);
      throw exhausted;
    }
  }
}
