/**
 * Event system for typed-input
 *
 * Provides a typed event emitter for observing input requests, the default
 * parse-error handler, and the default logging handlers.
 */

import type { StreamError, AttemptsExhaustedError } from './errors.js';
import type { ErrorHandler, OutputChannel, ParseFailure } from './types.js';

function wrap(style: string, text: string): string {
  if (typeof process !== 'undefined' && process.env && 'NO_COLOR' in process.env) {
    return text;
  }
  return `\x1b[${style}m${text}\x1b[0m`;
}

/**
 * Events emitted while a request runs, as argument tuples
 */
export interface InputEvents {
  /** A prompt is about to be shown */
  prompt: [prompt: string, attempt: number];
  /** A line parsed successfully */
  value: [value: unknown, expected: string];
  /** A line failed to parse; emitted before the error handler runs */
  parse_error: [failure: ParseFailure];
  /** The line source ended or failed; the request is aborted */
  stream_error: [error: StreamError];
  /** maxAttempts was reached; the request is aborted */
  attempts_exhausted: [error: AttemptsExhaustedError];
}

/**
 * Event handler function type
 */
export type InputEventHandler<K extends keyof InputEvents> = (...args: InputEvents[K]) => void;

type HandlerSets = { [K in keyof InputEvents]: Set<InputEventHandler<K>> };

function emptyHandlerSets(): HandlerSets {
  return {
    prompt: new Set(),
    value: new Set(),
    parse_error: new Set(),
    stream_error: new Set(),
    attempts_exhausted: new Set(),
  };
}

/**
 * Simple typed event emitter for typed-input events
 */
export class InputEmitter {
  private handlers: HandlerSets = emptyHandlerSets();

  /**
   * Subscribe to an event
   */
  on<K extends keyof InputEvents>(event: K, handler: InputEventHandler<K>): void {
    this.handlers[event].add(handler);
  }

  /**
   * Unsubscribe from an event
   */
  off<K extends keyof InputEvents>(event: K, handler: InputEventHandler<K>): void {
    this.handlers[event].delete(handler);
  }

  /**
   * Emit an event to all subscribers
   */
  emit<K extends keyof InputEvents>(event: K, ...args: InputEvents[K]): void {
    const handlers: Set<InputEventHandler<K>> = this.handlers[event];
    for (const handler of handlers) {
      handler(...args);
    }
  }

  /**
   * Check if there are any handlers for an event
   */
  hasHandlers<K extends keyof InputEvents>(event: K): boolean {
    return this.handlers[event].size > 0;
  }

  /**
   * Remove all handlers for all events
   */
  clear(): void {
    this.handlers = emptyHandlerSets();
  }
}

/**
 * Diagnostic line for a failed parse
 */
export function formatParseFailure(failure: ParseFailure): string {
  return `Invalid input '${failure.input}'. Expected type: ${failure.expected}. Error: ${failure.reason}`;
}

/**
 * Default parse-error handler - writes a diagnostic naming the input and expected type
 */
export function defaultErrorHandler(out: OutputChannel): ErrorHandler {
  return (failure) => {
    out.write(wrap('31', formatParseFailure(failure)) + '\n');
  };
}

/**
 * Default stream_error handler - logs the read failure
 */
export function defaultStreamErrorHandler(out: OutputChannel, error: StreamError): void {
  out.write(wrap('31', `Input read error: ${error.message}`) + '\n');
}

/**
 * Default attempts_exhausted handler - logs that the request gave up
 */
export function defaultAttemptsExhaustedHandler(out: OutputChannel, error: AttemptsExhaustedError): void {
  out.write(wrap('33', `Giving up after ${error.attempts} attempts`) + '\n');
}

/**
 * Options for installDefaultHandlers
 */
export interface DefaultHandlerOptions {
  /** When returns true, suppresses all output */
  isSilent?: () => boolean;
  /** Where log lines go; read at emit time so setConfig changes apply */
  errorOutput: () => OutputChannel;
}

/**
 * Install default logging handlers on an emitter
 *
 * @param target - Object with an `on` method for subscribing to events
 */
export function installDefaultHandlers(
  target: { on: InputEmitter['on'] },
  options: DefaultHandlerOptions,
): void {
  const silent = options.isSilent ?? (() => false);

  target.on('stream_error', (error) => {
    if (!silent()) defaultStreamErrorHandler(options.errorOutput(), error);
  });
  target.on('attempts_exhausted', (error) => {
    if (!silent()) defaultAttemptsExhaustedHandler(options.errorOutput(), error);
  });
}
