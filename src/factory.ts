/**
 * Factory for creating typed-input instances
 *
 * Supports configuration priority (highest to lowest):
 * 1. Per-request config (passed with the request)
 * 2. Instance config (factory initial, mutated by setConfig)
 * 3. Hardcoded defaults
 */

import type {
  ErrorHandler,
  InputConfig,
  ParserLike,
  RecordOf,
  RequestOptions,
  ResolvedInputConfig,
  TypedInputInstance,
  ValueRequest,
  ValuesOf,
} from './types.js';
import { requestValue, type EngineContext } from './engine.js';
import { InputEmitter, defaultErrorHandler, installDefaultHandlers, type InputEventHandler, type InputEvents } from './events.js';
import { createReadlineSource, type LineSource } from './line-source.js';
import { request } from './request.js';

/**
 * Default configuration values
 */
const DEFAULTS = {
  showType: false,
  trim: true,
  silent: false,
} as const;

/**
 * Validate configuration values
 * @throws Error if config values are invalid
 */
function validateConfig(config: InputConfig): void {
  if (config.maxAttempts !== undefined && (config.maxAttempts < 1 || !Number.isInteger(config.maxAttempts))) {
    throw new Error('maxAttempts must be a positive integer');
  }
}

/**
 * Merge configs, with earlier configs taking priority.
 * undefined values are skipped, allowing lower-priority configs to provide defaults
 */
function mergeConfigs(perRequest: InputConfig, instance: InputConfig): ResolvedInputConfig {
  return {
    lineSource: perRequest.lineSource ?? instance.lineSource,
    output: perRequest.output ?? instance.output ?? process.stdout,
    errorOutput: perRequest.errorOutput ?? instance.errorOutput ?? process.stderr,
    showType: perRequest.showType ?? instance.showType ?? DEFAULTS.showType,
    trim: perRequest.trim ?? instance.trim ?? DEFAULTS.trim,
    maxAttempts: perRequest.maxAttempts ?? instance.maxAttempts,
    silent: perRequest.silent ?? instance.silent ?? DEFAULTS.silent,
  };
}

const noop = () => {};

/**
 * Create a typed-input instance with its own configuration
 *
 * @param initialConfig - Initial configuration (optional)
 * @returns An instance with input, sequence, record, setConfig, on, off and close
 *
 * @example
 * ```typescript
 * // Prompts on stdout, reads stdin
 * const { input, close } = createTypedInput();
 * const age = await input(int, 'Age: ');
 * close();
 *
 * // Scripted answers, no diagnostics
 * const scripted = createTypedInput({
 *   lineSource: createScriptedSource(['42']),
 *   silent: true,
 * });
 * ```
 */
export function createTypedInput(initialConfig: InputConfig = {}): TypedInputInstance {
  validateConfig(initialConfig);

  // Single mutable config (copy so we don't mutate the caller's object)
  let config: InputConfig = { ...initialConfig };

  const emitter = new InputEmitter();

  // Stdin source opened on first use when no lineSource is configured
  let ownSource: LineSource | undefined;

  // Tail of the request queue; each request waits for the previous one to settle
  let queue: Promise<void> = Promise.resolve();

  // Config of the request currently running, so default log lines follow per-request overrides
  let active: ResolvedInputConfig | undefined;

  installDefaultHandlers(emitter, {
    isSilent: () => (active ?? resolveConfig()).silent,
    errorOutput: () => (active ?? resolveConfig()).errorOutput,
  });

  /**
   * Resolve the current config by merging all sources
   */
  function resolveConfig(perRequest: InputConfig = {}): ResolvedInputConfig {
    return mergeConfigs(perRequest, config);
  }

  /**
   * Update the instance configuration
   */
  function setConfig(newConfig: InputConfig): void {
    validateConfig(newConfig);
    config = { ...config, ...newConfig };
  }

  function lineSourceFor(resolved: ResolvedInputConfig): LineSource {
    if (resolved.lineSource) return resolved.lineSource;
    ownSource ??= createReadlineSource();
    return ownSource;
  }

  function contextFor(resolved: ResolvedInputConfig, onError?: ErrorHandler): EngineContext {
    return {
      lineSource: lineSourceFor(resolved),
      output: resolved.output,
      onError: onError ?? (resolved.silent ? noop : defaultErrorHandler(resolved.errorOutput)),
      emitter,
      showType: resolved.showType,
      trim: resolved.trim,
      maxAttempts: resolved.maxAttempts,
    };
  }

  /**
   * Run a task once every earlier task on this instance has settled
   */
  function enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = queue.then(task);
    // The caller observes failures through `run`; the queue only tracks completion
    queue = run.then(noop, noop);
    return run;
  }

  async function runRequest<T>(req: ValueRequest<T>): Promise<T> {
    const perRequest = req.config ?? {};
    validateConfig(perRequest);
    active = resolveConfig(perRequest);
    try {
      const value = await requestValue(req.parser, req.prompt, contextFor(active, req.onError));
      req.into?.(value);
      return value;
    } finally {
      active = undefined;
    }
  }

  function input<T>(parser: ParserLike<T>, prompt: string, handler?: ErrorHandler | RequestOptions<T>): Promise<T> {
    const req = request(parser, prompt, handler);
    return enqueue(() => runRequest(req));
  }

  function sequence<R extends ValueRequest<unknown>[]>(...requests: R): Promise<ValuesOf<R>> {
    return enqueue(async () => {
      const values: unknown[] = [];
      for (const req of requests) {
        values.push(await runRequest(req));
      }
      // values[i] came from requests[i].parser
      return values as unknown as ValuesOf<R>;
    });
  }

  function record<R extends Record<string, ValueRequest<unknown>>>(requests: R): Promise<RecordOf<R>> {
    return enqueue(async () => {
      const values: Record<string, unknown> = {};
      for (const [key, req] of Object.entries(requests)) {
        values[key] = await runRequest(req);
      }
      return values as unknown as RecordOf<R>;
    });
  }

  function on<K extends keyof InputEvents>(event: K, handler: InputEventHandler<K>): void {
    emitter.on(event, handler);
  }

  function off<K extends keyof InputEvents>(event: K, handler: InputEventHandler<K>): void {
    emitter.off(event, handler);
  }

  function close(): void {
    ownSource?.close?.();
    ownSource = undefined;
  }

  return { input, sequence, record, setConfig, on, off, close };
}

