/**
 * Hooks system for observability (OpenTelemetry, DataDog, custom metrics)
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const dmm = new Instrument(transport, {
 *   hooks: {
 *     onQuery: (ctx) => {
 *       ctx.span = trace.getTracer('scpi').startSpan('scpi.query', {
 *         attributes: { command: ctx.command },
 *       });
 *     },
 *     onQueryComplete: (ctx) => ctx.span?.end(),
 *     onQueryError: (ctx, error) => {
 *       ctx.span?.recordException(error);
 *       ctx.span?.end();
 *     },
 *   },
 * });
 * ```
 */

import type { Logger } from './utils/logger';

/** Context passed to hooks - can store custom data like spans */
export interface HookContext {
  /** Operation start time */
  startTime: number;
  /** Custom data storage (e.g., OpenTelemetry span) */
  [key: string]: unknown;
}

/** Outgoing command context (no response expected) */
export interface CommandHookContext extends HookContext {
  command: string;
}

/** Query context */
export interface QueryHookContext extends HookContext {
  command: string;
  /** Byte count for raw queries */
  count?: number;
  /** Set after the response arrives */
  response?: string | Buffer;
}

/** Connection event context */
export interface ConnectionHookContext extends HookContext {
  endpoint: string;
  event: 'connect' | 'disconnect' | 'error';
  error?: Error;
}

/** Hook definitions for transports */
export interface TransportHooks {
  /** Called on connection events */
  onConnection?: Hook<ConnectionHookContext>;
}

/** Hook definitions for instrument sessions */
export interface InstrumentHooks {
  /** Called before a command is sent */
  onCommand?: Hook<CommandHookContext>;
  /** Called before a query is sent */
  onQuery?: Hook<QueryHookContext>;
  /** Called after the query response was received and parsed */
  onQueryComplete?: Hook<QueryHookContext>;
  /** Called if the query fails at any stage */
  onQueryError?: ErrorHook<QueryHookContext>;
}

/** Error hook type */
export type ErrorHook<T extends HookContext> = (ctx: T, error: Error) => void | Promise<void>;

/** Standard hook type */
export type Hook<T extends HookContext> = (ctx: T) => void | Promise<void>;

/**
 * Helper to safely call a hook. Never rejects.
 */
export async function callHook<T extends HookContext>(
  hook: Hook<T> | undefined,
  ctx: T,
  logger?: Logger
): Promise<void> {
  if (!hook) return;
  try {
    await hook(ctx);
  } catch (e) {
    // Hooks should not break the main flow
    logger?.error('Hook error', e);
  }
}

/**
 * Helper to safely call an error hook. Never rejects.
 */
export async function callErrorHook<T extends HookContext>(
  hook: ErrorHook<T> | undefined,
  ctx: T,
  error: Error,
  logger?: Logger
): Promise<void> {
  if (!hook) return;
  try {
    await hook(ctx, error);
  } catch (e) {
    logger?.error('Hook error', e);
  }
}

/**
 * Create a new hook context with start time
 */
export function createHookContext<T extends HookContext>(data: Omit<T, 'startTime'>): T {
  return {
    startTime: Date.now(),
    ...data,
  } as T;
}

/**
 * Calculate duration from context start time
 */
export function getDuration(ctx: HookContext): number {
  return Date.now() - ctx.startTime;
}
