// navi-morph/log - Debug printing and call tracing
// Enable debug output with NAVI_DEBUG=1, call tracing with NAVI_TRACE=1

// =============================================================================
// DEBUG LOGGING
// =============================================================================

export let DEBUG = process.env.NAVI_DEBUG === '1' || process.env.NAVI_DEBUG === 'true';

export function setDebug(value: boolean) {
  DEBUG = value;
}

export function dp(...args: unknown[]) {
  if (DEBUG) {
    console.log('[DEBUG]', ...args);
  }
}

// =============================================================================
// TRACING
// =============================================================================

export type TraceEvent =
  | { phase: 'start'; operation: string; input: string }
  | { phase: 'end'; operation: string; input: string; output: string; durationMs: number }
  | { phase: 'error'; operation: string; input: string; error: unknown; durationMs: number };

/**
 * Observer for public calls. The engine reports through it but never reads
 * anything back, so a hook cannot change a result.
 */
export type TraceHook = (event: TraceEvent) => void;

export const consoleTraceHook: TraceHook = (event) => {
  switch (event.phase) {
    case 'start':
      console.log(`[TRACE] Calling ${event.operation}(${event.input})`);
      break;
    case 'end':
      console.log(`[TRACE] ${event.operation} finished: ${event.output} (${event.durationMs.toFixed(3)}ms)`);
      break;
    case 'error':
      console.error(`[TRACE] ${event.operation} failed: ${event.error instanceof Error ? event.error.message : String(event.error)}`);
      break;
  }
};

function describeOutput(result: unknown): string {
  if (typeof result === 'string') return result;
  if (Array.isArray(result) && result.every(item => typeof item === 'string')) return result.join(', ');
  return JSON.stringify(result) ?? String(result);
}

/**
 * Run fn, reporting start/end/error to the hook. A missing hook costs one branch.
 */
export function traced<T>(hook: TraceHook | undefined, operation: string, input: string, fn: () => T): T {
  if (!hook) return fn();

  const start = performance.now();
  hook({ phase: 'start', operation, input });
  try {
    const result = fn();
    hook({ phase: 'end', operation, input, output: describeOutput(result), durationMs: performance.now() - start });
    return result;
  } catch (error) {
    hook({ phase: 'error', operation, input, error, durationMs: performance.now() - start });
    throw error;
  }
}
