import cds from "@sap/cds";
import { getStatusCode } from "./service-errors";

const LOG = cds.log("call-logger");

export interface CallLogEntry {
  component: string;
  providerKey: string;
  operation: string;
  durationMs: number;
  success: boolean;
  statusCode?: number;
  errorMessage?: string;
}

/** Consecutive failure tracking per provider. */
interface FailureState {
  count: number;
  lastSuccessAt: string | null;
}

export const FAILURE_THRESHOLD = 3;
const failureCounters = new Map<string, FailureState>();

/**
 * Get the current failure state for a provider.
 */
export function getFailureState(providerKey: string): FailureState | undefined {
  return failureCounters.get(providerKey);
}

/**
 * Reset all failure counters (for testing).
 */
export function resetFailureCounters(): void {
  failureCounters.clear();
}

/**
 * Track consecutive failures and warn once the threshold is reached.
 * A 404 is an answer from the store, not a provider failure.
 */
function trackProviderFailure(entry: CallLogEntry): void {
  const state = failureCounters.get(entry.providerKey) || {
    count: 0,
    lastSuccessAt: null,
  };

  if (!entry.success && entry.statusCode !== 404) {
    state.count++;
    failureCounters.set(entry.providerKey, state);

    if (state.count === FAILURE_THRESHOLD) {
      LOG.warn(
        `Storage provider "${entry.providerKey}" has ${state.count} consecutive failures. Last success: ${state.lastSuccessAt || "never"}`,
      );
    }
  } else {
    state.count = 0;
    state.lastSuccessAt = new Date().toISOString();
    failureCounters.set(entry.providerKey, state);
  }
}

export function logCall(entry: CallLogEntry): void {
  if (entry.success) {
    LOG.debug(`${entry.component}.${entry.operation} ok in ${entry.durationMs}ms`);
  } else {
    LOG.warn(
      `${entry.component}.${entry.operation} failed in ${entry.durationMs}ms` +
        (entry.statusCode !== undefined ? ` (status ${entry.statusCode})` : "") +
        `: ${entry.errorMessage}`,
    );
  }
  trackProviderFailure(entry);
}

/**
 * Wraps an async function to log every call.
 * Errors are re-thrown unchanged after logging.
 */
export function withCallLogging<TArgs extends unknown[], TResult>(
  component: string,
  providerKey: string,
  fn: (...args: TArgs) => Promise<TResult>,
  operation?: string,
): (...args: TArgs) => Promise<TResult> {
  const resolvedOperation = operation || fn.name || "unknown";
  return async (...args: TArgs): Promise<TResult> => {
    const start = Date.now();
    let success = true;
    let statusCode: number | undefined;
    let errorMessage: string | undefined;

    try {
      return await fn(...args);
    } catch (err) {
      success = false;
      statusCode = getStatusCode(err);
      errorMessage = err instanceof Error ? err.message : String(err);
      throw err;
    } finally {
      logCall({
        component,
        providerKey,
        operation: resolvedOperation,
        durationMs: Date.now() - start,
        success,
        statusCode,
        errorMessage,
      });
    }
  };
}
