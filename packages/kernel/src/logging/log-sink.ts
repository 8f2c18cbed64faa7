/**
 * Wharf Kernel — Log Sink Interface
 *
 * Defines the injection point for deploy log persistence. The kernel owns
 * the contract and the DeployLogger; the runtime host provides the
 * file-backed sink.
 */

import type { DeployEvent } from '../types/event.js';

/**
 * A sink that receives and persists deploy events.
 *
 * append() must complete before the caller moves on to the next operation,
 * so the log never lags behind saved state.
 */
export interface LogSink {
  append(event: DeployEvent): void;
}
