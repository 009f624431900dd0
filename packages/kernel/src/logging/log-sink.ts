/**
 * Tapir Kernel — Log Sink Interface
 *
 * Defines the injection point for run log persistence.
 *
 * The kernel owns the contract (this interface) and the RunLogger class.
 * Concrete implementations live in the runtime host layer and are injected
 * at construction time; the kernel never writes to disk directly.
 */

import type { RunEvent } from './run-log.js';

/**
 * A sink that receives and persists run events.
 *
 * append() is synchronous: the event must be durable when the call returns.
 * Implementations must not silently discard events.
 */
export interface LogSink {
  append(event: RunEvent): void;
}
