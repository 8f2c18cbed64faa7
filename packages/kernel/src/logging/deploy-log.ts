/**
 * Wharf Kernel — Deploy Logger
 *
 * Stamps events with the injected clock and forwards them to the sink.
 * If no sink is injected (e.g., in tests), record() is a no-op.
 */

import type { DeployEvent, DeployEventType } from '../types/event.js';
import type { LogSink } from './log-sink.js';

export type Clock = () => string;

export const systemClock: Clock = () => new Date().toISOString();

export class DeployLogger {
  constructor(
    private readonly sink?: LogSink,
    private readonly clock: Clock = systemClock,
  ) {}

  now(): string {
    return this.clock();
  }

  record(type: DeployEventType, fields: Omit<DeployEvent, 'type' | 'timestamp'> = {}): void {
    this.sink?.append({ type, timestamp: this.clock(), ...fields });
  }
}
