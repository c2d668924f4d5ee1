/**
 * @fileoverview Explicit handle for one unit of concurrent execution.
 * @module age-graph-bridge/connection/ExecutionContext
 *
 * A pool bound to one scheduler (an event loop in a worker thread, a request
 * scope, a job runner) must not be reused by another. Callers create one
 * context per such unit and pass it to every lifecycle call; nothing is
 * looked up from ambient state.
 */

import { v4 as uuidv4 } from 'uuid';

export class ExecutionContext {
  /** Cache key for this context's engine handle. */
  readonly id: string;
  /** Free-form name used in log lines. */
  readonly label: string;

  private constructor(id: string, label: string) {
    this.id = id;
    this.label = label;
  }

  static create(label?: string): ExecutionContext {
    const id = uuidv4();
    return new ExecutionContext(id, label ?? `context-${id.slice(0, 8)}`);
  }

  toString(): string {
    return `${this.label} (${this.id})`;
  }
}
