/**
 * Run Context
 *
 * Per-run shared namespace keyed by port name. Values are seeded from the
 * caller's initial mapping; node outputs are merged in execution order and
 * the later writer of a port name replaces the earlier one.
 */

import type { InitialValues, PortName } from '../types/index.js';

export class RunContext {
  private readonly values = new Map<string, unknown>();

  constructor(initial: InitialValues = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  /**
   * Set a value only when the key is not present yet
   */
  setDefault(key: string, value: unknown): void {
    if (!this.values.has(key)) {
      this.values.set(key, value);
    }
  }

  /**
   * Copy every listed port present in `outputs` into the namespace.
   * Returns the ports that were written.
   */
  merge(outputs: Record<string, unknown>, ports: readonly PortName[]): PortName[] {
    const written: PortName[] = [];
    for (const port of ports) {
      if (port in outputs) {
        this.values.set(port, outputs[port]);
        written.push(port);
      }
    }
    return written;
  }

  view(): ReadonlyMap<string, unknown> {
    return this.values;
  }

  toRecord(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }
}
