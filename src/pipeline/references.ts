/**
 * Derived references
 * Identifiers the platform generates in one response and a later request needs
 */

import { MissingReferenceError } from '../errors.js';

export interface ReferenceReader {
  get(name: string): string;
  has(name: string): boolean;
}

export class ReferenceSet implements ReferenceReader {
  private readonly live = new Map<string, string>();
  private readonly released = new Set<string>();

  get(name: string): string {
    const value = this.live.get(name);
    if (value === undefined) {
      throw new MissingReferenceError(name, this.released.has(name));
    }
    return value;
  }

  has(name: string): boolean {
    return this.live.has(name);
  }

  set(name: string, value: string): void {
    this.live.set(name, value);
    this.released.delete(name);
  }

  /**
   * Invalidate a reference whose object no longer exists
   */
  release(name: string): void {
    if (this.live.delete(name)) {
      this.released.add(name);
    }
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries(this.live);
  }
}
