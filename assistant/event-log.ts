/**
 * Bounded ring of recent pipeline events.
 *
 * Owned by the assistant context and written only by the orchestrator. Kept
 * regardless of console log level; the dashboard diagnostics route reads it.
 */

import type { EventLevel, EventLogEntry } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export const EVENT_LOG_CAPACITY = 50;

// ============================================================================
// EVENT LOG
// ============================================================================

export class EventLog {
  private readonly ring: EventLogEntry[] = [];

  constructor(
    private readonly capacity: number = EVENT_LOG_CAPACITY,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Append an entry, evicting the oldest when full.
   *
   * @returns The stored entry
   */
  record(level: EventLevel, summary: string): EventLogEntry {
    const entry: EventLogEntry = { timestamp: this.now(), level, summary };
    this.ring.push(entry);
    if (this.ring.length > this.capacity) {
      this.ring.splice(0, this.ring.length - this.capacity);
    }
    return entry;
  }

  /** Oldest first */
  entries(): readonly EventLogEntry[] {
    return [...this.ring];
  }

  get size(): number {
    return this.ring.length;
  }
}
