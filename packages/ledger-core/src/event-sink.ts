import type { LedgerEvent } from "./types.js";

/** Receives each committed command's events, inside its transaction; throwing aborts the command. */
export interface EventSink {
  deposit(event: LedgerEvent): void;
}

export class MemoryEventSink implements EventSink {
  readonly events: LedgerEvent[] = [];

  deposit(event: LedgerEvent): void {
    this.events.push(event);
  }

  clear(): void {
    this.events.length = 0;
  }
}
