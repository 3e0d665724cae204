import type { KeyValueBackend, KeyValueEntry } from "./backend.js";

interface JournalEntry {
  namespace: string;
  key: string;
  previous: string | undefined;
}

type Journal = Map<string, JournalEntry>;

export class MemoryKeyValueBackend implements KeyValueBackend {
  private readonly spaces = new Map<string, Map<string, string>>();
  private readonly journals: Journal[] = [];

  get(namespace: string, key: string): string | undefined {
    return this.spaces.get(namespace)?.get(key);
  }

  put(namespace: string, key: string, value: string): void {
    const space = this.space(namespace);
    const journal = this.journals[this.journals.length - 1];
    if (journal) {
      const slot = `${namespace}\u0000${key}`;
      if (!journal.has(slot)) {
        journal.set(slot, { namespace, key, previous: space.get(key) });
      }
    }
    space.set(key, value);
  }

  scan(namespace: string, prefix: string): KeyValueEntry[] {
    const space = this.spaces.get(namespace);
    if (!space) return [];
    const entries: KeyValueEntry[] = [];
    for (const [key, value] of space) {
      if (key.startsWith(prefix)) entries.push({ key, value });
    }
    return entries.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  }

  transaction<T>(fn: () => T): T {
    const journal: Journal = new Map();
    this.journals.push(journal);
    let result: T;
    try {
      result = fn();
    } catch (error) {
      this.journals.pop();
      this.restore(journal);
      throw error;
    }
    this.journals.pop();

    // nested: the enclosing transaction must still be able to undo these writes
    const parent = this.journals[this.journals.length - 1];
    if (parent) {
      for (const [slot, entry] of journal) {
        if (!parent.has(slot)) parent.set(slot, entry);
      }
    }
    return result;
  }

  close(): void {
    this.spaces.clear();
  }

  private space(namespace: string): Map<string, string> {
    let space = this.spaces.get(namespace);
    if (!space) {
      space = new Map();
      this.spaces.set(namespace, space);
    }
    return space;
  }

  private restore(journal: Journal): void {
    for (const entry of journal.values()) {
      const space = this.space(entry.namespace);
      if (entry.previous === undefined) {
        space.delete(entry.key);
      } else {
        space.set(entry.key, entry.previous);
      }
    }
  }
}
