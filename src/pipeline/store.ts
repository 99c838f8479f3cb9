/**
 * InMemoryTaskStore
 *
 * Ephemeral store scoped to a single pipeline run, one map per slot kind.
 */

import type { ProducedRef, ProducedRefKind, StoreSlots, TaskStore } from "./types.js";

type SlotMaps = { [K in ProducedRefKind]: Map<string, StoreSlots[K]> };

export class InMemoryTaskStore implements TaskStore {
  private slots: SlotMaps = {
    ingest_result: new Map(),
    master_snapshot: new Map(),
    joined_rows: new Map(),
    quality_report: new Map(),
    written_files: new Map(),
  };

  set<K extends ProducedRefKind>(kind: K, id: string, value: StoreSlots[K]): ProducedRef {
    const slot: Map<string, StoreSlots[K]> = this.slots[kind];
    slot.set(id, value);
    return { kind, id };
  }

  get<K extends ProducedRefKind>(kind: K, id: string): StoreSlots[K] {
    const slot: Map<string, StoreSlots[K]> = this.slots[kind];
    const value = slot.get(id);
    if (value === undefined) {
      throw new Error(`TaskStore: key not found — ${kind}::${id}`);
    }
    return value;
  }

  has(kind: ProducedRefKind, id: string): boolean {
    return this.slots[kind].has(id);
  }

  get size(): number {
    return Object.values(this.slots).reduce((n, slot) => n + slot.size, 0);
  }
}
