import type { EventBus } from "../events";
import type { EntityStatusRecord } from "../status/types";

export interface RecordSource {
  list(): Promise<EntityStatusRecord[]>;
}

/**
 * In-memory copy of the entry status sidecars. The status store writes
 * through it; purges arrive from the event bus.
 */
export class EntryRecordCache {
  private records = new Map<number, EntityStatusRecord>();

  get(entryId: number): EntityStatusRecord | null {
    const record = this.records.get(entryId);
    return record ? { ...record } : null;
  }

  set(record: EntityStatusRecord): void {
    this.records.set(record.id, { ...record });
  }

  remove(entryId: number): void {
    this.records.delete(entryId);
  }

  clear(): void {
    this.records.clear();
  }

  get size(): number {
    return this.records.size;
  }

  async warm(source: RecordSource): Promise<number> {
    const records = await source.list();
    this.records.clear();
    for (const record of records) {
      this.set(record);
    }
    return records.length;
  }

  attach(bus: EventBus): () => void {
    return bus.subscribe({
      onEntryPurged: (event) => this.remove(event.entryId),
    });
  }
}
