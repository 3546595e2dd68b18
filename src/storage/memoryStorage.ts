import type { StorageConnection, StorageConnector, StorageHealth, StoredRecord } from "./types";

function keyOf(type: string, id: string): string {
  return `${type}/${id}`;
}

function copy(record: StoredRecord): StoredRecord {
  return { type: record.type, id: record.id, data: structuredClone(record.data) };
}

class MemoryStorageConnection implements StorageConnection {
  private closed = false;

  constructor(
    private readonly records: Map<string, StoredRecord>,
    private readonly onClose: () => void
  ) {}

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("storage connection is closed");
    }
  }

  async fetch(type: string, id: string): Promise<StoredRecord | null> {
    this.assertOpen();
    const found = this.records.get(keyOf(type, id));
    return found ? copy(found) : null;
  }

  async save(record: StoredRecord): Promise<StoredRecord> {
    this.assertOpen();
    this.records.set(keyOf(record.type, record.id), copy(record));
    return copy(record);
  }

  async remove(type: string, id: string): Promise<StoredRecord | null> {
    this.assertOpen();
    const key = keyOf(type, id);
    const found = this.records.get(key);
    if (!found) return null;
    this.records.delete(key);
    return found;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.onClose();
  }
}

export class MemoryStorageConnector implements StorageConnector {
  readonly impl = "memory";
  private readonly records = new Map<string, StoredRecord>();
  private openCount = 0;

  async open(): Promise<StorageConnection> {
    this.openCount += 1;
    return new MemoryStorageConnection(this.records, () => {
      this.openCount -= 1;
    });
  }

  openConnections(): number {
    return this.openCount;
  }

  async healthcheck(): Promise<StorageHealth> {
    return { ok: true, latencyMs: 0 };
  }

  async close(): Promise<void> {
    this.records.clear();
  }
}
