import { z } from "zod";

export const StoredRecordSchema = z.object({
  type: z.string().trim().min(1),
  id: z.string().trim().min(1),
  data: z.record(z.unknown()).default({}),
});

export type StoredRecord = z.infer<typeof StoredRecordSchema>;

export type StorageHealth = {
  ok: boolean;
  latencyMs: number;
  error?: string;
};

/** One request's handle on the storage engine. Never shared across requests. */
export interface StorageConnection {
  fetch(type: string, id: string): Promise<StoredRecord | null>;
  save(record: StoredRecord): Promise<StoredRecord>;
  remove(type: string, id: string): Promise<StoredRecord | null>;
  close(): Promise<void>;
}

export interface StorageConnector {
  readonly impl: string;
  open(): Promise<StorageConnection>;
  healthcheck(): Promise<StorageHealth>;
  close(): Promise<void>;
}
