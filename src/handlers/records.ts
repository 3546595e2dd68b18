import { z } from "zod";
import type { HookRegistry } from "../registry/hooks";
import type { RequestContext } from "../router/context";
import { ActionError, InvalidArgumentError } from "../router/errors";
import type { Handler } from "../router/router";
import { StoredRecordSchema, type StorageConnection, type StoredRecord } from "../storage/types";

const RecordRefSchema = z.object({
  type: z.string().trim().min(1),
  id: z.string().trim().min(1),
});

type RecordRef = z.infer<typeof RecordRefSchema>;

const SavePayloadSchema = z.object({ records: z.array(StoredRecordSchema).min(1) });
const RefPayloadSchema = z.object({ records: z.array(RecordRefSchema).min(1) });

function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new InvalidArgumentError("payload is not valid", { issues });
  }
  return parsed.data;
}

function requireStorage(ctx: RequestContext): StorageConnection {
  if (!ctx.storage) {
    throw new Error("storage connection was not opened for the request");
  }
  return ctx.storage;
}

function requireHooks(ctx: RequestContext): HookRegistry {
  if (!ctx.hooks) {
    throw new Error("hook registry was not attached to the request");
  }
  return ctx.hooks;
}

function notFound(ref: RecordRef): ActionError {
  return new ActionError("NotFound", `record ${ref.type}/${ref.id} not found`, { type: ref.type, id: ref.id });
}

export const recordFetchHandler: Handler = async (ctx) => {
  const { records } = parsePayload(RefPayloadSchema, ctx.payload);
  const storage = requireStorage(ctx);
  const found: StoredRecord[] = [];
  for (const ref of records) {
    const record = await storage.fetch(ref.type, ref.id);
    if (!record) throw notFound(ref);
    found.push(record);
  }
  return { records: found };
};

/**
 * Every `before-save` hook for every record runs before anything is written,
 * so one rejected record leaves storage untouched.
 */
export const recordSaveHandler: Handler = async (ctx) => {
  const { records } = parsePayload(SavePayloadSchema, ctx.payload);
  const storage = requireStorage(ctx);
  const hooks = requireHooks(ctx);

  const staged: Array<{ record: StoredRecord; original: StoredRecord | null }> = [];
  for (const record of records) {
    const original = await storage.fetch(record.type, record.id);
    const prepared = await hooks.invokeHooks(record.type, "before-save", record, ctx, original);
    if (prepared.type !== record.type || prepared.id !== record.id) {
      throw new InvalidArgumentError("before-save hook changed the record key", {
        type: record.type,
        id: record.id,
      });
    }
    staged.push({ record: prepared, original });
  }

  const saved: StoredRecord[] = [];
  for (const { record } of staged) {
    saved.push(await storage.save(record));
  }

  for (const [index, record] of saved.entries()) {
    await hooks.invokeHooks(record.type, "after-save", record, ctx, staged[index]?.original ?? null);
  }
  return { records: saved };
};

export const recordDeleteHandler: Handler = async (ctx) => {
  const { records } = parsePayload(RefPayloadSchema, ctx.payload);
  const storage = requireStorage(ctx);
  const hooks = requireHooks(ctx);

  const existing: StoredRecord[] = [];
  for (const ref of records) {
    const record = await storage.fetch(ref.type, ref.id);
    if (!record) throw notFound(ref);
    existing.push(record);
  }
  for (const record of existing) {
    await hooks.invokeHooks(record.type, "before-delete", record, ctx, record);
  }

  const deleted: RecordRef[] = [];
  for (const record of existing) {
    await storage.remove(record.type, record.id);
    deleted.push({ type: record.type, id: record.id });
  }
  for (const record of existing) {
    await hooks.invokeHooks(record.type, "after-delete", record, ctx, record);
  }
  return { records: deleted };
};
