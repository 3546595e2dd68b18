import type { RequestContext } from "../router/context";
import { DuplicateRegistrationError, toActionError } from "../router/errors";
import type { StoredRecord } from "../storage/types";

export const TRIGGER_POINTS = ["before-save", "after-save", "before-delete", "after-delete"] as const;

export type TriggerPoint = (typeof TRIGGER_POINTS)[number];

export type HookEvent = {
  record: StoredRecord;
  original: StoredRecord | null;
  ctx: RequestContext;
};

export type HookInvocable = {
  readonly name: string;
  /** `before-*` hooks may return a replacement record. */
  invoke: (event: HookEvent) => Promise<StoredRecord | void>;
};

export function isBeforeTrigger(trigger: TriggerPoint): boolean {
  return trigger === "before-save" || trigger === "before-delete";
}

function bindingKey(recordType: string, trigger: TriggerPoint): string {
  return `${recordType}\u0000${trigger}`;
}

export class HookRegistry {
  private readonly bindings = new Map<string, HookInvocable[]>();
  private sealed = false;

  registerHook(recordType: string, trigger: TriggerPoint, hook: HookInvocable): void {
    if (this.sealed) {
      throw new Error("hook registry is sealed; hooks can only be registered during startup");
    }
    const key = bindingKey(recordType, trigger);
    const list = this.bindings.get(key) ?? [];
    if (list.some((existing) => existing.name === hook.name)) {
      throw new DuplicateRegistrationError("hook", `${recordType}:${trigger}:${hook.name}`);
    }
    list.push(hook);
    this.bindings.set(key, list);
  }

  seal(): void {
    this.sealed = true;
  }

  list(recordType: string, trigger: TriggerPoint): readonly HookInvocable[] {
    return this.bindings.get(bindingKey(recordType, trigger)) ?? [];
  }

  size(): number {
    let total = 0;
    for (const list of this.bindings.values()) total += list.length;
    return total;
  }

  /**
   * Runs the bound hooks in registration order. A failing `before-*` hook
   * stops the list and throws; `after-*` hooks all run and failures are only
   * logged. Returns the record as left by the last `before-*` hook.
   */
  async invokeHooks(
    recordType: string,
    trigger: TriggerPoint,
    record: StoredRecord,
    ctx: RequestContext,
    original: StoredRecord | null = null
  ): Promise<StoredRecord> {
    const hooks = this.list(recordType, trigger);
    if (!isBeforeTrigger(trigger)) {
      for (const hook of hooks) {
        try {
          await hook.invoke({ record, original, ctx });
        } catch (error) {
          ctx.logger.warn("hook_failed", {
            requestId: ctx.requestId,
            recordType,
            trigger,
            hook: hook.name,
            message: toActionError(error).message,
          });
        }
      }
      return record;
    }

    let current = record;
    for (const hook of hooks) {
      const replaced = await hook.invoke({ record: current, original, ctx });
      if (replaced) {
        current = replaced;
      }
    }
    return current;
  }
}
