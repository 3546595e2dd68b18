import { PluginFailure, servePlugin, type PluginDefinition } from "../plugin/sdk";
import { isPlainObject } from "../router/errors";

/**
 * Demo plugin for `note` records: requires text, stamps `updatedAt`, counts
 * saves, and reports the count hourly.
 */
export function notesPlugin(now: () => Date = () => new Date()): PluginDefinition {
  let saves = 0;

  return {
    handlers: {
      "notes:stats": () => ({ saves }),
    },
    hooks: [
      {
        name: "stamp",
        type: "note",
        trigger: "before-save",
        run: (context) => {
          const record = context.record;
          if (!isPlainObject(record)) {
            throw new PluginFailure("hook called without a record", { code: 108, name: "InvalidArgument" });
          }
          const data = isPlainObject(record.data) ? record.data : {};
          if (typeof data.text !== "string" || data.text.trim().length === 0) {
            throw new PluginFailure("notes need text", { code: 108, name: "InvalidArgument", info: { id: record.id } });
          }
          return { ...record, data: { ...data, updatedAt: now().toISOString() } };
        },
      },
      {
        name: "count",
        type: "note",
        trigger: "after-save",
        run: () => {
          saves += 1;
          return null;
        },
      },
    ],
    lambdas: {
      "notes:wordCount": (context) =>
        typeof context.args === "string" ? context.args.split(/\s+/).filter(Boolean).length : 0,
    },
    timers: [{ name: "notes:report", schedule: "@every 1h", run: () => ({ saves }) }],
  };
}

if (require.main === module) {
  servePlugin(notesPlugin(), { input: process.stdin, output: process.stdout, diagnostics: process.stderr }).catch(
    (error: unknown) => {
      process.stderr.write(`notes plugin failed: ${error instanceof Error ? error.message : String(error)}\n`);
      process.exit(1);
    }
  );
}
