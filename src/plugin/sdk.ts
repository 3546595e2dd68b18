import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { TriggerPoint } from "../registry/hooks";
import { decodeRequest, encodeReply, type PluginManifest, type PluginReply, type PluginRequest } from "./protocol";

export type PluginOp = (context: Record<string, unknown>) => Promise<unknown> | unknown;

export type PluginDefinition = {
  handlers?: Record<string, PluginOp>;
  hooks?: Array<{ name: string; type: string; trigger: TriggerPoint; run: PluginOp }>;
  lambdas?: Record<string, PluginOp>;
  timers?: Array<{ name: string; schedule: string; run: PluginOp }>;
};

export type PluginIo = {
  input: Readable;
  output: Writable;
  /** Where undecodable lines are reported. */
  diagnostics?: Writable;
};

/** Thrown from an op to send a structured `error` reply. */
export class PluginFailure extends Error {
  readonly code?: number;
  readonly errorName: string;
  readonly info?: Record<string, unknown>;

  constructor(message: string, options: { code?: number; name?: string; info?: Record<string, unknown> } = {}) {
    super(message);
    this.name = "PluginFailure";
    this.code = options.code;
    this.errorName = options.name ?? "PluginError";
    this.info = options.info;
  }
}

export function manifestOf(definition: PluginDefinition): PluginManifest {
  return {
    handlers: Object.keys(definition.handlers ?? {}),
    hooks: (definition.hooks ?? []).map(({ name, type, trigger }) => ({ name, type, trigger })),
    lambdas: Object.keys(definition.lambdas ?? {}),
    timers: (definition.timers ?? []).map(({ name, schedule }) => ({ name, schedule })),
  };
}

type OpTable = {
  ops: Map<string, PluginOp>;
  /** Keyed by hook name, record type and trigger. */
  hooks: Map<string, PluginOp>;
};

function hookKey(name: string, type: string, trigger: string): string {
  return `${name}\u0000${type}\u0000${trigger}`;
}

/** Throws when two handlers, lambdas or timers share a name, or two hooks share a binding. */
function buildOpTable(definition: PluginDefinition): OpTable {
  const ops = new Map<string, PluginOp>();
  const add = (name: string, op: PluginOp) => {
    if (ops.has(name)) throw new Error(`duplicate plugin operation "${name}"`);
    ops.set(name, op);
  };
  for (const [name, op] of Object.entries(definition.handlers ?? {})) add(name, op);
  for (const [name, op] of Object.entries(definition.lambdas ?? {})) add(name, op);
  for (const timer of definition.timers ?? []) add(timer.name, timer.run);

  const hooks = new Map<string, PluginOp>();
  for (const hook of definition.hooks ?? []) {
    const key = hookKey(hook.name, hook.type, hook.trigger);
    if (hooks.has(key)) {
      throw new Error(`duplicate plugin hook "${hook.name}" for ${hook.type} ${hook.trigger}`);
    }
    hooks.set(key, hook.run);
  }
  return { ops, hooks };
}

function lookupOp(table: OpTable, name: string, context: Record<string, unknown>): PluginOp | undefined {
  const { trigger, record } = context;
  if (typeof trigger !== "string") return table.ops.get(name);
  if (typeof record !== "object" || record === null || !("type" in record) || typeof record.type !== "string") {
    return undefined;
  }
  return table.hooks.get(hookKey(name, record.type, trigger));
}

function failureData(error: unknown): Record<string, unknown> {
  if (error instanceof PluginFailure) {
    return {
      ...(error.code !== undefined ? { code: error.code } : {}),
      name: error.errorName,
      message: error.message,
      ...(error.info ? { info: error.info } : {}),
    };
  }
  return { name: "PluginError", message: error instanceof Error ? error.message : String(error) };
}

async function answer(request: PluginRequest, manifest: PluginManifest, table: OpTable): Promise<PluginReply> {
  if (request.kind === "init") {
    return { id: request.id, kind: "result", data: manifest };
  }
  const op = lookupOp(table, request.name, request.context);
  if (!op) {
    return {
      id: request.id,
      kind: "error",
      data: { code: 110, name: "NotFound", message: `Unknown operation "${request.name}"` },
    };
  }
  try {
    const result = await op(request.context);
    return { id: request.id, kind: "result", data: result ?? null };
  } catch (error) {
    return { id: request.id, kind: "error", data: failureData(error) };
  }
}

/**
 * Serves the plugin side of the line protocol until `input` ends. Requests
 * are answered strictly in arrival order.
 */
export function servePlugin(
  definition: PluginDefinition,
  io: PluginIo = { input: process.stdin, output: process.stdout, diagnostics: process.stderr }
): Promise<void> {
  const manifest = manifestOf(definition);
  const table = buildOpTable(definition);
  const lines = readline.createInterface({ input: io.input, terminal: false, crlfDelay: Infinity });
  let queue: Promise<void> = Promise.resolve();

  lines.on("line", (raw) => {
    if (raw.trim().length === 0) return;
    queue = queue.then(async () => {
      let request: PluginRequest;
      try {
        request = decodeRequest(raw);
      } catch (error) {
        io.diagnostics?.write(`${error instanceof Error ? error.message : String(error)}\n`);
        return;
      }
      const reply = await answer(request, manifest, table);
      let frame: string;
      try {
        frame = encodeReply(reply);
      } catch (error) {
        frame = encodeReply({ id: reply.id, kind: "error", data: failureData(error) });
      }
      io.output.write(frame);
    });
  });

  return new Promise<void>((resolve) => {
    lines.on("close", () => {
      void queue.then(resolve);
    });
  });
}
