import { z } from "zod";
import { TRIGGER_POINTS } from "../registry/hooks";

/*
 * Wire format shared with plugin processes: one JSON object per line.
 *
 *   server -> plugin  {"id":0,"kind":"init","name":"init"}
 *                     {"id":1,"kind":"op","name":"demo:echo","context":{...}}
 *   plugin -> server  {"id":1,"kind":"result","data":...}
 *                     {"id":1,"kind":"error","data":{"code":...,"message":...,"info":...}}
 */

export type RequestKind = "init" | "op";

export type InitRequest = { id: number; kind: "init"; name: string };
export type OpRequest = { id: number; kind: "op"; name: string; context: Record<string, unknown> };
export type PluginRequest = InitRequest | OpRequest;

export const PluginReplySchema = z.object({
  id: z.number().int().nonnegative(),
  kind: z.enum(["result", "error"]),
  data: z.unknown(),
});

export type PluginReply = z.infer<typeof PluginReplySchema>;

export const PluginRequestSchema = z.discriminatedUnion("kind", [
  z.object({ id: z.number().int().nonnegative(), kind: z.literal("init"), name: z.string() }),
  z.object({
    id: z.number().int().nonnegative(),
    kind: z.literal("op"),
    name: z.string(),
    context: z.record(z.unknown()),
  }),
]);

export const PluginErrorDataSchema = z.object({
  code: z.number().int().optional(),
  name: z.string().optional(),
  message: z.string().optional(),
  info: z.record(z.unknown()).optional(),
});

export type PluginErrorData = z.infer<typeof PluginErrorDataSchema>;

export const HookDeclarationSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  trigger: z.enum(TRIGGER_POINTS),
});

export const TimerDeclarationSchema = z.object({
  name: z.string().min(1),
  schedule: z.string().min(1),
});

/** `data` of the handshake `result`. */
export const PluginManifestSchema = z.object({
  handlers: z.array(z.string().min(1)).default([]),
  hooks: z.array(HookDeclarationSchema).default([]),
  lambdas: z.array(z.string().min(1)).default([]),
  timers: z.array(TimerDeclarationSchema).default([]),
});

export type PluginManifest = z.infer<typeof PluginManifestSchema>;
export type HookDeclaration = z.infer<typeof HookDeclarationSchema>;
export type TimerDeclaration = z.infer<typeof TimerDeclarationSchema>;

export class FrameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FrameError";
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export function encodeRequest(request: PluginRequest): string {
  // Key order is part of the documented framing.
  const ordered =
    request.kind === "init"
      ? { id: request.id, kind: request.kind, name: request.name }
      : { id: request.id, kind: request.kind, name: request.name, context: request.context };
  return `${JSON.stringify(ordered)}\n`;
}

export function encodeReply(reply: PluginReply): string {
  return `${JSON.stringify({ id: reply.id, kind: reply.kind, data: reply.data ?? null })}\n`;
}

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    throw new FrameError(`unparsable message: ${line.slice(0, 120)}`);
  }
}

export function decodeReply(line: string): PluginReply {
  const parsed = PluginReplySchema.safeParse(parseLine(line));
  if (!parsed.success) {
    throw new FrameError(`malformed reply: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function decodeRequest(line: string): PluginRequest {
  const parsed = PluginRequestSchema.safeParse(parseLine(line));
  if (!parsed.success) {
    throw new FrameError(`malformed request: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function parseManifest(data: unknown): PluginManifest {
  const parsed = PluginManifestSchema.safeParse(data);
  if (!parsed.success) {
    throw new FrameError(`malformed handshake: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}
