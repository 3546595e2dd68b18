import path from "node:path";
import { z } from "zod";

export const TRANSPORT_KINDS = ["exec"] as const;

export type TransportKind = (typeof TRANSPORT_KINDS)[number];

export const PluginDescriptorSchema = z.object({
  name: z.string().trim().min(1).optional(),
  transport: z.enum(TRANSPORT_KINDS),
  path: z.string().trim().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).default({}),
  poolWidth: z.number().int().min(1).max(64).default(1),
  callTimeoutMs: z.number().int().min(10).max(600_000).default(30_000),
  handshakeTimeoutMs: z.number().int().min(10).max(600_000).default(10_000),
  acquireTimeoutMs: z.number().int().min(0).max(600_000).default(5_000),
  maxRestarts: z.number().int().min(0).max(1_000).default(5),
  restartWindowMs: z.number().int().min(1_000).max(86_400_000).default(60_000),
});

export type PluginDescriptorInput = z.input<typeof PluginDescriptorSchema>;

export type PluginDescriptor = Omit<z.infer<typeof PluginDescriptorSchema>, "name"> & { name: string };

/** Gives every descriptor a unique name, defaulting to the executable's base name. */
export function resolveDescriptors(entries: Array<z.infer<typeof PluginDescriptorSchema>>): PluginDescriptor[] {
  const seen = new Map<string, number>();
  return entries.map((entry) => {
    const base = entry.name ?? path.basename(entry.path).replace(/\.[^.]+$/, "");
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    if (entry.name && count > 0) {
      throw new Error(`plugin name "${entry.name}" is configured more than once`);
    }
    return { ...entry, name: count === 0 ? base : `${base}-${count + 1}` };
  });
}

export function parseDescriptor(input: PluginDescriptorInput): PluginDescriptor {
  const [descriptor] = resolveDescriptors([PluginDescriptorSchema.parse(input)]);
  if (!descriptor) {
    throw new Error("plugin descriptor could not be resolved");
  }
  return descriptor;
}
