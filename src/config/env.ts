import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../router/errors";

dotenv.config();

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const EnvSchema = z.object({
  ACTIONBASE_CONFIG: optionalString,
  ACTIONBASE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
  ACTIONBASE_HTTP_PORT: z.coerce.number().int().min(0).max(65535).optional(),
});

export type ActionbaseEnv = z.infer<typeof EnvSchema>;

export function readEnv(source: NodeJS.ProcessEnv = process.env): ActionbaseEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid actionbase env: ${message}`);
  }
  return parsed.data;
}
