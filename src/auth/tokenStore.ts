import { z } from "zod";

export const AccessTokenSchema = z.object({
  token: z.string().min(1),
  userId: z.string().min(1),
  issuedAt: z.string(),
  expiresAt: z.string().nullable(),
});

export type AccessToken = z.infer<typeof AccessTokenSchema>;

export interface TokenStore {
  readonly impl: string;
  get(token: string): Promise<AccessToken | null>;
  put(token: AccessToken): Promise<void>;
  delete(token: string): Promise<void>;
  close(): Promise<void>;
}

export function isExpired(token: AccessToken, now: Date = new Date()): boolean {
  if (!token.expiresAt) return false;
  const expiresMs = Date.parse(token.expiresAt);
  return !Number.isFinite(expiresMs) || expiresMs <= now.getTime();
}

export class MemoryTokenStore implements TokenStore {
  readonly impl = "memory";
  private readonly tokens = new Map<string, AccessToken>();

  async get(token: string): Promise<AccessToken | null> {
    return this.tokens.get(token) ?? null;
  }

  async put(token: AccessToken): Promise<void> {
    this.tokens.set(token.token, { ...token });
  }

  async delete(token: string): Promise<void> {
    this.tokens.delete(token);
  }

  async close(): Promise<void> {
    this.tokens.clear();
  }
}
