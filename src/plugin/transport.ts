import { spawn, type ChildProcessByStdio } from "node:child_process";
import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { Logger } from "../config/logger";
import {
  ActionError,
  PluginCallError,
  PluginProtocolError,
  PluginTimeoutError,
  PluginUnavailableError,
} from "../router/errors";
import type { PluginDescriptor } from "./descriptor";
import {
  decodeReply,
  encodeRequest,
  PluginErrorDataSchema,
  type PluginErrorData,
  type PluginReply,
  type RequestKind,
} from "./protocol";

export type TransportExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: string;
};

/**
 * Request/response channel to one running plugin instance. At most one
 * request is in flight at a time.
 */
export interface PluginTransport {
  readonly pid: number | null;
  request(kind: RequestKind, name: string, context: Record<string, unknown> | null, timeoutMs: number): Promise<unknown>;
  onExit(listener: (exit: TransportExit) => void): void;
  isAlive(): boolean;
  /** SIGKILL, no waiting. */
  kill(): void;
  /** SIGTERM, then SIGKILL after `graceMs`. Resolves once the process is gone. */
  close(graceMs?: number): Promise<void>;
}

export type TransportFactory = (descriptor: PluginDescriptor, logger: Logger) => PluginTransport;

type Pending = {
  id: number;
  name: string;
  resolve: (value: unknown) => void;
  reject: (reason: ActionError) => void;
  timer: NodeJS.Timeout;
};

function toErrorData(data: unknown): PluginErrorData {
  const parsed = PluginErrorDataSchema.safeParse(data);
  if (parsed.success) return parsed.data;
  return { message: typeof data === "string" ? data : JSON.stringify(data ?? null) };
}

/** Newline-delimited JSON over a spawned process's stdin/stdout. */
export class ExecTransport implements PluginTransport {
  private readonly child: ChildProcessByStdio<Writable, Readable, Readable>;
  private readonly exitListeners: Array<(exit: TransportExit) => void> = [];
  private readonly exited: Promise<TransportExit>;
  private resolveExited: (exit: TransportExit) => void = () => {};
  private exitInfo: TransportExit | null = null;
  private pending: Pending | null = null;
  private broken: string | null = null;
  private nextId = 0;

  constructor(
    private readonly plugin: string,
    command: { path: string; args: string[]; env?: Record<string, string> },
    private readonly logger: Logger
  ) {
    this.exited = new Promise<TransportExit>((resolve) => {
      this.resolveExited = resolve;
    });

    this.child = spawn(command.path, command.args, {
      stdio: ["pipe", "pipe", "pipe"],
      env: { ...process.env, ...command.env },
    });

    const lines = readline.createInterface({ input: this.child.stdout, crlfDelay: Infinity });
    lines.on("line", (line) => this.handleLine(line));

    this.child.stderr.on("data", (chunk: Buffer) => {
      this.logger.debug("plugin_stderr", { plugin: this.plugin, pid: this.pid, output: String(chunk) });
    });

    this.child.stdin.on("error", (error: Error) => this.writeFailed(error));

    this.child.on("error", (error: Error) => {
      this.logger.error("plugin_process_error", { plugin: this.plugin, message: error.message });
      if (this.child.pid === undefined) {
        this.finish({ code: null, signal: null, error: error.message });
      }
    });

    this.child.on("exit", (code, signal) => {
      this.finish({ code, signal });
    });
  }

  get pid(): number | null {
    return this.child.pid ?? null;
  }

  isAlive(): boolean {
    return this.exitInfo === null && this.broken === null;
  }

  onExit(listener: (exit: TransportExit) => void): void {
    if (this.exitInfo) {
      listener(this.exitInfo);
      return;
    }
    this.exitListeners.push(listener);
  }

  request(
    kind: RequestKind,
    name: string,
    context: Record<string, unknown> | null,
    timeoutMs: number
  ): Promise<unknown> {
    if (this.exitInfo) {
      return Promise.reject(new PluginUnavailableError(this.plugin, "process has exited"));
    }
    if (this.broken) {
      return Promise.reject(new PluginUnavailableError(this.plugin, this.broken));
    }
    if (this.pending) {
      return Promise.reject(new Error(`transport for ${this.plugin} already has a call in flight`));
    }

    const id = this.nextId;
    this.nextId += 1;
    const frame =
      kind === "init" ? encodeRequest({ id, kind, name }) : encodeRequest({ id, kind, name, context: context ?? {} });

    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.pending?.id !== id) return;
        this.pending = null;
        this.logger.warn("plugin_call_timeout", { plugin: this.plugin, pid: this.pid, name, id, timeoutMs });
        this.breakWith(`call ${name} timed out`);
        reject(new PluginTimeoutError(this.plugin, name, timeoutMs));
      }, timeoutMs);
      this.pending = { id, name, resolve, reject, timer };
      this.child.stdin.write(frame, (error) => {
        if (error) this.writeFailed(error);
      });
    });
  }

  kill(): void {
    if (this.exitInfo) return;
    this.child.kill("SIGKILL");
  }

  async close(graceMs = 2_000): Promise<void> {
    if (this.exitInfo) return;
    this.fail(new PluginUnavailableError(this.plugin, "transport closed"));
    this.child.stdin.end();
    this.child.kill("SIGTERM");
    let timer: NodeJS.Timeout | null = null;
    const forced = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), graceMs);
    });
    const outcome = await Promise.race([this.exited, forced]);
    if (timer) clearTimeout(timer);
    if (outcome === "timeout") {
      this.child.kill("SIGKILL");
      await this.exited;
    }
  }

  private handleLine(line: string): void {
    if (line.trim().length === 0) return;
    let reply: PluginReply;
    try {
      reply = decodeReply(line);
    } catch (error) {
      this.violation(error instanceof Error ? error.message : String(error));
      return;
    }

    const pending = this.pending;
    if (!pending) {
      this.violation(`reply id ${reply.id} arrived with no call outstanding`);
      return;
    }
    if (reply.id !== pending.id) {
      this.violation(`reply id ${reply.id} does not match request id ${pending.id}`);
      return;
    }

    this.pending = null;
    clearTimeout(pending.timer);
    if (reply.kind === "result") {
      pending.resolve(reply.data ?? null);
    } else {
      pending.reject(new PluginCallError(this.plugin, toErrorData(reply.data)));
    }
  }

  private violation(message: string): void {
    this.logger.error("plugin_protocol_violation", { plugin: this.plugin, pid: this.pid, message });
    this.fail(new PluginProtocolError(this.plugin, message));
    this.breakWith(message);
  }

  // A process that stopped reading can never answer again.
  private writeFailed(error: Error): void {
    if (this.exitInfo) return;
    const reason = `write failed: ${error.message}`;
    if (!this.broken) {
      this.logger.warn("plugin_write_failed", { plugin: this.plugin, pid: this.pid, message: error.message });
    }
    this.fail(new PluginUnavailableError(this.plugin, reason));
    this.breakWith(reason);
  }

  private fail(error: ActionError): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.reject(error);
  }

  private breakWith(reason: string): void {
    if (this.broken) return;
    this.broken = reason;
    this.kill();
  }

  private finish(exit: TransportExit): void {
    if (this.exitInfo) return;
    this.exitInfo = exit;
    this.fail(
      new PluginUnavailableError(
        this.plugin,
        exit.error ?? `process exited (code=${String(exit.code)}, signal=${String(exit.signal)})`
      )
    );
    for (const listener of this.exitListeners.splice(0)) {
      listener(exit);
    }
    this.resolveExited(exit);
  }
}

export const createTransport: TransportFactory = (descriptor, logger) => {
  if (descriptor.transport === "exec") {
    return new ExecTransport(descriptor.name, descriptor, logger);
  }
  throw new Error(`unsupported plugin transport "${String(descriptor.transport)}"`);
};
