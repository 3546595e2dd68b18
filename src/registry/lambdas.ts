import type { RequestContext } from "../router/context";
import { DuplicateRegistrationError, UnknownActionError } from "../router/errors";

export type LambdaInvocable = (args: unknown, ctx: RequestContext) => Promise<unknown>;

export class LambdaRegistry {
  private readonly lambdas = new Map<string, LambdaInvocable>();
  private sealed = false;

  registerLambda(name: string, invocable: LambdaInvocable): void {
    if (this.sealed) {
      throw new Error("lambda registry is sealed; lambdas can only be registered during startup");
    }
    if (this.lambdas.has(name)) {
      throw new DuplicateRegistrationError("lambda", name);
    }
    this.lambdas.set(name, invocable);
  }

  seal(): void {
    this.sealed = true;
  }

  names(): string[] {
    return [...this.lambdas.keys()];
  }

  async invokeLambda(name: string, args: unknown, ctx: RequestContext): Promise<unknown> {
    const lambda = this.lambdas.get(name);
    if (!lambda) {
      throw new UnknownActionError(name);
    }
    return lambda(args, ctx);
  }
}
