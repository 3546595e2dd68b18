import { parseSchedule, type Schedule } from "../jobs/schedule";
import { DuplicateRegistrationError } from "../router/errors";

export type TimerInvocable = () => Promise<unknown>;

export type TimerRegistration = {
  readonly name: string;
  readonly schedule: Schedule;
  readonly invoke: TimerInvocable;
};

export class TimerRegistry {
  private readonly timers = new Map<string, TimerRegistration>();
  private sealed = false;

  /** Throws on an unparsable schedule before anything is recorded. */
  registerTimer(name: string, schedule: string, invoke: TimerInvocable): void {
    if (this.sealed) {
      throw new Error("timer registry is sealed; timers can only be registered during startup");
    }
    if (this.timers.has(name)) {
      throw new DuplicateRegistrationError("timer", name);
    }
    this.timers.set(name, { name, schedule: parseSchedule(schedule), invoke });
  }

  seal(): void {
    this.sealed = true;
  }

  list(): TimerRegistration[] {
    return [...this.timers.values()];
  }

  get(name: string): TimerRegistration | null {
    return this.timers.get(name) ?? null;
  }
}
