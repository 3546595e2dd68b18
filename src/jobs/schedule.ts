export type Schedule = {
  readonly source: string;
  /** First firing time strictly after `from`. */
  next(from: Date): Date;
};

type CronField = {
  values: Set<number>;
  unrestricted: boolean;
};

const DESCRIPTORS: Record<string, string> = {
  "@yearly": "0 0 0 1 1 *",
  "@annually": "0 0 0 1 1 *",
  "@monthly": "0 0 0 1 * *",
  "@weekly": "0 0 0 * * 0",
  "@daily": "0 0 0 * * *",
  "@midnight": "0 0 0 * * *",
  "@hourly": "0 0 * * * *",
};

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

const SEARCH_HORIZON_MS = 5 * 366 * 24 * 3_600_000;

function parseInteger(raw: string, source: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new Error(`invalid schedule "${source}": "${raw}" is not a number`);
  }
  return Number(raw);
}

function parseField(raw: string, min: number, max: number, label: string, source: string): CronField {
  const values = new Set<number>();
  for (const part of raw.split(",")) {
    const [rangePart = "", stepPart, extra] = part.split("/");
    if (extra !== undefined || rangePart === "") {
      throw new Error(`invalid schedule "${source}": bad ${label} field "${raw}"`);
    }
    const step = stepPart === undefined ? 1 : parseInteger(stepPart, source);
    if (step < 1) {
      throw new Error(`invalid schedule "${source}": ${label} step must be positive`);
    }

    let lo: number;
    let hi: number;
    if (rangePart === "*" || rangePart === "?") {
      lo = min;
      hi = max;
    } else if (rangePart.includes("-")) {
      const [from = "", to = ""] = rangePart.split("-", 2);
      lo = parseInteger(from, source);
      hi = parseInteger(to, source);
    } else {
      lo = parseInteger(rangePart, source);
      hi = stepPart === undefined ? lo : max;
    }

    if (lo < min || hi > max || lo > hi) {
      throw new Error(`invalid schedule "${source}": ${label} "${part}" is outside ${min}-${max}`);
    }
    for (let value = lo; value <= hi; value += step) {
      values.add(value);
    }
  }
  return { values, unrestricted: raw === "*" || raw === "?" };
}

function parseEvery(raw: string, source: string): Schedule {
  const compact = raw.replace(/\s+/g, "");
  if (!/^(?:\d+(?:ms|s|m|h))+$/.test(compact)) {
    throw new Error(`invalid schedule "${source}": expected a duration such as 30s or 1h30m`);
  }
  let intervalMs = 0;
  for (const match of compact.matchAll(/(\d+)(ms|s|m|h)/g)) {
    const amount = Number(match[1]);
    const unit = UNIT_MS[match[2] ?? ""] ?? 0;
    intervalMs += amount * unit;
  }
  if (intervalMs <= 0) {
    throw new Error(`invalid schedule "${source}": interval must be positive`);
  }
  return {
    source,
    next: (from) => new Date(from.getTime() + intervalMs),
  };
}

function parseCron(expression: string, source: string): Schedule {
  const fields = expression.trim().split(/\s+/);
  if (fields.length === 5) {
    fields.unshift("0");
  }
  if (fields.length !== 6) {
    throw new Error(`invalid schedule "${source}": expected 5 or 6 fields, got ${fields.length}`);
  }
  const [secRaw = "", minRaw = "", hourRaw = "", domRaw = "", monthRaw = "", dowRaw = ""] = fields;
  const seconds = parseField(secRaw, 0, 59, "second", source);
  const minutes = parseField(minRaw, 0, 59, "minute", source);
  const hours = parseField(hourRaw, 0, 23, "hour", source);
  const dom = parseField(domRaw, 1, 31, "day-of-month", source);
  const months = parseField(monthRaw, 1, 12, "month", source);
  const dow = parseField(dowRaw, 0, 7, "day-of-week", source);
  if (dow.values.has(7)) {
    dow.values.delete(7);
    dow.values.add(0);
  }

  const dayMatches = (at: Date): boolean => {
    const domOk = dom.values.has(at.getUTCDate());
    const dowOk = dow.values.has(at.getUTCDay());
    if (dom.unrestricted || dow.unrestricted) return domOk && dowOk;
    return domOk || dowOk;
  };

  const next = (from: Date): Date => {
    const limit = from.getTime() + SEARCH_HORIZON_MS;
    let t = new Date(Math.floor(from.getTime() / 1000) * 1000 + 1000);
    while (t.getTime() <= limit) {
      const y = t.getUTCFullYear();
      const mo = t.getUTCMonth();
      const d = t.getUTCDate();
      const h = t.getUTCHours();
      const mi = t.getUTCMinutes();
      if (!months.values.has(mo + 1)) {
        t = new Date(Date.UTC(y, mo + 1, 1));
        continue;
      }
      if (!dayMatches(t)) {
        t = new Date(Date.UTC(y, mo, d + 1));
        continue;
      }
      if (!hours.values.has(h)) {
        t = new Date(Date.UTC(y, mo, d, h + 1));
        continue;
      }
      if (!minutes.values.has(mi)) {
        t = new Date(Date.UTC(y, mo, d, h, mi + 1));
        continue;
      }
      if (!seconds.values.has(t.getUTCSeconds())) {
        t = new Date(t.getTime() + 1000);
        continue;
      }
      return t;
    }
    throw new Error(`schedule "${source}" has no firing time within five years`);
  };

  return { source, next };
}

/**
 * Accepts `@every <duration>`, the `@hourly`-style descriptors, and five- or
 * six-field cron expressions. Cron fields are evaluated in UTC.
 */
export function parseSchedule(source: string): Schedule {
  const trimmed = source.trim();
  if (trimmed.startsWith("@every")) {
    return parseEvery(trimmed.slice("@every".length), source);
  }
  if (trimmed.startsWith("@")) {
    const expansion = DESCRIPTORS[trimmed];
    if (!expansion) {
      throw new Error(`invalid schedule "${source}": unknown descriptor`);
    }
    return parseCron(expansion, source);
  }
  return parseCron(trimmed, source);
}
