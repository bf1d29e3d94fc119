export type OutcomeResult<T> = {
  readonly kind: "result";
  readonly value: T;
};

/** The step succeeded, but something non-fatal happened on the way. */
export type OutcomeWarning<T> = {
  readonly kind: "warning";
  readonly value: T;
  readonly warning: Error;
};

/**
 * The step failed. `partial` keeps whatever was produced before the failure,
 * so multi-stage work can stop early without losing prior progress.
 */
export type OutcomeException<T> = {
  readonly kind: "exception";
  readonly error: Error;
  readonly partial: T | null;
};

export type Outcome<T> = OutcomeResult<T> | OutcomeWarning<T> | OutcomeException<T>;

export type OutcomeSuccess<T> = OutcomeResult<T> | OutcomeWarning<T>;

export function toError(cause: unknown): Error {
  if (cause instanceof Error) return cause;
  return new Error(String(cause));
}

export function result<T>(value: T): OutcomeResult<T> {
  return { kind: "result", value };
}

export function warning<T>(value: T, cause: unknown): OutcomeWarning<T> {
  return { kind: "warning", value, warning: toError(cause) };
}

export function exception<T = never>(cause: unknown, partial: T | null = null): OutcomeException<T> {
  return { kind: "exception", error: toError(cause), partial };
}

export function isSuccess<T>(outcome: Outcome<T>): outcome is OutcomeSuccess<T> {
  return outcome.kind !== "exception";
}

export function resultOrRaise<T>(outcome: Outcome<T>): T {
  switch (outcome.kind) {
    case "result":
    case "warning":
      return outcome.value;
    case "exception":
      throw outcome.error;
  }
}

export function resultOrNull<T>(outcome: Outcome<T>): T | null {
  return isSuccess(outcome) ? outcome.value : null;
}

export function exceptionOrNull<T>(outcome: Outcome<T>): Error | null {
  return outcome.kind === "exception" ? outcome.error : null;
}

export function warningOrNull<T>(outcome: Outcome<T>): Error | null {
  return outcome.kind === "warning" ? outcome.warning : null;
}

export async function capture<T>(task: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return result(await task());
  } catch (error) {
    return exception<T>(error);
  }
}

export function mapOutcome<T, U>(outcome: Outcome<T>, fn: (value: T) => U): Outcome<U> {
  switch (outcome.kind) {
    case "exception":
      return exception<U>(outcome.error);
    case "result":
    case "warning": {
      let mapped: U;
      try {
        mapped = fn(outcome.value);
      } catch (error) {
        return exception<U>(error);
      }
      return outcome.kind === "warning" ? warning(mapped, outcome.warning) : result(mapped);
    }
  }
}

export type OutcomeReportItem<K> = {
  key: K;
  status: "ok" | "warning" | "error";
  value?: unknown;
  message?: string;
  code?: string;
};

export type OutcomesReport<K> = {
  total: number;
  succeeded: number;
  failed: number;
  items: Array<OutcomeReportItem<K>>;
};

function errorCode(error: Error): string | undefined {
  if (!("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}

/**
 * Ordered outcomes keyed by input item. Every item keeps exactly one entry;
 * failures are never dropped by the aggregate queries.
 */
export class Outcomes<T, K = string> implements Iterable<[K, Outcome<T>]> {
  private readonly entries = new Map<K, Outcome<T>>();

  set(key: K, outcome: Outcome<T>): void {
    if (this.entries.has(key)) {
      throw new Error(`duplicate outcome key: ${String(key)}`);
    }
    this.entries.set(key, outcome);
  }

  get(key: K): Outcome<T> | undefined {
    return this.entries.get(key);
  }

  get size(): number {
    return this.entries.size;
  }

  get resultCount(): number {
    let count = 0;
    for (const outcome of this.entries.values()) {
      if (isSuccess(outcome)) count += 1;
    }
    return count;
  }

  get exceptionCount(): number {
    return this.size - this.resultCount;
  }

  get warningCount(): number {
    let count = 0;
    for (const outcome of this.entries.values()) {
      if (outcome.kind === "warning") count += 1;
    }
    return count;
  }

  keys(): K[] {
    return [...this.entries.keys()];
  }

  results(): T[] {
    const values: T[] = [];
    for (const outcome of this.entries.values()) {
      if (isSuccess(outcome)) values.push(outcome.value);
    }
    return values;
  }

  exceptions(): Error[] {
    const errors: Error[] = [];
    for (const outcome of this.entries.values()) {
      if (outcome.kind === "exception") errors.push(outcome.error);
    }
    return errors;
  }

  warnings(): Error[] {
    const errors: Error[] = [];
    for (const outcome of this.entries.values()) {
      if (outcome.kind === "warning") errors.push(outcome.warning);
    }
    return errors;
  }

  resultPredicateCount(predicate: (value: T) => boolean): number {
    return this.results().filter(predicate).length;
  }

  /** Applies `fn` to successful entries only; a throw turns that entry into an exception. */
  mapResults<U>(fn: (value: T, key: K) => U): Outcomes<U, K> {
    const mapped = new Outcomes<U, K>();
    for (const [key, outcome] of this.entries) {
      mapped.set(
        key,
        mapOutcome(outcome, (value) => fn(value, key))
      );
    }
    return mapped;
  }

  resultsOrRaise(): T[] {
    for (const outcome of this.entries.values()) {
      if (outcome.kind === "exception") throw outcome.error;
    }
    return this.results();
  }

  report(project: (value: T) => unknown = (value) => value): OutcomesReport<K> {
    const items: Array<OutcomeReportItem<K>> = [];
    for (const [key, outcome] of this.entries) {
      switch (outcome.kind) {
        case "result":
          items.push({ key, status: "ok", value: project(outcome.value) });
          break;
        case "warning":
          items.push({
            key,
            status: "warning",
            value: project(outcome.value),
            message: outcome.warning.message,
            code: errorCode(outcome.warning),
          });
          break;
        case "exception":
          items.push({ key, status: "error", message: outcome.error.message, code: errorCode(outcome.error) });
          break;
      }
    }
    return { total: this.size, succeeded: this.resultCount, failed: this.exceptionCount, items };
  }

  [Symbol.iterator](): Iterator<[K, Outcome<T>]> {
    return this.entries[Symbol.iterator]();
  }
}
