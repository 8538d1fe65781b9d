////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// error handling / result stuff
export type Ok<T> = {
  ok: true;
  value: T;
};
export type Err<E = string> = {
  ok: false;
  error: E;
};
export type Result<T, E = string> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E = string>(error: E): Err<E> {
  return { ok: false, error };
}

// runs fn, converting errors of the given class into an Err. anything else is rethrown.
export function capture<T, E extends Error>(fn: () => T, errorClass: new (...args: never[]) => E): Result<T, E> {
  try {
    return ok(fn());
  } catch (e) {
    if (e instanceof errorClass) {
      return err(e);
    }
    throw e;
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
