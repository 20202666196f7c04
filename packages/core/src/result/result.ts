export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export const ok = <T, E = never>(data: T): Result<T, E> => ({
  success: true,
  data,
});

export const err = <E, T = never>(error: E): Result<T, E> => ({
  success: false,
  error,
});

export type AndThenReturn<T1, T2, E> = (data: Result<T1, E>) => Result<T2, E>;

export const andThen = <T1, T2, E>(
  fn: (data: T1) => Result<T2, E>
): AndThenReturn<T1, T2, E> => {
  return (data) => {
    if (data.success) {
      return fn(data.data);
    }
    return data;
  };
};

/**
 * Runs `fn`, turning the errors `recover` recognises into an err result.
 * Errors it returns undefined for are rethrown.
 */
export const tryCatch = <T, E>(
  fn: () => T,
  recover: (error: unknown) => E | undefined
): Result<T, E> => {
  try {
    return ok(fn());
  } catch (error) {
    const recovered = recover(error);
    if (recovered === undefined) throw error;
    return err(recovered);
  }
};
