/** Success-or-failure value, shaped like zod's `safeParse` result. */
export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}
