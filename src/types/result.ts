/**
 * Tagged success/failure value returned by stores and by the coordinator.
 * Mirrors the `{ success, data | error }` shape the HTTP layer sends back.
 */
export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export const ok = <T>(data: T): Result<T, never> => ({ success: true, data });

export const fail = <E>(error: E): Result<never, E> => ({ success: false, error });
