/**
 * Generic success/error result
 *
 * Use for operations that return data on success. The error payload
 * defaults to a message string; pass a structured type when callers need
 * to branch on the failure.
 *
 * @example
 * ```typescript
 * function readStatus(path: string): Result<string> {
 *   if (exists(path)) {
 *     return { success: true, data: contents }
 *   }
 *   return { success: false, error: 'Status file not found' }
 * }
 * ```
 */
export type Result<T, E = string> = { success: true; data: T } | { success: false; error: E }

/**
 * Generic success/error result with optional data
 *
 * Use for operations that may not return data on success (e.g., publish, delete).
 *
 * @example
 * ```typescript
 * function publish(record: StatusRecord): OptionalResult<void, PublishError> {
 *   if (written) {
 *     return { success: true }
 *   }
 *   return { success: false, error: { kind: 'io', message, target } }
 * }
 * ```
 */
export type OptionalResult<T, E = string> =
  | { success: true; data?: T }
  | { success: false; error: E }

/**
 * Convert an unknown thrown value into a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
