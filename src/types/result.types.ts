// Result types for connector and store responses

/**
 * Represents the outcome of an operation that may succeed or fail.
 * Discriminated union prevents invalid states.
 */
export type Result<T> =
  | { readonly success: true; readonly data: T; readonly message: string }        // Success with data
  | { readonly success: true; readonly message: string }                          // Success without data
  | { readonly success: false; readonly message: string };                        // Failure

// ============================================================================
// Type guard shared by connectors and services
// ============================================================================

/**
 * Type guard to check if Result has data (success with data case).
 */
export function isSuccess<T>(result: Result<T>): result is { readonly success: true; readonly data: T; readonly message: string } {
  return result.success && 'data' in result;
}
