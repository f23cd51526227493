/**
 * Error helpers shared across modules.
 */

/**
 * Extract a human-readable message from an unknown thrown value.
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
