/** Message of anything thrown, for log lines */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
