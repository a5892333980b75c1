/**
 * Extracts a readable message from an unknown error value.
 * Use when converting a caught value into a report cause or log context.
 */
export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string' && err.length > 0) return err;
  return 'Unknown error';
}

/** Node system errors carry a string `code` such as ENOENT or ESRCH. */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/** HTTP-backed clients (the Docker Engine API) report a numeric `statusCode`. */
export function errorStatusCode(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'statusCode' in err) {
    const { statusCode } = err;
    return typeof statusCode === 'number' ? statusCode : undefined;
  }
  return undefined;
}
