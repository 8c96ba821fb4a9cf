/** True for Node system errors (`ENOENT`, `EBUSY`, `EACCES`, ...), which are worth retrying. */
export function isIoError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

export function isErrnoCode(err: unknown, code: string): boolean {
  return isIoError(err) && err.code === code;
}
