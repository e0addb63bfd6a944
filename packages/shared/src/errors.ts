export function reasonFromCode(code: string | undefined) {
  const reason = code || 'UNKNOWN';
  const map: Record<string, string> = {
    EACCES: 'permission_denied',
    EPERM: 'operation_not_permitted',
    ENOENT: 'file_not_found',
    EISDIR: 'is_a_directory',
    ENOTDIR: 'not_a_directory'
  };
  return map[reason] || reason.toLowerCase();
}

export function extractErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object'
    && error !== null && 'code' in error
    && typeof error.code === 'string'
  ) {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'unknown error';
}
