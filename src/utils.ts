export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function redactToken(token: string): string {
  const trimmed = token.trim();
  if (trimmed.length <= 4) {
    return '****';
  }
  return `${trimmed.slice(0, 4)}…`;
}
