function isVerbose(): boolean {
  const raw = process.env.VERBOSE?.trim().toLowerCase();
  return raw === 'true' || raw === '1' || raw === 'yes';
}

export function setVerbose(enabled: boolean): void {
  process.env.VERBOSE = enabled ? 'true' : 'false';
}

/** Detail output, shown only when VERBOSE is on. */
export function logDetail(scope: string, message: string): void {
  if (isVerbose()) {
    console.info(`[${scope}] ${message}`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error && error.message.trim()) {
    return error.message.trim();
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'unknown error';
}
