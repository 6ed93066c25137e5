// Debug traces go to stderr.
// Enable with HOSTCHECK_DEBUG=1.
export function debugEnabled(): boolean {
  const flag = process.env.HOSTCHECK_DEBUG;
  return flag !== undefined && flag !== '' && flag !== '0';
}

export function debug(scope: string, message: string): void {
  if (debugEnabled()) {
    console.error(`[DEBUG] ${scope}: ${message}`);
  }
}
