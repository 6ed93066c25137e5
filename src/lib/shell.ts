// Single-quote a value for POSIX sh.
export function shellEscape(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}
