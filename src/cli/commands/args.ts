/**
 * Extract a flag value from args in --key=value format.
 */
export function extractFlag(args: string[], flag: string): string | undefined {
  const prefix = `--${flag}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : undefined;
}

export function hasHelpFlag(args: string[]): boolean {
  return args.includes('--help') || args.includes('-h');
}
