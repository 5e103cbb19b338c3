/** A variable an optional sink needs is not set; the sink is skipped, scoring is not affected. */
export class SinkConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SinkConfigError';
  }
}

export function requireEnv(name: string, hint?: string): string {
  const value = process.env[name];
  if (!value) {
    throw new SinkConfigError(`Missing ${name} in environment${hint ? ` (${hint})` : ''}`);
  }
  return value;
}
