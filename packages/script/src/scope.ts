/**
 * The only names a script can see or bind.
 */
export interface Scope {
  has(name: string): boolean;
  get(name: string): unknown;
  set(name: string, value: unknown): void;
}

/** Map-backed scope, seeded from `initial` */
export function createScope(initial: Record<string, unknown> = {}): Scope {
  const values = new Map<string, unknown>(Object.entries(initial));
  return {
    has: (name) => values.has(name),
    get: (name) => values.get(name),
    set: (name, value) => {
      values.set(name, value);
    },
  };
}
