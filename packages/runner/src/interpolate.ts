/**
 * Message templating
 *
 * Templates go through two passes, always in this order:
 * 1. `{name}` placeholders are replaced by symbol resolvers.
 * 2. `{}` slots are filled with positional arguments.
 *
 * Slots are counted in the template's own text only, so neither named
 * placeholders nor the values they resolve to are taken for positional slots.
 */

export type SymbolResolver = (name: string) => string | undefined;

const NAMED_PLACEHOLDER = /\{([^}]+)\}/g;
const POSITIONAL_SLOT = /\{\}/g;
const PLACEHOLDER_SPLIT = /(\{[^}]+\})/;

/**
 * Text form of a value in messages and command lines
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  if (typeof value === 'function') return `[directive ${value.name || 'anonymous'}]`;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Replace each `{name}` with the first resolver's value for `name`.
 * Placeholders no resolver knows are left as they are.
 */
export function interpolateSymbols(template: string, ...resolvers: SymbolResolver[]): string {
  return template.replace(NAMED_PLACEHOLDER, (placeholder: string, name: string) => {
    for (const resolve of resolvers) {
      const value = resolve(name);
      if (value !== undefined) {
        return value;
      }
    }
    return placeholder;
  });
}

export function countSlots(template: string): number {
  return template.match(POSITIONAL_SLOT)?.length ?? 0;
}

/**
 * Interpolate symbols, then fill `{}` slots with `args`.
 *
 * Only `{}` slots in the template's own text count; resolved symbol values
 * are inserted as they are. When there are more arguments than slots,
 * `": "` and one `"{} "` per missing slot are appended first. Slots left
 * without an argument render empty. Without arguments the interpolated
 * template is returned as is.
 *
 * @example
 * ```ts
 * formatMessage('{}-{}', ['a']) // => 'a-'
 * formatMessage('got', [1, 2]) // => 'got: 1 2 '
 * ```
 */
export function formatMessage(
  template: string,
  args: readonly unknown[] = [],
  resolvers: readonly SymbolResolver[] = [],
): string {
  if (args.length === 0) {
    return interpolateSymbols(template, ...resolvers);
  }

  // Odd indexes hold named placeholders
  const parts = template.split(PLACEHOLDER_SPLIT);
  const literals = parts.filter((_, i) => i % 2 === 0);
  const missing = args.length - literals.reduce((total, text) => total + countSlots(text), 0);
  if (missing > 0) {
    parts[parts.length - 1] += ': ' + '{} '.repeat(missing);
  }

  let next = 0;
  const fill = (text: string) =>
    text.replace(POSITIONAL_SLOT, () => {
      const value = next < args.length ? formatValue(args[next]) : '';
      next++;
      return value;
    });

  return parts
    .map((part, i) => (i % 2 === 0 ? fill(part) : interpolateSymbols(part, ...resolvers)))
    .join('');
}

/**
 * Prefix every line of `text` with `indent` spaces and `prefix`
 */
export function reindent(text: string, indent: number, prefix: string = ''): string {
  const lead = ' '.repeat(indent) + prefix;
  return text
    .split('\n')
    .map((line) => lead + line)
    .join('\n');
}
