/**
 * Binding names
 *
 * Placeholders are built from field paths (`users.first_name`,
 * `meta-data/notes`), which the execution layer does not accept as bare
 * identifiers. Each illegal character maps to its own token so distinct
 * paths keep distinct placeholders.
 */

import { ValidationError } from '../errors';
import { placeholderNames } from './placeholders';

import type { Binding, ParameterType, Scalar } from '../types';

const REPLACEMENTS: Record<string, string> = {
  '.': '_1_',
  '-': '_2_',
  '/': '_3_',
  '\\': '_4_',
  ' ': '_5_',
};

export function sanitizeBindingName(name: string): string {
  return name.replace(/[./\\ -]/g, (char) => REPLACEMENTS[char] ?? char);
}

/**
 * Sanitize and make sure the name carries the leading colon
 */
export function placeholderFor(name: string): string {
  const safe = sanitizeBindingName(name);
  return safe.startsWith(':') ? safe : `:${safe}`;
}

/**
 * Ordered set of bindings for one statement. Placeholder names are unique.
 */
export class BindingList {
  private readonly items: Binding[] = [];

  get size(): number {
    return this.items.length;
  }

  has(name: string): boolean {
    const placeholder = placeholderFor(name);
    return this.items.some((binding) => binding.name === placeholder);
  }

  add(name: string, value: Scalar, type?: ParameterType): Binding {
    const placeholder = placeholderFor(name);

    if (this.items.some((binding) => binding.name === placeholder)) {
      throw new ValidationError(`Duplicate binding name: ${placeholder}`, name);
    }

    const binding: Binding = type === undefined
      ? { name: placeholder, value }
      : { name: placeholder, value, type };
    this.items.push(binding);
    return binding;
  }

  /**
   * Add, or overwrite the value of an existing placeholder
   */
  replace(name: string, value: Scalar, type?: ParameterType): Binding {
    const placeholder = placeholderFor(name);
    const index = this.items.findIndex((binding) => binding.name === placeholder);

    if (index === -1) {
      return this.add(name, value, type);
    }

    const binding: Binding = type === undefined
      ? { name: placeholder, value }
      : { name: placeholder, value, type };
    this.items[index] = binding;
    return binding;
  }

  all(): Binding[] {
    return [...this.items];
  }

  /**
   * Bindings in the order their placeholders first appear in `sql`.
   * Bindings the SQL never references keep their relative order at the end.
   */
  orderedFor(sql: string): Binding[] {
    const positions = new Map<string, number>();
    placeholderNames(sql).forEach((name, index) => {
      if (!positions.has(name)) {
        positions.set(name, index);
      }
    });

    const referenced = this.items
      .filter((binding) => positions.has(binding.name))
      .sort((a, b) => (positions.get(a.name) ?? 0) - (positions.get(b.name) ?? 0));
    const unreferenced = this.items.filter((binding) => !positions.has(binding.name));

    return [...referenced, ...unreferenced];
  }
}
