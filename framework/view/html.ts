/**
 * HTML Utilities
 *
 * Escaping and the `SafeHtml` marker for markup that must be emitted as-is,
 * such as the output of an already rendered partial.
 */

const ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * Markup that has already been escaped or rendered
 */
export class SafeHtml {
  constructor(public readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

/**
 * Escape HTML entities. SafeHtml passes through untouched.
 */
export function escape(value: unknown): string {
  if (value instanceof SafeHtml) {
    return value.content;
  }

  return String(value ?? '').replace(/[&<>"']/g, (char) => ENTITIES[char] ?? char);
}

export function raw(content: string): SafeHtml {
  return new SafeHtml(content);
}

/**
 * HTML tagged template literal
 *
 * @example
 * html`<li>${item.name}</li>`
 */
export function html(strings: TemplateStringsArray, ...values: unknown[]): SafeHtml {
  let result = strings[0] ?? '';

  values.forEach((value, i) => {
    result += escape(value) + (strings[i + 1] ?? '');
  });

  return new SafeHtml(result);
}

