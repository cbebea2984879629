/**
 * HTML Building Blocks
 * Layer: Interfaces (HTTP)
 *
 * A tagged template literal that escapes every interpolated value unless it is
 * already SafeHtml. Views compose SafeHtml fragments; only layout() turns the
 * result into a string for `res.send()`.
 *
 *   html`<td>${bank.name}</td>`          // name is escaped
 *   html`<ul>${banks.map(row)}</ul>`     // arrays of fragments are joined
 */
export class SafeHtml {
  constructor(public readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

export function escapeHtml(value: unknown): string {
  return String(value ?? '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function render(value: unknown): string {
  if (value instanceof SafeHtml) return value.content;
  if (Array.isArray(value)) return value.map(render).join('');
  return escapeHtml(value);
}

export function html(strings: TemplateStringsArray, ...values: unknown[]): SafeHtml {
  let result = '';

  for (let i = 0; i < strings.length; i++) {
    result += strings[i];
    if (i < values.length) {
      result += render(values[i]);
    }
  }

  return new SafeHtml(result);
}
