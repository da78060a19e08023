// Tagged-template HTML building with escaping of interpolated values.

export class SafeHtml {
  constructor(public readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

export function escapeHtml(value: unknown): string {
  if (value instanceof SafeHtml) return value.content;

  return String(value ?? "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Arrays are joined without separators; each element is escaped. */
export function html(
  strings: TemplateStringsArray,
  ...values: unknown[]
): SafeHtml {
  let result = "";

  strings.forEach((chunk, i) => {
    result += chunk;
    if (i >= values.length) return;

    const value = values[i];
    result += Array.isArray(value)
      ? value.map(escapeHtml).join("")
      : escapeHtml(value);
  });

  return new SafeHtml(result);
}
