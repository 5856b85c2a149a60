/**
 * Fill `{{name}}` placeholders in one pass. Values are inserted literally:
 * `$` sequences are not expanded, and placeholders inside a value are left
 * as they are. Unknown placeholders stay in the output.
 */
export function fillTemplate(
  template: string,
  values: Readonly<Record<string, string>>,
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, name: string) =>
    Object.hasOwn(values, name) ? (values[name] ?? placeholder) : placeholder,
  );
}
