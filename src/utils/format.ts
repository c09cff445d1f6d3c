/**
 * Fill `{name}` placeholders; names without a parameter stay as written
 */
export function fmt(template: string, params: Readonly<Record<string, string | number>>): string {
  return template.replace(/{(\w+)}/g, (placeholder: string, key: string) => {
    const value = params[key];
    return value === undefined ? placeholder : String(value);
  });
}
