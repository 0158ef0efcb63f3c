/**
 * Convert a hyphen-separated identifier to its compound form:
 * `security-baseline` becomes `securityBaseline`.
 */
export function toCamelCase(name: string): string {
  const [first, ...rest] = name.split('-');
  return first.toLowerCase() + rest.map(capitalize).join('');
}

function capitalize(segment: string): string {
  return segment.charAt(0).toUpperCase() + segment.slice(1).toLowerCase();
}
