const REGISTRABLE_DOMAIN = /(?<domain>[a-z0-9][a-z0-9-]{1,63}\.[a-z.]{2,6})$/i;

/**
 * Extract the registrable domain (name + TLD) from a fully qualified name.
 *
 * Examples:
 * - `a.b.example.com` → `example.com`
 * - `www.example.co.uk` → `example.co.uk`
 * - `localhost` → `localhost` (no match: input returned unchanged)
 *
 * Case is preserved.
 */
export function extractDomain(input: string): string {
  const match = REGISTRABLE_DOMAIN.exec(input);
  return match?.groups?.domain ?? input;
}

/**
 * Extract the subdomain prefix of a fully qualified name.
 *
 * Examples:
 * - `a.b.example.com` → `a.b`
 * - `example.com` → `` (empty string = apex)
 */
export function extractSubdomain(input: string): string {
  const domain = extractDomain(input);
  const index = input.indexOf(domain);
  if (index <= 0) return '';
  return input.slice(0, index).replace(/\.+$/, '');
}
