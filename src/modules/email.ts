/**
 * Escape a literal string for use inside a RegExp
 * @param value - Text to escape
 */
function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build the pattern an institutional address must match: a local part of
 * alphanumerics and `. _ % + -`, then `@` and exactly the given domain.
 * The domain comparison is case-sensitive.
 * @param domain - e.g. `uclan.ac.uk`
 */
export function buildEmailPattern(domain: string): RegExp {
  return new RegExp(`^[a-zA-Z0-9._%+-]+@${escapeRegExp(domain)}$`);
}

/**
 * Check a direct message body against the institutional email pattern
 * @param content - Raw message content (surrounding whitespace is ignored)
 * @param domain - Accepted domain
 */
export function isValidEmail(content: string, domain: string): boolean {
  return buildEmailPattern(domain).test(content.trim());
}
