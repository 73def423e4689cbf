/**
 * Email addresses are compared trimmed and lower-cased on both sides of the
 * sync
 */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
