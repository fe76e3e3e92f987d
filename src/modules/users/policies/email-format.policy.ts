/**
 * src/modules/users/policies/email-format.policy.ts
 *
 * WHY:
 * - Pure decision: is this string acceptable as a user email?
 *
 * RULES:
 * - Valid iff it contains both '@' and '.'. Nothing more.
 * - Do NOT tighten this to RFC validation; "a@b." is a valid email here and
 *   callers rely on that.
 */

export function isValidEmail(email: string): boolean {
  return email.includes('@') && email.includes('.');
}
