/**
 * Invocation context helpers
 *
 * The function is exposed to other accounts through aliases named
 * `account-<accountId>`. A qualified function ARN has 8 segments:
 * arn:aws:lambda:<region>:<account>:function:<name>:<alias>
 */

const QUALIFIED_ARN_SEGMENTS = 8;
const ACCOUNT_MARKER = 'account-';

export function getAliasFromArn(arn: string): string | null {
  const segments = arn.split(':');
  if (segments.length !== QUALIFIED_ARN_SEGMENTS) {
    return null;
  }
  return segments[QUALIFIED_ARN_SEGMENTS - 1] || null;
}

/**
 * Account id the function was invoked for: the text after the last
 * `account-` marker of the alias, or the whole qualifier when it has no
 * marker (so `:live` or `:7` never match a real account id).
 * Null only for an unqualified ARN.
 */
export function getInvokingAccount(arn: string): string | null {
  const alias = getAliasFromArn(arn);
  if (!alias) {
    return null;
  }
  const markerAt = alias.lastIndexOf(ACCOUNT_MARKER);
  return markerAt === -1 ? alias : alias.slice(markerAt + ACCOUNT_MARKER.length);
}
