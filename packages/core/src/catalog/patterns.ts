/**
 * Ready-made patterns for common identifier and date formats.
 * They spell out every class instead of using `\w` or `\d`, so the output is
 * the same whatever alphabet is configured.
 */

const OCTET = '(25[0-5]|2[0-4][0-9]|1[0-9]{2}|[1-9][0-9]|[0-9])';
const SEMVER_PART = '(0|[1-9][0-9]*)';
const BASE64URL = '[A-Za-z0-9_-]';

export const PATTERNS = Object.freeze({
  UUID4:
    '[a-f0-9]{8}-[a-f0-9]{4}-4[a-f0-9]{3}-[89ab][a-f0-9]{3}-[a-f0-9]{12}',
  OBJECT_ID: '[a-f0-9]{24}',
  IPV4: `${OCTET}\\.${OCTET}\\.${OCTET}\\.${OCTET}`,
  IPV6_SHORT: '[a-f0-9]{1,4}(:[a-f0-9]{1,4}){7}',
  MAC_ADDRESS: '[a-f0-9]{2}(:[a-f0-9]{2}){5}',
  HEX_COLOR: '#[a-fA-F0-9]{6}',
  HEX_COLOR_SHORT: '#[a-fA-F0-9]{3}',
  SLUG: '[a-z][a-z0-9]*(-[a-z0-9]+){1,5}',
  SEMVER: `${SEMVER_PART}\\.${SEMVER_PART}\\.${SEMVER_PART}`,
  DATE_ISO: '20[2-3][0-9]-(0[1-9]|1[0-2])-(0[1-9]|[12][0-9]|3[01])',
  TIME_24H: '([01][0-9]|2[0-3]):[0-5][0-9]:[0-5][0-9]',
  JWT_LIKE: `${BASE64URL}{20,40}\\.${BASE64URL}{20,60}\\.${BASE64URL}{20,40}`,
  API_KEY: '(sk|pk)_(live|test)_[a-zA-Z0-9]{20}',
} as const);

export type PatternName = keyof typeof PATTERNS;

export function isPatternName(name: string): name is PatternName {
  return Object.prototype.hasOwnProperty.call(PATTERNS, name);
}
