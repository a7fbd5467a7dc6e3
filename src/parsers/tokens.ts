/**
 * Package token validation
 */

const PACKAGE_TOKEN_REGEX = /^[a-z0-9][a-z0-9+_.@-]*$/;

/**
 * Check whether a string looks like an Arch package name
 * Lowercase only; anything else is not a token
 */
export function isPackageToken(value: string): boolean {
  return PACKAGE_TOKEN_REGEX.test(value);
}
