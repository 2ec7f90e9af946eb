/**
 * CLI Version Information
 *
 * @module cli/version
 */

/**
 * Current CLI version.
 * Should match package.json version.
 */
export const VERSION = '1.0.0';

export function getVersionInfo(): string {
  return `listing-dedupe v${VERSION}`;
}
