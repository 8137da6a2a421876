/**
 * Current freshen CLI version.
 * This should match the version in package.json.
 */
export const CLI_VERSION = "0.1.0";
