/**
 * Sokosumi environments and their API base URLs.
 */

import { UnknownEnvironmentError } from "./types.js";

export const ENVIRONMENTS = Object.freeze({
  preprod: "https://preprod.sokosumi.com",
  mainnet: "https://app.sokosumi.com",
});

export type EnvironmentId = keyof typeof ENVIRONMENTS;

export const ENVIRONMENT_IDS: readonly EnvironmentId[] = ["preprod", "mainnet"];

export function isEnvironmentId(value: string): value is EnvironmentId {
  return ENVIRONMENT_IDS.some((id) => id === value);
}

/**
 * Look up the base URL for an environment.
 * @throws UnknownEnvironmentError for anything other than "preprod" or "mainnet"
 */
export function resolveEnvironment(environment: string): string {
  if (!isEnvironmentId(environment)) {
    throw new UnknownEnvironmentError(environment, ENVIRONMENT_IDS);
  }
  return ENVIRONMENTS[environment];
}
