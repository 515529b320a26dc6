import type { Operation } from "./operation.js";

/**
 * Capability-checking engine. Decides whether the presented tokens
 * authorize an operation; minting and verifying the tokens is its business.
 */
export interface Authorizer {
  allow(operation: Operation, tokens: string[]): Promise<boolean>;
}

/**
 * Parse the capability tokens presented in a `Macaroons` header value.
 * Several tokens are separated by commas.
 */
export function parseTokens(header: string | undefined): string[] {
  if (!header) {
    return [];
  }
  return header
    .split(",")
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
}
