import type { IdentityProviderConfig } from "../config/types.js";
import type { IdentityProvider } from "./identity-provider.js";
import { OAuthSignatureIdentityProvider } from "./providers/oauth-signature.js";

export interface CreateProvidersOptions {
  /** HTTP client handed to providers that call out to remote services. */
  fetch?: typeof fetch;
}

/**
 * Build one provider per configuration entry.
 */
export function createIdentityProviders(
  configs: IdentityProviderConfig[],
  options: CreateProvidersOptions = {},
): IdentityProvider[] {
  return configs.map((config) => {
    switch (config.type) {
      case "oauth_signature":
        return new OAuthSignatureIdentityProvider({
          url: config.url,
          name: config.name,
          description: config.description,
          fetch: options.fetch,
        });
    }
  });
}

/**
 * Providers keyed by name. Filled once at startup and read-only afterwards.
 */
export class IdentityProviderRegistry {
  private readonly providers: ReadonlyMap<string, IdentityProvider>;

  constructor(providers: Iterable<IdentityProvider>) {
    const byName = new Map<string, IdentityProvider>();
    for (const provider of providers) {
      if (byName.has(provider.name)) {
        throw new Error(
          `identity provider "${provider.name}" registered more than once`,
        );
      }
      byName.set(provider.name, provider);
    }
    this.providers = byName;
  }

  get(name: string): IdentityProvider | undefined {
    return this.providers.get(name);
  }

  list(): IdentityProvider[] {
    return [...this.providers.values()];
  }

  get size(): number {
    return this.providers.size;
  }
}
