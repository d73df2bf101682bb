import type { ExportConfig } from "../config";
import type { Subscription } from "../export";

export function createTestConfig(overrides?: Partial<ExportConfig>): ExportConfig {
  return {
    apiToken: "test-token",
    host: "api.example.com",
    graphqlPath: "/api/graphql",
    logLevel: "silent",
    ...overrides,
  };
}

/**
 * Builds a Subscription with every optional field absent unless overridden.
 */
export function createTestSubscription(
  overrides?: Partial<Subscription>,
): Subscription {
  return {
    name: "Test Feed",
    url: "https://example.com/feed.xml",
    folder: null,
    createdAt: null,
    lastFetchedAt: null,
    description: null,
    newsletterEmail: null,
    refreshedAt: null,
    count: null,
    icon: null,
    isPrivate: null,
    autoAddToLibrary: null,
    fetchContent: null,
    failedAt: null,
    ...overrides,
  };
}

/**
 * Wraps raw subscription items in the body the subscriptions query returns.
 */
export function subscriptionsBody(items: ReadonlyArray<Record<string, unknown>>): string {
  return JSON.stringify({ data: { subscriptions: { subscriptions: items } } });
}
