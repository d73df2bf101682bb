// pattern: Imperative Shell
import type { Logger } from "pino";
import type { ExportConfig } from "../config";
import {
  errorMessage,
  excerpt,
  GraphQLResponseError,
  MalformedResponseError,
  SubscriptionQueryError,
  TransportError,
} from "../errors";
import {
  graphqlEnvelopeSchema,
  subscriptionItemsSchema,
  subscriptionSchema,
  subscriptionsResultSchema,
} from "./response-schema";
import type { Subscription } from "./types";

export const SUBSCRIPTIONS_QUERY = `
query GetSubscriptions {
  subscriptions {
    ... on SubscriptionsSuccess {
      subscriptions {
        name
        url
        folder
        createdAt
        lastFetchedAt
        description
        newsletterEmail
        refreshedAt
        count
        icon
        isPrivate
        autoAddToLibrary
        fetchContent
        failedAt
      }
    }
    ... on SubscriptionsError {
      errorCodes
    }
  }
}
`;

export function endpointUrl(config: ExportConfig): string {
  return `https://${config.host}${config.graphqlPath}`;
}

/**
 * Issues the subscriptions query and maps the result into Subscription
 * records. The token goes into the Authorization header as is, with no
 * scheme prefix. Not retried.
 *
 * @throws TransportError on a network fault or non-2xx status
 * @throws GraphQLResponseError when the body carries a top-level `errors` list
 * @throws SubscriptionQueryError when the result carries `errorCodes`
 * @throws MalformedResponseError when the body is not the expected JSON shape
 */
export async function fetchSubscriptions(
  config: ExportConfig,
  logger: Logger,
): Promise<ReadonlyArray<Subscription>> {
  const url = endpointUrl(config);

  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: {
        Authorization: config.apiToken,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({ query: SUBSCRIPTIONS_QUERY }),
    });
  } catch (err) {
    const message = errorMessage(err);
    logger.error({ url, error: message }, "subscriptions request failed");
    throw new TransportError(`request to ${url} failed: ${message}`, {
      cause: err,
    });
  }

  logger.debug({ status: response.status }, "subscriptions response received");

  let text: string;
  try {
    text = await response.text();
  } catch (err) {
    const message = errorMessage(err);
    logger.error(
      { url, status: response.status, error: message },
      "failed to read subscriptions response",
    );
    throw new TransportError(
      `reading response from ${url} failed: ${message}`,
      { status: response.status, cause: err },
    );
  }

  if (!response.ok) {
    logger.error(
      {
        status: response.status,
        headers: Object.fromEntries(response.headers.entries()),
        body: excerpt(text),
      },
      "subscriptions request returned an error status",
    );
    throw new TransportError(
      `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}: ${excerpt(text)}`,
      { status: response.status, body: text },
    );
  }

  return parseSubscriptionsResponse(text);
}

/**
 * Interprets a successful response body. Checks run in order: top-level
 * GraphQL errors, then the result's error codes, then the item shapes.
 */
export function parseSubscriptionsResponse(
  text: string,
): ReadonlyArray<Subscription> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new MalformedResponseError(
      `response is not valid JSON: ${excerpt(text)}`,
      { cause: err },
    );
  }

  const envelope = graphqlEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new MalformedResponseError(
      `response is not a GraphQL result: ${excerpt(text)}`,
    );
  }

  // A present `errors` key fails the request, even when it is null.
  const { errors, data } = envelope.data;
  if (errors !== undefined) {
    throw new GraphQLResponseError(errors);
  }

  const result = subscriptionsResultSchema.safeParse(data);
  if (!result.success) {
    throw new MalformedResponseError(
      `response has no subscriptions result: ${excerpt(text)}`,
    );
  }

  const { errorCodes, subscriptions } = result.data.subscriptions;
  if (errorCodes !== undefined) {
    throw new SubscriptionQueryError(errorCodes);
  }
  if (subscriptions === undefined) {
    throw new MalformedResponseError(
      "subscriptions result has neither subscriptions nor errorCodes",
    );
  }

  const items = subscriptionItemsSchema.safeParse(subscriptions);
  if (!items.success) {
    throw new MalformedResponseError(
      `subscriptions result is not a list: ${excerpt(text)}`,
    );
  }

  return items.data.map((item, index) => {
    const parsed = subscriptionSchema.safeParse(item);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      throw new MalformedResponseError(
        `subscription at index ${index} is invalid: ${issues}`,
      );
    }
    return parsed.data;
  });
}
