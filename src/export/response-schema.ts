import { z } from "zod";
import type { Subscription } from "./types";

const optionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? null);

const HAS_OFFSET = /(?:[zZ]|[+-]\d{2}(?::?\d{2})?)$/;

/**
 * Reads an ISO-8601 date or date-time as an instant. A space may stand in for
 * the `T` separator; date-only values and date-times without an offset are
 * taken as UTC.
 */
const timestamp = z
  .string()
  .transform((v) => v.replace(" ", "T"))
  .pipe(
    z.union([
      z.string().date(),
      z.string().datetime({ offset: true }),
      z.string().datetime({ local: true }),
    ]),
  )
  .transform((v, ctx) => {
    const isDateOnly = v.length === 10;
    const instant = new Date(isDateOnly || HAS_OFFSET.test(v) ? v : `${v}Z`);
    if (Number.isNaN(instant.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid timestamp" });
      return z.NEVER;
    }
    return instant;
  });

const optionalTimestamp = z
  .union([z.literal(""), timestamp])
  .nullish()
  .transform((v) => (v === "" || v === undefined ? null : v));

export const subscriptionSchema = z
  .object({
    name: z.string(),
    url: optionalString,
    folder: optionalString,
    createdAt: optionalTimestamp,
    lastFetchedAt: optionalTimestamp,
    description: optionalString,
    newsletterEmail: optionalString,
    refreshedAt: optionalTimestamp,
    count: z
      .number()
      .int()
      .nullish()
      .transform((v) => v ?? null),
    icon: optionalString,
    isPrivate: z
      .boolean()
      .nullish()
      .transform((v) => v ?? null),
    autoAddToLibrary: z
      .boolean()
      .nullish()
      .transform((v) => v ?? null),
    fetchContent: z
      .boolean()
      .nullish()
      .transform((v) => v ?? null),
    failedAt: optionalTimestamp,
  })
  .transform((s): Subscription => s);

export const graphqlEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.unknown().optional(),
});

export const subscriptionsResultSchema = z.object({
  subscriptions: z.object({
    errorCodes: z.unknown().optional(),
    subscriptions: z.unknown().optional(),
  }),
});

export const subscriptionItemsSchema = z.array(z.unknown());
