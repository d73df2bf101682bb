/**
 * One feed subscription as returned by the subscriptions query. Every field
 * but `name` may be absent; timestamps are already parsed instants.
 */
export type Subscription = {
  readonly name: string;
  readonly url: string | null;
  readonly folder: string | null;
  readonly createdAt: Date | null;
  readonly lastFetchedAt: Date | null;
  readonly description: string | null;
  readonly newsletterEmail: string | null;
  readonly refreshedAt: Date | null;
  readonly count: number | null;
  readonly icon: string | null;
  readonly isPrivate: boolean | null;
  readonly autoAddToLibrary: boolean | null;
  readonly fetchContent: boolean | null;
  readonly failedAt: Date | null;
};

export type FilterResult = {
  readonly subscriptions: ReadonlyArray<Subscription>;
  readonly removedCount: number;
};

export type FolderGroup = {
  readonly name: string;
  /** False only for the Uncategorized bucket, which renders without a folder outline. */
  readonly wrapped: boolean;
  readonly subscriptions: ReadonlyArray<Subscription>;
};

export type ExportOptions = {
  readonly excludeUnfetched: boolean;
};

export type ExportResult = {
  readonly outputPath: string;
  readonly fetchedCount: number;
  readonly removedCount: number;
  readonly exportedFeedCount: number;
};
