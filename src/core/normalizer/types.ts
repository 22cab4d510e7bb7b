// src/core/normalizer/types.ts

export interface Credentials {
  readonly username: string;
  readonly password: string; // HTTP Basic
  readonly apiKey: string; // Sent as the `key` query parameter
}

/**
 * An instant together with the UTC offset the source reported it in.
 * The offset is kept so the rendered timestamp matches the source's wall clock.
 */
export interface ZonedTimestamp {
  readonly epochMs: number;
  readonly offsetMinutes: number;
}

export interface Bookmark {
  readonly url: string;
  readonly title: string;
  readonly description: string;
  readonly tags: readonly string[];
  readonly createdAt: ZonedTimestamp;
  readonly readLater: boolean;
  readonly private: boolean;
  readonly annotations: ReadonlyMap<string, readonly string[]>; // Insertion order = first-seen order
}
