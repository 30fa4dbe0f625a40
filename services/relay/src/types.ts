export type YoinkId = number;
export type Topic = string;

export type ContentValue = number | string;
export type YoinkContent = Record<string, ContentValue>;

/** Raw request parameters; a key maps to every value it was given. */
export type RawParams = Map<string, string[]>;

export interface YoinkRow {
  id: YoinkId;
  topic: Topic;
  timestamp: string; // ISO-8601 UTC, assigned by the store
  content: string;   // persisted shape (always JSON text)
}

export interface Yoink {
  id: YoinkId;
  topic: Topic;
  timestamp: string;
  content: YoinkContent;
}
