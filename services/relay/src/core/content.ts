import { errorMessage, missingTopic, YoinkError } from '../errors';
import type { RawParams, Topic, Yoink, YoinkContent, YoinkRow } from '../types';
import { inferValue } from './inference';

function isContent(value: unknown): value is YoinkContent {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === 'string' || (typeof v === 'number' && Number.isFinite(v)));
}

export function requireTopic(topic: Topic): Topic {
  if (topic.length === 0) throw missingTopic();
  return topic;
}

/** Typed content for a parameter set; rejects the whole set if any key repeats. */
export function buildContent(params: RawParams): YoinkContent {
  const entries: [string, number | string][] = [];
  for (const [key, values] of params) {
    if (values.length !== 1) {
      throw new YoinkError(
        'multi_valued_parameter',
        `parameter "${key}" has ${values.length} values, expected exactly 1`,
        'Bad Request',
      );
    }
    entries.push([key, inferValue(values[0])]);
  }
  // fromEntries defines own properties, so keys such as "__proto__" survive
  return Object.fromEntries(entries);
}

/** Serialize content and prove the document parses before anything is stored. */
export function encodeContent(content: YoinkContent): string {
  const document = JSON.stringify(content);
  let reparsed: unknown;
  try {
    reparsed = JSON.parse(document);
  } catch (err) {
    throw new YoinkError('malformed_content', errorMessage(err), 'Error encoding content to JSON');
  }
  if (!isContent(reparsed) || Object.keys(reparsed).length !== Object.keys(content).length) {
    throw new YoinkError('malformed_content', 'content did not survive serialization', 'Error encoding content to JSON');
  }
  return document;
}

export function decodeContent(document: string): YoinkContent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(document);
  } catch (err) {
    throw new YoinkError('content_decode_failure', errorMessage(err), 'Error decoding content from JSON');
  }
  if (!isContent(parsed)) {
    throw new YoinkError(
      'content_decode_failure',
      'stored content is not an object of numbers and strings',
      'Error decoding content from JSON',
    );
  }
  return parsed;
}

export function toYoink(row: YoinkRow): Yoink {
  return {
    id: row.id,
    topic: row.topic,
    timestamp: row.timestamp,
    content: decodeContent(row.content),
  };
}
