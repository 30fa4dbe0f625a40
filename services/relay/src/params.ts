import { z } from 'zod';
import { YoinkError } from './errors';
import type { RawParams } from './types';

// ---------- Schemas ----------
const scalarSchema = z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v));

// query strings give a string or string[], JSON bodies may also carry numbers and booleans
const paramValueSchema = z.union([scalarSchema, z.array(scalarSchema)]);

const INTEGER_LITERAL = /^[+-]?\d+$/;

function invalidParameter(where: string): YoinkError {
  return new YoinkError('invalid_parameter', `parameters must be strings, numbers or booleans${where}`, 'Bad Request');
}

/**
 * Merge every parameter source (query string, request body) into one multi-map.
 * Repeated keys keep all their values so the encoder can reject them.
 */
export function collectParams(...sources: unknown[]): RawParams {
  const params: RawParams = new Map();
  for (const source of sources) {
    if (source === undefined || source === null) continue;

    if (typeof source !== 'object' || Array.isArray(source)) {
      throw invalidParameter('');
    }

    // walk own keys ourselves: zod's record output drops a "__proto__" key
    for (const [key, raw] of Object.entries(source)) {
      const parsed = paramValueSchema.safeParse(raw);
      if (!parsed.success) throw invalidParameter(` at "${key}"`);

      const values = params.get(key) ?? [];
      values.push(...(Array.isArray(parsed.data) ? parsed.data : [parsed.data]));
      params.set(key, values);
    }
  }
  return params;
}

/** Parse the number-of-yoinks path segment: a base-10 integer of at least 1. */
export function parseCount(raw: string): number {
  const n = Number(raw);
  if (!INTEGER_LITERAL.test(raw) || !Number.isSafeInteger(n)) {
    throw new YoinkError('invalid_number', `"${raw}" is not a whole number`, 'Error parsing number of yoinks');
  }
  if (n < 1) {
    throw new YoinkError('number_out_of_range', 'number is less than 1', 'Error validating number of yoinks');
  }
  return n;
}
