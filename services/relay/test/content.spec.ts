import { describe, expect, it } from 'vitest';
import { buildContent, decodeContent, encodeContent, toYoink } from '../src/core/content';
import { params, thrownBy } from './helpers';

describe('buildContent', () => {
  it('infers a type per parameter', () => {
    const content = buildContent(params({ num: '666.666', threads: '7', result: 'discard' }));
    expect(content).toEqual({ num: 666.666, threads: 7, result: 'discard' });
  });

  it('rejects the whole set when one key has two values', () => {
    const err = thrownBy(() => buildContent(params({ ok: '1', dup: ['1', '2'] })));
    expect(err.kind).toBe('multi_valued_parameter');
    expect(err.status).toBe(400);
    expect(err.message).toBe('parameter "dup" has 2 values, expected exactly 1');
    expect(err.detail).toBe('Bad Request');
  });

  it('returns an empty mapping for no parameters', () => {
    expect(buildContent(new Map())).toEqual({});
  });
});

describe('encodeContent', () => {
  it('writes numbers in their shortest round-trip form', () => {
    expect(encodeContent({ num: 666.666, threads: 7, result: 'discard' })).toBe(
      '{"num":666.666,"threads":7,"result":"discard"}',
    );
    expect(encodeContent({ drift: 0.1 + 0.2 })).toBe('{"drift":0.30000000000000004}');
  });

  it('escapes strings that would break hand-built JSON', () => {
    const document = encodeContent({ note: '"quoted",}' });
    expect(document).toBe('{"note":"\\"quoted\\",}"}');
    expect(decodeContent(document)).toEqual({ note: '"quoted",}' });
  });

  it('refuses content that does not survive serialization', () => {
    const err = thrownBy(() => encodeContent({ broken: Number.NaN }));
    expect(err.kind).toBe('malformed_content');
    expect(err.status).toBe(500);
    expect(err.detail).toBe('Error encoding content to JSON');
  });

  it('keeps a "__proto__" parameter as an ordinary key', () => {
    const content = buildContent(new Map([['__proto__', ['1']]]));
    const decoded = decodeContent(encodeContent(content));
    expect(Object.keys(decoded)).toEqual(['__proto__']);
  });
});

describe('decodeContent', () => {
  it('restores typed values', () => {
    const decoded = decodeContent('{"f":1.25,"i":12,"s":"  padded "}');
    expect(decoded).toEqual({ f: 1.25, i: 12, s: '  padded ' });
  });

  it.each([
    ['not json', '{broken'],
    ['an array', '[1,2]'],
    ['a nested object', '{"a":{"b":1}}'],
    ['a boolean value', '{"a":true}'],
    ['null', 'null'],
  ])('fails on %s', (_label, document) => {
    const err = thrownBy(() => decodeContent(document));
    expect(err.kind).toBe('content_decode_failure');
    expect(err.status).toBe(500);
    expect(err.detail).toBe('Error decoding content from JSON');
  });
});

describe('toYoink', () => {
  it('maps a stored row to the response shape', () => {
    const yoink = toYoink({ id: 4, topic: 'attic', timestamp: '2026-10-18T10:00:00.000Z', content: '{"t":19.5}' });
    expect(yoink).toEqual({ id: 4, topic: 'attic', timestamp: '2026-10-18T10:00:00.000Z', content: { t: 19.5 } });
  });
});
