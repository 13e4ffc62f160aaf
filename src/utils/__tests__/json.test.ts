/**
 * Tests for JSON helpers
 */

import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { safeJsonParse, extractJsonObject } from '../json.js';

const MetadataSchema = z.record(z.string(), z.unknown());

describe('safeJsonParse', () => {
  it('parses and validates a JSON object', () => {
    const result = safeJsonParse('{"name":"test","value":42}', MetadataSchema, {});
    expect(result).toEqual({ name: 'test', value: 42 });
  });

  it('returns fallback for null and undefined without calling onError', () => {
    const onError = vi.fn();
    expect(safeJsonParse(null, MetadataSchema, { default: true }, onError)).toEqual({ default: true });
    expect(safeJsonParse(undefined, z.array(z.number()), [1, 2], onError)).toEqual([1, 2]);
    expect(onError).not.toHaveBeenCalled();
  });

  it('returns fallback and reports invalid JSON', () => {
    const onError = vi.fn();
    const result = safeJsonParse('{broken', MetadataSchema, {}, onError);

    expect(result).toEqual({});
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[1]).toBe('{broken');
  });

  it('returns fallback when the shape does not match', () => {
    const onError = vi.fn();
    const result = safeJsonParse('[1,2,3]', MetadataSchema, { fallback: 1 }, onError);

    expect(result).toEqual({ fallback: 1 });
    expect(onError).toHaveBeenCalledTimes(1);
  });
});

describe('extractJsonObject', () => {
  it('finds JSON wrapped in prose', () => {
    expect(extractJsonObject('Sure! {"a": 1} Hope that helps')).toBe('{"a": 1}');
  });

  it('prefers fenced code blocks', () => {
    const text = 'Plan:\n```json\n{"queries": ["x"]}\n```\nnote {not json}';
    expect(extractJsonObject(text)).toBe('{"queries": ["x"]}');
  });

  it('returns null when there is no object', () => {
    expect(extractJsonObject('no json here')).toBeNull();
  });
});
