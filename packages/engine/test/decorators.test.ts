/**
 * Exclusion Engine — Decorator and Configuration Tests
 *
 * cache:   hits return the stored result without calling the delegate
 * logging: one entry per anyOf / allOf request, with a fixed clock
 * config:  createExcludeFactory() assembles the stack from EngineOptions
 */

import { describe, it, expect, vi } from 'vitest';
import { DefaultExcludeFactory, hashSpec, parseExcludeSpecOrThrow } from '@exclusions/model';
import type { ExcludeSpec } from '@exclusions/model';
import {
  CachingExcludeFactory,
  LoggingExcludeFactory,
  MemoryLogSink,
  NormalizingExcludeFactory,
  OperationLogger,
  createExcludeFactory,
} from '../src/index.js';

const FIXED_CLOCK = (): string => '2026-01-01T00:00:00.000Z';

function rule(source: string): ExcludeSpec {
  return parseExcludeSpecOrThrow(source);
}

// ---------------------------------------------------------------------------
// cache
// ---------------------------------------------------------------------------

describe('CachingExcludeFactory', () => {
  it('answers a repeated request from the cache', () => {
    const normalizing = new NormalizingExcludeFactory();
    const anyOf = vi.spyOn(normalizing, 'anyOf');
    const caching = new CachingExcludeFactory(normalizing);

    const first = caching.anyOf([rule('a:*'), rule('b:*')]);
    const second = caching.anyOf([rule('a:*'), rule('b:*')]);

    expect(second).toBe(first);
    expect(anyOf).toHaveBeenCalledTimes(1);
    expect(caching.size).toBe(1);
  });

  it('keys on operation and operand order', () => {
    const caching = new CachingExcludeFactory(new NormalizingExcludeFactory());
    caching.anyOf([rule('a:*'), rule('b:*')]);
    caching.anyOf([rule('b:*'), rule('a:*')]);
    caching.allOf([rule('a:*'), rule('b:*')]);
    expect(caching.size).toBe(3);
  });

  it('returns what the delegate returns', () => {
    const caching = new CachingExcludeFactory(new NormalizingExcludeFactory());
    const result = caching.allOf([rule('g:*'), rule('*:m')]);
    expect(hashSpec(result)).toBe(hashSpec(rule('g:m')));
  });

  it('forgets everything on clear()', () => {
    const caching = new CachingExcludeFactory(new NormalizingExcludeFactory());
    caching.anyOf([rule('a:*'), rule('b:*')]);
    caching.clear();
    expect(caching.size).toBe(0);
  });

  it('forwards leaf and singleton construction', () => {
    const caching = new CachingExcludeFactory(new DefaultExcludeFactory());
    expect(caching.nothing()).toBe(new DefaultExcludeFactory().nothing());
    expect(caching.leaf({ group: 'g' })).toEqual(rule('g'));
    expect(caching.size).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// logging
// ---------------------------------------------------------------------------

describe('LoggingExcludeFactory', () => {
  it('records one entry per request with formatted operands and result', () => {
    const sink = new MemoryLogSink();
    const factory = new LoggingExcludeFactory(
      new NormalizingExcludeFactory(),
      new OperationLogger(sink),
      FIXED_CLOCK,
    );

    factory.allOf([rule('g:*'), rule('g:m')]);

    expect(sink.list()).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        operation: 'allOf',
        operands: ['g:*', 'g:m'],
        result: 'g:m',
        result_hash: hashSpec(rule('g:m')),
      },
    ]);
  });

  it('does not log recursive steps inside the delegate', () => {
    const sink = new MemoryLogSink();
    const factory = new LoggingExcludeFactory(
      new NormalizingExcludeFactory(),
      new OperationLogger(sink),
      FIXED_CLOCK,
    );
    factory.anyOf([rule('x:y'), rule('all(a:*, *:m)')]);
    expect(sink.list().map((entry) => entry.result)).toEqual(['any(a:m, x:y)']);
  });

  it('records nothing when the delegate throws', () => {
    const sink = new MemoryLogSink();
    const factory = new LoggingExcludeFactory(
      new NormalizingExcludeFactory(),
      new OperationLogger(sink),
      FIXED_CLOCK,
    );
    const bogus = { kind: 'bogus' } as unknown as ExcludeSpec;
    expect(() => factory.anyOf([rule('g:*'), bogus])).toThrow('Unexpected spec type: bogus');
    expect(sink.list()).toEqual([]);
  });

  it('works without a sink', () => {
    const factory = new LoggingExcludeFactory(new NormalizingExcludeFactory(), new OperationLogger());
    expect(factory.anyOf([rule('g:*'), rule('g:m')])).toEqual(rule('g:*'));
  });
});

describe('MemoryLogSink', () => {
  it('returns a copy of its entries and can be cleared', () => {
    const sink = new MemoryLogSink();
    const entry = {
      timestamp: '2026-01-01T00:00:00.000Z',
      operation: 'anyOf' as const,
      operands: ['a:*'],
      result: 'a:*',
      result_hash: hashSpec(rule('a:*')),
    };
    sink.append(entry);
    const listed = sink.list();
    sink.clear();
    expect(listed).toEqual([entry]);
    expect(sink.list()).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// config
// ---------------------------------------------------------------------------

describe('createExcludeFactory', () => {
  it('caches by default', () => {
    expect(createExcludeFactory()).toBeInstanceOf(CachingExcludeFactory);
  });

  it('returns the bare normalizing factory when caching is off', () => {
    expect(createExcludeFactory({ cache: false })).toBeInstanceOf(NormalizingExcludeFactory);
  });

  it('puts logging outermost so cache hits are logged too', () => {
    const sink = new MemoryLogSink();
    const factory = createExcludeFactory({ sink, clock: FIXED_CLOCK });
    expect(factory).toBeInstanceOf(LoggingExcludeFactory);

    const first = factory.anyOf([rule('a:*'), rule('b:*')]);
    const second = factory.anyOf([rule('a:*'), rule('b:*')]);

    expect(second).toBe(first);
    expect(sink.list()).toHaveLength(2);
  });

  it('simplifies regardless of options', () => {
    for (const cache of [true, false]) {
      const factory = createExcludeFactory({ cache });
      expect(factory.allOf([rule('g1:*'), rule('g2:*')])).toBe(factory.nothing());
    }
  });
});
