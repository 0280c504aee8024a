// This test suite verifies identifier sequences, resets and the alternative id strategies.

import { afterEach, describe, expect, it } from 'vitest';
import {
  CounterIdGenerator,
  defaultIdGenerator,
  hexIdGenerator,
  randomIdGenerator,
  resetRequestIds,
  uuidIdGenerator
} from '../src/jsonrpc/ids.js';

describe('id generators', () => {
  afterEach(() => {
    resetRequestIds();
  });

  it('yields exactly 1..n from a fresh counter', () => {
    const ids = new CounterIdGenerator();
    const sequence = Array.from({ length: 6 }, () => ids.next());

    expect(sequence).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('starts from a configurable seed and restarts on reset', () => {
    const ids = new CounterIdGenerator(10);
    expect(ids.next()).toBe(10);
    expect(ids.next()).toBe(11);

    ids.reset();
    expect(ids.next()).toBe(1);

    ids.reset(40);
    expect(ids.next()).toBe(40);
  });

  it('restarts the process-wide counter for test isolation', () => {
    defaultIdGenerator.next();
    defaultIdGenerator.next();

    resetRequestIds();
    expect(defaultIdGenerator.next()).toBe(1);

    resetRequestIds(7);
    expect(defaultIdGenerator.next()).toBe(7);
  });

  it('renders the counter as lowercase hexadecimal strings', () => {
    const ids = hexIdGenerator(255);

    expect(ids.next()).toBe('ff');
    expect(ids.next()).toBe('100');
  });

  it('produces random alphanumeric ids of the requested length', () => {
    const ids = randomIdGenerator(12);
    const first = ids.next();

    expect(first).toMatch(/^[a-z0-9]{12}$/);
    expect(randomIdGenerator().next()).toMatch(/^[a-z0-9]{8}$/);
  });

  it('produces version 4 uuids', () => {
    expect(uuidIdGenerator().next()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});
