// This module produces request identifiers; notifications never draw from a generator.

import { randomInt, randomUUID } from 'node:crypto';
import type { JsonRpcId } from '../types/jsonrpc.js';

export interface IdGenerator {
  next(): JsonRpcId;
}

const RANDOM_ID_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Strictly increasing integer ids starting at `seed`, with no gaps.
 *
 * Node runs every caller on one thread, so `next()` cannot interleave and the
 * sequence stays unique for the lifetime of the generator.
 */
export class CounterIdGenerator implements IdGenerator {
  private current: number;

  public constructor(seed = 1) {
    this.current = seed;
  }

  public next(): number {
    const id = this.current;
    this.current += 1;
    return id;
  }

  public reset(seed = 1): void {
    this.current = seed;
  }
}

// This generator renders the counter sequence as lowercase hexadecimal strings.
export function hexIdGenerator(seed = 1): IdGenerator {
  const counter = new CounterIdGenerator(seed);
  return {
    next: () => counter.next().toString(16)
  };
}

// This generator draws fixed-length lowercase alphanumeric ids; uniqueness is probabilistic.
export function randomIdGenerator(length = 8): IdGenerator {
  return {
    next: () => {
      let id = '';
      for (let index = 0; index < length; index += 1) {
        id += RANDOM_ID_ALPHABET[randomInt(RANDOM_ID_ALPHABET.length)];
      }
      return id;
    }
  };
}

// This generator issues RFC 4122 v4 UUID strings.
export function uuidIdGenerator(): IdGenerator {
  return {
    next: () => randomUUID()
  };
}

// Process-wide counter used when callers do not supply their own generator.
export const defaultIdGenerator = new CounterIdGenerator();

export function resetRequestIds(seed = 1): void {
  defaultIdGenerator.reset(seed);
}
