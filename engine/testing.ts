/**
 * Test fixtures: an in-memory world with a hand-driven clock and fixed
 * seeds, so every draw is known before the call.
 */

import type { SeedSource } from './core/types.js';
import { isWorldError } from './core/errors.js';
import { LocalChain } from './context/local-chain.js';
import { World } from './index.js';

export const START_TIME = 1_700_000_000;

/** Returns whatever the test last set. */
export class FixedSeeds implements SeedSource {
  network = 99n;
  consciousness = 99n;

  networkSeed(): bigint {
    return this.network;
  }

  consciousnessSeed(): bigint {
    return this.consciousness;
  }
}

export interface TestWorld {
  world: World;
  seeds: FixedSeeds;
  clock: { now: number };
}

export function createTestWorld(cooldownSeconds?: number): TestWorld {
  const clock = { now: START_TIME };
  const seeds = new FixedSeeds();
  const world = new World({
    dbPath: ':memory:',
    seeds,
    context: new LocalChain({ clock: () => clock.now }),
    cooldownSeconds,
  });
  return { world, seeds, clock };
}

/** The WorldError code fn fails with, or undefined when it succeeds. */
export function failureCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (isWorldError(err)) return err.code;
    throw err;
  }
  return undefined;
}
