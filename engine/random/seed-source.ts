/**
 * Seed Source — Pseudo-random draws derived from the block context.
 *
 * The hash inputs are the same ones a contract would pack with
 * abi.encodePacked: block time, caller, gas price or prevrandao, and the
 * parent hash or the character/experience pair. Anyone who can see or
 * shape those inputs (a block producer, or a caller simulating before
 * submitting) can predict or steer every draw. This is not a secure RNG.
 */

import { keccak256, solidityPackedKeccak256, toUtf8Bytes } from 'ethers';
import type { BlockContext, CharacterId, SeedSource } from '../core/types.js';

export class BlockSeedSource implements SeedSource {
  /** Same value for every draw within one block context. */
  networkSeed(ctx: BlockContext): bigint {
    return BigInt(solidityPackedKeccak256(
      ['uint256', 'address', 'uint256', 'bytes32'],
      [ctx.timestamp, ctx.caller, ctx.gasPrice, ctx.previousBlockHash],
    ));
  }

  consciousnessSeed(ctx: BlockContext, characterId: CharacterId, experience: string): bigint {
    return BigInt(solidityPackedKeccak256(
      ['uint256', 'uint256', 'address', 'uint256', 'bytes32'],
      [ctx.timestamp, ctx.prevrandao, ctx.caller, characterId, keccak256(toUtf8Bytes(experience))],
    ));
  }
}

/** Reduce a seed to [0, modulus). */
export function draw(seed: bigint, modulus: number): number {
  return Number(seed % BigInt(modulus));
}
