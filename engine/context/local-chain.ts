/**
 * Local Chain — Block contexts for a single-process world.
 *
 * Each mutating call gets its own block: the number increments, the
 * timestamp comes from the clock, prevrandao is fresh random bytes and
 * the parent hash chains from the previous block's header.
 */

import { hexlify, randomBytes, solidityPackedKeccak256, ZeroHash } from 'ethers';
import type { BlockContext, BlockContextSource } from '../core/types.js';

export interface LocalChainOptions {
  gasPrice?: bigint;
  /** Seconds since epoch. */
  clock?: () => number;
}

const DEFAULT_GAS_PRICE = 1_000_000_000n; // 1 gwei

export class LocalChain implements BlockContextSource {
  private number = 0;
  private parentHash: string = ZeroHash;
  private readonly gasPrice: bigint;
  private readonly clock: () => number;

  constructor(options: LocalChainOptions = {}) {
    this.gasPrice = options.gasPrice ?? DEFAULT_GAS_PRICE;
    this.clock = options.clock ?? (() => Math.floor(Date.now() / 1000));
  }

  next(caller: string): BlockContext {
    const block: BlockContext = {
      number: ++this.number,
      timestamp: this.clock(),
      caller,
      gasPrice: this.gasPrice,
      prevrandao: BigInt(hexlify(randomBytes(32))),
      previousBlockHash: this.parentHash,
    };

    this.parentHash = solidityPackedKeccak256(
      ['uint256', 'uint256', 'uint256', 'bytes32'],
      [block.number, block.timestamp, block.prevrandao, block.previousBlockHash],
    );

    return block;
  }
}
