import { describe, expect, it } from 'vitest';
import { concat, keccak256, toBeHex, toUtf8Bytes, ZeroHash } from 'ethers';
import type { BlockContext } from '../core/types.js';
import { LocalChain } from '../context/local-chain.js';
import { BlockSeedSource, draw } from './seed-source.js';

const CALLER = '0x000000000000000000000000000000000000beef';

const ctx: BlockContext = {
  number: 1,
  timestamp: 1_700_000_000,
  caller: CALLER,
  gasPrice: 1_000_000_000n,
  prevrandao: 42n,
  previousBlockHash: ZeroHash,
};

describe('BlockSeedSource', () => {
  const seeds = new BlockSeedSource();

  it('packs time, caller, gas price and parent hash like abi.encodePacked', () => {
    const packed = concat([
      toBeHex(ctx.timestamp, 32),
      CALLER,
      toBeHex(ctx.gasPrice, 32),
      ctx.previousBlockHash,
    ]);

    expect(seeds.networkSeed(ctx)).toBe(BigInt(keccak256(packed)));
  });

  it('packs the character and the experience hash for consciousness draws', () => {
    const packed = concat([
      toBeHex(ctx.timestamp, 32),
      toBeHex(ctx.prevrandao, 32),
      CALLER,
      toBeHex(9, 32),
      keccak256(toUtf8Bytes('eclipse')),
    ]);

    expect(seeds.consciousnessSeed(ctx, 9, 'eclipse')).toBe(BigInt(keccak256(packed)));
  });

  it('repeats within one block and is predictable from its inputs', () => {
    expect(seeds.networkSeed(ctx)).toBe(seeds.networkSeed({ ...ctx }));
    expect(seeds.networkSeed(ctx)).not.toBe(seeds.networkSeed({ ...ctx, timestamp: ctx.timestamp + 1 }));
    expect(seeds.consciousnessSeed(ctx, 9, 'a')).not.toBe(seeds.consciousnessSeed(ctx, 9, 'b'));
  });
});

describe('draw', () => {
  it('reduces a seed modulo n', () => {
    expect(draw(205n, 100)).toBe(5);
    expect(draw(2n ** 255n, 100)).toBe(Number((2n ** 255n) % 100n));
  });
});

describe('LocalChain', () => {
  it('numbers blocks and chains parent hashes', () => {
    const chain = new LocalChain({ clock: () => 1000 });

    const first = chain.next(CALLER);
    const second = chain.next(CALLER);

    expect(first.number).toBe(1);
    expect(second.number).toBe(2);
    expect(first.previousBlockHash).toBe(ZeroHash);
    expect(second.previousBlockHash).not.toBe(ZeroHash);
    expect(second.timestamp).toBe(1000);
    expect(second.caller).toBe(CALLER);
    expect(second.gasPrice).toBe(1_000_000_000n);
  });
});
