/**
 * Meme Engine — Memetic patterns, single-byte mutation, and broadcast
 * over the entanglement relation.
 *
 * Fan-out visits peer IDs 0..n-1 where n is the SOURCE's superposition
 * count, not its real adjacency set. Entangled peers with IDs >= n are
 * never reached. Kept as-is; see DESIGN.md.
 */

import { toUtf8Bytes, toUtf8String } from 'ethers';
import type { CharacterId, MemeticPattern, OperationContext } from '../core/types.js';
import { WorldError, assertCharacterId } from '../core/errors.js';
import { countOf, emptyCounts } from '../core/counts.js';
import type { WorldStore } from '../store/world-store.js';
import { draw } from '../random/seed-source.js';
import { loadQuantumState } from './entanglement.js';

export const DEFAULT_MUTATION_RATE = 10;

/** ASCII bytes below this step up by one; the rest step down. */
export const MUTATION_UPPER_BOUND = 126;

/** Same rule for the last continuation byte of a multi-byte character. */
export const CONTINUATION_UPPER_BOUND = 0xbf;

export function emptyMemeticPattern(id: CharacterId): MemeticPattern {
  return {
    characterId: id,
    memes: [],
    virality: 0,
    mutationRate: 0,
    propagationPaths: emptyCounts(),
  };
}

export function loadMemeticPattern(store: WorldStore, id: CharacterId): MemeticPattern {
  return store.getMemeticPattern(id) ?? emptyMemeticPattern(id);
}

function isContinuation(byte: number): boolean {
  return byte >= 0x80 && byte <= 0xbf;
}

/**
 * Byte offsets that can move by one and still decode to one character:
 * ASCII bytes and the final continuation byte of each multi-byte
 * sequence. Lead bytes and inner continuation bytes carry range limits
 * (overlongs, surrogates) and are left alone.
 */
function mutableOffsets(bytes: Uint8Array): number[] {
  const offsets: number[] = [];
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] >= 0xc0) continue;
    if (i + 1 < bytes.length && isContinuation(bytes[i + 1])) continue;
    offsets.push(i);
  }
  return offsets;
}

/**
 * Nudge one byte of the UTF-8 encoding by ±1. There is one candidate
 * byte per character, picked by `seed mod characters`; the result has
 * the same byte length and differs in exactly that byte.
 */
export function mutateMeme(meme: string, seed: bigint): string {
  const bytes = toUtf8Bytes(meme);
  if (bytes.length === 0) {
    throw new WorldError('EmptyMeme', 'Cannot mutate an empty meme');
  }

  const offsets = mutableOffsets(bytes);
  const index = offsets[draw(seed, offsets.length)];
  const mutated = new Uint8Array(bytes);
  const upper = mutated[index] < 0x80 ? MUTATION_UPPER_BOUND : CONTINUATION_UPPER_BOUND;
  mutated[index] = mutated[index] < upper ? mutated[index] + 1 : mutated[index] - 1;

  return toUtf8String(mutated);
}

export interface PropagationResult {
  mutated?: string;
  reached: CharacterId[];
}

export function propagateMeme(
  store: WorldStore,
  op: OperationContext,
  id: CharacterId,
  meme: string,
): PropagationResult {
  assertCharacterId(id);
  const source = loadQuantumState(store, id);
  if (source.entanglementFactor === 0) {
    throw new WorldError('NotInitialized', `Character ${id} has no quantum state`);
  }
  if (meme.length === 0) {
    throw new WorldError('EmptyMeme', 'Meme must not be empty');
  }

  const pattern = loadMemeticPattern(store, id);
  pattern.memes.push(meme);
  if (pattern.mutationRate === 0) pattern.mutationRate = DEFAULT_MUTATION_RATE;

  const result: PropagationResult = { reached: [] };

  if (draw(op.seeds.networkSeed(op.block), 100) < pattern.mutationRate) {
    const mutated = mutateMeme(meme, op.seeds.networkSeed(op.block));
    pattern.memes.push(mutated);
    result.mutated = mutated;
    op.emit({ kind: 'MemeMutated', characterId: id, original: meme, mutated });
  }

  store.saveMemeticPattern(pattern);

  const bound = source.superpositionStates.length;
  for (let peer = 0; peer < bound; peer++) {
    if (!store.isEntangled(id, peer)) continue;

    const target = loadMemeticPattern(store, peer);
    target.memes.push(meme);
    target.virality += 1;
    target.propagationPaths[String(id)] = countOf(target.propagationPaths, String(id)) + 1;
    store.saveMemeticPattern(target);

    result.reached.push(peer);
    op.emit({ kind: 'MemePropagated', characterId: id, targetId: peer, meme });
  }

  return result;
}

// ─── Reads ───

export function getMemes(store: WorldStore, id: CharacterId): string[] {
  return loadMemeticPattern(store, id).memes;
}

export function getVirality(store: WorldStore, id: CharacterId): number {
  return loadMemeticPattern(store, id).virality;
}

export function getMutationRate(store: WorldStore, id: CharacterId): number {
  return loadMemeticPattern(store, id).mutationRate;
}

export function getPropagationCount(store: WorldStore, id: CharacterId, sourceId: CharacterId): number {
  return countOf(loadMemeticPattern(store, id).propagationPaths, String(sourceId));
}
