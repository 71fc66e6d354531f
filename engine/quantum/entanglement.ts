/**
 * Entanglement Network — Per-character quantum states and the
 * symmetric entanglement relation between them.
 *
 * A factor of 0 marks an uninitialized character. Bonds are set-once:
 * there is no way to break one.
 */

import type { CharacterId, OperationContext, QuantumState } from '../core/types.js';
import { WorldError, assertCharacterId } from '../core/errors.js';
import { countOf, emptyCounts } from '../core/counts.js';
import type { WorldStore } from '../store/world-store.js';

/** Factors and bonds stay exact as JS numbers and SQLite integers. */
export const MAX_ENTANGLEMENT_FACTOR = Number.MAX_SAFE_INTEGER;

export function emptyQuantumState(id: CharacterId): QuantumState {
  return {
    characterId: id,
    entanglementFactor: 0,
    isCollapsed: false,
    superpositionStates: [],
    quantumBonds: emptyCounts(),
  };
}

export function loadQuantumState(store: WorldStore, id: CharacterId): QuantumState {
  return store.getQuantumState(id) ?? emptyQuantumState(id);
}

function requireInitialized(store: WorldStore, id: CharacterId): QuantumState {
  const state = loadQuantumState(store, id);
  if (state.entanglementFactor === 0) {
    throw new WorldError('NotInitialized', `Character ${id} has no quantum state`);
  }
  return state;
}

// ─── Mutations ───

export function initializeQuantumState(
  store: WorldStore,
  op: OperationContext,
  id: CharacterId,
  factor: number,
): QuantumState {
  assertCharacterId(id);
  if (!Number.isSafeInteger(factor) || factor <= 0) {
    throw new WorldError('InvalidEntanglementFactor', `Entanglement factor must be a positive integer, got ${factor}`);
  }

  const state = loadQuantumState(store, id);
  if (state.entanglementFactor !== 0) {
    throw new WorldError('AlreadyInitialized', `Character ${id} already has a quantum state`);
  }

  state.entanglementFactor = factor;
  state.isCollapsed = false;
  store.saveQuantumState(state);

  op.emit({ kind: 'QuantumStateInitialized', characterId: id, entanglementFactor: factor });
  return state;
}

/**
 * Bond strength is the truncated mean of both factors; each side then gains
 * a tenth of it. Fails when a gain would carry a factor past
 * MAX_ENTANGLEMENT_FACTOR.
 */
export function createQuantumBond(
  store: WorldStore,
  op: OperationContext,
  a: CharacterId,
  b: CharacterId,
): number {
  assertCharacterId(a);
  assertCharacterId(b);
  if (a === b) {
    throw new WorldError('SelfEntanglement', `Character ${a} cannot bond with itself`);
  }
  if (store.isEntangled(a, b)) {
    throw new WorldError('AlreadyEntangled', `Characters ${a} and ${b} are already entangled`);
  }

  const stateA = requireInitialized(store, a);
  const stateB = requireInitialized(store, b);

  const fa = BigInt(stateA.entanglementFactor);
  const fb = BigInt(stateB.entanglementFactor);
  const bond = (fa + fb) / 2n;
  const gain = bond / 10n;
  const limit = BigInt(MAX_ENTANGLEMENT_FACTOR);
  if (fa + gain > limit || fb + gain > limit) {
    throw new WorldError(
      'InvalidEntanglementFactor',
      `Bonding ${a} and ${b} would raise a factor past ${MAX_ENTANGLEMENT_FACTOR}`,
    );
  }

  const bondStrength = Number(bond);
  stateA.quantumBonds[String(b)] = bondStrength;
  stateB.quantumBonds[String(a)] = bondStrength;
  stateA.entanglementFactor = Number(fa + gain);
  stateB.entanglementFactor = Number(fb + gain);

  store.saveQuantumState(stateA);
  store.saveQuantumState(stateB);
  store.entangle(a, b);

  op.emit({ kind: 'EntanglementFormed', characterId: a, otherId: b, bondStrength });
  return bondStrength;
}

/** One-way. Bonds and adjacency survive; only the superposition list empties. */
export function collapseQuantumState(
  store: WorldStore,
  op: OperationContext,
  id: CharacterId,
): QuantumState {
  assertCharacterId(id);
  const state = loadQuantumState(store, id);
  if (state.isCollapsed) {
    throw new WorldError('AlreadyCollapsed', `Character ${id} has already collapsed`);
  }

  state.isCollapsed = true;
  state.superpositionStates = [];
  store.saveQuantumState(state);

  op.emit({ kind: 'QuantumStateCollapsed', characterId: id });
  return state;
}

export function addSuperpositionState(
  store: WorldStore,
  op: OperationContext,
  id: CharacterId,
  label: string,
): string[] {
  assertCharacterId(id);
  const state = requireInitialized(store, id);
  if (state.isCollapsed) {
    throw new WorldError('AlreadyCollapsed', `Character ${id} has collapsed; no new superpositions`);
  }

  state.superpositionStates.push(label);
  store.saveQuantumState(state);

  op.emit({ kind: 'SuperpositionAdded', characterId: id, label });
  return state.superpositionStates;
}

// ─── Reads ───

export function getEntanglementFactor(store: WorldStore, id: CharacterId): number {
  return loadQuantumState(store, id).entanglementFactor;
}

export function getSuperpositionStates(store: WorldStore, id: CharacterId): string[] {
  return loadQuantumState(store, id).superpositionStates;
}

export function isCollapsed(store: WorldStore, id: CharacterId): boolean {
  return loadQuantumState(store, id).isCollapsed;
}

export function getBondStrength(store: WorldStore, a: CharacterId, b: CharacterId): number {
  return countOf(loadQuantumState(store, a).quantumBonds, String(b));
}

export function areEntangled(store: WorldStore, a: CharacterId, b: CharacterId): boolean {
  return store.isEntangled(a, b);
}
