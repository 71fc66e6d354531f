/**
 * Consciousness Engine — Beliefs, values, goals and decisions that
 * evolve under a cooldown, with probability-gated breakthroughs.
 *
 * Awareness is bounded to 100. Coherence is seeded at 50 and nothing
 * changes it afterwards; it only feeds the confidence, impact and
 * breakthrough formulas.
 */

import type { CharacterId, ConsciousnessRecord, Decision, OperationContext } from '../core/types.js';
import { WorldError, assertCharacterId } from '../core/errors.js';
import { countOf, countsFrom } from '../core/counts.js';
import type { WorldStore } from '../store/world-store.js';
import { draw } from '../random/seed-source.js';

export const DEFAULT_COOLDOWN_SECONDS = 3600;
export const INITIAL_COHERENCE = 50;
export const MAX_AWARENESS = 100;
export const MAX_CONFIDENCE = 95;
export const MAX_PRIORITY = 100;
export const BREAKTHROUGH_BONUS = 5;
export const GOAL_ALIGNMENT_BONUS = 2;

export const DEFAULT_BELIEF = 'I exist and can learn';
export const DEFAULT_VALUE = 'growth';
export const DEFAULT_GOAL = 'understand myself';
export const DEFAULT_PRIORITIES: Readonly<Record<string, number>> = {
  survival: 90,
  growth: 80,
  connection: 70,
};

export const DECISION_REASONING = 'Evolved from experience';

function requireInitialized(store: WorldStore, id: CharacterId): ConsciousnessRecord {
  assertCharacterId(id);
  const record = store.getConsciousness(id);
  if (!record || !record.isInitialized) {
    throw new WorldError('NotInitialized', `Character ${id} has no consciousness`);
  }
  return record;
}

// ─── Lifecycle ───

export function initializeConsciousness(
  store: WorldStore,
  op: OperationContext,
  id: CharacterId,
  awareness: number,
): ConsciousnessRecord {
  assertCharacterId(id);
  if (store.getConsciousness(id)?.isInitialized) {
    throw new WorldError('AlreadyInitialized', `Character ${id} already has a consciousness`);
  }
  if (!Number.isInteger(awareness) || awareness <= 0 || awareness > MAX_AWARENESS) {
    throw new WorldError('InvalidAwarenessLevel', `Awareness must be in (0, ${MAX_AWARENESS}], got ${awareness}`);
  }

  const record: ConsciousnessRecord = {
    characterId: id,
    beliefs: [DEFAULT_BELIEF],
    values: [DEFAULT_VALUE],
    goals: [DEFAULT_GOAL],
    priorities: countsFrom(Object.entries(DEFAULT_PRIORITIES)),
    decisionHistory: [],
    awarenessLevel: awareness,
    coherenceLevel: INITIAL_COHERENCE,
    evolutionPoints: 0,
    achievedBreakthroughs: [],
    lastUpdateTime: op.block.timestamp,
    isInitialized: true,
  };
  store.saveConsciousness(record);

  op.emit({ kind: 'ConsciousnessInitialized', characterId: id, awarenessLevel: awareness });
  return record;
}

export interface EvolutionResult {
  record: ConsciousnessRecord;
  decision: Decision;
  impact: number;
  breakthrough: boolean;
}

export function evolveConsciousness(
  store: WorldStore,
  op: OperationContext,
  id: CharacterId,
  experience: string,
  outcome: string,
  cooldownSeconds: number = DEFAULT_COOLDOWN_SECONDS,
): EvolutionResult {
  const record = requireInitialized(store, id);
  const now = op.block.timestamp;
  if (now < record.lastUpdateTime + cooldownSeconds) {
    throw new WorldError(
      'CooldownNotElapsed',
      `Character ${id} can evolve again at ${record.lastUpdateTime + cooldownSeconds}`,
    );
  }

  // Every experience becomes a belief, duplicates included
  record.beliefs.push(experience);

  const decision: Decision = {
    context: experience,
    reasoning: DECISION_REASONING,
    outcome,
    timestamp: now,
    confidence: Math.min(MAX_CONFIDENCE, Math.floor((record.awarenessLevel + record.coherenceLevel) / 2)),
    success: true,
  };
  record.decisionHistory.push(decision);
  op.emit({ kind: 'DecisionMade', characterId: id, context: experience, confidence: decision.confidence });

  let impact = 1 + Math.floor(record.coherenceLevel / 20);
  if (record.goals.includes(experience)) impact += GOAL_ALIGNMENT_BONUS;

  record.awarenessLevel = Math.min(MAX_AWARENESS, record.awarenessLevel + impact);
  record.evolutionPoints += impact;
  record.lastUpdateTime = now;

  const breakthrough = checkBreakthrough(record, op, experience);

  store.saveConsciousness(record);
  op.emit({
    kind: 'ConsciousnessEvolved',
    characterId: id,
    awarenessLevel: record.awarenessLevel,
    evolutionPoints: record.evolutionPoints,
  });

  return { record, decision, impact, breakthrough };
}

/** Unclamped: once the probability passes 100 the breakthrough is certain. */
export function breakthroughProbability(record: ConsciousnessRecord): number {
  return Math.floor((record.awarenessLevel * record.coherenceLevel) / 100)
    + Math.floor(record.evolutionPoints / 100);
}

function checkBreakthrough(record: ConsciousnessRecord, op: OperationContext, experience: string): boolean {
  if (record.achievedBreakthroughs.includes(experience)) return false;

  const roll = draw(op.seeds.consciousnessSeed(op.block, record.characterId, experience), 100);
  if (roll >= breakthroughProbability(record)) return false;

  record.achievedBreakthroughs.push(experience);
  record.evolutionPoints += BREAKTHROUGH_BONUS;
  op.emit({ kind: 'BreakthroughAchieved', characterId: record.characterId, experience });
  return true;
}

// ─── Additions ───

export function addGoal(store: WorldStore, op: OperationContext, id: CharacterId, goal: string): number {
  const record = requireInitialized(store, id);
  record.goals.push(goal);
  store.saveConsciousness(record);
  op.emit({ kind: 'GoalAdded', characterId: id, goal });
  return record.goals.length;
}

export function addBelief(store: WorldStore, op: OperationContext, id: CharacterId, belief: string): number {
  const record = requireInitialized(store, id);
  record.beliefs.push(belief);
  store.saveConsciousness(record);
  op.emit({ kind: 'BeliefAdded', characterId: id, belief });
  return record.beliefs.length;
}

/** Appends the value and sets its priority, overwriting any earlier one. */
export function addValue(
  store: WorldStore,
  op: OperationContext,
  id: CharacterId,
  value: string,
  priority: number,
): number {
  const record = requireInitialized(store, id);
  if (!Number.isInteger(priority) || priority < 0 || priority > MAX_PRIORITY) {
    throw new WorldError('InvalidPriority', `Priority must be in [0, ${MAX_PRIORITY}], got ${priority}`);
  }

  record.values.push(value);
  record.priorities[value] = priority;
  store.saveConsciousness(record);
  op.emit({ kind: 'ValueAdded', characterId: id, value, priority });
  return record.values.length;
}

// ─── Reads ───

export function getPriority(store: WorldStore, id: CharacterId, key: string): number {
  return countOf(requireInitialized(store, id).priorities, key);
}

export function hasBreakthrough(store: WorldStore, id: CharacterId, experience: string): boolean {
  return store.getConsciousness(id)?.achievedBreakthroughs.includes(experience) ?? false;
}

export interface ConsciousnessSummary {
  beliefCount: number;
  valueCount: number;
  goalCount: number;
  decisionCount: number;
  awarenessLevel: number;
  coherenceLevel: number;
  evolutionPoints: number;
  breakthroughCount: number;
  lastUpdateTime: number;
}

/** Counts and levels; zeros for a character that never initialized. */
export function summarize(store: WorldStore, id: CharacterId): ConsciousnessSummary {
  const r = store.getConsciousness(id);
  return {
    beliefCount: r?.beliefs.length ?? 0,
    valueCount: r?.values.length ?? 0,
    goalCount: r?.goals.length ?? 0,
    decisionCount: r?.decisionHistory.length ?? 0,
    awarenessLevel: r?.awarenessLevel ?? 0,
    coherenceLevel: r?.coherenceLevel ?? 0,
    evolutionPoints: r?.evolutionPoints ?? 0,
    breakthroughCount: r?.achievedBreakthroughs.length ?? 0,
    lastUpdateTime: r?.lastUpdateTime ?? 0,
  };
}
