/**
 * Core types for the Character World Engine.
 *
 * Two independent simulation cores share a character-ID namespace:
 * the entanglement network (with its meme engine) and the consciousness
 * engine. Both read a block context from the execution environment and
 * write through a transactional store.
 */

// ─── Execution Environment ───

/** A numeric character identifier. Non-negative safe integer. */
export type CharacterId = number;

/** What the execution environment knows about the current call. */
export interface BlockContext {
  number: number;
  timestamp: number;         // Seconds since epoch
  caller: string;            // 0x-prefixed address
  gasPrice: bigint;          // Wei
  prevrandao: bigint;        // Per-block unpredictable seed
  previousBlockHash: string; // 0x-prefixed 32-byte hash
}

/** Supplies one block context per mutating call. */
export interface BlockContextSource {
  next(caller: string): BlockContext;
}

/** Pseudo-random draws derived from the block context. */
export interface SeedSource {
  networkSeed(ctx: BlockContext): bigint;
  consciousnessSeed(ctx: BlockContext, characterId: CharacterId, experience: string): bigint;
}

// ─── Entanglement Network ───

export interface QuantumState {
  characterId: CharacterId;
  entanglementFactor: number;  // 0 = uninitialized
  isCollapsed: boolean;
  superpositionStates: string[];
  quantumBonds: Record<string, number>;  // Other character ID → bond strength
}

export interface MemeticPattern {
  characterId: CharacterId;
  memes: string[];
  virality: number;
  mutationRate: number;        // Percent, 0 = unset
  propagationPaths: Record<string, number>;  // Source character ID → inbound count
}

// ─── Consciousness Engine ───

export interface Decision {
  context: string;
  reasoning: string;
  outcome: string;
  timestamp: number;
  confidence: number;          // 0-95
  success: boolean;
}

export interface ConsciousnessRecord {
  characterId: CharacterId;
  beliefs: string[];
  values: string[];
  goals: string[];
  priorities: Record<string, number>;
  decisionHistory: Decision[];
  awarenessLevel: number;      // 0-100
  coherenceLevel: number;      // 0-100
  evolutionPoints: number;
  achievedBreakthroughs: string[];
  lastUpdateTime: number;
  isInitialized: boolean;
}

// ─── Event Log ───

export type WorldEvent =
  | { kind: 'QuantumStateInitialized'; characterId: CharacterId; entanglementFactor: number }
  | { kind: 'EntanglementFormed'; characterId: CharacterId; otherId: CharacterId; bondStrength: number }
  | { kind: 'QuantumStateCollapsed'; characterId: CharacterId }
  | { kind: 'SuperpositionAdded'; characterId: CharacterId; label: string }
  | { kind: 'MemeMutated'; characterId: CharacterId; original: string; mutated: string }
  | { kind: 'MemePropagated'; characterId: CharacterId; targetId: CharacterId; meme: string }
  | { kind: 'ConsciousnessInitialized'; characterId: CharacterId; awarenessLevel: number }
  | { kind: 'ConsciousnessEvolved'; characterId: CharacterId; awarenessLevel: number; evolutionPoints: number }
  | { kind: 'DecisionMade'; characterId: CharacterId; context: string; confidence: number }
  | { kind: 'BreakthroughAchieved'; characterId: CharacterId; experience: string }
  | { kind: 'GoalAdded'; characterId: CharacterId; goal: string }
  | { kind: 'BeliefAdded'; characterId: CharacterId; belief: string }
  | { kind: 'ValueAdded'; characterId: CharacterId; value: string; priority: number };

export type WorldEventKind = WorldEvent['kind'];

/** An event as stored in the log. */
export interface LoggedEvent {
  id: string;
  blockNumber: number;
  timestamp: number;
  caller: string;
  event: WorldEvent;
}

export interface EventQuery {
  characterId?: CharacterId;
  kind?: WorldEventKind;
  limit?: number;
}

// ─── Operation Plumbing ───

/** Everything a single mutating operation may touch. */
export interface OperationContext {
  block: BlockContext;
  seeds: SeedSource;
  emit: (event: WorldEvent) => void;
}
