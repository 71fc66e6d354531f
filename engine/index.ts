/**
 * Character World Engine — The public API.
 *
 * Create a world, then call its operations. Each mutating call runs in
 * its own block context and its own store transaction: it either commits
 * every write and event, or throws a WorldError and leaves no trace.
 *
 * Architecture:
 *   World (this file) → block context + seed source
 *        ↓
 *   Entanglement network / meme engine   Consciousness engine
 *        ↓                                      ↓
 *                  World store (SQLite)
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { getAddress, isAddress, ZeroAddress } from 'ethers';
import type {
  BlockContextSource,
  CharacterId,
  ConsciousnessRecord,
  Decision,
  EventQuery,
  LoggedEvent,
  MemeticPattern,
  OperationContext,
  QuantumState,
  SeedSource,
  WorldEvent,
} from './core/types.js';
import { WorldError } from './core/errors.js';
import { WorldStore, type StoreStats } from './store/world-store.js';
import { BlockSeedSource } from './random/seed-source.js';
import { LocalChain } from './context/local-chain.js';
import * as quantum from './quantum/entanglement.js';
import * as memes from './quantum/memes.js';
import * as consciousness from './consciousness/consciousness.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DB_PATH = process.env.WORLD_DB_PATH || path.join(__dirname, '../data/world.db');

export interface WorldConfig {
  dbPath?: string;
  cooldownSeconds?: number;
  seeds?: SeedSource;
  context?: BlockContextSource;
  debug?: boolean;
}

/** What a committed operation produced. */
export interface Receipt<T> {
  result: T;
  blockNumber: number;
  timestamp: number;
  events: WorldEvent[];
  debug?: {
    duration_ms: number;
  };
}

/** The character world. */
export class World {
  private store: WorldStore;
  private seeds: SeedSource;
  private context: BlockContextSource;
  private cooldownSeconds: number;
  private debug: boolean;

  constructor(config: WorldConfig = {}) {
    this.store = new WorldStore(config.dbPath ?? DB_PATH);
    this.seeds = config.seeds ?? new BlockSeedSource();
    this.context = config.context ?? new LocalChain();
    this.cooldownSeconds = config.cooldownSeconds ?? consciousness.DEFAULT_COOLDOWN_SECONDS;
    this.debug = config.debug ?? false;
  }

  /** Run one operation in its own block and transaction. */
  private execute<T>(caller: string, op: (ctx: OperationContext) => T): Receipt<T> {
    if (!isAddress(caller)) {
      throw new WorldError('InvalidCaller', `Caller is not an address: ${caller}`);
    }

    const startTime = Date.now();
    const block = this.context.next(getAddress(caller));
    const events: WorldEvent[] = [];

    const result = this.store.transaction(() => op({
      block,
      seeds: this.seeds,
      emit: (event) => {
        this.store.appendEvent(block, event);
        events.push(event);
      },
    }));

    const receipt: Receipt<T> = {
      result,
      blockNumber: block.number,
      timestamp: block.timestamp,
      events,
    };
    if (this.debug) {
      receipt.debug = { duration_ms: Date.now() - startTime };
    }
    return receipt;
  }

  close(): void {
    this.store.close();
  }

  // ─── Entanglement Network ───

  initializeQuantumState(id: CharacterId, factor: number, caller: string = ZeroAddress): Receipt<QuantumState> {
    return this.execute(caller, (ctx) => quantum.initializeQuantumState(this.store, ctx, id, factor));
  }

  createQuantumBond(a: CharacterId, b: CharacterId, caller: string = ZeroAddress): Receipt<number> {
    return this.execute(caller, (ctx) => quantum.createQuantumBond(this.store, ctx, a, b));
  }

  collapseQuantumState(id: CharacterId, caller: string = ZeroAddress): Receipt<QuantumState> {
    return this.execute(caller, (ctx) => quantum.collapseQuantumState(this.store, ctx, id));
  }

  addSuperpositionState(id: CharacterId, label: string, caller: string = ZeroAddress): Receipt<string[]> {
    return this.execute(caller, (ctx) => quantum.addSuperpositionState(this.store, ctx, id, label));
  }

  getQuantumState(id: CharacterId): QuantumState | undefined {
    return this.store.getQuantumState(id);
  }

  getEntanglementFactor(id: CharacterId): number {
    return quantum.getEntanglementFactor(this.store, id);
  }

  getSuperpositionStates(id: CharacterId): string[] {
    return quantum.getSuperpositionStates(this.store, id);
  }

  isCollapsed(id: CharacterId): boolean {
    return quantum.isCollapsed(this.store, id);
  }

  getBondStrength(a: CharacterId, b: CharacterId): number {
    return quantum.getBondStrength(this.store, a, b);
  }

  areEntangled(a: CharacterId, b: CharacterId): boolean {
    return quantum.areEntangled(this.store, a, b);
  }

  // ─── Meme Engine ───

  propagateMeme(id: CharacterId, meme: string, caller: string = ZeroAddress): Receipt<memes.PropagationResult> {
    return this.execute(caller, (ctx) => memes.propagateMeme(this.store, ctx, id, meme));
  }

  getMemeticPattern(id: CharacterId): MemeticPattern | undefined {
    return this.store.getMemeticPattern(id);
  }

  getMemes(id: CharacterId): string[] {
    return memes.getMemes(this.store, id);
  }

  getVirality(id: CharacterId): number {
    return memes.getVirality(this.store, id);
  }

  getMutationRate(id: CharacterId): number {
    return memes.getMutationRate(this.store, id);
  }

  getPropagationCount(id: CharacterId, sourceId: CharacterId): number {
    return memes.getPropagationCount(this.store, id, sourceId);
  }

  // ─── Consciousness Engine ───

  initializeConsciousness(id: CharacterId, awareness: number, caller: string = ZeroAddress): Receipt<ConsciousnessRecord> {
    return this.execute(caller, (ctx) => consciousness.initializeConsciousness(this.store, ctx, id, awareness));
  }

  evolveConsciousness(
    id: CharacterId,
    experience: string,
    outcome: string,
    caller: string = ZeroAddress,
  ): Receipt<consciousness.EvolutionResult> {
    return this.execute(caller, (ctx) =>
      consciousness.evolveConsciousness(this.store, ctx, id, experience, outcome, this.cooldownSeconds));
  }

  addGoal(id: CharacterId, goal: string, caller: string = ZeroAddress): Receipt<number> {
    return this.execute(caller, (ctx) => consciousness.addGoal(this.store, ctx, id, goal));
  }

  addBelief(id: CharacterId, belief: string, caller: string = ZeroAddress): Receipt<number> {
    return this.execute(caller, (ctx) => consciousness.addBelief(this.store, ctx, id, belief));
  }

  addValue(id: CharacterId, value: string, priority: number, caller: string = ZeroAddress): Receipt<number> {
    return this.execute(caller, (ctx) => consciousness.addValue(this.store, ctx, id, value, priority));
  }

  getConsciousness(id: CharacterId): ConsciousnessRecord | undefined {
    return this.store.getConsciousness(id);
  }

  getConsciousnessSummary(id: CharacterId): consciousness.ConsciousnessSummary {
    return consciousness.summarize(this.store, id);
  }

  getBeliefs(id: CharacterId): string[] {
    return this.store.getConsciousness(id)?.beliefs ?? [];
  }

  getValues(id: CharacterId): string[] {
    return this.store.getConsciousness(id)?.values ?? [];
  }

  getGoals(id: CharacterId): string[] {
    return this.store.getConsciousness(id)?.goals ?? [];
  }

  getDecisionHistory(id: CharacterId): Decision[] {
    return this.store.getConsciousness(id)?.decisionHistory ?? [];
  }

  getPriority(id: CharacterId, key: string): number {
    return consciousness.getPriority(this.store, id, key);
  }

  hasBreakthrough(id: CharacterId, experience: string): boolean {
    return consciousness.hasBreakthrough(this.store, id, experience);
  }

  // ─── Event Log & Stats ───

  listEvents(query?: EventQuery): LoggedEvent[] {
    return this.store.listEvents(query);
  }

  stats(): StoreStats {
    return this.store.stats();
  }
}

/** Create a world instance. */
export function createWorld(config?: WorldConfig): World {
  const world = new World(config);
  console.log('Character world opened at', config?.dbPath ?? DB_PATH);
  return world;
}

// Re-export types
export type {
  BlockContext,
  BlockContextSource,
  CharacterId,
  ConsciousnessRecord,
  Decision,
  EventQuery,
  LoggedEvent,
  MemeticPattern,
  QuantumState,
  SeedSource,
  WorldEvent,
  WorldEventKind,
} from './core/types.js';
export type { StoreStats } from './store/world-store.js';
export type { PropagationResult } from './quantum/memes.js';
export type { EvolutionResult, ConsciousnessSummary } from './consciousness/consciousness.js';
export { WorldError, isWorldError, type WorldErrorCode } from './core/errors.js';
export { BlockSeedSource } from './random/seed-source.js';
export { LocalChain } from './context/local-chain.js';
