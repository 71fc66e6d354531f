/**
 * World Store — Persistent keyed state for every character.
 *
 * Uses SQLite (embedded, zero cost, runs everywhere). One row per
 * character per subsystem; list and map fields live in JSON columns
 * on that row so each record keeps its own nested containers.
 *
 * Every mutating operation runs inside transaction(): a throw rolls
 * back all of its writes, event rows included.
 */

import Database from 'better-sqlite3';
import { nanoid } from 'nanoid';
import fs from 'fs';
import path from 'path';
import { emptyCounts, type Counts } from '../core/counts.js';
import type {
  BlockContext,
  CharacterId,
  ConsciousnessRecord,
  Decision,
  EventQuery,
  LoggedEvent,
  MemeticPattern,
  QuantumState,
  WorldEvent,
} from '../core/types.js';

// ─── Row Shapes ───

interface QuantumRow {
  character_id: number;
  entanglement_factor: number;
  is_collapsed: number;
  superposition_states: string;
  quantum_bonds: string;
}

interface MemeticRow {
  character_id: number;
  memes: string;
  virality: number;
  mutation_rate: number;
  propagation_paths: string;
}

interface ConsciousnessRow {
  character_id: number;
  beliefs: string;
  vals: string;
  goals: string;
  priorities: string;
  decision_history: string;
  awareness_level: number;
  coherence_level: number;
  evolution_points: number;
  achieved_breakthroughs: string;
  last_update_time: number;
  is_initialized: number;
}

interface EventRow {
  id: string;
  block_number: number;
  timestamp: number;
  caller: string;
  kind: string;
  character_id: number;
  counterpart_id: number | null;
  payload: string;
}

export interface StoreStats {
  quantumStates: number;
  entanglements: number;
  memeticPatterns: number;
  consciousness: number;
  events: number;
}

// ─── JSON Columns ───

function parseStrings(text: string): string[] {
  const data: unknown = JSON.parse(text);
  if (!Array.isArray(data)) return [];
  return data.filter((v): v is string => typeof v === 'string');
}

function parseCounts(text: string): Counts {
  const data: unknown = JSON.parse(text);
  const out = emptyCounts();
  if (data === null || typeof data !== 'object' || Array.isArray(data)) return out;
  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'number') out[key] = value;
  }
  return out;
}

function counterpartOf(event: WorldEvent): CharacterId | undefined {
  switch (event.kind) {
    case 'EntanglementFormed':
      return event.otherId;
    case 'MemePropagated':
      return event.targetId;
    default:
      return undefined;
  }
}

function isDecision(v: unknown): v is Decision {
  if (v === null || typeof v !== 'object') return false;
  const d: Record<string, unknown> = { ...v };
  return typeof d.context === 'string'
    && typeof d.reasoning === 'string'
    && typeof d.outcome === 'string'
    && typeof d.timestamp === 'number'
    && typeof d.confidence === 'number'
    && typeof d.success === 'boolean';
}

function parseDecisions(text: string): Decision[] {
  const data: unknown = JSON.parse(text);
  return Array.isArray(data) ? data.filter(isDecision) : [];
}

function isWorldEvent(v: unknown, kind: string): v is WorldEvent {
  return v !== null && typeof v === 'object' && 'kind' in v && v.kind === kind;
}

// ─── Store ───

export class WorldStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS quantum_states (
        character_id INTEGER PRIMARY KEY,
        entanglement_factor INTEGER NOT NULL DEFAULT 0,
        is_collapsed INTEGER NOT NULL DEFAULT 0,
        superposition_states TEXT NOT NULL DEFAULT '[]',
        quantum_bonds TEXT NOT NULL DEFAULT '{}'
      );

      CREATE TABLE IF NOT EXISTS entanglements (
        character_id INTEGER NOT NULL,
        other_id INTEGER NOT NULL,
        PRIMARY KEY (character_id, other_id)
      );

      CREATE TABLE IF NOT EXISTS memetic_patterns (
        character_id INTEGER PRIMARY KEY,
        memes TEXT NOT NULL DEFAULT '[]',
        virality INTEGER NOT NULL DEFAULT 0,
        mutation_rate INTEGER NOT NULL DEFAULT 0,
        propagation_paths TEXT NOT NULL DEFAULT '{}'
      );

      CREATE TABLE IF NOT EXISTS consciousness (
        character_id INTEGER PRIMARY KEY,
        beliefs TEXT NOT NULL DEFAULT '[]',
        vals TEXT NOT NULL DEFAULT '[]',
        goals TEXT NOT NULL DEFAULT '[]',
        priorities TEXT NOT NULL DEFAULT '{}',
        decision_history TEXT NOT NULL DEFAULT '[]',
        awareness_level INTEGER NOT NULL DEFAULT 0,
        coherence_level INTEGER NOT NULL DEFAULT 0,
        evolution_points INTEGER NOT NULL DEFAULT 0,
        achieved_breakthroughs TEXT NOT NULL DEFAULT '[]',
        last_update_time INTEGER NOT NULL DEFAULT 0,
        is_initialized INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS events (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        block_number INTEGER NOT NULL,
        timestamp INTEGER NOT NULL,
        caller TEXT NOT NULL,
        kind TEXT NOT NULL,
        character_id INTEGER NOT NULL,
        counterpart_id INTEGER,
        payload TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_events_character ON events(character_id, seq);
      CREATE INDEX IF NOT EXISTS idx_events_counterpart ON events(counterpart_id, seq);
      CREATE INDEX IF NOT EXISTS idx_events_kind ON events(kind, seq);
    `);
  }

  /** Run fn atomically. A throw discards every write fn made. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }

  // ─── Quantum States ───

  getQuantumState(id: CharacterId): QuantumState | undefined {
    const row = this.db
      .prepare<[number], QuantumRow>('SELECT * FROM quantum_states WHERE character_id = ?')
      .get(id);
    if (!row) return undefined;
    return {
      characterId: row.character_id,
      entanglementFactor: row.entanglement_factor,
      isCollapsed: row.is_collapsed === 1,
      superpositionStates: parseStrings(row.superposition_states),
      quantumBonds: parseCounts(row.quantum_bonds),
    };
  }

  saveQuantumState(state: QuantumState): void {
    this.db.prepare(`
      INSERT INTO quantum_states (character_id, entanglement_factor, is_collapsed, superposition_states, quantum_bonds)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(character_id) DO UPDATE SET
        entanglement_factor = excluded.entanglement_factor,
        is_collapsed = excluded.is_collapsed,
        superposition_states = excluded.superposition_states,
        quantum_bonds = excluded.quantum_bonds
    `).run(
      state.characterId,
      state.entanglementFactor,
      state.isCollapsed ? 1 : 0,
      JSON.stringify(state.superpositionStates),
      JSON.stringify(state.quantumBonds),
    );
  }

  // ─── Entanglement Adjacency ───

  isEntangled(a: CharacterId, b: CharacterId): boolean {
    const row = this.db
      .prepare<[number, number], { found: number }>(
        'SELECT 1 AS found FROM entanglements WHERE character_id = ? AND other_id = ?'
      )
      .get(a, b);
    return row !== undefined;
  }

  /** Both directions are written together so adjacency stays symmetric. */
  entangle(a: CharacterId, b: CharacterId): void {
    const stmt = this.db.prepare(
      'INSERT OR IGNORE INTO entanglements (character_id, other_id) VALUES (?, ?)'
    );
    stmt.run(a, b);
    stmt.run(b, a);
  }

  // ─── Memetic Patterns ───

  getMemeticPattern(id: CharacterId): MemeticPattern | undefined {
    const row = this.db
      .prepare<[number], MemeticRow>('SELECT * FROM memetic_patterns WHERE character_id = ?')
      .get(id);
    if (!row) return undefined;
    return {
      characterId: row.character_id,
      memes: parseStrings(row.memes),
      virality: row.virality,
      mutationRate: row.mutation_rate,
      propagationPaths: parseCounts(row.propagation_paths),
    };
  }

  saveMemeticPattern(pattern: MemeticPattern): void {
    this.db.prepare(`
      INSERT INTO memetic_patterns (character_id, memes, virality, mutation_rate, propagation_paths)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(character_id) DO UPDATE SET
        memes = excluded.memes,
        virality = excluded.virality,
        mutation_rate = excluded.mutation_rate,
        propagation_paths = excluded.propagation_paths
    `).run(
      pattern.characterId,
      JSON.stringify(pattern.memes),
      pattern.virality,
      pattern.mutationRate,
      JSON.stringify(pattern.propagationPaths),
    );
  }

  // ─── Consciousness ───

  getConsciousness(id: CharacterId): ConsciousnessRecord | undefined {
    const row = this.db
      .prepare<[number], ConsciousnessRow>('SELECT * FROM consciousness WHERE character_id = ?')
      .get(id);
    if (!row) return undefined;
    return {
      characterId: row.character_id,
      beliefs: parseStrings(row.beliefs),
      values: parseStrings(row.vals),
      goals: parseStrings(row.goals),
      priorities: parseCounts(row.priorities),
      decisionHistory: parseDecisions(row.decision_history),
      awarenessLevel: row.awareness_level,
      coherenceLevel: row.coherence_level,
      evolutionPoints: row.evolution_points,
      achievedBreakthroughs: parseStrings(row.achieved_breakthroughs),
      lastUpdateTime: row.last_update_time,
      isInitialized: row.is_initialized === 1,
    };
  }

  saveConsciousness(record: ConsciousnessRecord): void {
    this.db.prepare(`
      INSERT INTO consciousness (
        character_id, beliefs, vals, goals, priorities, decision_history,
        awareness_level, coherence_level, evolution_points,
        achieved_breakthroughs, last_update_time, is_initialized
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(character_id) DO UPDATE SET
        beliefs = excluded.beliefs,
        vals = excluded.vals,
        goals = excluded.goals,
        priorities = excluded.priorities,
        decision_history = excluded.decision_history,
        awareness_level = excluded.awareness_level,
        coherence_level = excluded.coherence_level,
        evolution_points = excluded.evolution_points,
        achieved_breakthroughs = excluded.achieved_breakthroughs,
        last_update_time = excluded.last_update_time,
        is_initialized = excluded.is_initialized
    `).run(
      record.characterId,
      JSON.stringify(record.beliefs),
      JSON.stringify(record.values),
      JSON.stringify(record.goals),
      JSON.stringify(record.priorities),
      JSON.stringify(record.decisionHistory),
      record.awarenessLevel,
      record.coherenceLevel,
      record.evolutionPoints,
      JSON.stringify(record.achievedBreakthroughs),
      record.lastUpdateTime,
      record.isInitialized ? 1 : 0,
    );
  }

  // ─── Event Log ───

  appendEvent(block: BlockContext, event: WorldEvent): LoggedEvent {
    const logged: LoggedEvent = {
      id: nanoid(12),
      blockNumber: block.number,
      timestamp: block.timestamp,
      caller: block.caller,
      event,
    };

    this.db.prepare(
      'INSERT INTO events (id, block_number, timestamp, caller, kind, character_id, counterpart_id, payload) VALUES (?, ?, ?, ?, ?, ?, ?, ?)'
    ).run(
      logged.id,
      logged.blockNumber,
      logged.timestamp,
      logged.caller,
      event.kind,
      event.characterId,
      counterpartOf(event) ?? null,
      JSON.stringify(event),
    );

    return logged;
  }

  /**
   * Events in emission order, optionally filtered. A character filter
   * also matches events where the character is the other party (the
   * second side of a bond, the target of a propagation).
   */
  listEvents(q: EventQuery = {}): LoggedEvent[] {
    let sql = 'SELECT * FROM events WHERE 1=1';
    const args: unknown[] = [];

    if (q.characterId !== undefined) {
      sql += ' AND (character_id = ? OR counterpart_id = ?)';
      args.push(q.characterId, q.characterId);
    }
    if (q.kind) {
      sql += ' AND kind = ?';
      args.push(q.kind);
    }

    sql += ' ORDER BY seq ASC LIMIT ?';
    args.push(q.limit ?? 500);

    const rows = this.db.prepare<unknown[], EventRow>(sql).all(...args);
    const out: LoggedEvent[] = [];
    for (const r of rows) {
      const event: unknown = JSON.parse(r.payload);
      if (!isWorldEvent(event, r.kind)) continue;
      out.push({ id: r.id, blockNumber: r.block_number, timestamp: r.timestamp, caller: r.caller, event });
    }
    return out;
  }

  stats(): StoreStats {
    const count = (table: string): number =>
      this.db.prepare<[], { c: number }>(`SELECT COUNT(*) AS c FROM ${table}`).get()?.c ?? 0;

    return {
      quantumStates: count('quantum_states'),
      // Each relation is stored once per direction
      entanglements: count('entanglements') / 2,
      memeticPatterns: count('memetic_patterns'),
      consciousness: count('consciousness'),
      events: count('events'),
    };
  }
}
