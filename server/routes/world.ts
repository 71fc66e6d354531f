/**
 * World Routes — The execution environment's HTTP face.
 *
 * Each POST runs one world operation as the caller named in the
 * x-caller-address header and answers with its receipt. GETs are
 * plain reads.
 */

import { Router, Request, Response } from 'express';
import { ZeroAddress } from 'ethers';
import type { World, WorldEventKind } from '../../engine/index.js';
import { sendError } from '../lib/http-errors.js';

const EVENT_KINDS: ReadonlySet<string> = new Set<WorldEventKind>([
  'QuantumStateInitialized',
  'EntanglementFormed',
  'QuantumStateCollapsed',
  'SuperpositionAdded',
  'MemeMutated',
  'MemePropagated',
  'ConsciousnessInitialized',
  'ConsciousnessEvolved',
  'DecisionMade',
  'BreakthroughAchieved',
  'GoalAdded',
  'BeliefAdded',
  'ValueAdded',
]);

function isEventKind(value: string): value is WorldEventKind {
  return EVENT_KINDS.has(value);
}

function callerOf(req: Request): string {
  return req.header('x-caller-address') ?? ZeroAddress;
}

/** Parse a path or body ID. Returns undefined when it is not a non-negative integer. */
function parseId(raw: unknown): number | undefined {
  const n = typeof raw === 'number' ? raw : typeof raw === 'string' && /^\d+$/.test(raw) ? Number(raw) : NaN;
  return Number.isSafeInteger(n) && n >= 0 ? n : undefined;
}

function badRequest(res: Response, message: string): void {
  res.status(400).json({ error: message });
}

function isText(value: unknown): value is string {
  return typeof value === 'string' && value.length <= 5000;
}

export function worldRouter(world: World): Router {
  const router = Router();

  // ─── Entanglement Network ───

  /**
   * POST /api/quantum/:id/init
   * Body: { factor: number }
   */
  router.post('/quantum/:id/init', (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    const { factor } = req.body;
    if (id === undefined) return badRequest(res, 'Invalid character ID.');
    if (typeof factor !== 'number') return badRequest(res, 'factor must be a number.');

    try {
      res.json(world.initializeQuantumState(id, factor, callerOf(req)));
    } catch (error: unknown) {
      sendError(res, error, 'Quantum init');
    }
  });

  /**
   * POST /api/quantum/bonds
   * Body: { a: number, b: number }
   */
  router.post('/quantum/bonds', (req: Request, res: Response) => {
    const a = parseId(req.body.a);
    const b = parseId(req.body.b);
    if (a === undefined || b === undefined) return badRequest(res, 'a and b must be character IDs.');

    try {
      res.json(world.createQuantumBond(a, b, callerOf(req)));
    } catch (error: unknown) {
      sendError(res, error, 'Bond');
    }
  });

  router.post('/quantum/:id/collapse', (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    if (id === undefined) return badRequest(res, 'Invalid character ID.');

    try {
      res.json(world.collapseQuantumState(id, callerOf(req)));
    } catch (error: unknown) {
      sendError(res, error, 'Collapse');
    }
  });

  /**
   * POST /api/quantum/:id/superposition
   * Body: { label: string }
   */
  router.post('/quantum/:id/superposition', (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    const { label } = req.body;
    if (id === undefined) return badRequest(res, 'Invalid character ID.');
    if (!isText(label)) return badRequest(res, 'label must be a string.');

    try {
      res.json(world.addSuperpositionState(id, label, callerOf(req)));
    } catch (error: unknown) {
      sendError(res, error, 'Superposition');
    }
  });

  router.get('/quantum/:id', (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    if (id === undefined) return badRequest(res, 'Invalid character ID.');

    const state = world.getQuantumState(id);
    if (!state) {
      return res.status(404).json({ error: 'Quantum state not found.' });
    }
    res.json({ state });
  });

  router.get('/quantum/:a/bonds/:b', (req: Request, res: Response) => {
    const a = parseId(req.params.a);
    const b = parseId(req.params.b);
    if (a === undefined || b === undefined) return badRequest(res, 'Invalid character ID.');

    res.json({
      entangled: world.areEntangled(a, b),
      bondStrength: world.getBondStrength(a, b),
    });
  });

  // ─── Meme Engine ───

  /**
   * POST /api/memes/:id/propagate
   * Body: { meme: string }
   */
  router.post('/memes/:id/propagate', (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    const { meme } = req.body;
    if (id === undefined) return badRequest(res, 'Invalid character ID.');
    if (!isText(meme)) return badRequest(res, 'meme must be a string under 5000 characters.');

    try {
      res.json(world.propagateMeme(id, meme, callerOf(req)));
    } catch (error: unknown) {
      sendError(res, error, 'Propagate');
    }
  });

  router.get('/memes/:id', (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    if (id === undefined) return badRequest(res, 'Invalid character ID.');

    const pattern = world.getMemeticPattern(id);
    if (!pattern) {
      return res.status(404).json({ error: 'Memetic pattern not found.' });
    }
    res.json({ pattern });
  });

  // ─── Consciousness Engine ───

  /**
   * POST /api/consciousness/:id/init
   * Body: { awareness: number }
   */
  router.post('/consciousness/:id/init', (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    const { awareness } = req.body;
    if (id === undefined) return badRequest(res, 'Invalid character ID.');
    if (typeof awareness !== 'number') return badRequest(res, 'awareness must be a number.');

    try {
      res.json(world.initializeConsciousness(id, awareness, callerOf(req)));
    } catch (error: unknown) {
      sendError(res, error, 'Consciousness init');
    }
  });

  /**
   * POST /api/consciousness/:id/evolve
   * Body: { experience: string, outcome: string }
   */
  router.post('/consciousness/:id/evolve', (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    const { experience, outcome } = req.body;
    if (id === undefined) return badRequest(res, 'Invalid character ID.');
    if (!isText(experience) || !isText(outcome)) {
      return badRequest(res, 'experience and outcome must be strings.');
    }

    try {
      res.json(world.evolveConsciousness(id, experience, outcome, callerOf(req)));
    } catch (error: unknown) {
      sendError(res, error, 'Evolve');
    }
  });

  router.post('/consciousness/:id/goals', (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    const { goal } = req.body;
    if (id === undefined) return badRequest(res, 'Invalid character ID.');
    if (!isText(goal)) return badRequest(res, 'goal must be a string.');

    try {
      res.json(world.addGoal(id, goal, callerOf(req)));
    } catch (error: unknown) {
      sendError(res, error, 'Add goal');
    }
  });

  router.post('/consciousness/:id/beliefs', (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    const { belief } = req.body;
    if (id === undefined) return badRequest(res, 'Invalid character ID.');
    if (!isText(belief)) return badRequest(res, 'belief must be a string.');

    try {
      res.json(world.addBelief(id, belief, callerOf(req)));
    } catch (error: unknown) {
      sendError(res, error, 'Add belief');
    }
  });

  /**
   * POST /api/consciousness/:id/values
   * Body: { value: string, priority: number }
   */
  router.post('/consciousness/:id/values', (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    const { value, priority } = req.body;
    if (id === undefined) return badRequest(res, 'Invalid character ID.');
    if (!isText(value) || typeof priority !== 'number') {
      return badRequest(res, 'value must be a string and priority a number.');
    }

    try {
      res.json(world.addValue(id, value, priority, callerOf(req)));
    } catch (error: unknown) {
      sendError(res, error, 'Add value');
    }
  });

  router.get('/consciousness/:id', (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    if (id === undefined) return badRequest(res, 'Invalid character ID.');

    const record = world.getConsciousness(id);
    if (!record) {
      return res.status(404).json({ error: 'Consciousness not found.' });
    }
    res.json({ record, summary: world.getConsciousnessSummary(id) });
  });

  router.get('/consciousness/:id/priorities/:key', (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    if (id === undefined) return badRequest(res, 'Invalid character ID.');

    try {
      res.json({ key: req.params.key, priority: world.getPriority(id, req.params.key) });
    } catch (error: unknown) {
      sendError(res, error, 'Priority');
    }
  });

  // ─── Event Log & Stats ───

  /**
   * GET /api/events?characterId=&kind=&limit=
   */
  router.get('/events', (req: Request, res: Response) => {
    const { characterId, kind, limit } = req.query;
    const id = characterId === undefined ? undefined : parseId(characterId);
    const max = limit === undefined ? undefined : parseId(limit);

    if (characterId !== undefined && id === undefined) return badRequest(res, 'Invalid character ID.');
    if (limit !== undefined && max === undefined) return badRequest(res, 'Invalid limit.');

    let eventKind: WorldEventKind | undefined;
    if (kind !== undefined) {
      if (typeof kind !== 'string' || !isEventKind(kind)) return badRequest(res, 'Unknown event kind.');
      eventKind = kind;
    }

    res.json({ events: world.listEvents({ characterId: id, kind: eventKind, limit: max }) });
  });

  router.get('/stats', (_req: Request, res: Response) => {
    res.json(world.stats());
  });

  return router;
}
