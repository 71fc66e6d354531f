import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { START_TIME, createTestWorld, failureCode, type TestWorld } from '../testing.js';
import type { ConsciousnessRecord } from '../core/types.js';
import {
  DECISION_REASONING,
  DEFAULT_BELIEF,
  DEFAULT_GOAL,
  DEFAULT_VALUE,
  breakthroughProbability,
} from './consciousness.js';

const HOUR = 3600;

describe('consciousness engine', () => {
  let t: TestWorld;

  beforeEach(() => {
    t = createTestWorld();
  });

  afterEach(() => {
    t.world.close();
  });

  describe('initializeConsciousness', () => {
    it('seeds defaults', () => {
      t.world.initializeConsciousness(1, 10);

      const record = t.world.getConsciousness(1);
      expect(record?.beliefs).toEqual([DEFAULT_BELIEF]);
      expect(record?.values).toEqual([DEFAULT_VALUE]);
      expect(record?.goals).toEqual([DEFAULT_GOAL]);
      expect(record?.priorities).toEqual({ survival: 90, growth: 80, connection: 70 });
      expect(record?.awarenessLevel).toBe(10);
      expect(record?.coherenceLevel).toBe(50);
      expect(record?.evolutionPoints).toBe(0);
      expect(record?.lastUpdateTime).toBe(START_TIME);
    });

    it('accepts awareness in (0, 100] only', () => {
      expect(failureCode(() => t.world.initializeConsciousness(1, 0))).toBe('InvalidAwarenessLevel');
      expect(failureCode(() => t.world.initializeConsciousness(1, 101))).toBe('InvalidAwarenessLevel');
      expect(failureCode(() => t.world.initializeConsciousness(1, 100))).toBeUndefined();
    });

    it('initializes only once', () => {
      t.world.initializeConsciousness(1, 10);
      expect(failureCode(() => t.world.initializeConsciousness(1, 20))).toBe('AlreadyInitialized');
      expect(t.world.getConsciousness(1)?.awarenessLevel).toBe(10);
    });
  });

  describe('evolveConsciousness', () => {
    beforeEach(() => {
      t.world.initializeConsciousness(1, 10);
    });

    it('waits out the cooldown', () => {
      expect(failureCode(() => t.world.evolveConsciousness(1, 'rain', 'wet'))).toBe('CooldownNotElapsed');

      t.clock.now = START_TIME + HOUR - 1;
      expect(failureCode(() => t.world.evolveConsciousness(1, 'rain', 'wet'))).toBe('CooldownNotElapsed');

      t.clock.now = START_TIME + HOUR;
      expect(failureCode(() => t.world.evolveConsciousness(1, 'rain', 'wet'))).toBeUndefined();
      expect(failureCode(() => t.world.evolveConsciousness(1, 'sun', 'dry'))).toBe('CooldownNotElapsed');

      t.clock.now = START_TIME + 2 * HOUR;
      expect(failureCode(() => t.world.evolveConsciousness(1, 'sun', 'dry'))).toBeUndefined();
    });

    it('records the experience as a belief and a decision', () => {
      t.clock.now = START_TIME + HOUR;

      const { result } = t.world.evolveConsciousness(1, 'rain', 'wet');

      expect(result.decision).toEqual({
        context: 'rain',
        reasoning: DECISION_REASONING,
        outcome: 'wet',
        timestamp: START_TIME + HOUR,
        confidence: 30,
        success: true,
      });
      expect(t.world.getBeliefs(1)).toEqual([DEFAULT_BELIEF, 'rain']);
      expect(t.world.getDecisionHistory(1)).toHaveLength(1);
    });

    it('raises awareness and points by 1 + coherence / 20', () => {
      t.clock.now = START_TIME + HOUR;

      const { result } = t.world.evolveConsciousness(1, 'rain', 'wet');

      expect(result.impact).toBe(3);
      expect(result.breakthrough).toBe(false);
      expect(t.world.getConsciousnessSummary(1)).toMatchObject({
        awarenessLevel: 13,
        evolutionPoints: 3,
        coherenceLevel: 50,
        beliefCount: 2,
        decisionCount: 1,
        lastUpdateTime: START_TIME + HOUR,
      });
    });

    it('adds two when the experience matches a goal', () => {
      t.clock.now = START_TIME + HOUR;

      const { result } = t.world.evolveConsciousness(1, DEFAULT_GOAL, 'clarity');

      expect(result.impact).toBe(5);
      expect(t.world.getConsciousness(1)?.awarenessLevel).toBe(15);
    });

    it('never lets awareness pass 100', () => {
      t.world.initializeConsciousness(2, 99);

      for (let i = 1; i <= 3; i++) {
        t.clock.now = START_TIME + i * HOUR;
        t.world.evolveConsciousness(2, `step ${i}`, 'ok');
        expect(t.world.getConsciousness(2)?.awarenessLevel).toBe(100);
      }
      expect(t.world.getConsciousness(2)?.evolutionPoints).toBe(9);
    });

    it('averages awareness and coherence into confidence', () => {
      t.world.initializeConsciousness(2, 100);
      t.clock.now = START_TIME + HOUR;
      t.world.evolveConsciousness(2, 'rain', 'wet');

      expect(t.world.getDecisionHistory(2)[0].confidence).toBe(75);
    });
  });

  describe('breakthroughs', () => {
    beforeEach(() => {
      t.world.initializeConsciousness(1, 10);
      t.clock.now = START_TIME + HOUR;
    });

    it('triggers when the draw is under the probability', () => {
      // awareness 13 after impact → 13 * 50 / 100 = 6
      t.seeds.consciousness = 105n;

      const { result, events } = t.world.evolveConsciousness(1, 'eclipse', 'awe');

      expect(result.breakthrough).toBe(true);
      expect(t.world.hasBreakthrough(1, 'eclipse')).toBe(true);
      expect(t.world.getConsciousness(1)?.evolutionPoints).toBe(8);
      expect(events).toContainEqual({ kind: 'BreakthroughAchieved', characterId: 1, experience: 'eclipse' });
    });

    it('does not trigger at or above the probability', () => {
      t.seeds.consciousness = 6n;

      expect(t.world.evolveConsciousness(1, 'eclipse', 'awe').result.breakthrough).toBe(false);
      expect(t.world.hasBreakthrough(1, 'eclipse')).toBe(false);
    });

    it('fires once per experience', () => {
      t.seeds.consciousness = 0n;
      t.world.evolveConsciousness(1, 'eclipse', 'awe');

      t.clock.now = START_TIME + 2 * HOUR;
      const second = t.world.evolveConsciousness(1, 'eclipse', 'awe again');

      expect(second.result.breakthrough).toBe(false);
      expect(t.world.getConsciousness(1)?.achievedBreakthroughs).toEqual(['eclipse']);
      expect(t.world.getConsciousness(1)?.evolutionPoints).toBe(11);
      expect(t.world.listEvents({ kind: 'BreakthroughAchieved' })).toHaveLength(1);
    });
  });

  describe('breakthroughProbability', () => {
    const base: ConsciousnessRecord = {
      characterId: 1,
      beliefs: [],
      values: [],
      goals: [],
      priorities: {},
      decisionHistory: [],
      awarenessLevel: 100,
      coherenceLevel: 50,
      evolutionPoints: 0,
      achievedBreakthroughs: [],
      lastUpdateTime: 0,
      isInitialized: true,
    };

    it('adds a point per hundred evolution points', () => {
      expect(breakthroughProbability(base)).toBe(50);
      expect(breakthroughProbability({ ...base, evolutionPoints: 199 })).toBe(51);
    });

    it('is not clamped at 100', () => {
      expect(breakthroughProbability({ ...base, evolutionPoints: 10_000 })).toBe(150);
    });
  });

  describe('goals, beliefs and values', () => {
    it('require an initialized consciousness', () => {
      expect(failureCode(() => t.world.addGoal(1, 'fly'))).toBe('NotInitialized');
      expect(failureCode(() => t.world.addBelief(1, 'sky is up'))).toBe('NotInitialized');
      expect(failureCode(() => t.world.addValue(1, 'honesty', 50))).toBe('NotInitialized');
      expect(failureCode(() => t.world.getPriority(1, 'growth'))).toBe('NotInitialized');
    });

    it('append and report counts', () => {
      t.world.initializeConsciousness(1, 10);

      expect(t.world.addGoal(1, 'fly').result).toBe(2);
      expect(t.world.addBelief(1, 'sky is up').result).toBe(2);
      expect(t.world.getGoals(1)).toEqual([DEFAULT_GOAL, 'fly']);
      expect(t.world.getBeliefs(1)).toEqual([DEFAULT_BELIEF, 'sky is up']);
    });

    it('overwrite the priority of a repeated value', () => {
      t.world.initializeConsciousness(1, 10);

      t.world.addValue(1, 'honesty', 60);
      expect(t.world.getPriority(1, 'honesty')).toBe(60);

      t.world.addValue(1, 'honesty', 40);
      expect(t.world.getPriority(1, 'honesty')).toBe(40);
      expect(t.world.getValues(1)).toEqual([DEFAULT_VALUE, 'honesty', 'honesty']);
    });

    it('reject priorities above 100', () => {
      t.world.initializeConsciousness(1, 10);

      expect(failureCode(() => t.world.addValue(1, 'honesty', 101))).toBe('InvalidPriority');
      expect(t.world.getValues(1)).toEqual([DEFAULT_VALUE]);
      expect(t.world.getPriority(1, 'honesty')).toBe(0);
    });

    it('report 0 for keys that only exist on Object.prototype', () => {
      t.world.initializeConsciousness(1, 10);

      expect(t.world.getPriority(1, 'constructor')).toBe(0);
      expect(t.world.getPriority(1, 'toString')).toBe(0);
      expect(t.world.getPriority(1, 'hasOwnProperty')).toBe(0);
    });

    it('store a value named __proto__ like any other', () => {
      t.world.initializeConsciousness(1, 10);
      t.world.addValue(1, '__proto__', 42);
      t.world.addValue(1, 'constructor', 7);

      expect(t.world.getPriority(1, '__proto__')).toBe(42);
      expect(t.world.getPriority(1, 'constructor')).toBe(7);
      expect(t.world.getPriority(1, 'growth')).toBe(80);
      expect(t.world.getConsciousness(1)?.priorities.survival).toBe(90);
    });

    it('count a goal added later towards evolution impact', () => {
      t.world.initializeConsciousness(1, 10);
      t.world.addGoal(1, 'fly');
      t.clock.now = START_TIME + HOUR;

      expect(t.world.evolveConsciousness(1, 'fly', 'airborne').result.impact).toBe(5);
    });
  });
});
