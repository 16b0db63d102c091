import { join } from 'path';
import { loadScenario, parseScenario, runScenario } from '../../src/simulation/ScenarioRunner';

const SCENARIO_DIR = join(__dirname, '..', '..', 'scenarios');

describe('parseScenario', () => {
  test('requires a name and steps', () => {
    expect(() => parseScenario({ steps: [{ at: 0, type: 'wait' }] })).toThrow(
      'Scenario root: name must be a non-empty string'
    );
    expect(() => parseScenario({ name: 'empty', steps: [] })).toThrow(
      'Scenario root: steps must be a non-empty array'
    );
  });

  test('rejects unknown steps and bad repeats', () => {
    expect(() => parseScenario({ name: 'x', steps: [{ at: 0, type: 'jump' }] })).toThrow(
      'Scenario steps[0]: unknown step type "jump"'
    );
    expect(() => parseScenario({ name: 'x', steps: [{ at: 0, type: 'wait', repeat: 0 }] })).toThrow(
      'Scenario steps[0]: repeat must be a positive integer'
    );
    expect(() => parseScenario({ name: 'x', steps: [{ at: -1, type: 'wait' }] })).toThrow(
      'Scenario steps[0]: at must be a non-negative number'
    );
  });

  test('fills step defaults', () => {
    const scenario = parseScenario({
      name: 'x',
      steps: [{ at: 2, type: 'request', subjectId: 'p1', endpoint: 'PlaceItem' }]
    });
    expect(scenario.steps[0]).toEqual({
      at: 2, repeat: 1, every: 0, type: 'request', subjectId: 'p1', endpoint: 'PlaceItem', privileged: undefined
    });
  });
});

describe('runScenario', () => {
  test('replays requests on a simulated clock', () => {
    const report = runScenario(parseScenario({
      name: 'double-buy',
      steps: [{ at: 0, type: 'request', subjectId: 'p1', endpoint: 'PurchaseItem', repeat: 3, every: 0.5 }]
    }));

    expect(report.duration).toBe(1);
    expect(report.requests).toEqual({ allowed: 1, denied: 2 });
    expect(report.events).toEqual([
      { at: 0.5, subjectId: 'p1', kind: 'denied', detail: 'cooldown active, retry in 1.50 seconds', code: 'cooldown' },
      { at: 1, subjectId: 'p1', kind: 'denied', detail: 'cooldown active, retry in 1.00 seconds', code: 'cooldown' }
    ]);
    expect(report.subjects.p1).toMatchObject({ throttleMultiplier: 1, trustScore: 1, behaviorCategory: 'NORMAL' });
  });

  test('reports anomaly events from the micro cadence', () => {
    const report = runScenario(parseScenario({
      name: 'bot',
      steps: [
        { at: 0, type: 'action', subjectId: 'bot-1', actionType: 'PlaceItem', repeat: 20, every: 0.1 },
        {
          at: 0, type: 'movement', subjectId: 'bot-1', repeat: 10, every: 0.1,
          position: { x: 0, y: 0, z: 0 }, step: { x: 30, y: 0, z: 0 }, velocity: { x: 300, y: 0, z: 0 }
        },
        { at: 3, type: 'wait' }
      ]
    }));

    expect(report.events).toEqual([{
      at: 3,
      subjectId: 'bot-1',
      kind: 'anomaly',
      detail: 'score 0.80 [high_frequency, regular_timing, repeated_sequence, low_variation, speed_exceeded]'
    }]);
    expect(report.subjects['bot-1'].anomalyScore).toBe(0.8);
  });

  test('reports disconnects and idle evictions', () => {
    const report = runScenario(parseScenario({
      name: 'leavers',
      steps: [
        { at: 0, type: 'request', subjectId: 'p1', endpoint: 'PlaceItem' },
        { at: 0, type: 'request', subjectId: 'p2', endpoint: 'PlaceItem' },
        { at: 5, type: 'disconnect', subjectId: 'p1' },
        { at: 1000, type: 'wait' }
      ]
    }));

    expect(report.events).toEqual([
      { at: 5, subjectId: 'p1', kind: 'evicted', detail: 'disconnect' },
      { at: 1000, subjectId: 'p2', kind: 'evicted', detail: 'idle' }
    ]);
    expect(report.subjects).toEqual({});
  });

  test('rejects an invalid config override', () => {
    const scenario = parseScenario({
      name: 'broken',
      config: { cadence: { microSeconds: 0 } },
      steps: [{ at: 0, type: 'wait' }]
    });
    expect(() => runScenario(scenario)).toThrow('Scenario broken: invalid config: cadence.microSeconds must be > 0');
  });

  test('bundled bot-clicker scenario throttles only the bot', () => {
    const report = runScenario(loadScenario(join(SCENARIO_DIR, 'bot-clicker.json')));
    const denied = report.events.filter(e => e.kind === 'denied');

    expect(denied.length).toBeGreaterThan(0);
    expect(denied.every(e => e.subjectId === 'bot-1')).toBe(true);
    expect(report.events).toContainEqual({ at: 45, subjectId: 'bot-1', kind: 'evicted', detail: 'disconnect' });
    expect(Object.keys(report.subjects)).toEqual(['player-1']);
  });

  test('bundled speed-hack scenario is classified suspicious', () => {
    const report = runScenario(loadScenario(join(SCENARIO_DIR, 'speed-hack.json')));
    expect(report.subjects['runner-1']).toMatchObject({
      behaviorCategory: 'SUSPICIOUS',
      riskScore: 0.333,
      anomalyScore: 0.15
    });
  });

  test('missing scenario files are reported', () => {
    expect(() => loadScenario(join(SCENARIO_DIR, 'nope.json'))).toThrow('Scenario not found');
  });
});
