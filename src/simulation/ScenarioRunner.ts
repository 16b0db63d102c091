import { existsSync, readFileSync } from 'fs';
import { AbusePreventionEngine } from '../core/AbusePreventionEngine';
import { ManualClock } from '../core/Clock';
import { createConfig, validateConfig } from '../config/GuardConfig';
import { BehaviorAnalysis, DenialCode, EvictionReason, Vector3 } from '../types';
import { isObject, round } from '../utils';

interface StepBase {
  /** Seconds from scenario start. */
  at: number;
  /** Repeat the step this many times... */
  repeat?: number;
  /** ...this many seconds apart. */
  every?: number;
}

export interface RequestStep extends StepBase {
  type: 'request';
  subjectId: string;
  endpoint: string;
  privileged?: boolean;
}

export interface ActionStep extends StepBase {
  type: 'action';
  subjectId: string;
  actionType: string;
  actionData?: Record<string, unknown>;
}

export interface MovementStep extends StepBase {
  type: 'movement';
  subjectId: string;
  position: Vector3;
  /** Added to position on each repeat. */
  step?: Vector3;
  velocity: Vector3;
}

export interface DisconnectStep extends StepBase {
  type: 'disconnect';
  subjectId: string;
}

/** Moves time forward without input, so due cadences run. */
export interface WaitStep extends StepBase {
  type: 'wait';
}

export type ScenarioStep = RequestStep | ActionStep | MovementStep | DisconnectStep | WaitStep;

export interface Scenario {
  name: string;
  description?: string;
  config?: Record<string, unknown>;
  steps: ScenarioStep[];
}

export interface ScenarioEvent {
  at: number;
  subjectId: string;
  kind: 'denied' | 'anomaly' | 'evicted';
  detail: string;
  code?: DenialCode;
}

export interface ScenarioReport {
  name: string;
  duration: number;
  requests: { allowed: number; denied: number };
  events: ScenarioEvent[];
  subjects: Record<string, BehaviorAnalysis & { throttleMultiplier: number; trustScore: number }>;
}

interface TimedInput {
  at: number;
  order: number;
  step: ScenarioStep;
  index: number;
}

function fail(path: string, message: string): never {
  throw new Error(`Scenario ${path}: ${message}`);
}

function readNumber(obj: Record<string, unknown>, key: string, path: string, fallback?: number): number {
  const value = obj[key];
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    fail(path, `${key} must be a non-negative number`);
  }
  return value;
}

function readString(obj: Record<string, unknown>, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || !value.trim()) fail(path, `${key} must be a non-empty string`);
  return value;
}

function readVector(obj: Record<string, unknown>, key: string, path: string): Vector3 {
  const value = obj[key];
  if (isObject(value)) {
    const { x, y, z } = value;
    if (typeof x === 'number' && typeof y === 'number' && typeof z === 'number') return { x, y, z };
  }
  return fail(path, `${key} must be { x, y, z }`);
}

function parseStep(raw: unknown, path: string): ScenarioStep {
  if (!isObject(raw)) fail(path, 'step must be an object');
  const base: StepBase = {
    at: readNumber(raw, 'at', path),
    repeat: readNumber(raw, 'repeat', path, 1),
    every: readNumber(raw, 'every', path, 0)
  };
  if (!Number.isInteger(base.repeat) || (base.repeat ?? 1) < 1) fail(path, 'repeat must be a positive integer');

  switch (raw.type) {
    case 'request':
      return {
        ...base,
        type: 'request',
        subjectId: readString(raw, 'subjectId', path),
        endpoint: readString(raw, 'endpoint', path),
        privileged: typeof raw.privileged === 'boolean' ? raw.privileged : undefined
      };
    case 'action':
      return {
        ...base,
        type: 'action',
        subjectId: readString(raw, 'subjectId', path),
        actionType: readString(raw, 'actionType', path),
        actionData: isObject(raw.actionData) ? raw.actionData : undefined
      };
    case 'movement':
      return {
        ...base,
        type: 'movement',
        subjectId: readString(raw, 'subjectId', path),
        position: readVector(raw, 'position', path),
        step: raw.step === undefined ? undefined : readVector(raw, 'step', path),
        velocity: readVector(raw, 'velocity', path)
      };
    case 'disconnect':
      return { ...base, type: 'disconnect', subjectId: readString(raw, 'subjectId', path) };
    case 'wait':
      return { ...base, type: 'wait' };
    default:
      return fail(path, `unknown step type ${JSON.stringify(raw.type)}`);
  }
}

/**
 * Validate a parsed scenario document.
 */
export function parseScenario(raw: unknown): Scenario {
  if (!isObject(raw)) fail('root', 'must be a JSON object');
  const name = readString(raw, 'name', 'root');
  if (!Array.isArray(raw.steps) || raw.steps.length === 0) fail('root', 'steps must be a non-empty array');
  if (raw.config !== undefined && !isObject(raw.config)) fail('root', 'config must be an object');

  return {
    name,
    description: typeof raw.description === 'string' ? raw.description : undefined,
    config: isObject(raw.config) ? raw.config : undefined,
    steps: raw.steps.map((s, i) => parseStep(s, `steps[${i}]`))
  };
}

export function loadScenario(path: string): Scenario {
  if (!existsSync(path)) throw new Error(`Scenario not found: ${path}`);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new Error(`Failed to parse scenario ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseScenario(parsed);
}

function expand(steps: ScenarioStep[]): TimedInput[] {
  const inputs: TimedInput[] = [];
  let order = 0;
  for (const step of steps) {
    const repeat = step.repeat ?? 1;
    for (let i = 0; i < repeat; i++) {
      inputs.push({ at: step.at + i * (step.every ?? 0), order: order++, step, index: i });
    }
  }
  // Stable: equal timestamps keep document order.
  return inputs.sort((a, b) => a.at - b.at || a.order - b.order);
}

/**
 * Deterministic replay of a scenario on a fresh engine with a manual clock.
 * Due cadences run before each input, the way the scheduler would.
 */
export function runScenario(scenario: Scenario): ScenarioReport {
  const config = createConfig(scenario.config ?? {});
  const problems = validateConfig(config);
  if (problems.length > 0) throw new Error(`Scenario ${scenario.name}: invalid config: ${problems.join('; ')}`);

  const clock = new ManualClock(0);
  const events: ScenarioEvent[] = [];
  const requests = { allowed: 0, denied: 0 };
  const seen = new Set<string>();

  const engine = new AbusePreventionEngine({
    config,
    clock,
    listeners: {
      onAnomalyDetected: (subjectId, score, details) => {
        events.push({
          at: details.timestamp,
          subjectId,
          kind: 'anomaly',
          detail: `score ${score.toFixed(2)} [${details.flags.join(', ')}]`
        });
      },
      onSubjectEvicted: (snapshot, reason: EvictionReason) => {
        events.push({ at: clock.now(), subjectId: snapshot.subjectId, kind: 'evicted', detail: reason });
      },
      onListenerError: err => {
        throw err;
      }
    }
  });

  for (const input of expand(scenario.steps)) {
    clock.set(input.at);
    engine.tick(input.at);
    const step = input.step;

    switch (step.type) {
      case 'request': {
        seen.add(step.subjectId);
        const decision = engine.checkAndRecord(step.subjectId, step.endpoint, step.privileged);
        if (decision.allowed) {
          requests.allowed++;
        } else {
          requests.denied++;
          events.push({ at: input.at, subjectId: step.subjectId, kind: 'denied', detail: decision.reason, code: decision.code });
        }
        break;
      }
      case 'action':
        seen.add(step.subjectId);
        engine.recordAction(step.subjectId, step.actionType, step.actionData);
        break;
      case 'movement': {
        seen.add(step.subjectId);
        const d = step.step ?? { x: 0, y: 0, z: 0 };
        const position = {
          x: step.position.x + d.x * input.index,
          y: step.position.y + d.y * input.index,
          z: step.position.z + d.z * input.index
        };
        engine.recordMovement(step.subjectId, position, step.velocity);
        break;
      }
      case 'disconnect':
        engine.disconnect(step.subjectId);
        break;
      case 'wait':
        break;
    }
  }

  const subjects: ScenarioReport['subjects'] = {};
  for (const id of seen) {
    const state = engine.getSubjectState(id);
    if (!state) continue;
    subjects[id] = {
      ...state.analysis,
      riskScore: round(state.analysis.riskScore),
      anomalyScore: round(state.analysis.anomalyScore),
      confidence: round(state.analysis.confidence),
      throttleMultiplier: round(state.adaptive.throttleMultiplier),
      trustScore: round(state.adaptive.trustScore)
    };
  }

  return { name: scenario.name, duration: clock.now(), requests, events, subjects };
}
