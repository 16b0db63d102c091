export { AbusePreventionEngine, EngineOptions, EngineStats } from './core/AbusePreventionEngine';
export { RateLimiter, ViolationListener } from './core/RateLimiter';
export { SlidingWindowLimiter, LimitCheck } from './core/SlidingWindowLimiter';
export { EndpointPolicyTable } from './core/EndpointPolicyTable';
export { AdaptiveThrottle, createAdaptiveState } from './core/AdaptiveThrottle';
export { SubjectStore, SubjectState } from './core/SubjectStore';
export { StaticAuthorizer } from './core/Authorizer';
export { Clock, ManualClock, systemClock } from './core/Clock';
export { GuardScheduler } from './core/GuardScheduler';
export { AnomalyAggregator, classify, Classification, MicroResult, MacroResult } from './analysis/AnomalyAggregator';
export { createBehaviorProfile, analysisOf, freshAnalysis } from './analysis/BehaviorProfile';
export * from './analysis/scorers';
export { AuditLog, AuditEvent, AuditKind } from './audit/AuditLog';
export { createAuditListeners } from './audit/listeners';
export { GuardServer } from './server/GuardServer';
export { runScenario, parseScenario, loadScenario, Scenario, ScenarioStep, ScenarioReport } from './simulation/ScenarioRunner';
export {
  GuardConfig, ThrottleConfig, AnalysisConfig, CadenceConfig, PatternWeights,
  DEFAULT_CONFIG, createConfig, validateConfig, loadConfig, saveConfig
} from './config/GuardConfig';
export * from './config/constants';
export { formatSubjectId, canonicalJson, isObject, log, logWarn, logError } from './utils';
export * from './types';
