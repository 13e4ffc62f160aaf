/**
 * Engine Module
 *
 * The research state machine, its session persistence, events and the
 * static stage registry.
 */

export { ResearchEngine, type ResearchEngineOptions, type ResumeResult } from './engine.js';
export { createResearchEngine, type EngineFactoryOptions } from './factory.js';
export {
  ResearchConfigSchema,
  researchConfigFrom,
  withOverrides,
  type ResearchConfig,
} from './config.js';
export {
  SqliteSessionStore,
  InMemorySessionStore,
  cancelStoredSession,
  type SessionStore,
  type SessionSummary,
} from './session-store.js';
export {
  SessionSnapshotSchema,
  toSnapshot,
  fromSnapshot,
  parseSnapshot,
  sessionStatus,
  type SessionSnapshot,
} from './snapshot.js';
export { SessionEvents } from './events.js';
export { STAGE_REGISTRY, getStage, type StageDefinition, type SessionField } from './stage-registry.js';
export { STAGE_HANDLERS, type StageContext, type StageHandler } from './stages.js';
export {
  ENGINE_STATES,
  isActiveState,
  isTerminalState,
  isFinalEvent,
  type EngineState,
  type ActiveState,
  type TerminalState,
  type SessionState,
  type SessionStatus,
  type SessionHandle,
  type SessionMessage,
  type SessionOutcome,
  type QuerySummary,
  type ResearchEvent,
  type ResearchEventType,
  type ResearchEventListener,
} from './types.js';
