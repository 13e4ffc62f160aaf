/**
 * Research Engine
 *
 * Drives sessions through the state machine:
 *
 * ```
 * init → generate_queries → planning → [planning_wait]* → research_fan_out
 *      → validate → compress → reflect → {research_fan_out | finalize} → done
 * ```
 *
 * plus the terminal `failed` and `cancelled` states. Each session runs as
 * one background task; the task stops when the session suspends in
 * planning_wait or reaches a terminal state. The snapshot is saved on every
 * transition, so a suspended session can be resumed by another process.
 *
 * @example
 * ```typescript
 * const engine = new ResearchEngine({ llm, search, index, store, config });
 * const { sessionId, idle } = engine.start('What is quantum computing?');
 * if ((await idle).state === 'planning_wait') {
 *   await engine.resume(sessionId, 'confirm-plan');
 * }
 * const status = await engine.waitForIdle(sessionId);
 * ```
 */

import { generateId } from '../database/schema.js';
import {
  CLIError,
  SessionNotFoundError,
  SessionStateError,
  StageError,
} from '../errors/index.js';
import type { HybridEvidenceIndex } from '../evidence/hybrid-index.js';
import { CitationRegistry } from '../pipeline/citations.js';
import { routePlanningCommand } from '../planning/router.js';
import type { PlanningRoute } from '../planning/types.js';
import type { LLMClient } from '../providers/types.js';
import type { SearchCoordinator } from '../search/coordinator.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { withOverrides, type ResearchConfig } from './config.js';
import { SessionEvents } from './events.js';
import { InMemorySessionStore, type SessionStore, type SessionSummary } from './session-store.js';
import { fromSnapshot, sessionStatus, toSnapshot } from './snapshot.js';
import { STAGE_HANDLERS, type StageContext } from './stages.js';
import {
  isActiveState,
  isTerminalState,
  type EngineState,
  type ResearchEvent,
  type ResearchEventListener,
  type SessionHandle,
  type SessionState,
  type SessionStatus,
} from './types.js';

export interface ResearchEngineOptions {
  llm: LLMClient;
  search: Pick<SearchCoordinator, 'fanOut' | 'providerNames'>;
  index: HybridEvidenceIndex;
  /** Default settings for new sessions */
  config: ResearchConfig;
  /** Defaults to an in-memory store */
  store?: SessionStore;
  logger?: Logger;
  /** Injected for tests */
  now?: () => Date;
}

export interface ResumeResult {
  route: PlanningRoute;
  status: SessionStatus;
}

/**
 * In-process bookkeeping for a session this engine has loaded.
 */
interface SessionRuntime {
  session: SessionState;
  events: SessionEvents;
  controller: AbortController;
  /** The current run loop; settled when idle */
  running: Promise<void>;
}

export class ResearchEngine {
  private readonly sessions = new Map<string, SessionRuntime>();
  private readonly store: SessionStore;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: ResearchEngineOptions) {
    this.store = options.store ?? new InMemorySessionStore();
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Public API
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Create a session and run it in the background until it suspends or
   * terminates.
   *
   * @throws ValidationError when an override is out of range
   */
  start(question: string, overrides: Partial<ResearchConfig> = {}): SessionHandle {
    const config = withOverrides(this.options.config, overrides);
    const timestamp = this.now().toISOString();
    const session: SessionState = {
      sessionId: generateId(),
      question: question.trim(),
      messages: [],
      plan: [],
      pendingQueries: [],
      executedQueries: [],
      reusedQueries: [],
      rawResults: [],
      validatedResults: [],
      compressedResults: [],
      validationNotes: [],
      sourcesGathered: new CitationRegistry(),
      researchLoopCount: 0,
      planningStatus: null,
      isSufficient: null,
      knowledgeGap: '',
      state: 'init',
      outcome: null,
      config,
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    const runtime = this.register(session);
    runtime.running = this.launch(runtime, true);
    return { sessionId: session.sessionId, idle: this.waitForIdle(session.sessionId) };
  }

  /**
   * Route a planning command to a session waiting in planning_wait. A
   * session this engine has not loaded is restored from the store.
   *
   * @throws SessionNotFoundError when the session is unknown
   * @throws SessionStateError when the session is not waiting for a command
   */
  async resume(sessionId: string, command: string): Promise<ResumeResult> {
    const runtime = await this.load(sessionId);
    await runtime.running;

    const { session } = runtime;
    if (session.state !== 'planning_wait') {
      throw new SessionStateError(
        sessionId,
        session.state,
        'Session is not waiting for a planning command'
      );
    }

    const route = routePlanningCommand(session.planningStatus, command);
    session.messages.push(
      { role: 'user', content: command.trim() },
      { role: 'assistant', content: route.feedback }
    );
    session.planningStatus = route.status;

    if (route.next === 'research_fan_out') {
      await this.transition(runtime, 'research_fan_out');
      runtime.running = this.launch(runtime, false);
    } else {
      await this.save(runtime);
      runtime.events.emit({
        type: 'PlanningUpdated',
        sessionId,
        planningStatus: session.planningStatus,
        plan: session.plan,
        feedback: route.feedback,
      });
    }
    return { route, status: sessionStatus(session) };
  }

  /**
   * Cancel a session. In-flight provider calls are aborted; evidence
   * already written to the index stays.
   *
   * @throws SessionStateError when the session already finished
   */
  async cancel(sessionId: string): Promise<SessionStatus> {
    const runtime = await this.load(sessionId);
    if (isTerminalState(runtime.session.state)) {
      throw new SessionStateError(sessionId, runtime.session.state, 'Session has already finished');
    }

    runtime.controller.abort();
    await runtime.running;
    // A suspended session has no run loop to notice the abort
    if (!isTerminalState(runtime.session.state)) {
      await this.markCancelled(runtime);
    }
    return sessionStatus(runtime.session);
  }

  /**
   * @throws SessionNotFoundError
   */
  async status(sessionId: string): Promise<SessionStatus> {
    const runtime = await this.load(sessionId);
    return sessionStatus(runtime.session);
  }

  /**
   * Resolve once the session's run loop has suspended or terminated.
   */
  async waitForIdle(sessionId: string): Promise<SessionStatus> {
    const runtime = await this.load(sessionId);
    let running: Promise<void>;
    // resume() may start a new run loop while the previous one settles
    do {
      running = runtime.running;
      await running;
    } while (running !== runtime.running);
    return sessionStatus(runtime.session);
  }

  list(limit?: number): Promise<SessionSummary[]> {
    return this.store.list(limit);
  }

  /**
   * Listen to live events of a loaded session.
   *
   * @returns unsubscribe function
   * @throws SessionNotFoundError when the session is not loaded
   */
  subscribe(sessionId: string, listener: ResearchEventListener): () => void {
    return this.requireLoaded(sessionId).events.subscribe(listener);
  }

  /**
   * Every event of a loaded session, from its first, ending with Finalized,
   * Failed or Cancelled.
   *
   * @throws SessionNotFoundError when the session is not loaded
   */
  events(sessionId: string): AsyncIterable<ResearchEvent> {
    return this.requireLoaded(sessionId).events.stream();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Run loop
  // ─────────────────────────────────────────────────────────────────────────

  private register(session: SessionState): SessionRuntime {
    const runtime: SessionRuntime = {
      session,
      events: new SessionEvents(this.logger),
      controller: new AbortController(),
      running: Promise.resolve(),
    };
    this.sessions.set(session.sessionId, runtime);
    return runtime;
  }

  private launch(runtime: SessionRuntime, saveFirst: boolean): Promise<void> {
    return this.run(runtime, saveFirst).catch((error: unknown) => {
      // Only persistence failures while ending the session get here
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`session ${runtime.session.sessionId}: ${message}`);
    });
  }

  private async run(runtime: SessionRuntime, saveFirst: boolean): Promise<void> {
    const { session, controller } = runtime;
    const ctx: StageContext = {
      llm: this.options.llm,
      search: this.options.search,
      index: this.options.index,
      signal: controller.signal,
      emit: (event) => runtime.events.emit(event),
      logger: this.logger,
    };

    let stage: EngineState = session.state;
    try {
      if (saveFirst) {
        await this.save(runtime);
      }
      for (;;) {
        const state = session.state;
        if (!isActiveState(state)) {
          return;
        }
        if (controller.signal.aborted) {
          await this.markCancelled(runtime);
          return;
        }
        stage = state;
        this.logger.debug?.(`session ${session.sessionId}: ${state}`);
        const next = await STAGE_HANDLERS[state](session, ctx);
        if (controller.signal.aborted) {
          await this.markCancelled(runtime);
          return;
        }
        await this.transition(runtime, next);
      }
    } catch (error) {
      if (controller.signal.aborted) {
        await this.markCancelled(runtime);
        return;
      }
      await this.markFailed(runtime, stage, error);
    }
  }

  private async transition(runtime: SessionRuntime, next: EngineState): Promise<void> {
    runtime.session.state = next;
    await this.save(runtime);
  }

  private async save(runtime: SessionRuntime): Promise<void> {
    runtime.session.updatedAt = this.now().toISOString();
    await this.store.save(runtime.session.sessionId, toSnapshot(runtime.session));
  }

  private async markFailed(runtime: SessionRuntime, stage: EngineState, error: unknown): Promise<void> {
    let failure: CLIError;
    if (error instanceof CLIError) {
      failure = error;
    } else if (error instanceof Error) {
      failure = new StageError(stage, error.message, error);
    } else {
      failure = new StageError(stage, String(error));
    }
    const { session } = runtime;
    session.outcome = { kind: 'failed', reason: failure.message };
    this.logger.warn(`session ${session.sessionId} failed in ${stage}: ${failure.message}`);
    await this.transition(runtime, 'failed');
    runtime.events.emit({ type: 'Failed', sessionId: session.sessionId, reason: failure.message });
  }

  private async markCancelled(runtime: SessionRuntime): Promise<void> {
    const { session } = runtime;
    session.outcome = { kind: 'cancelled' };
    await this.transition(runtime, 'cancelled');
    runtime.events.emit({ type: 'Cancelled', sessionId: session.sessionId });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Loading
  // ─────────────────────────────────────────────────────────────────────────

  private requireLoaded(sessionId: string): SessionRuntime {
    const runtime = this.sessions.get(sessionId);
    if (!runtime) {
      throw new SessionNotFoundError(sessionId);
    }
    return runtime;
  }

  /**
   * In-memory runtime, or one restored from the store. A restored session
   * that was interrupted mid-round is not re-run; only planning_wait
   * sessions continue, through resume().
   */
  private async load(sessionId: string): Promise<SessionRuntime> {
    const loaded = this.sessions.get(sessionId);
    if (loaded) {
      return loaded;
    }
    const snapshot = await this.store.load(sessionId);
    if (!snapshot) {
      throw new SessionNotFoundError(sessionId);
    }
    // Another call may have restored it while the store was read
    return this.sessions.get(sessionId) ?? this.register(fromSnapshot(snapshot));
  }
}
