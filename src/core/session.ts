import { randomUUID } from 'node:crypto';

import type { LLMClient } from '../llm/index.js';
import type {
  AutomationConfig,
  AutomationConfigInput,
  ObstacleReport,
  PlanSource,
  PlanStep,
  RunReport,
  SessionState,
  StepOutcome,
} from '../schema/index.js';
import { resolveAutomationConfig } from '../schema/index.js';
import { TIMEOUTS } from '../config/defaults.js';
import { clearObstacles, executeStep, launchBrowser } from '../browser/index.js';
import type {
  BrowserLauncher,
  BrowserSession,
  ExecutionContext,
  ObstacleCatalog,
  PageHandle,
  SelectorCatalog,
} from '../browser/index.js';
import { createPacer } from '../utils/pace.js';
import type { Pacer } from '../utils/pace.js';
import * as log from '../utils/logger.js';
import { PlanningError, SessionError, describeError } from './errors.js';
import { planAutomation } from './planner.js';
import type { PlanResult, PlannerOptions } from './planner.js';

// ── Public types ─────────────────────────────────────────────

export type Planner = (
  instruction: string,
  startUrl: string | undefined,
  options: PlannerOptions,
) => Promise<PlanResult>;

export interface SessionOptions {
  config?: AutomationConfigInput | undefined;
  client?: LLMClient | undefined;
  launcher?: BrowserLauncher | undefined;
  planner?: Planner | undefined;
  /** Wall-clock budget for the executing phase, measured from run start. */
  totalTimeoutMs?: number | undefined;
  pace?: Pacer | undefined;
  selectors?: SelectorCatalog | undefined;
  obstacles?: ObstacleCatalog | undefined;
  clock?: (() => number) | undefined;
}

// ── Run bookkeeping ──────────────────────────────────────────

interface RunState {
  trace: string[];
  steps: StepOutcome[];
  obstacles: ObstacleReport[];
  plan: PlanStep[];
  plannedBy: PlanSource;
  error?: SessionError | undefined;
}

// ── Session ──────────────────────────────────────────────────

/**
 * One browser, one instruction. Walks idle → browser_starting →
 * planning → executing → draining → closed (or failed) and always
 * releases the browser on the way out. A session runs once.
 */
export class AutomationSession {
  readonly config: Readonly<AutomationConfig>;

  private currentState: SessionState = 'idle';
  private started = false;

  private readonly client: LLMClient | undefined;
  private readonly launcher: BrowserLauncher;
  private readonly planner: Planner;
  private readonly totalTimeoutMs: number;
  private readonly pace: Pacer;
  private readonly selectors: SelectorCatalog | undefined;
  private readonly obstacleCatalog: ObstacleCatalog | undefined;
  private readonly clock: () => number;

  constructor(options: SessionOptions = {}) {
    this.config = resolveAutomationConfig(options.config);
    this.client = options.client;
    this.launcher = options.launcher ?? launchBrowser;
    this.planner = options.planner ?? planAutomation;
    this.totalTimeoutMs = options.totalTimeoutMs ?? TIMEOUTS.TOTAL_RUN_TIMEOUT;
    this.pace = options.pace ?? createPacer(this.config.paceScale);
    this.selectors = options.selectors;
    this.obstacleCatalog = options.obstacles;
    this.clock = options.clock ?? Date.now;
  }

  get state(): SessionState {
    return this.currentState;
  }

  async run(instruction: string, startUrl?: string): Promise<RunReport> {
    if (this.started) {
      throw new SessionError('Session already ran; create a new session for another instruction');
    }
    this.started = true;

    const startedAt = new Date();
    const startMs = this.clock();
    const deadline = startMs + this.totalTimeoutMs;
    const run: RunState = {
      trace: [],
      steps: [],
      obstacles: [],
      plan: [],
      plannedBy: 'none',
    };

    let browser: BrowserSession | undefined;

    try {
      this.transition('browser_starting');
      browser = await this.startBrowser();

      this.transition('planning');
      const planned = await this.planner(instruction, startUrl, { client: this.client });
      run.plan = planned.steps;
      run.plannedBy = planned.source;

      this.transition('executing');
      await this.execute(browser.page, instruction, deadline, run);

      this.transition('draining');
      await this.pace(this.config.finalPauseMs);
      await this.clearPage(browser.page, run);
    } catch (err) {
      if (err instanceof PlanningError) {
        record(run, `❌ Planning failed: ${err.message}`);
      } else {
        run.error =
          err instanceof SessionError
            ? err
            : new SessionError(`Session failed: ${describeError(err)}`, { cause: err });
        record(run, `❌ Session error: ${run.error.message}`);
      }
    } finally {
      if (browser) {
        await closeQuietly(browser);
      }
    }

    if (run.error) {
      this.transition('failed');
    } else {
      this.transition('closed');
      if (run.plannedBy !== 'none') record(run, '🎉 Automation completed!');
    }

    const finishedAt = new Date();
    return {
      runId: randomUUID(),
      instruction,
      ...(startUrl ? { startUrl } : {}),
      plannedBy: run.plannedBy,
      plan: run.plan,
      finalState: this.currentState,
      trace: run.trace,
      steps: run.steps,
      obstacles: run.obstacles,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: Math.max(0, Math.round(this.clock() - startMs)),
      ...(run.error ? { error: run.error } : {}),
    };
  }

  // ── Phases ─────────────────────────────────────────────────

  private async startBrowser(): Promise<BrowserSession> {
    try {
      return await this.launcher(this.config);
    } catch (err) {
      if (err instanceof SessionError) throw err;
      throw new SessionError(`Browser failed to start: ${describeError(err)}`, { cause: err });
    }
  }

  private async execute(
    page: PageHandle,
    instruction: string,
    deadline: number,
    run: RunState,
  ): Promise<void> {
    const ctx: ExecutionContext = {
      config: this.config,
      pace: this.pace,
      ...(this.selectors ? { catalog: this.selectors } : {}),
    };

    record(run, `🎯 Executing ${String(run.plan.length)} steps for: ${instruction}`);

    for (const [index, step] of run.plan.entries()) {
      if (this.clock() >= deadline) {
        const remaining = run.plan.length - index;
        record(run, `⏱️ Run deadline reached, ${String(remaining)} steps not started`);
        break;
      }

      const label = `Step ${String(index + 1)} [${step.action}]`;
      record(run, `🔄 ${label}: ${step.description}`);

      const result = await executeStep(step, page, ctx);
      run.steps.push({
        index,
        step,
        success: result.success,
        skipped: result.skipped,
        message: result.message,
        ...(result.extracted !== undefined ? { extracted: result.extracted } : {}),
      });

      if (result.skipped) {
        record(run, `⚠️ ${label} skipped (optional): ${step.description}`);
      } else if (result.success) {
        record(run, `✅ ${label} completed: ${step.description}`);
        if (step.action === 'navigate') {
          await this.clearPage(page, run);
        }
      } else {
        record(run, `❌ ${label} failed but continuing: ${result.message}`);
      }
    }
  }

  private async clearPage(page: PageHandle, run: RunState): Promise<void> {
    const report = await clearObstacles(page, this.pace, this.obstacleCatalog);
    run.obstacles.push(report);
    for (const entry of report.entries) {
      record(run, entry);
    }
  }

  private transition(next: SessionState): void {
    log.detail(`session: ${this.currentState} → ${next}`);
    this.currentState = next;
  }
}

// ── Convenience entry ────────────────────────────────────────

/** Run one instruction in a fresh session. */
export function runAutomation(
  instruction: string,
  startUrl?: string,
  options: SessionOptions = {},
): Promise<RunReport> {
  return new AutomationSession(options).run(instruction, startUrl);
}

// ── Helpers ──────────────────────────────────────────────────

function record(run: RunState, entry: string): void {
  run.trace.push(entry);
  log.trace(entry);
}

async function closeQuietly(browser: BrowserSession): Promise<void> {
  try {
    await browser.close();
  } catch (err) {
    log.warn(`Browser cleanup failed: ${describeError(err)}`);
  }
}
