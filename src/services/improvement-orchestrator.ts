import { v4 as uuidv4 } from 'uuid';
import { TestRunner } from './test-runner';
import { FailureAnalyzer, describeFailure } from './failure-analyzer';
import { PromptAdapter, applyImprovements } from './prompt-adapter';
import { PromptStore } from './prompt-store';
import { IterationLog } from './iteration-log';
import { formatPercent } from '../utils/pass-rate';
import { RunStatus, transitionRunStatus } from '../utils/state-machine';
import { errorMessage } from '../errors';
import {
  ImprovementReport,
  ImprovementStatus,
  IterationSnapshot,
  ProspectInput,
  PromptImprovement,
  TestSuiteResults,
} from '../types';

export const EARLY_STOP_AFTER = 3;
const FAILURE_EXAMPLES = 5;

export interface ImprovementConfig {
  maxIterations: number;
  targetPassRate: number;
  numProspects: number;
  /** Copy the prompt documents here before the first iteration. */
  backupDir?: string;
}

export const DEFAULT_IMPROVEMENT_CONFIG: ImprovementConfig = {
  maxIterations: 10,
  targetPassRate: 0.95,
  numProspects: 20,
};

export interface ProspectSource {
  generate(count: number): ProspectInput[];
}

export interface OrchestratorDeps {
  store: PromptStore;
  prospects: ProspectSource;
  runner: TestRunner;
  analyzer: FailureAnalyzer;
  adapter: PromptAdapter;
  log: IterationLog;
}

export interface ImprovementEvent {
  type:
    | 'run_start'
    | 'iteration_start'
    | 'test_suite_complete'
    | 'analysis_complete'
    | 'improvements_applied'
    | 'finished'
    | 'error';
  iteration?: number;
  passRate?: number;
  status?: ImprovementStatus;
  message?: string;
}

export type ImprovementEventListener = (event: ImprovementEvent) => void;

// --- Loop state ---

export interface LoopState {
  iteration: number;
  initialPassRate: number | null;
  bestPassRate: number;
  iterationsSinceImprovement: number;
  history: IterationSnapshot[];
}

export function initialLoopState(): LoopState {
  return { iteration: 0, initialPassRate: null, bestPassRate: 0, iterationsSinceImprovement: 0, history: [] };
}

/**
 * Fold one finished iteration into the loop state and decide whether the
 * loop stops. Target beats early stop; early stop beats the iteration cap.
 */
export function advanceLoop(
  state: LoopState,
  snapshot: IterationSnapshot,
  config: Pick<ImprovementConfig, 'targetPassRate' | 'maxIterations'>
): { state: LoopState; status: ImprovementStatus | null } {
  const passRate = snapshot.passRate;
  const improved = passRate > state.bestPassRate;
  const next: LoopState = {
    iteration: snapshot.iteration,
    initialPassRate: state.initialPassRate ?? passRate,
    bestPassRate: improved ? passRate : state.bestPassRate,
    iterationsSinceImprovement: improved ? 0 : state.iterationsSinceImprovement + 1,
    history: [...state.history, snapshot],
  };

  if (passRate >= config.targetPassRate) return { state: next, status: 'SUCCESS' };
  if (next.iterationsSinceImprovement >= EARLY_STOP_AFTER) return { state: next, status: 'EARLY_STOP' };
  if (next.iteration >= config.maxIterations) return { state: next, status: 'MAX_ITERATIONS' };
  return { state: next, status: null };
}

export function reportMessage(status: ImprovementStatus, iterations: number, finalPassRate: number): string {
  switch (status) {
    case 'SUCCESS':
      return `Successfully achieved ${formatPercent(finalPassRate)} pass rate in ${iterations} iterations`;
    case 'EARLY_STOP':
      return `Early stopping: No improvement for ${EARLY_STOP_AFTER} iterations`;
    case 'MAX_ITERATIONS':
      return `Max iterations (${iterations}) reached without achieving target`;
    case 'TEST_ONLY':
      return 'Test-only mode - no improvements applied';
  }
}

export function buildReport(
  status: ImprovementStatus,
  state: LoopState,
  config: ImprovementConfig,
  last: TestSuiteResults
): ImprovementReport {
  const initialPassRate = state.initialPassRate ?? last.passRate;
  return {
    success: last.passRate >= config.targetPassRate,
    status,
    iterations: state.iteration,
    initialPassRate,
    finalPassRate: last.passRate,
    targetPassRate: config.targetPassRate,
    improvement: last.passRate - initialPassRate,
    finalAvgQuality: last.avgQualityScore,
    totalTestsRun: state.iteration * config.numProspects,
    timestamp: new Date().toISOString(),
    iterationHistory: state.history,
    message: reportMessage(status, state.iteration, last.passRate),
  };
}

function snapshotOf(iteration: number, suite: TestSuiteResults): IterationSnapshot {
  return {
    iteration,
    passRate: suite.passRate,
    avgQuality: suite.avgQualityScore,
    passed: suite.passedTests,
    failed: suite.failedTests,
    failurePatterns: suite.failurePatterns,
    timestamp: new Date().toISOString(),
  };
}

/**
 * test -> analyze -> adapt -> apply, repeated until the pass rate reaches the
 * target, stops improving, or the iteration cap is hit. Assumes it is the
 * only writer of the prompt documents.
 */
export class ImprovementOrchestrator {
  private listeners: ImprovementEventListener[] = [];

  constructor(
    private deps: OrchestratorDeps,
    private config: ImprovementConfig = DEFAULT_IMPROVEMENT_CONFIG
  ) {}

  addEventListener(listener: ImprovementEventListener): void {
    this.listeners.push(listener);
  }

  removeEventListener(listener: ImprovementEventListener): void {
    this.listeners = this.listeners.filter(l => l !== listener);
  }

  private emit(event: ImprovementEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private async runSuite(iteration: number): Promise<TestSuiteResults> {
    const prospects = this.deps.prospects.generate(this.config.numProspects);
    const suite = await this.deps.runner.runTestSuite(prospects, this.config.targetPassRate);
    this.emit({ type: 'test_suite_complete', iteration, passRate: suite.passRate });
    return suite;
  }

  async run(): Promise<ImprovementReport> {
    const { maxIterations, targetPassRate, numProspects } = this.config;
    console.log(
      `[orchestrator] Starting improvement run ${this.deps.log.runId}: target ${formatPercent(targetPassRate, 0)}, ` +
        `${maxIterations} iterations max, ${numProspects} prospects each`
    );
    this.emit({ type: 'run_start', message: this.deps.log.runId });

    if (this.config.backupDir) {
      await this.deps.store.backup(this.config.backupDir);
    }

    let state = initialLoopState();
    let status: ImprovementStatus | null = null;
    let suite: TestSuiteResults | null = null;

    while (status === null) {
      const iteration = state.iteration + 1;
      console.log(`[orchestrator] Iteration ${iteration}/${maxIterations}`);
      this.emit({ type: 'iteration_start', iteration });

      suite = await this.runSuite(iteration);
      const snapshot = snapshotOf(iteration, suite);
      ({ state, status } = advanceLoop(state, snapshot, this.config));

      let applied: PromptImprovement[] = [];
      if (status === null) {
        applied = await this.adapt(snapshot, suite);
        console.log(
          `[orchestrator] Iteration ${iteration} complete: ${formatPercent(state.initialPassRate ?? 0)} → ${formatPercent(suite.passRate)}`
        );
      } else if (state.iterationsSinceImprovement > 0) {
        console.log(`[orchestrator] No improvement for ${state.iterationsSinceImprovement} iteration(s)`);
      }
      await this.deps.log.writeIteration(snapshot, applied);
    }

    if (!suite) {
      throw new Error('Improvement run finished without running a test suite');
    }
    return this.finish(buildReport(status, state, this.config, suite));
  }

  /** One suite against the current prompts; nothing is adapted. */
  async testOnly(): Promise<ImprovementReport> {
    console.log(`[orchestrator] Test-only run with ${this.config.numProspects} prospects`);
    this.emit({ type: 'run_start', message: this.deps.log.runId });

    const suite = await this.runSuite(1);
    const snapshot = snapshotOf(1, suite);
    const state: LoopState = {
      iteration: 1,
      initialPassRate: suite.passRate,
      bestPassRate: suite.passRate,
      iterationsSinceImprovement: 0,
      history: [snapshot],
    };
    await this.deps.log.writeIteration(snapshot);
    return this.finish(buildReport('TEST_ONLY', state, this.config, suite));
  }

  /** Analyze the failures, adapt the prompts and write them back; mutates `snapshot`. */
  private async adapt(snapshot: IterationSnapshot, suite: TestSuiteResults): Promise<PromptImprovement[]> {
    const prompts = await this.deps.store.load();
    const analysis = await this.deps.analyzer.analyzeFailures(suite, prompts);
    snapshot.analysis = {
      failurePatterns: analysis.failurePatterns,
      priorityFixes: analysis.priorityFixes,
      summary: analysis.summary,
      source: analysis.source,
    };
    this.emit({ type: 'analysis_complete', iteration: snapshot.iteration, message: analysis.summary });

    const failureExamples = suite.results
      .filter(r => !r.passed)
      .slice(0, FAILURE_EXAMPLES)
      .map(describeFailure);
    const improvements = await this.deps.adapter.adaptPrompts({
      analysis,
      agents: prompts.agents,
      tasks: prompts.tasks,
      failureExamples,
    });
    const outcome = await applyImprovements(improvements, this.deps.store);
    snapshot.improvements = {
      numImprovements: improvements.improvements.length,
      summary: improvements.summary,
      expectedImpact: improvements.expectedImpact,
      applied: outcome.applied,
      skipped: outcome.skipped,
    };
    this.emit({
      type: 'improvements_applied',
      iteration: snapshot.iteration,
      message: `${outcome.applied.length} applied, ${outcome.skipped.length} skipped`,
    });
    return improvements.improvements;
  }

  private async finish(report: ImprovementReport): Promise<ImprovementReport> {
    const reportPath = await this.deps.log.writeReport(report);
    console.log(`[orchestrator] ${report.message} (report: ${reportPath})`);
    this.emit({ type: 'finished', status: report.status, passRate: report.finalPassRate, message: report.message });
    return report;
  }
}

// --- Background runs (HTTP API) ---

export interface ImprovementRunRecord {
  id: string;
  status: RunStatus;
  testOnly: boolean;
  config: ImprovementConfig;
  startedAt: string;
  completedAt: string | null;
  report: ImprovementReport | null;
  error: string | null;
  events: ImprovementEvent[];
}

export interface StartRunOptions {
  config: ImprovementConfig;
  testOnly?: boolean;
}

export type OrchestratorFactory = (runId: string, config: ImprovementConfig) => ImprovementOrchestrator;

export class RunInProgressError extends Error {
  constructor(readonly runningId: string) {
    super(`Improvement run '${runningId}' is still running`);
    this.name = 'RunInProgressError';
  }
}

/**
 * In-memory records of improvement runs started over HTTP. Only one run may
 * be active at a time because runs share the prompt documents.
 */
export class ImprovementRunRegistry {
  private runs = new Map<string, ImprovementRunRecord>();
  private listeners = new Map<string, ImprovementEventListener[]>();

  constructor(private createOrchestrator: OrchestratorFactory) {}

  activeRun(): ImprovementRunRecord | null {
    for (const run of this.runs.values()) {
      if (run.status === 'running') return run;
    }
    return null;
  }

  get(id: string): ImprovementRunRecord | null {
    return this.runs.get(id) ?? null;
  }

  /** Start a run in the background and return its id. */
  start(options: StartRunOptions): string {
    const active = this.activeRun();
    if (active) throw new RunInProgressError(active.id);

    const id = uuidv4();
    const record: ImprovementRunRecord = {
      id,
      status: 'running',
      testOnly: options.testOnly ?? false,
      config: options.config,
      startedAt: new Date().toISOString(),
      completedAt: null,
      report: null,
      error: null,
      events: [],
    };
    this.runs.set(id, record);

    const orchestrator = this.createOrchestrator(id, options.config);
    orchestrator.addEventListener(event => this.record(id, event));

    const work = record.testOnly ? orchestrator.testOnly() : orchestrator.run();
    work
      .then(report => {
        record.report = report;
        record.status = transitionRunStatus(record.status, 'completed');
        record.completedAt = new Date().toISOString();
        this.listeners.delete(id);
      })
      .catch(err => {
        const message = errorMessage(err);
        console.error(`[orchestrator] Run ${id} failed: ${message}`);
        record.error = message;
        record.status = transitionRunStatus(record.status, 'failed');
        record.completedAt = new Date().toISOString();
        this.record(id, { type: 'error', message });
        this.listeners.delete(id);
      });

    return id;
  }

  addEventListener(id: string, listener: ImprovementEventListener): void {
    const existing = this.listeners.get(id) || [];
    existing.push(listener);
    this.listeners.set(id, existing);
  }

  removeEventListener(id: string, listener: ImprovementEventListener): void {
    const existing = this.listeners.get(id) || [];
    this.listeners.set(id, existing.filter(l => l !== listener));
  }

  private record(id: string, event: ImprovementEvent): void {
    this.runs.get(id)?.events.push(event);
    for (const listener of this.listeners.get(id) || []) {
      listener(event);
    }
  }
}
