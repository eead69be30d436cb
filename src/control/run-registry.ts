import { randomUUID } from 'node:crypto';
import { errorMessage } from '../api/http.js';
import { getLogger } from '../lib/logger.js';
import type { ProgressObserver } from '../lib/progress.js';

export type RunType = 'collect' | 'migrate';
export type RunStatus = 'running' | 'completed' | 'stopped' | 'failed';

export interface RunView {
  id: string;
  type: RunType;
  label: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string | null;
  progress: unknown;
  result: unknown;
  error: string | null;
}

interface RunEntry {
  view: RunView;
  controller: AbortController;
  done: Promise<void>;
}

export interface RunStartContext<TEvent> {
  signal: AbortSignal;
  observer: ProgressObserver<TEvent>;
}

/**
 * In-process registry of background runs. Each run gets an AbortController
 * for cooperative stop and keeps its latest progress event and final result
 * for status polling.
 */
export class RunRegistry {
  private readonly runs = new Map<string, RunEntry>();

  constructor(private readonly maxFinishedRuns = 50) {}

  start<TEvent, TResult>(
    type: RunType,
    label: string,
    work: (ctx: RunStartContext<TEvent>) => Promise<TResult>,
    statusOf: (result: TResult) => RunStatus = () => 'completed',
  ): RunView {
    const logger = getLogger();
    const controller = new AbortController();
    const view: RunView = {
      id: randomUUID(),
      type,
      label,
      status: 'running',
      startedAt: new Date().toISOString(),
      finishedAt: null,
      progress: null,
      result: null,
      error: null,
    };

    const observer: ProgressObserver<TEvent> = {
      onProgress: (event) => {
        view.progress = event;
      },
    };

    const done = work({ signal: controller.signal, observer }).then(
      (result) => {
        view.result = result;
        view.status = statusOf(result);
        view.finishedAt = new Date().toISOString();
        logger.info({ runId: view.id, type, label, status: view.status }, 'Run finished');
      },
      (err: unknown) => {
        view.error = errorMessage(err);
        view.status = 'failed';
        view.finishedAt = new Date().toISOString();
        logger.error({ runId: view.id, type, label, err: view.error }, 'Run failed');
      },
    );

    this.runs.set(view.id, { view, controller, done });
    this.prune();
    logger.info({ runId: view.id, type, label }, 'Run started');
    return view;
  }

  get(id: string): RunView | null {
    return this.runs.get(id)?.view ?? null;
  }

  list(): RunView[] {
    return [...this.runs.values()].map((entry) => entry.view);
  }

  active(): RunView[] {
    return this.list().filter((view) => view.status === 'running');
  }

  /** True when a running run with this label exists. */
  isRunning(label: string): boolean {
    return this.active().some((view) => view.label === label);
  }

  /** Request a cooperative stop. Returns false for unknown or finished runs. */
  stop(id: string): boolean {
    const entry = this.runs.get(id);
    if (!entry || entry.view.status !== 'running') return false;
    entry.controller.abort();
    getLogger().info({ runId: id }, 'Run stop requested');
    return true;
  }

  async wait(id: string): Promise<RunView | null> {
    const entry = this.runs.get(id);
    if (!entry) return null;
    await entry.done;
    return entry.view;
  }

  /** Stop every running run and wait for all of them to settle. */
  async stopAll(): Promise<void> {
    for (const view of this.active()) {
      this.stop(view.id);
    }
    await Promise.all([...this.runs.values()].map((entry) => entry.done));
  }

  private prune(): void {
    const finished = this.list().filter((view) => view.status !== 'running');
    const excess = finished.length - this.maxFinishedRuns;
    for (const view of finished.slice(0, Math.max(0, excess))) {
      this.runs.delete(view.id);
    }
  }
}
