import { CronJob } from 'cron';
import type { Logger, Subscription } from './types';
import { getErrorMessage } from './types/errors';
import type { CycleResult, PollEngine } from './poll-engine';

export type SubscriptionPhase = 'idle' | 'running' | 'sleeping' | 'failed';

export interface SubscriptionStatus {
  subreddit: string;
  phase: SubscriptionPhase;
  nextRunAt: number;
  lastResult?: CycleResult;
}

interface SubscriptionState extends SubscriptionStatus {
  subscription: Subscription;
  controller?: AbortController;
  inFlight?: Promise<void>;
}

export interface SchedulerOptions {
  engine: Pick<PollEngine, 'runCycle'>;
  subscriptions: Subscription[];
  intervalSeconds: number;
  /** Heartbeat that looks for due subscriptions; every second by default */
  heartbeat?: string;
  now?: () => number;
  logger?: Logger;
}

/**
 * Drives every enabled subscription from one shared timer. A subscription is
 * due `intervalSeconds` after its previous cycle finished, so its cycles never
 * overlap; different subscriptions run concurrently.
 */
export class Scheduler {
  private readonly states: SubscriptionState[];
  private readonly now: () => number;
  private readonly logger: Logger;
  private job: CronJob | null = null;
  private stopping = false;

  constructor(private readonly options: SchedulerOptions) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? console;
    this.states = options.subscriptions
      .filter((subscription) => subscription.enabled)
      .map((subscription): SubscriptionState => ({
        subscription,
        subreddit: subscription.subreddit,
        phase: 'idle',
        nextRunAt: 0,
      }));
  }

  start(): void {
    if (this.job) {
      this.logger.log('Scheduler already running');
      return;
    }
    this.stopping = false;

    this.job = new CronJob(
      this.options.heartbeat ?? '* * * * * *',
      () => {
        void this.tick();
      },
      null,
      true
    );

    this.logger.log(
      `Started monitoring ${this.states.length} subreddit(s), check interval ${this.options.intervalSeconds}s`
    );
    void this.tick();
  }

  /**
   * Launch every due subscription; resolves when the cycles launched by this
   * tick have settled.
   */
  async tick(): Promise<void> {
    if (this.stopping) return;
    const now = this.now();
    const launched: Promise<void>[] = [];
    for (const state of this.states) {
      if (state.phase === 'failed' || state.phase === 'running') continue;
      if (now < state.nextRunAt) continue;
      launched.push(this.launch(state));
    }
    await Promise.all(launched);
  }

  /**
   * Stop scheduling, ask running cycles to stop before their next item and
   * wait for them to settle.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    if (this.job) {
      this.job.stop();
      this.job = null;
    }
    const inFlight: Promise<void>[] = [];
    for (const state of this.states) {
      state.controller?.abort();
      if (state.inFlight) inFlight.push(state.inFlight);
    }
    await Promise.all(inFlight);
    this.logger.log('Monitoring stopped');
  }

  getStatus(): SubscriptionStatus[] {
    return this.states.map(({ subreddit, phase, nextRunAt, lastResult }) => ({
      subreddit,
      phase,
      nextRunAt,
      lastResult,
    }));
  }

  private launch(state: SubscriptionState): Promise<void> {
    const controller = new AbortController();
    state.phase = 'running';
    state.controller = controller;

    const run = this.options.engine
      .runCycle(state.subscription, controller.signal)
      .then(
        (result) => {
          state.lastResult = result;
          if (result.outcome === 'permanent-failure') {
            state.phase = 'failed';
            this.logger.error(`[r/${state.subreddit}] Disabled until restart: ${result.error ?? 'permanent failure'}`);
            return;
          }
          this.sleepUntilNext(state);
        },
        (error: unknown) => {
          this.logger.error(`[r/${state.subreddit}] Unexpected error in poll cycle: ${getErrorMessage(error)}`);
          this.sleepUntilNext(state);
        }
      )
      .finally(() => {
        state.controller = undefined;
        state.inFlight = undefined;
      });

    state.inFlight = run;
    return run;
  }

  private sleepUntilNext(state: SubscriptionState): void {
    state.phase = this.stopping ? 'idle' : 'sleeping';
    state.nextRunAt = this.now() + this.options.intervalSeconds * 1000;
  }
}
