/**
 * Optimization Loop
 *
 * Runs the collect → evaluate → propose → execute → record cycle on a fixed
 * interval in a single async worker:
 * - snapshots and executed actions go into bounded ring buffers
 * - registered callbacks receive every snapshot
 * - a failing tick is logged and the worker backs off for twice the interval
 */

import type {
  AnalyticsReport,
  LoopState,
  LoopStatus,
  NoDataReport,
  OptimizationAction,
  OptimizationStats,
  OptimizationStrategy,
  OptimizerConfig
} from '../../src/types/common.js';
import { consoleLogger, type StructuredLogger } from '../../src/utils/logger.js';
import { RingBuffer } from '../../src/utils/ring-buffer.js';
import { OptimizationAnalytics, type AnalyticsConfig, type AnalyticsSource } from '../analytics/optimization_analytics.js';
import { ActionExecutionError, CallbackError, LoopTickError } from '../errors.js';
import type { ActionExecutor } from '../executor/action_executor.js';
import type { MetricsCollector } from '../metrics/metrics_collector.js';
import type { MetricsSnapshot } from '../metrics/snapshot.js';
import type { OptimizationPolicy } from '../policy/optimization_policy.js';

export type LoopConfig = Omit<OptimizerConfig['loop'], 'strategy'>;

export interface LoopOptions extends Partial<LoopConfig> {
  analytics?: Partial<AnalyticsConfig>;
  logger?: StructuredLogger;
}

export type LoopCallback = (snapshot: MetricsSnapshot) => void | Promise<void>;

const DEFAULT_LOOP_CONFIG: LoopConfig = {
  interval_ms: 100,
  history_capacity: 100,
  action_history_capacity: 50,
  stop_timeout_ms: 2000
};

/**
 * Resolves after `ms`, or as soon as `signal` aborts
 */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal.aborted) {
      resolve();
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export class OptimizationLoop implements AnalyticsSource {
  private readonly config: LoopConfig;
  private readonly logger: StructuredLogger;
  private readonly analytics: OptimizationAnalytics;

  private readonly history: RingBuffer<MetricsSnapshot>;
  private readonly actionHistory: RingBuffer<OptimizationAction>;
  private readonly callbacks: LoopCallback[] = [];

  private state: LoopState = 'stopped';
  private strategy: OptimizationStrategy = 'adaptive';
  private stats: OptimizationStats = {
    total_optimizations: 0,
    successful_optimizations: 0,
    average_improvement: 0,
    optimization_frequency: 0
  };
  private optimizationCycles = 0;
  private tickCount = 0;

  private worker?: Promise<void>;
  private abortController?: AbortController;
  private stopping?: Promise<void>;
  // Serializes ticks from the worker and from runCycle()
  private tickChain: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly collector: MetricsCollector,
    private readonly policy: OptimizationPolicy,
    private readonly executor: ActionExecutor,
    options: LoopOptions = {}
  ) {
    this.config = {
      interval_ms: options.interval_ms ?? DEFAULT_LOOP_CONFIG.interval_ms,
      history_capacity: options.history_capacity ?? DEFAULT_LOOP_CONFIG.history_capacity,
      action_history_capacity: options.action_history_capacity ?? DEFAULT_LOOP_CONFIG.action_history_capacity,
      stop_timeout_ms: options.stop_timeout_ms ?? DEFAULT_LOOP_CONFIG.stop_timeout_ms
    };
    this.logger = options.logger ?? consoleLogger;
    this.history = new RingBuffer(this.config.history_capacity);
    this.actionHistory = new RingBuffer(this.config.action_history_capacity);
    this.analytics = new OptimizationAnalytics(this, options.analytics);
  }

  /**
   * Start the background worker. A call while running or stopping only warns.
   */
  start(strategy: OptimizationStrategy = 'adaptive'): void {
    if (this.state === 'running') {
      this.logger.warn('Optimization loop already running', { state: this.state, strategy: this.strategy });
      return;
    }
    if (this.state === 'stopping') {
      this.logger.warn('Optimization loop is stopping; start it again once stop() resolves', { state: this.state });
      return;
    }

    if (strategy !== 'adaptive') {
      this.logger.warn(`Strategy "${strategy}" is reserved and not implemented; using adaptive thresholds`, { strategy });
    }

    this.strategy = strategy;
    this.state = 'running';

    const controller = new AbortController();
    this.abortController = controller;
    this.worker = this.runWorker(controller.signal).catch(error => {
      this.logger.error('run optimization worker', error);
    });

    this.logger.info('Optimization loop started', {
      strategy,
      interval_ms: this.config.interval_ms
    });
  }

  /**
   * Stop the worker. Waits at most `stop_timeout_ms` for the current tick
   * to finish and ends stopped either way.
   */
  stop(): Promise<void> {
    if (this.state === 'stopped') {
      return Promise.resolve();
    }

    if (!this.stopping) {
      this.stopping = this.shutdown().finally(() => {
        this.stopping = undefined;
      });
    }

    return this.stopping;
  }

  registerCallback(callback: LoopCallback): void {
    this.callbacks.push(callback);
    this.logger.debug('Registered optimization callback', { callback: callback.name || 'anonymous' });
  }

  /**
   * Manually trigger one cycle. Runs after any tick already in flight.
   */
  runCycle(): Promise<MetricsSnapshot> {
    const next = this.tickChain.then(() => this.tick());
    // The caller sees the failure through `next`; the chain itself keeps going
    this.tickChain = next.catch(() => undefined);
    return next;
  }

  getStatus(): LoopStatus {
    return {
      is_running: this.state === 'running',
      state: this.state,
      strategy: this.strategy,
      latest_composite: this.history.latest()?.composite ?? null,
      ...this.stats,
      recent_action_count: this.actionHistory.length,
      history_length: this.history.length
    };
  }

  getAnalytics(): AnalyticsReport | NoDataReport {
    return this.analytics.report();
  }

  getHistory(): readonly MetricsSnapshot[] {
    return this.history.toArray();
  }

  getActionHistory(): readonly OptimizationAction[] {
    return this.actionHistory.toArray();
  }

  getStats(): OptimizationStats {
    return { ...this.stats };
  }

  // Private methods

  private async runWorker(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let delay = this.config.interval_ms;

      try {
        await this.runCycle();
      } catch (error) {
        const failure = new LoopTickError(this.tickCount, error);
        this.logger.error('run optimization tick', failure, { tick: this.tickCount });
        delay *= 2;
      }

      await sleep(delay, signal);
    }
  }

  private async shutdown(): Promise<void> {
    this.state = 'stopping';
    this.abortController?.abort();

    const worker = this.worker ?? Promise.resolve();
    let timer: NodeJS.Timeout | undefined;
    const timedOut = await Promise.race([
      worker.then(() => false),
      new Promise<boolean>(resolve => {
        timer = setTimeout(() => resolve(true), this.config.stop_timeout_ms);
      })
    ]);
    clearTimeout(timer);

    if (timedOut) {
      this.logger.warn('Optimization worker did not finish before the stop timeout', {
        stop_timeout_ms: this.config.stop_timeout_ms
      });
    }

    this.worker = undefined;
    this.abortController = undefined;
    this.state = 'stopped';
    this.logger.info('Optimization loop stopped', { ticks: this.tickCount });
  }

  private async tick(): Promise<MetricsSnapshot> {
    this.tickCount += 1;

    const snapshot = await this.collector.collect();
    const previous = this.history.latest();

    if (this.policy.evaluate(snapshot, this.history.toArray())) {
      const actions = this.policy.proposeActions(snapshot);

      for (const action of actions) {
        const success = await this.executeAction(action);
        this.stats.total_optimizations += 1;
        if (success) {
          this.stats.successful_optimizations += 1;
        }
        this.actionHistory.push(action);
      }

      if (actions.length > 0) {
        this.updateOptimizationStats(snapshot, previous);
      }
    }

    this.history.push(snapshot);
    this.notifyCallbacks(snapshot);

    return snapshot;
  }

  private async executeAction(action: OptimizationAction): Promise<boolean> {
    try {
      return await this.executor.execute(action);
    } catch (error) {
      const failure = new ActionExecutionError(action.kind, error);
      this.logger.error('execute optimization action', failure, { action_kind: action.kind });
      return false;
    }
  }

  private updateOptimizationStats(snapshot: MetricsSnapshot, previous: MetricsSnapshot | undefined): void {
    if (previous) {
      const improvement = snapshot.composite - previous.composite;
      this.optimizationCycles += 1;
      this.stats.average_improvement =
        (this.stats.average_improvement * (this.optimizationCycles - 1) + improvement) / this.optimizationCycles;
    }

    const [before, latest] = this.actionHistory.tail(2);
    if (before && latest) {
      const seconds = (new Date(latest.created_at).getTime() - new Date(before.created_at).getTime()) / 1000;
      if (seconds > 0) {
        this.stats.optimization_frequency = 1 / seconds;
      }
    }
  }

  private notifyCallbacks(snapshot: MetricsSnapshot): void {
    for (const callback of this.callbacks) {
      const name = callback.name || 'anonymous';
      try {
        const result = callback(snapshot);
        if (result instanceof Promise) {
          result.catch(error => {
            this.logger.error('run optimization callback', new CallbackError(name, error), { callback: name });
          });
        }
      } catch (error) {
        this.logger.error('run optimization callback', new CallbackError(name, error), { callback: name });
      }
    }
  }
}
