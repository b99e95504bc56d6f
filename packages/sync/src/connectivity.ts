import {
  resolveLogger,
  systemClock,
  toError,
  type Clock,
  type Logger,
  type LoggerOption,
  type TimerHandle,
} from '@tidemark/core';
import { BehaviorSubject, distinctUntilChanged, type Observable } from 'rxjs';

/**
 * Source of online/offline transitions. The coordinator syncs when it sees
 * an offline → online transition.
 */
export interface ConnectivityMonitor {
  /** Current status, replayed on subscribe, emitted only on change */
  readonly online$: Observable<boolean>;
  /** Current status */
  isOnline(): boolean;
}

/**
 * Connectivity driven by the application (or a test)
 */
export class ManualConnectivity implements ConnectivityMonitor {
  private readonly state$: BehaviorSubject<boolean>;
  readonly online$: Observable<boolean>;

  constructor(initial = true) {
    this.state$ = new BehaviorSubject<boolean>(initial);
    this.online$ = this.state$.pipe(distinctUntilChanged());
  }

  isOnline(): boolean {
    return this.state$.value;
  }

  setOnline(online: boolean): void {
    this.state$.next(online);
  }
}

/**
 * Create a manually controlled monitor
 *
 * @example
 * ```typescript
 * const connectivity = createManualConnectivity(false);
 * // later, when the platform reports a network
 * connectivity.setOnline(true);
 * ```
 */
export function createManualConnectivity(initial = true): ManualConnectivity {
  return new ManualConnectivity(initial);
}

export interface PollingConnectivityOptions {
  /** Resolves true when the remote is reachable. A rejection counts as offline. */
  check: () => Promise<boolean>;
  /** Time between checks in ms (default: 30000) */
  intervalMs?: number;
  /** Status before the first check completes (default: false) */
  initial?: boolean;
  /** Timer source */
  clock?: Clock;
  /** Logger or logger options */
  logger?: LoggerOption;
}

/**
 * Connectivity determined by polling an async check
 */
export class PollingConnectivity implements ConnectivityMonitor {
  private readonly state$: BehaviorSubject<boolean>;
  private readonly isReachable: () => Promise<boolean>;
  private readonly intervalMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private timer: TimerHandle | null = null;
  private running = false;
  readonly online$: Observable<boolean>;

  constructor(options: PollingConnectivityOptions) {
    this.state$ = new BehaviorSubject<boolean>(options.initial ?? false);
    this.online$ = this.state$.pipe(distinctUntilChanged());
    this.isReachable = options.check;
    this.intervalMs = options.intervalMs ?? 30000;
    this.clock = options.clock ?? systemClock;
    this.logger = resolveLogger(options.logger, 'PollingConnectivity');
  }

  isOnline(): boolean {
    return this.state$.value;
  }

  /**
   * Check now and then every `intervalMs`
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    void this.tick();
  }

  stop(): void {
    this.running = false;
    this.timer?.cancel();
    this.timer = null;
  }

  /**
   * Run the check once and publish the result
   */
  async check(): Promise<boolean> {
    let online: boolean;
    try {
      online = await this.isReachable();
    } catch (error) {
      this.logger.debug('Check failed', { error: toError(error).message });
      online = false;
    }

    if (online !== this.state$.value) {
      this.logger.info(online ? 'Remote reachable' : 'Remote unreachable');
    }
    this.state$.next(online);
    return online;
  }

  private async tick(): Promise<void> {
    await this.check();
    if (!this.running) return;
    this.timer = this.clock.schedule(this.intervalMs, () => {
      void this.tick();
    });
  }
}

/**
 * Create a polling monitor. Call `start()` to begin probing.
 */
export function createPollingConnectivity(options: PollingConnectivityOptions): PollingConnectivity {
  return new PollingConnectivity(options);
}
