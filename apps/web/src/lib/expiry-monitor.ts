import { describeError } from '../utils/errors';
import { sessionLogger } from '../utils/logger';

export interface VisibilitySource {
  /** Calls `listener` whenever the app returns to the foreground. Returns an unsubscribe function. */
  onVisible(listener: () => void): () => void;
}

export interface VisibilityTarget {
  readonly hidden: boolean;
  addEventListener(type: 'visibilitychange', listener: () => void): void;
  removeEventListener(type: 'visibilitychange', listener: () => void): void;
}

export function documentVisibility(target: VisibilityTarget): VisibilitySource {
  return {
    onVisible(listener) {
      const handleChange = () => {
        if (!target.hidden) {
          listener();
        }
      };
      target.addEventListener('visibilitychange', handleChange);
      return () => target.removeEventListener('visibilitychange', handleChange);
    },
  };
}

export function defaultVisibility(): VisibilitySource | null {
  return typeof document !== 'undefined' ? documentVisibility(document) : null;
}

export interface ExpiryMonitorOptions {
  interval: number;
  visibility?: VisibilitySource | null;
}

/**
 * Runs `check` on a fixed interval and whenever the app becomes visible again.
 * `check` must be idempotent: both triggers may fire back to back.
 */
export class ExpiryMonitor {
  private timer: ReturnType<typeof setInterval> | null = null;
  private stopVisibility: (() => void) | null = null;

  constructor(
    private readonly check: () => void,
    private readonly options: ExpiryMonitorOptions,
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    this.stop();

    this.timer = setInterval(() => this.runCheck('interval'), this.options.interval);
    if (this.options.visibility) {
      this.stopVisibility = this.options.visibility.onVisible(() => this.runCheck('visibility'));
    }
    sessionLogger.debug('Expiry monitor started', { interval: this.options.interval });
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.stopVisibility) {
      this.stopVisibility();
      this.stopVisibility = null;
    }
  }

  private runCheck(trigger: 'interval' | 'visibility'): void {
    if (this.timer === null) return;

    try {
      this.check();
    } catch (error) {
      sessionLogger.warn('Freshness check failed', { trigger, error: describeError(error) });
    }
  }
}
