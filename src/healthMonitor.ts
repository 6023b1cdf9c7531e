import net from 'node:net';
import { createLogger, type Logger } from './logger.js';

export type HealthCheck = (origin: URL) => boolean | Promise<boolean>;

export type HealthState = 'idle' | 'running' | 'stopped';

export const DEFAULT_CHECK_PERIOD_MS = 10_000;
export const DEFAULT_CHECK_TIMEOUT_MS = 10_000;

/**
 * Reachability probe: a plain TCP connect to the origin's host and port.
 * The socket is destroyed as soon as the attempt settles either way.
 */
export function tcpCheck(timeoutMs: number = DEFAULT_CHECK_TIMEOUT_MS): HealthCheck {
  return (origin) =>
    new Promise<boolean>((resolve) => {
      const port = Number(origin.port || (origin.protocol === 'https:' ? 443 : 80));
      const host = origin.hostname.replace(/^\[(.*)\]$/, '$1');
      const sock = net.createConnection({ host, port });
      const finish = (ok: boolean) => {
        clearTimeout(t);
        sock.destroy();
        resolve(ok);
      };
      const t = setTimeout(() => finish(false), timeoutMs);
      t.unref();
      sock.unref();
      sock.once('connect', () => finish(true));
      sock.once('error', () => finish(false));
    });
}

export interface HealthMonitorOptions {
  check?: HealthCheck;
  periodMs?: number;
  logger?: Logger;
}

interface Loop {
  cancelled: boolean;
  timer?: NodeJS.Timeout;
  pending?: Promise<void>;
}

/**
 * Keeps a cached answer to "is the origin reachable?". One probe runs before
 * `start` resolves, then the probe repeats every period until `stop`.
 *
 * Control operations (`setCheckFunc`, `stop`) are serialized, and stopping
 * waits for an in-flight probe, so at most one loop ever writes `available`.
 */
export class HealthMonitor {
  private check: HealthCheck;
  private periodMs: number;
  private available = false;
  private lifecycle: HealthState = 'idle';
  private loop?: Loop;
  private control: Promise<void> = Promise.resolve();
  private readonly logger: Logger;

  private constructor(
    readonly origin: URL,
    options: HealthMonitorOptions
  ) {
    this.check = options.check ?? tcpCheck();
    this.periodMs = options.periodMs ?? DEFAULT_CHECK_PERIOD_MS;
    this.logger = options.logger ?? createLogger('health');
  }

  static async start(origin: URL, options: HealthMonitorOptions = {}): Promise<HealthMonitor> {
    const monitor = new HealthMonitor(origin, options);
    await monitor.exclusive(async () => {
      monitor.store(await monitor.probe(monitor.check));
      monitor.run();
    });
    return monitor;
  }

  get state(): HealthState {
    return this.lifecycle;
  }

  get period(): number {
    return this.periodMs;
  }

  isAvailable(): boolean {
    return this.available;
  }

  /**
   * Replaces the probe and its period. The new probe runs once before this
   * resolves, so `isAvailable` never reports the old probe's verdict after it.
   */
  setCheckFunc(check: HealthCheck, periodMs: number): Promise<void> {
    return this.exclusive(async () => {
      await this.halt();
      this.check = check;
      this.periodMs = periodMs;
      this.store(await this.probe(check));
      this.run();
    });
  }

  /** Safe to call any number of times. */
  stop(): Promise<void> {
    return this.exclusive(() => this.halt());
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.control.then(fn);
    this.control = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private run(): void {
    const loop: Loop = { cancelled: false };
    const check = this.check;
    const period = this.periodMs;
    const schedule = () => {
      loop.timer = setTimeout(() => {
        loop.pending = this.tick(loop, check).then(() => {
          if (!loop.cancelled) schedule();
        });
      }, period);
      loop.timer.unref();
    };
    this.loop = loop;
    this.lifecycle = 'running';
    schedule();
  }

  private async tick(loop: Loop, check: HealthCheck): Promise<void> {
    const ok = await this.probe(check);
    if (!loop.cancelled) this.store(ok);
  }

  private async halt(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.loop = undefined;
    loop.cancelled = true;
    clearTimeout(loop.timer);
    await loop.pending;
    this.lifecycle = 'stopped';
  }

  private async probe(check: HealthCheck): Promise<boolean> {
    try {
      return await check(this.origin);
    } catch (err) {
      this.logger.warn('Health check threw, treating origin as unavailable', {
        origin: this.origin.host,
        error: String(err),
      });
      return false;
    }
  }

  private store(ok: boolean): void {
    const was = this.available;
    this.available = ok;
    if (this.lifecycle === 'idle') {
      this.logger.info('Origin health established', { origin: this.origin.host, available: ok });
    } else if (was && !ok) {
      this.logger.warn('Origin became unavailable', { origin: this.origin.host });
    } else if (!was && ok) {
      this.logger.info('Origin is available again', { origin: this.origin.host });
    }
  }
}
