import type { Logger } from 'pino';
import type { AuditConfig } from '../config/index.js';
import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import type { AuditRepository } from '../storage/index.js';
import type { AuditEvent, AuditQuery, AuditStats } from './types.js';

export * from './types.js';

export type AuditEventInput = Omit<AuditEvent, 'timestamp'>;

/**
 * Asynchronous audit trail. Events are queued and written in batches so that request
 * handling never waits on the database. When the queue is full, ordinary events wait
 * briefly and are then dropped; critical events wait longer and are then queued past
 * capacity. A critical event is never lost, even when its batch fails to write.
 */
export class AuditLogger {
  private queue: AuditEvent[] = [];
  private waiters: Array<() => void> = [];
  private timer: NodeJS.Timeout | null = null;
  private flushing: Promise<void> | null = null;
  private closed = false;
  private counters: AuditStats = { queued: 0, written: 0, dropped: 0, overflowed: 0, failedFlushes: 0 };

  constructor(
    private readonly repository: AuditRepository,
    private readonly config: AuditConfig,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  start(): void {
    if (this.timer || this.closed) return;
    this.timer = setInterval(() => {
      this.flush().catch((err) => {
        this.logger.error({ err }, 'Scheduled audit flush failed');
      });
    }, this.config.flush_interval_ms);
    this.timer.unref();
  }

  /**
   * Record an event. Resolves to false when an ordinary event had to be dropped.
   */
  async record(input: AuditEventInput): Promise<boolean> {
    const event: AuditEvent = Object.freeze({
      ...input,
      detail: input.detail ? Object.freeze({ ...input.detail }) : undefined,
      timestamp: new Date(this.clock()),
    });
    this.mirror(event);

    const critical = event.severity === 'critical';
    if (!this.hasSpace()) {
      this.requestFlush();
      await this.waitForSpace(critical ? this.config.critical_wait_ms : this.config.enqueue_wait_ms);
    }

    if (this.hasSpace()) {
      this.queue.push(event);
    } else if (critical) {
      this.queue.push(event);
      this.counters.overflowed++;
      this.logger.warn({ queued: this.queue.length }, 'Audit queue over capacity for critical event');
    } else {
      this.counters.dropped++;
      return false;
    }

    this.counters.queued++;
    if (this.queue.length >= this.config.batch_size || this.closed) {
      this.requestFlush();
    }
    return true;
  }

  /**
   * Write queued events in batches until the queue is empty or a write fails.
   * Concurrent callers share the flush in progress.
   */
  flush(): Promise<void> {
    if (!this.flushing) {
      this.flushing = this.drain().finally(() => {
        this.flushing = null;
      });
    }
    return this.flushing;
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.flush();
    if (this.queue.length > 0) {
      // One more attempt for whatever a failed batch put back
      await this.flush();
    }
    if (this.queue.length > 0) {
      this.logger.error({ pending: this.queue.length }, 'Audit events left unwritten at shutdown');
    }
  }

  query(query: AuditQuery): Promise<AuditEvent[]> {
    return this.repository.query(query);
  }

  pending(): number {
    return this.queue.length;
  }

  stats(): AuditStats {
    return { ...this.counters };
  }

  private async drain(): Promise<void> {
    while (this.queue.length > 0) {
      const batch = this.queue.splice(0, this.config.batch_size);
      try {
        await this.repository.append(batch);
        this.counters.written += batch.length;
      } catch (err) {
        this.counters.failedFlushes++;
        const critical = batch.filter((event) => event.severity === 'critical');
        this.queue.unshift(...critical);
        this.counters.dropped += batch.length - critical.length;
        this.logger.error(
          { err, batchSize: batch.length, requeued: critical.length },
          'Failed to write audit batch'
        );
        this.notifyWaiters();
        return;
      }
      this.notifyWaiters();
    }
  }

  private requestFlush(): void {
    this.flush().catch((err) => {
      this.logger.error({ err }, 'Audit flush failed');
    });
  }

  private hasSpace(): boolean {
    return this.queue.length < this.config.queue_capacity;
  }

  private waitForSpace(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve) => {
      const waiter = () => {
        clearTimeout(timeout);
        resolve();
      };
      const timeout = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve();
      }, ms);
      this.waiters.push(waiter);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }

  private mirror(event: AuditEvent): void {
    const fields = {
      audit: event.kind,
      path: event.path,
      tokenId: event.tokenId,
      tenantId: event.tenantId,
      endpoint: event.endpoint,
      outcome: event.outcome,
      latencyMs: event.latencyMs,
      detail: event.detail,
    };
    switch (event.severity) {
      case 'critical':
        this.logger.error(fields, 'Critical audit event');
        break;
      case 'elevated':
        this.logger.warn(fields, 'Elevated audit event');
        break;
      default:
        this.logger.debug(fields, 'Audit event');
    }
  }
}
