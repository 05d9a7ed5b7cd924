import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { BrokerMessage, BrokerSnapshot, JobBroker } from './job-broker';
import { BrokerUnavailableError } from './jobs.errors';

interface PendingReserve {
  workerId: string;
  resolve: (message: BrokerMessage | null) => void;
}

/**
 * In-process FIFO broker.
 *
 * Messages live in memory, so queued jobs do not survive a restart.
 * Workers waiting on an empty queue are served in the order they asked.
 */
@Injectable()
export class InMemoryJobBroker implements JobBroker, OnModuleDestroy {
  private readonly logger = new Logger(InMemoryJobBroker.name);

  private queue: BrokerMessage[] = [];

  /** workerId → messages delivered and not yet acknowledged */
  private reserved = new Map<string, BrokerMessage[]>();

  /** Workers blocked in reserve(), oldest first */
  private waiting: PendingReserve[] = [];

  private closed = false;

  onModuleDestroy(): void {
    this.close();
  }

  enqueue(jobId: string): BrokerMessage {
    if (this.closed) {
      throw new BrokerUnavailableError('broker is closed');
    }

    const message: BrokerMessage = {
      jobId,
      enqueuedAt: new Date().toISOString(),
      deliveries: 0,
    };
    this.queue.push(message);
    this.logger.debug(`Enqueued job ${jobId} (depth: ${this.queue.length})`);

    this.drain();
    return message;
  }

  reserve(workerId: string): Promise<BrokerMessage | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }

    const next = this.queue.shift();
    if (next) {
      return Promise.resolve(this.deliver(workerId, next));
    }

    return new Promise((resolve) => {
      this.waiting.push({ workerId, resolve });
    });
  }

  cancelReserve(workerId: string): void {
    const cancelled = this.waiting.filter((w) => w.workerId === workerId);
    this.waiting = this.waiting.filter((w) => w.workerId !== workerId);
    cancelled.forEach((w) => w.resolve(null));
  }

  ack(workerId: string, jobId: string): void {
    const held = this.reserved.get(workerId) ?? [];
    const remaining = held.filter((m) => m.jobId !== jobId);
    if (remaining.length === held.length) {
      this.logger.warn(`Ack for job ${jobId} from ${workerId}, which does not hold it`);
      return;
    }
    this.reserved.set(workerId, remaining);
  }

  releaseWorker(workerId: string): number {
    const held = this.reserved.get(workerId) ?? [];
    this.reserved.delete(workerId);
    if (held.length === 0) return 0;

    // Back to the front: these were already ahead of everything queued.
    this.queue.unshift(...held);
    this.logger.warn(`Requeued ${held.length} job(s) held by lost worker ${workerId}`);

    this.drain();
    return held.length;
  }

  ping(): boolean {
    return !this.closed;
  }

  snapshot(): BrokerSnapshot {
    const reserved: Record<string, BrokerMessage[]> = {};
    for (const [workerId, messages] of this.reserved) {
      reserved[workerId] = messages.map((m) => ({ ...m }));
    }
    return { queued: this.queue.map((m) => ({ ...m })), reserved };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    const waiting = this.waiting;
    this.waiting = [];
    waiting.forEach((w) => w.resolve(null));

    this.logger.log(`Broker closed (${this.queue.length} job(s) still queued)`);
  }

  /** Hand queued messages to waiting workers */
  private drain(): void {
    while (this.queue.length > 0 && this.waiting.length > 0) {
      const waiter = this.waiting.shift();
      const message = this.queue.shift();
      if (!waiter || !message) return;
      waiter.resolve(this.deliver(waiter.workerId, message));
    }
  }

  private deliver(workerId: string, message: BrokerMessage): BrokerMessage {
    message.deliveries++;
    const held = this.reserved.get(workerId) ?? [];
    held.push(message);
    this.reserved.set(workerId, held);
    this.logger.debug(`Delivered job ${message.jobId} to ${workerId} (delivery ${message.deliveries})`);
    return { ...message };
  }
}
