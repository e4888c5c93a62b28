import { DispatchMessage, IWorkerChannel } from '../../src/core/interfaces/IWorkerChannel.js';

interface Deferred {
  message: DispatchMessage;
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * In-process worker channel. Dispatches stay pending until the test
 * acknowledges or fails them.
 */
export class FakeWorkerChannel implements IWorkerChannel {
  readonly connected = new Set<string>();
  readonly sent: Array<{ workerId: string; message: DispatchMessage }> = [];
  readonly aborted: Array<{ workerId: string; jobId: string }> = [];
  private pending = new Map<string, Deferred>();

  connect(...workerIds: string[]): void {
    workerIds.forEach((id) => this.connected.add(id));
  }

  isConnected(workerId: string): boolean {
    return this.connected.has(workerId);
  }

  dispatch(workerId: string, message: DispatchMessage): Promise<void> {
    this.sent.push({ workerId, message });
    return new Promise((resolve, reject) => {
      this.pending.set(`${workerId}:${message.jobId}`, { message, resolve, reject });
    });
  }

  abort(workerId: string, jobId: string): void {
    this.aborted.push({ workerId, jobId });
  }

  ack(workerId: string, jobId: string): void {
    this.take(workerId, jobId).resolve();
  }

  fail(workerId: string, jobId: string, reason = 'connection reset'): void {
    this.take(workerId, jobId).reject(new Error(reason));
  }

  ackAll(): void {
    for (const key of Array.from(this.pending.keys())) {
      const deferred = this.pending.get(key);
      this.pending.delete(key);
      deferred?.resolve();
    }
  }

  sentTo(workerId: string): string[] {
    return this.sent.filter((s) => s.workerId === workerId).map((s) => s.message.jobId);
  }

  private take(workerId: string, jobId: string): Deferred {
    const key = `${workerId}:${jobId}`;
    const deferred = this.pending.get(key);
    if (!deferred) {
      throw new Error(`No pending dispatch of ${jobId} to ${workerId}`);
    }
    this.pending.delete(key);
    return deferred;
  }
}
