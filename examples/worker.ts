/**
 * Example worker
 *
 * Connects to the master's worker channel, registers, heartbeats and runs
 * dispatched jobs. A payload of `{ "ms": 500 }` sleeps that long; a payload
 * of `{ "fail": true }` reports a failure.
 *
 * Usage:
 *   node dist/examples/worker.js --id worker-1 --capacity 2
 */

import WebSocket from 'ws';
import { parseArgs } from '../src/config.js';
import type { MasterMessage } from '../src/core/validation/schemas.js';

const args = parseArgs();
const workerId = typeof args.id === 'string' ? args.id : `worker-${process.pid}`;
const capacity = typeof args.capacity === 'string' ? Number(args.capacity) : 1;
const url = typeof args.url === 'string' ? args.url : 'ws://localhost:3001/workers';
const heartbeatMs = 5000;

const running = new Map<string, NodeJS.Timeout>();

function send(ws: WebSocket, message: Record<string, unknown>): void {
  ws.send(JSON.stringify(message));
}

function readPayload(payload: unknown): { ms: number; fail: boolean } {
  if (typeof payload !== 'object' || payload === null) {
    return { ms: 100, fail: false };
  }
  const ms = 'ms' in payload && typeof payload.ms === 'number' ? payload.ms : 100;
  const fail = 'fail' in payload && payload.fail === true;
  return { ms, fail };
}

function runJob(ws: WebSocket, jobId: string, payload: unknown): void {
  const { ms, fail } = readPayload(payload);
  send(ws, { type: 'ack', jobId });
  send(ws, { type: 'progress', jobId, percentage: 0, message: 'started' });

  const timer = setTimeout(() => {
    running.delete(jobId);
    const outcome = fail
      ? { status: 'failed', code: 1, error: 'asked to fail' }
      : { status: 'completed', code: 0, data: { sleptMs: ms, by: workerId } };
    send(ws, { type: 'report', jobId, outcome });
  }, ms);
  running.set(jobId, timer);
}

function handle(ws: WebSocket, message: MasterMessage): void {
  switch (message.type) {
    case 'registered':
      console.log(`✅ Registered as ${message.workerId} (capacity ${message.capacity})`);
      break;
    case 'dispatch':
      console.log(`▶️  Job ${message.jobId} (attempt ${message.attempt})`);
      runJob(ws, message.jobId, message.payload);
      break;
    case 'abort': {
      const timer = running.get(message.jobId);
      if (timer) {
        clearTimeout(timer);
        running.delete(message.jobId);
      }
      console.log(`⛔ Job ${message.jobId} aborted`);
      break;
    }
    case 'report-ack':
      console.log(`📬 Job ${message.jobId}: ${message.state}${message.applied ? '' : ' (ignored)'}`);
      break;
    case 'error':
      console.error(`❌ ${message.kind} (${message.code}): ${message.message}`);
      break;
    case 'heartbeat-ack':
      break;
  }
}

const ws = new WebSocket(url);
let heartbeat: NodeJS.Timeout | null = null;

ws.on('open', () => {
  console.log(`🔌 Connected to ${url}`);
  send(ws, { type: 'register', workerId, capacity });
  heartbeat = setInterval(() => send(ws, { type: 'heartbeat' }), heartbeatMs);
});

ws.on('message', (data) => {
  try {
    // messages come from the master and follow its protocol
    const message: MasterMessage = JSON.parse(data.toString());
    handle(ws, message);
  } catch (error) {
    console.error('Could not handle message:', error);
  }
});

ws.on('close', (code, reason) => {
  if (heartbeat) clearInterval(heartbeat);
  running.forEach((timer) => clearTimeout(timer));
  console.log(`👋 Disconnected (${code} ${reason.toString()})`);
});

ws.on('error', (error) => {
  console.error('Socket error:', error.message);
});

process.on('SIGINT', () => ws.close(1000, 'worker stopping'));
