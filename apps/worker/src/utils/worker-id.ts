import { randomUUID } from 'node:crypto';
import os from 'node:os';

/** Claim owner name for this process, e.g. `host-4242-1a2b3c4d`. */
export function createWorkerId(): string {
  return `${os.hostname()}-${process.pid}-${randomUUID().slice(0, 8)}`;
}
