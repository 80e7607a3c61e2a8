import { Injectable } from '@nestjs/common';
import { FlowSessionState, StateStore } from './state-store.interface';

type StoredState = {
  state: FlowSessionState;
  expiresAt?: number;
};

/** Keeps sessions in process. Expired sessions are dropped on read and swept on every write. */
@Injectable()
export class MemoryStateStoreService implements StateStore {
  private readonly store = new Map<string, StoredState>();

  get size(): number {
    return this.store.size;
  }

  async get(sessionId: string): Promise<FlowSessionState | undefined> {
    const entry = this.store.get(sessionId);
    if (!entry) {
      return undefined;
    }
    if (isExpired(entry, Date.now())) {
      this.store.delete(sessionId);
      return undefined;
    }
    return entry.state;
  }

  async set(sessionId: string, state: FlowSessionState, ttlSeconds?: number): Promise<void> {
    const now = Date.now();
    this.sweep(now);
    this.store.set(sessionId, { state, expiresAt: ttlSeconds ? now + ttlSeconds * 1000 : undefined });
  }

  async delete(sessionId: string): Promise<void> {
    this.store.delete(sessionId);
  }

  private sweep(now: number): void {
    for (const [sessionId, entry] of this.store) {
      if (isExpired(entry, now)) {
        this.store.delete(sessionId);
      }
    }
  }
}

const isExpired = (entry: StoredState, now: number): boolean =>
  entry.expiresAt !== undefined && entry.expiresAt <= now;
