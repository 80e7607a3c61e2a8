import { Inject, Injectable } from '@nestjs/common';
import { FlowSessionState, STATE_STORE, StateStore } from './state-store.interface';

@Injectable()
export class StateService {
  constructor(@Inject(STATE_STORE) private readonly stateStore: StateStore) {}

  async getEntries(sessionId: string): Promise<Record<string, string>> {
    const state = await this.stateStore.get(sessionId);
    return state?.entries ?? {};
  }

  async saveEntries(
    sessionId: string,
    entries: Readonly<Record<string, string>>,
    ttlSeconds?: number,
  ): Promise<FlowSessionState> {
    const next: FlowSessionState = {
      sessionId,
      entries: { ...entries },
      updatedAtUtc: new Date().toISOString(),
    };
    await this.stateStore.set(sessionId, next, ttlSeconds);
    return next;
  }

  async clearState(sessionId: string): Promise<void> {
    await this.stateStore.delete(sessionId);
  }
}
