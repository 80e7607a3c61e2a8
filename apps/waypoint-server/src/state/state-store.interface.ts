export type FlowSessionState = {
  sessionId: string;
  entries: Record<string, string>;
  updatedAtUtc: string;
};

export type StateStore = {
  get(sessionId: string): Promise<FlowSessionState | undefined>;
  set(sessionId: string, state: FlowSessionState, ttlSeconds?: number): Promise<void>;
  delete(sessionId: string): Promise<void>;
};

export const STATE_STORE = Symbol('STATE_STORE');
