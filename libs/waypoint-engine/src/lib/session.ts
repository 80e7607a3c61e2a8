export type SessionEntries = Readonly<Record<string, string>>;

/**
 * Client-scoped store of completed steps, keyed by label. Every write returns a new session;
 * the receiver is never modified.
 */
export interface FlowSession {
  readonly size: number;
  get(label: string): string | undefined;
  withEntry(label: string, value: string): FlowSession;
  clear(): FlowSession;
  entries(): SessionEntries;
}

class RecordSession implements FlowSession {
  private readonly values: SessionEntries;

  constructor(values: SessionEntries) {
    this.values = Object.freeze({ ...values });
  }

  get size(): number {
    return Object.keys(this.values).length;
  }

  get(label: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(this.values, label) ? this.values[label] : undefined;
  }

  withEntry(label: string, value: string): FlowSession {
    return new RecordSession({ ...this.values, [label]: value });
  }

  clear(): FlowSession {
    return EMPTY_SESSION;
  }

  entries(): SessionEntries {
    return this.values;
  }
}

const EMPTY_SESSION: FlowSession = new RecordSession({});

export const createSession = (entries?: SessionEntries): FlowSession =>
  entries && Object.keys(entries).length > 0 ? new RecordSession(entries) : EMPTY_SESSION;
