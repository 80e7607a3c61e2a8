import type { Observable } from 'rxjs';
import type { FlowCall } from './router';
import type { FlowSession } from './session';

/** What every request handed to the engine must carry. */
export type FlowRequest = {
  readonly session: FlowSession;
};

export type StepContext<A> = Readonly<{
  /** Where the current step's form posts to. */
  current: FlowCall;
  previous?: FlowCall;
  storedValue?: A;
  restart: FlowCall;
  resolve: (label: string) => FlowCall;
}>;

export type StepOutcome<Res, A> =
  | { readonly kind: 'respond'; readonly response: Res }
  | { readonly kind: 'advance'; readonly value: A };

export const respond = <Res>(response: Res): StepOutcome<Res, never> => ({ kind: 'respond', response });

export const advance = <A>(value: A): StepOutcome<never, A> => ({ kind: 'advance', value });

/** Maps the messages a client sends to the messages it receives. */
export type ChannelHandler = (incoming: Observable<string>) => Observable<string>;

/**
 * A single step in a workflow.
 *
 * `render` answers the initial GET; returning `undefined` (or omitting it) sends the request
 * straight on to `process`. `process` either answers with a response (validation failed, nothing
 * stored) or advances with the value to store. `stream` is optional and only receives the
 * values of earlier steps; it is expected to post to the step itself to move the workflow on.
 */
export type Step<A, Req extends FlowRequest = FlowRequest, Res = unknown> = {
  render?: (ctx: StepContext<A>, request: Req) => Promise<Res | undefined>;
  process: (ctx: StepContext<A>, request: Req) => Promise<StepOutcome<Res, A>>;
  stream?: (ctx: StepContext<A>, request: Req) => Promise<ChannelHandler>;
};
