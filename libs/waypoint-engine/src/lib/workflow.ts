import type { Codec } from './codec';
import { FlowExhaustedError, InvalidLabelError } from './errors';
import { RESTART_LABEL } from './router';
import type { FlowRequest, Step } from './step';

export type Finished<T> = {
  readonly kind: 'finished';
  readonly value: T;
};

export type StepNode<A, T, Req extends FlowRequest, Res> = {
  readonly label: string;
  readonly step: Step<A, Req, Res>;
  readonly codec: Codec<A>;
  readonly next: (value: A) => Workflow<T, Req, Res>;
};

export type NodeVisitor<T, Req extends FlowRequest, Res, X> = <A>(node: StepNode<A, T, Req, Res>) => X;

/**
 * A step waiting for its value. The value type is only reachable through `open`, so a
 * continuation can never be called with anything but what its own codec or step produced.
 */
export type Pending<T, Req extends FlowRequest, Res> = {
  readonly kind: 'step';
  readonly label: string;
  open<X>(visit: NodeVisitor<T, Req, Res, X>): X;
};

/** A lazily unfolding sequence of steps that eventually yields a `T`. */
export type Workflow<T, Req extends FlowRequest = FlowRequest, Res = unknown> = Finished<T> | Pending<T, Req, Res>;

const pending = <A, T, Req extends FlowRequest, Res>(node: StepNode<A, T, Req, Res>): Pending<T, Req, Res> => ({
  kind: 'step',
  label: node.label,
  open<X>(visit: NodeVisitor<T, Req, Res, X>): X {
    return visit(node);
  },
});

export const pure = <T>(value: T): Finished<T> => ({ kind: 'finished', value });

/**
 * Wraps a step as a one-node workflow.
 *
 * @param label names the step in URLs and keys its value in the session; it has to be unique
 *   along any path through the workflow.
 */
export const step = <A, Req extends FlowRequest = FlowRequest, Res = unknown>(
  label: string,
  definition: Step<A, Req, Res>,
  codec: Codec<A>,
): Workflow<A, Req, Res> => {
  if (!label || label === RESTART_LABEL) {
    throw new InvalidLabelError(label);
  }
  return pending<A, A, Req, Res>({
    label,
    step: definition,
    codec,
    next: (value: A) => pure(value),
  });
};

/** Continues `workflow` with whatever `f` builds from its result. Nothing runs until traversal. */
export const bind = <A, B, Req extends FlowRequest, Res>(
  workflow: Workflow<A, Req, Res>,
  f: (value: A) => Workflow<B, Req, Res>,
): Workflow<B, Req, Res> => {
  if (workflow.kind === 'finished') {
    return f(workflow.value);
  }
  return workflow.open(
    <V>(node: StepNode<V, A, Req, Res>): Workflow<B, Req, Res> =>
      pending<V, B, Req, Res>({
        label: node.label,
        step: node.step,
        codec: node.codec,
        next: (value: V) => bind(node.next(value), f),
      }),
  );
};

export const map = <A, B, Req extends FlowRequest, Res>(
  workflow: Workflow<A, Req, Res>,
  f: (value: A) => B,
): Workflow<B, Req, Res> => bind(workflow, (value) => pure(f(value)));

export const firstLabel = <T, Req extends FlowRequest, Res>(workflow: Workflow<T, Req, Res>): string => {
  if (workflow.kind === 'finished') {
    throw new FlowExhaustedError();
  }
  return workflow.label;
};
