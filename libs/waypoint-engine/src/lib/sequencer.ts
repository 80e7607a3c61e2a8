import type { Codec } from './codec';
import { DecodeError, DuplicateLabelError, EncodeError, FlowExhaustedError, MissingStepValueError, UnsupportedStreamError } from './errors';
import { FlowCall, FlowRouter, RESTART_LABEL } from './router';
import type { FlowSession } from './session';
import type { ChannelHandler, FlowRequest, StepContext } from './step';
import { firstLabel, StepNode, Workflow } from './workflow';

export type FlowLogger = {
  log(message: string): void;
  warn(message: string): void;
  debug?(message: string): void;
};

export type WorkflowConfig<T, Req extends FlowRequest = FlowRequest, Res = unknown> = {
  workflow: Workflow<T, Req, Res>;
  router: FlowRouter;
  logger?: FlowLogger;
};

export type FlowOutcome<Res> =
  | { type: 'respond'; response: Res }
  | {
      type: 'redirect';
      location: FlowCall;
      session: FlowSession;
      /** Whether the host should append the incoming query string to `location`. */
      carryQuery: boolean;
    };

type TargetVisitor<T, Req extends FlowRequest, Res, X> = <A>(
  node: StepNode<A, T, Req, Res>,
  previous: string | undefined,
  path: readonly string[],
) => X;

export const decodeStored = <A>(label: string, codec: Codec<A>, raw: string): A => {
  try {
    return codec.decode(raw);
  } catch (error) {
    if (error instanceof DecodeError) {
      throw new DecodeError(error.message, label, error.details);
    }
    throw new DecodeError(`Could not decode value for step "${label}"`, label, error);
  }
};

const encodeValue = <A>(label: string, codec: Codec<A>, value: A): string => {
  try {
    return codec.encode(value);
  } catch (error) {
    if (error instanceof EncodeError) {
      throw new EncodeError(error.message, label, error.details);
    }
    throw new EncodeError(`Could not encode value for step "${label}"`, label, error);
  }
};

const storedValue = <A>(label: string, codec: Codec<A>, session: FlowSession): A | undefined => {
  const raw = session.get(label);
  return raw === undefined ? undefined : decodeStored(label, codec, raw);
};

/**
 * Walks the workflow from its root, replaying stored values into every step before `target`,
 * and hands the node labelled `target` to `atTarget`.
 */
const traverse = <T, Req extends FlowRequest, Res, X>(
  config: WorkflowConfig<T, Req, Res>,
  target: string,
  session: FlowSession,
  atTarget: TargetVisitor<T, Req, Res, X>,
): X => {
  let cursor: Workflow<T, Req, Res> = config.workflow;
  const path: string[] = [];
  for (;;) {
    if (cursor.kind === 'finished') {
      throw new FlowExhaustedError(target);
    }
    const label = cursor.label;
    if (path.includes(label)) {
      throw new DuplicateLabelError(label, [...path, label]);
    }
    if (label === target) {
      const previous = path.length > 0 ? path[path.length - 1] : undefined;
      return cursor.open(<A>(node: StepNode<A, T, Req, Res>) => atTarget(node, previous, path));
    }
    config.logger?.debug?.(`replaying ${label} towards ${target}`);
    cursor = cursor.open(<A>(node: StepNode<A, T, Req, Res>): Workflow<T, Req, Res> => {
      const raw = session.get(node.label);
      if (raw === undefined) {
        throw new MissingStepValueError(node.label, target);
      }
      return node.next(decodeStored(node.label, node.codec, raw));
    });
    path.push(label);
  }
};

const contextFor = <A>(
  router: FlowRouter,
  label: string,
  previous: string | undefined,
  stored: A | undefined,
): StepContext<A> =>
  Object.freeze({
    current: router.resolvePost(label),
    previous: previous === undefined ? undefined : router.resolvePost(previous),
    storedValue: stored,
    restart: router.resolveGet(RESTART_LABEL),
    resolve: (other: string) => router.resolveGet(other),
  });

const restart = <T, Req extends FlowRequest, Res>(
  config: WorkflowConfig<T, Req, Res>,
  request: Req,
): FlowOutcome<Res> => {
  const first = firstLabel(config.workflow);
  config.logger?.log(`restarting workflow at ${first}`);
  return {
    type: 'redirect',
    location: config.router.resolveGet(first),
    session: request.session.clear(),
    carryQuery: true,
  };
};

/**
 * Answers a GET for `label`. `start` clears the session and redirects to the first step; a
 * step whose `render` yields nothing is processed as if the request were a POST.
 */
export const handleGet = async <T, Req extends FlowRequest, Res>(
  config: WorkflowConfig<T, Req, Res>,
  label: string,
  request: Req,
): Promise<FlowOutcome<Res>> => {
  if (label === RESTART_LABEL) {
    return restart(config, request);
  }
  config.logger?.debug?.(`get ${label}`);
  const rendered = await traverse(
    config,
    label,
    request.session,
    async <A>(node: StepNode<A, T, Req, Res>, previous: string | undefined): Promise<Res | undefined> => {
      if (!node.step.render) {
        return undefined;
      }
      const ctx = contextFor(config.router, node.label, previous, storedValue(node.label, node.codec, request.session));
      return node.step.render(ctx, request);
    },
  );
  if (rendered !== undefined) {
    return { type: 'respond', response: rendered };
  }
  return handlePost(config, label, request);
};

/**
 * Answers a POST for `label`. A value produced by the step overwrites the step's session entry
 * and redirects to whichever step the workflow continues with.
 */
export const handlePost = async <T, Req extends FlowRequest, Res>(
  config: WorkflowConfig<T, Req, Res>,
  label: string,
  request: Req,
): Promise<FlowOutcome<Res>> => {
  if (label === RESTART_LABEL) {
    return restart(config, request);
  }
  config.logger?.debug?.(`post ${label}`);
  return traverse(
    config,
    label,
    request.session,
    async <A>(
      node: StepNode<A, T, Req, Res>,
      previous: string | undefined,
      path: readonly string[],
    ): Promise<FlowOutcome<Res>> => {
      const ctx = contextFor(config.router, node.label, previous, storedValue(node.label, node.codec, request.session));
      const outcome = await node.step.process(ctx, request);
      if (outcome.kind === 'respond') {
        config.logger?.debug?.(`${node.label} answered without advancing`);
        return { type: 'respond', response: outcome.response };
      }

      // The continuation sees the value exactly as later requests will replay it.
      const encoded = encodeValue(node.label, node.codec, outcome.value);
      const continuation = node.next(decodeStored(node.label, node.codec, encoded));
      if (continuation.kind === 'finished') {
        throw new FlowExhaustedError(
          node.label,
          `Workflow finished after step "${node.label}"; it must end in a step that responds`,
        );
      }
      const next = continuation.label;
      if (next === node.label || path.includes(next)) {
        throw new DuplicateLabelError(next, [...path, node.label, next]);
      }

      const session = request.session.withEntry(node.label, encoded);
      config.logger?.log(`stored ${node.label}, redirecting to ${next}`);
      return {
        type: 'redirect',
        location: config.router.resolveGet(next),
        session,
        carryQuery: false,
      };
    },
  );
};

/**
 * Opens the message channel of the step labelled `label`. Earlier steps are replayed as usual but
 * the step's own stored value is not handed to the channel.
 */
export const handleStream = async <T, Req extends FlowRequest, Res>(
  config: WorkflowConfig<T, Req, Res>,
  label: string,
  request: Req,
): Promise<ChannelHandler> => {
  config.logger?.debug?.(`stream ${label}`);
  return traverse(
    config,
    label,
    request.session,
    async <A>(node: StepNode<A, T, Req, Res>, previous: string | undefined): Promise<ChannelHandler> => {
      const open = node.step.stream;
      if (!open) {
        throw new UnsupportedStreamError(node.label);
      }
      return open(contextFor<A>(config.router, node.label, previous, undefined), request);
    },
  );
};
