import { DuplicateLabelError } from './errors';
import { decodeStored } from './sequencer';
import { createSession, SessionEntries } from './session';
import type { FlowRequest } from './step';
import type { StepNode, Workflow } from './workflow';

export type WorkflowPath = {
  /** Labels reached, ending with the first step that has no sample value. */
  labels: string[];
  finished: boolean;
};

/**
 * Follows the workflow as far as `entries` allow and lists the labels met on the way.
 * Throws `DuplicateLabelError` when a label comes up twice.
 */
export const tracePath = <T, Req extends FlowRequest, Res>(
  workflow: Workflow<T, Req, Res>,
  entries: SessionEntries = {},
): WorkflowPath => {
  const session = createSession(entries);
  const labels: string[] = [];
  let cursor: Workflow<T, Req, Res> = workflow;
  while (cursor.kind === 'step') {
    const label = cursor.label;
    if (labels.includes(label)) {
      throw new DuplicateLabelError(label, [...labels, label]);
    }
    labels.push(label);
    const raw = session.get(label);
    if (raw === undefined) {
      return { labels, finished: false };
    }
    cursor = cursor.open(
      <A>(node: StepNode<A, T, Req, Res>): Workflow<T, Req, Res> => node.next(decodeStored(label, node.codec, raw)),
    );
  }
  return { labels, finished: true };
};

/** Runs `tracePath` for every sample session; one path per sample, plus the bare root. */
export const validateWorkflow = <T, Req extends FlowRequest, Res>(
  workflow: Workflow<T, Req, Res>,
  samples: readonly SessionEntries[] = [],
): WorkflowPath[] => [tracePath(workflow), ...samples.map((sample) => tracePath(workflow, sample))];
