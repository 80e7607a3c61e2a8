import type { FlowCall, FlowRequest, SessionEntries, Workflow } from '@waypoint/engine';

export type FlowViewStatus = 'input_required' | 'invalid' | 'completed';

export type FlowFieldError = {
  path: string;
  message: string;
};

/** JSON body returned for every rendered step. */
export type FlowView = {
  status: FlowViewStatus;
  step: string;
  action: FlowCall;
  back?: FlowCall;
  restart: FlowCall;
  values?: unknown;
  errors?: FlowFieldError[];
  userMessage?: string;
};

export type FlowHttpRequest = FlowRequest & {
  sessionId: string;
  body: Record<string, unknown>;
  query: Record<string, string[]>;
};

export type FlowWorkflow = Workflow<unknown, FlowHttpRequest, FlowView>;

export type FlowModuleConfig = {
  workflow: FlowWorkflow;
  /** Path the flow controller is mounted on, including any global prefix. */
  basePath: string;
  sessionTtlSeconds?: number;
  validateOnBoot?: boolean;
  /** Sample sessions walked by the boot-time label check. */
  samples?: readonly SessionEntries[];
  restartOnMissingStep?: boolean;
};

export const FLOW_MODULE_CONFIG = Symbol('FLOW_MODULE_CONFIG');

export const SESSION_HEADER = 'x-waypoint-session';

export type FlowHttpInput = {
  sessionId?: string;
  body?: unknown;
  query?: Record<string, unknown>;
  /** Raw query string without the leading `?`. */
  queryString?: string;
};

export type FlowReply =
  | { type: 'view'; sessionId: string; view: FlowView }
  | { type: 'redirect'; sessionId: string; url: string };
