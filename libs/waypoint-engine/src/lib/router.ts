/** A resolved request target. Only the router builds these; the engine passes them through. */
export type FlowCall = {
  method: 'GET' | 'POST';
  url: string;
};

export interface FlowRouter {
  resolveGet(label: string): FlowCall;
  resolvePost(label: string): FlowCall;
}

/** Label that clears the session and redirects to the first step. */
export const RESTART_LABEL = 'start';
