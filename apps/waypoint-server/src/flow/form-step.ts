import { advance, Codec, respond, step, Step, StepContext, Workflow } from '@waypoint/engine';
import { z } from 'zod';
import { FlowFieldError, FlowHttpRequest, FlowView } from './flow.types';

export type FormStepOptions<A> = {
  label: string;
  /** Parses the submitted body into the value stored for the step. */
  schema: z.ZodType<A, z.ZodTypeDef, unknown>;
  prompt: string;
  /** Shapes the stored value for prefilling the form on a revisit. */
  toValues?: (value: A) => unknown;
  stream?: Step<A, FlowHttpRequest, FlowView>['stream'];
};

export const viewFor = <A>(label: string, ctx: StepContext<A>, patch: Partial<FlowView>): FlowView => ({
  status: 'input_required',
  step: label,
  action: ctx.current,
  back: ctx.previous,
  restart: ctx.restart,
  ...patch,
});

export const toFieldErrors = (error: z.ZodError): FlowFieldError[] =>
  error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));

/** A step that shows a prompt on GET and validates the POST body with a zod schema. */
export const formStep = <A>(options: FormStepOptions<A>): Step<A, FlowHttpRequest, FlowView> => ({
  render: async (ctx) =>
    viewFor(options.label, ctx, {
      userMessage: options.prompt,
      values:
        ctx.storedValue === undefined
          ? undefined
          : options.toValues
            ? options.toValues(ctx.storedValue)
            : ctx.storedValue,
    }),
  process: async (ctx, request) => {
    const parsed = options.schema.safeParse(request.body);
    if (parsed.success) {
      return advance(parsed.data);
    }
    return respond(
      viewFor(options.label, ctx, {
        status: 'invalid',
        userMessage: options.prompt,
        values: request.body,
        errors: toFieldErrors(parsed.error),
      }),
    );
  },
  stream: options.stream,
});

export const formWorkflow = <A>(
  options: FormStepOptions<A>,
  codec: Codec<A>,
): Workflow<A, FlowHttpRequest, FlowView> => step(options.label, formStep(options), codec);
