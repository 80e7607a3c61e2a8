import {
  bind,
  booleanCodec,
  enumCodec,
  jsonCodec,
  map,
  respond,
  step,
  stringCodec,
  Workflow,
} from '@waypoint/engine';
import { map as mapEach } from 'rxjs';
import { formWorkflow, toFieldErrors, viewFor } from '../flow/form-step';
import { FlowHttpRequest, FlowView } from '../flow/flow.types';
import { CompanyDirectoryService } from './company-directory.service';
import {
  ACCOUNT_TYPES,
  AccountType,
  AccountTypeFormSchema,
  CompanyDetails,
  CompanyDetailsSchema,
  ConfirmFormSchema,
  ContactFormSchema,
  PersonalDetails,
  PersonalDetailsSchema,
} from './signup.schemas';

export type SignupDetails =
  | ({ kind: 'personal' } & PersonalDetails)
  | ({ kind: 'business' } & CompanyDetails);

export type SignupSummary = {
  accountType: AccountType;
  details: SignupDetails;
  email: string;
};

type SignupWorkflow<T> = Workflow<T, FlowHttpRequest, FlowView>;

const personalDetails = (): SignupWorkflow<SignupDetails> =>
  map(
    formWorkflow(
      {
        label: 'personal-details',
        schema: PersonalDetailsSchema,
        prompt: 'Tell us your full name and age.',
      },
      jsonCodec(PersonalDetailsSchema),
    ),
    (details): SignupDetails => ({ kind: 'personal', ...details }),
  );

// The lookup channel answers each typed prefix with the matching companies as JSON.
const companyDetails = (directory: CompanyDirectoryService): SignupWorkflow<SignupDetails> =>
  map(
    formWorkflow(
      {
        label: 'company-details',
        schema: CompanyDetailsSchema,
        prompt: 'Which company is the account for?',
        stream: async () => (incoming) => incoming.pipe(mapEach((query) => JSON.stringify(directory.search(query)))),
      },
      jsonCodec(CompanyDetailsSchema),
    ),
    (details): SignupDetails => ({ kind: 'business', ...details }),
  );

/** Last page of the flow. It only ever responds, so the workflow never runs past it. */
const review = (summary: SignupSummary): SignupWorkflow<boolean> =>
  step<boolean, FlowHttpRequest, FlowView>(
    'review',
    {
      render: async (ctx) =>
        viewFor('review', ctx, { userMessage: 'Check your details and confirm.', values: summary }),
      process: async (ctx, request) => {
        const parsed = ConfirmFormSchema.safeParse(request.body);
        if (!parsed.success) {
          return respond(
            viewFor('review', ctx, {
              status: 'invalid',
              userMessage: 'Check your details and confirm.',
              values: summary,
              errors: toFieldErrors(parsed.error),
            }),
          );
        }
        if (parsed.data.confirm === 'no') {
          return respond(
            viewFor('review', ctx, {
              userMessage: 'Nothing was submitted. Go back or restart to change your details.',
              values: summary,
            }),
          );
        }
        return respond(
          viewFor('review', ctx, { status: 'completed', userMessage: 'Your account has been created.', values: summary }),
        );
      },
    },
    booleanCodec,
  );

export const buildSignupWorkflow = (directory: CompanyDirectoryService): SignupWorkflow<boolean> =>
  bind(
    formWorkflow(
      {
        label: 'account-type',
        schema: AccountTypeFormSchema,
        prompt: 'Is this account for you or for a business?',
        toValues: (accountType) => ({ accountType }),
      },
      enumCodec(ACCOUNT_TYPES),
    ),
    (accountType) =>
      bind(accountType === 'personal' ? personalDetails() : companyDetails(directory), (details) =>
        bind(
          formWorkflow(
            {
              label: 'contact',
              schema: ContactFormSchema,
              prompt: 'Where can we reach you?',
              toValues: (email) => ({ email }),
            },
            stringCodec,
          ),
          (email) => review({ accountType, details, email }),
        ),
      ),
  );
