import type { SessionEntries } from '@waypoint/engine';

/** One completed session per branch, walked by the boot-time label check. */
export const SIGNUP_SAMPLES: readonly SessionEntries[] = [
  {
    'account-type': 'personal',
    'personal-details': '{"fullName":"Sample Person","age":30}',
    contact: 'sample@example.com',
  },
  {
    'account-type': 'business',
    'company-details': '{"companyName":"Sample Company","registrationNumber":"SC123456"}',
    contact: 'sample@example.com',
  },
];
