import { z } from 'zod';

export const ACCOUNT_TYPES = ['personal', 'business'] as const;

export type AccountType = (typeof ACCOUNT_TYPES)[number];

export const AccountTypeFormSchema = z
  .object({ accountType: z.enum(ACCOUNT_TYPES) })
  .transform((form) => form.accountType);

export const PersonalDetailsSchema = z.object({
  fullName: z.string().trim().min(1),
  age: z.coerce.number().int().min(16).max(130),
});

export type PersonalDetails = z.infer<typeof PersonalDetailsSchema>;

export const CompanyDetailsSchema = z.object({
  companyName: z.string().trim().min(1),
  registrationNumber: z
    .string()
    .trim()
    .toUpperCase()
    .regex(/^[A-Z0-9]{6,10}$/, 'Registration number must be 6 to 10 letters or digits'),
});

export type CompanyDetails = z.infer<typeof CompanyDetailsSchema>;

export const ContactFormSchema = z
  .object({ email: z.string().trim().email() })
  .transform((form) => form.email);

export const ConfirmFormSchema = z.object({
  confirm: z.enum(['yes', 'no']),
});
