import { isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import { fromZodError, ok, fail, Result } from '../errors';

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : null));

const optionalEmail = z
  .string()
  .trim()
  .optional()
  .refine((v) => !v || z.string().email().safeParse(v).success, { message: 'Invalid email address' })
  .transform((v) => (v ? v : null));

const base64Image = z
  .string()
  .optional()
  .transform((v, ctx) => {
    if (!v) return null;
    const raw = v.replace(/^data:[^;]+;base64,/, '');
    if (!/^[A-Za-z0-9+/=\s]+$/.test(raw)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected base64 encoded image' });
      return z.NEVER;
    }
    return Buffer.from(raw, 'base64');
  });

const money = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number` }).finite().min(0, `${label} must not be negative`);

const isoDateOnly = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected date as YYYY-MM-DD')
  .refine((v) => isValid(parseISO(v)), { message: 'Invalid date' });

const isoTimestamp = z
  .string()
  .refine((v) => isValid(parseISO(v)), { message: 'Invalid timestamp' })
  .transform((v) => parseISO(v));

export const employeeRegistrationSchema = z.object({
  employeeId: z.string().trim().min(1).max(64).optional(),
  fullName: z.string({ required_error: 'fullName is required' }).trim().min(1, 'fullName is required'),
  contactNumber: optionalText,
  email: optionalEmail,
  aadhar: optionalText,
  dob: isoDateOnly.optional().transform((v) => v ?? null),
  address: optionalText,
  photo: base64Image,
  aadharPhoto: base64Image,
  signaturePhoto: base64Image,
  role: z.enum(['CEO', 'Employee']).default('Employee'),
  password: z.string({ required_error: 'password is required' }).min(1, 'password is required')
});
export type EmployeeRegistration = z.input<typeof employeeRegistrationSchema>;

export const assignmentSchema = z.object({
  clientId: z.string({ required_error: 'clientId is required' }).trim().min(1, 'clientId is required'),
  ratePerHour: money('ratePerHour')
});
export type AssignmentInput = z.input<typeof assignmentSchema>;

export const clientRegistrationSchema = z.object({
  clientId: z.string().trim().min(1).max(64).optional(),
  orgName: z.string({ required_error: 'orgName is required' }).trim().min(1, 'orgName is required'),
  description: optionalText,
  requirements: optionalText,
  companyContact: optionalText,
  companyEmail: optionalEmail,
  personInChargeName: optionalText,
  personInChargePhone: optionalText,
  personInChargeEmail: optionalEmail,
  companyType: z.enum(['GEM', 'NON-GEM']).optional().transform((v) => v ?? null),
  totalBill: money('totalBill')
});
export type ClientRegistration = z.input<typeof clientRegistrationSchema>;

export const installmentSchema = z.object({
  amount: money('amount')
});

export const checkInSchema = z.object({
  location: z.string({ required_error: 'location is required' }).trim().min(1, 'location is required'),
  selfie: z
    .string({ required_error: 'A selfie is required to check in' })
    .min(1, 'A selfie is required to check in')
    .pipe(base64Image)
});

export const checkOutSchema = z.object({
  location: z.string({ required_error: 'location is required' }).trim().min(1, 'location is required')
});

export const loginSchema = z.object({
  employeeId: z.string().min(1),
  password: z.string().min(1)
});

export const periodQuerySchema = z
  .object({
    start: isoTimestamp.optional(),
    end: isoTimestamp.optional()
  })
  .refine((p) => !p.start || !p.end || p.start.getTime() < p.end.getTime(), {
    message: 'start must be before end'
  });

export const payslipEmailSchema = z.object({
  to: z.string().trim().email('Invalid email address').optional(),
  subject: z.string().optional(),
  text: z.string().optional()
});

export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): Result<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) return fail(fromZodError(parsed.error));
  return ok(parsed.data);
}
