import { Response } from 'express';
import { ZodError } from 'zod';

export type LedgerError =
  | { kind: 'NotFound'; entity: 'employee' | 'client'; id: string }
  | { kind: 'NoOpenSession'; employeeId: string }
  | { kind: 'ValidationError'; issues: string[] };

export type Result<T> = { ok: true; value: T } | { ok: false; error: LedgerError };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });
export const fail = <T = never>(error: LedgerError): Result<T> => ({ ok: false, error });

export const notFound = (entity: 'employee' | 'client', id: string): LedgerError => ({ kind: 'NotFound', entity, id });
export const invalid = (...issues: string[]): LedgerError => ({ kind: 'ValidationError', issues });

export function fromZodError(err: ZodError): LedgerError {
  return invalid(...err.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)));
}

export function describeError(error: LedgerError): string {
  switch (error.kind) {
    case 'NotFound':
      return `${error.entity === 'employee' ? 'Employee' : 'Client'} ${error.id} not found`;
    case 'NoOpenSession':
      return 'No check-in record found. Please check in first.';
    case 'ValidationError':
      return error.issues[0] ?? 'Invalid input';
  }
}

export function statusFor(error: LedgerError): number {
  switch (error.kind) {
    case 'NotFound':
      return 404;
    case 'NoOpenSession':
      return 409;
    case 'ValidationError':
      return 400;
  }
}

export function sendError(res: Response, error: LedgerError) {
  return res.status(statusFor(error)).json({ message: describeError(error), ...error });
}
