// schemas/employee.ts
import { z } from 'zod';
import { localDateSchema, timeOfDaySchema } from './attendance';

export const workHoursSchema = z
  .object({
    start: timeOfDaySchema,
    end: timeOfDaySchema,
  })
  .refine((hours) => hours.start < hours.end, {
    message: 'Work start must be before work end',
    path: ['end'],
  });

export const exceptionalScheduleSchema = z
  .object({
    employeeId: z.string().trim().min(1, 'Employee ID is required'),
    date: localDateSchema,
    start: timeOfDaySchema,
    end: timeOfDaySchema,
    reason: z.string().trim().default(''),
  })
  .refine((schedule) => schedule.start < schedule.end, {
    message: 'Work start must be before work end',
    path: ['end'],
  });

export type ExceptionalScheduleInput = z.input<typeof exceptionalScheduleSchema>;

/** Flattens zod issues into one line for error messages. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}
