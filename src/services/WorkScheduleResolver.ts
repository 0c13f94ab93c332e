// services/WorkScheduleResolver.ts
import { EmployeeRepository, ScheduleRepository } from '../lib/store/AttendanceStore';
import { localDateSchema } from '../schemas/attendance';
import {
  ExceptionalScheduleInput,
  describeIssues,
  exceptionalScheduleSchema,
  workHoursSchema,
} from '../schemas/employee';
import {
  EffectiveHours,
  Employee,
  ExceptionalSchedule,
  LocalDate,
  WorkHours,
} from '../types/attendance';
import { ErrorCode, Result, fail, ok, toAppError } from '../types/attendance/error';
import { Clock, systemClock } from '../utils/dateUtils';
import { Logger, createSilentLogger } from '../utils/logger';

export interface WorkScheduleResolverOptions {
  store: EmployeeRepository & ScheduleRepository;
  defaultHours: WorkHours;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Resolves the hours an employee is expected to work on a given date.
 * Precedence: exceptional schedule, then standard hours, then the configured
 * default. The pair always comes from a single source.
 */
export class WorkScheduleResolver {
  private readonly store: EmployeeRepository & ScheduleRepository;
  private readonly defaultHours: WorkHours;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: WorkScheduleResolverOptions) {
    this.store = options.store;
    this.defaultHours = options.defaultHours;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createSilentLogger('WorkScheduleResolver');
  }

  async effectiveHours(
    employeeId: string,
    date: LocalDate,
  ): Promise<Result<EffectiveHours>> {
    if (!localDateSchema.safeParse(date).success) {
      return fail(ErrorCode.INVALID_SCHEDULE, `Malformed date: ${date}`, {
        date,
      });
    }

    try {
      const exceptional = await this.store.findExceptionalSchedule(employeeId, date);
      if (exceptional) {
        return ok({
          start: exceptional.start,
          end: exceptional.end,
          source: 'exceptional',
        });
      }

      const employee = await this.store.findEmployee(employeeId);
      if (employee) {
        return ok({
          start: employee.standardStart,
          end: employee.standardEnd,
          source: 'standard',
        });
      }

      return ok({ ...this.defaultHours, source: 'default' });
    } catch (error) {
      this.logger.error('Failed to resolve work hours', {
        employeeId,
        date,
        error: toAppError(error).message,
      });
      return { success: false, error: toAppError(error) };
    }
  }

  async setExceptionalSchedule(
    input: ExceptionalScheduleInput,
    authorId: string,
  ): Promise<Result<ExceptionalSchedule>> {
    const parsed = exceptionalScheduleSchema.safeParse(input);
    if (!parsed.success) {
      return fail(ErrorCode.INVALID_SCHEDULE, describeIssues(parsed.error), {
        input,
      });
    }

    try {
      const employee = await this.store.findEmployee(parsed.data.employeeId);
      if (!employee) {
        return fail(
          ErrorCode.NOT_REGISTERED,
          `Employee ${parsed.data.employeeId} is not registered`,
        );
      }

      const saved = await this.store.saveExceptionalSchedule({
        ...parsed.data,
        createdBy: authorId,
        createdAt: this.clock.now(),
      });
      this.logger.info('Exceptional schedule saved', {
        employeeId: saved.employeeId,
        date: saved.date,
        start: saved.start,
        end: saved.end,
        createdBy: authorId,
      });
      return ok(saved);
    } catch (error) {
      return { success: false, error: toAppError(error) };
    }
  }

  async setStandardHours(
    employeeId: string,
    start: string,
    end: string,
  ): Promise<Result<Employee>> {
    const parsed = workHoursSchema.safeParse({ start, end });
    if (!parsed.success) {
      return fail(ErrorCode.INVALID_SCHEDULE, describeIssues(parsed.error), {
        start,
        end,
      });
    }

    try {
      const updated = await this.store.setStandardHours(employeeId, parsed.data);
      if (!updated) {
        return fail(
          ErrorCode.NOT_REGISTERED,
          `Employee ${employeeId} is not registered`,
        );
      }
      this.logger.info('Standard hours updated', { employeeId, start, end });
      return ok(updated);
    } catch (error) {
      return { success: false, error: toAppError(error) };
    }
  }
}
