// services/scheduler/NotificationScheduler.ts
import { AttendanceStore } from '../../lib/store/AttendanceStore';
import { Clock, minutesOfDay, systemClock, toLocalDate } from '../../utils/dateUtils';
import { Logger, createSilentLogger, describeError } from '../../utils/logger';
import { justificationExpired } from '../../utils/messages';
import { ConversationStateMachine } from '../Attendance/ConversationStateMachine';
import { NotificationService } from '../NotificationService';
import { NotificationRule, RuleContext } from './rules';

export interface NotificationSchedulerOptions {
  rules: NotificationRule[];
  store: AttendanceStore;
  conversations: ConversationStateMachine;
  notifications: NotificationService;
  timezone: string;
  tickSeconds: number;
  clock?: Clock;
  logger?: Logger;
}

export interface TickReport {
  skipped: boolean;
  expired: number;
  sent: number;
  failed: number;
}

const emptyReport = (skipped: boolean): TickReport => ({
  skipped,
  expired: 0,
  sent: 0,
  failed: 0,
});

/**
 * Evaluates the rule table on a fixed tick. A (rule, subject, date) record is
 * written after each successful dispatch, so repeated or late ticks neither
 * duplicate nor miss a notification inside its window.
 */
export class NotificationScheduler {
  private readonly rules: NotificationRule[];
  private readonly store: AttendanceStore;
  private readonly conversations: ConversationStateMachine;
  private readonly notifications: NotificationService;
  private readonly timezone: string;
  private readonly tickMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private timer: NodeJS.Timeout | null = null;
  private current: Promise<TickReport> | null = null;

  constructor(options: NotificationSchedulerOptions) {
    this.rules = options.rules;
    this.store = options.store;
    this.conversations = options.conversations;
    this.notifications = options.notifications;
    this.timezone = options.timezone;
    this.tickMs = options.tickSeconds * 1000;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createSilentLogger('NotificationScheduler');
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.logger.info('Scheduler started', {
      tickSeconds: this.tickMs / 1000,
      rules: this.rules.map((rule) => rule.id),
    });
    this.timer = setInterval(() => this.runScheduledTick(), this.tickMs);
    this.runScheduledTick();
  }

  /** Stops the loop and waits for a tick already in progress. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.current) {
      await this.current;
    }
    this.logger.info('Scheduler stopped');
  }

  /** Runs one tick now; resolves with `skipped` when one is already running. */
  async tick(now: Date = this.clock.now()): Promise<TickReport> {
    if (this.current) {
      this.logger.warn('Previous tick still running, skipping');
      return emptyReport(true);
    }

    const run = this.evaluate(now);
    this.current = run;
    try {
      return await run;
    } finally {
      this.current = null;
    }
  }

  private runScheduledTick(): void {
    void this.tick().then(
      (report) => {
        if (report.sent > 0 || report.failed > 0 || report.expired > 0) {
          this.logger.info('Tick completed', { ...report });
        }
      },
      (error: unknown) => {
        this.logger.error('Tick failed', { error: describeError(error) });
      },
    );
  }

  private async evaluate(now: Date): Promise<TickReport> {
    const report = emptyReport(false);
    report.expired = await this.sweepExpired(now);

    const context: RuleContext = {
      now,
      date: toLocalDate(now, this.timezone),
      minuteOfDay: minutesOfDay(now, this.timezone),
    };

    for (const rule of this.rules) {
      try {
        if (!rule.isActive(context)) continue;
        const subjects = await rule.subjects(context);

        for (const subject of subjects) {
          try {
            if (await this.store.hasNotification(rule.id, subject.subjectId, subject.date)) {
              continue;
            }

            const message = await subject.compose();
            const result = await subject.deliver(message);
            if (!result.success) {
              report.failed += 1;
              this.logger.warn('Dispatch failed', {
                ruleId: rule.id,
                subjectId: subject.subjectId,
                error: result.error.message,
              });
              continue;
            }

            await this.store.saveNotification({
              ruleId: rule.id,
              subjectId: subject.subjectId,
              date: subject.date,
              message,
              sentAt: now,
            });
            report.sent += 1;
          } catch (error) {
            report.failed += 1;
            this.logger.error('Rule subject failed', {
              ruleId: rule.id,
              subjectId: subject.subjectId,
              error: describeError(error),
            });
          }
        }
      } catch (error) {
        this.logger.error('Rule evaluation failed', {
          ruleId: rule.id,
          error: describeError(error),
        });
      }
    }

    return report;
  }

  /** Expired justifications are discarded and the employee is told once. */
  private async sweepExpired(now: Date): Promise<number> {
    const swept = await this.conversations.sweepExpired(now);
    if (!swept.success) {
      this.logger.error('Expiry sweep failed', { error: swept.error.message });
      return 0;
    }

    for (const state of swept.data) {
      const sent = await this.notifications.send(
        state.employeeId,
        justificationExpired(state.payload, this.timezone),
      );
      if (!sent.success) {
        this.logger.warn('Could not notify employee of discarded event', {
          employeeId: state.employeeId,
        });
      }
    }
    return swept.data.length;
  }
}
