// NotificationService.ts

import { AdminRepository } from '../lib/store/AttendanceStore';
import { Admin } from '../types/attendance';
import {
  AppError,
  ErrorCode,
  Result,
  ok,
  toAppError,
} from '../types/attendance/error';
import { Logger, createSilentLogger } from '../utils/logger';
import { MessagingTransport } from './LineMessagingTransport';

export type AdminAudience = 'alerts' | 'dailySummary';

export interface NotificationServiceOptions {
  transport: MessagingTransport;
  admins: AdminRepository;
  timeoutMs: number;
  logger?: Logger;
}

export interface BroadcastReport {
  sent: string[];
  failed: { recipientId: string; error: AppError }[];
}

export class NotificationService {
  private readonly transport: MessagingTransport;
  private readonly admins: AdminRepository;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: NotificationServiceOptions) {
    this.transport = options.transport;
    this.admins = options.admins;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? createSilentLogger('NotificationService');
  }

  /**
   * Sends one text. Transport failures, thrown errors and timeouts all come
   * back as DISPATCH_FAILURE.
   */
  async send(recipientId: string, text: string): Promise<Result<void>> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Dispatch timed out after ${this.timeoutMs}ms`)),
        this.timeoutMs,
      );
    });

    try {
      const result = await Promise.race([
        this.transport.send(recipientId, text),
        timeout,
      ]);
      if (!result.success) throw result.error;

      this.logger.debug('Notification sent', { recipientId });
      return ok(undefined);
    } catch (error) {
      const appError = toAppError(error, ErrorCode.DISPATCH_FAILURE);
      this.logger.error('Notification failed', {
        recipientId,
        error: appError.message,
      });
      return {
        success: false,
        error: new AppError({
          code: ErrorCode.DISPATCH_FAILURE,
          message: appError.message,
          details: { recipientId },
          originalError: error,
        }),
      };
    } finally {
      clearTimeout(timer);
    }
  }

  async recipients(audience: AdminAudience): Promise<Admin[]> {
    const admins = await this.admins.listAdmins();
    return admins.filter((admin) =>
      audience === 'alerts' ? admin.alerts : admin.dailySummary,
    );
  }

  /** Sends to every admin subscribed to the audience; one failure does not stop the rest. */
  async notifyAdmins(
    text: string,
    audience: AdminAudience = 'alerts',
  ): Promise<Result<BroadcastReport>> {
    let admins: Admin[];
    try {
      admins = await this.recipients(audience);
    } catch (error) {
      return { success: false, error: toAppError(error) };
    }

    const report: BroadcastReport = { sent: [], failed: [] };
    for (const admin of admins) {
      const result = await this.send(admin.adminId, text);
      if (result.success) {
        report.sent.push(admin.adminId);
      } else {
        report.failed.push({ recipientId: admin.adminId, error: result.error });
      }
    }

    if (report.failed.length > 0) {
      this.logger.warn('Some admin notifications failed', {
        audience,
        sent: report.sent.length,
        failed: report.failed.length,
      });
    }
    return ok(report);
  }
}
