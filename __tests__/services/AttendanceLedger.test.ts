// __tests__/services/AttendanceLedger.test.ts
import {
  buildDailySummary,
  isEarlyDeparture,
  isLateArrival,
  workDurationMinutes,
} from '@/services/Attendance/AttendanceLedger';
import { CheckOutcome, ConversationMode, PendingAttendance } from '@/types/attendance';
import { ErrorCode, Result } from '@/types/attendance/error';
import { formatDuration } from '@/utils/dateUtils';
import { DAY, OFFICE, TZ, TestEngine, at, createTestEngine, employee } from '../helpers/engine';

const pendingOf = (result: Result<CheckOutcome>): PendingAttendance => {
  if (!result.success) throw result.error;
  if (result.data.status !== 'justification-required') {
    throw new Error(`expected a pending outcome, got ${result.data.status}`);
  }
  return result.data.pending;
};

describe('AttendanceLedger', () => {
  let engine: TestEngine;

  const checkInAt = (time: string, employeeId = 'U1') => {
    engine.clock.set(at(time));
    return engine.ledger.checkIn(employeeId, at(time), OFFICE, 0);
  };

  const checkOutAt = (time: string, employeeId = 'U1') => {
    engine.clock.set(at(time));
    return engine.ledger.checkOut(employeeId, at(time), OFFICE, 0);
  };

  beforeEach(async () => {
    engine = createTestEngine();
    await engine.store.saveEmployee(employee('U1', 'Mona'));
    await engine.store.saveEmployee(employee('U2', 'Karim'));
    await engine.store.saveEmployee(employee('U3', 'Salma'));
  });

  describe('classification', () => {
    it('should treat the exact start time as on time', () => {
      expect(isLateArrival(at('09:00'), '09:00', TZ)).toBe(false);
      expect(isLateArrival(at('08:59:59'), '09:00', TZ)).toBe(false);
    });

    it('should treat any second after the start as late', () => {
      expect(isLateArrival(at('09:00:30'), '09:00', TZ)).toBe(true);
      expect(isLateArrival(at('09:01'), '09:00', TZ)).toBe(true);
    });

    it('should treat the exact end time as not early', () => {
      expect(isEarlyDeparture(at('17:00'), '17:00', TZ)).toBe(false);
      expect(isEarlyDeparture(at('16:59:59'), '17:00', TZ)).toBe(true);
    });
  });

  describe('checkIn', () => {
    it('should record an on-time check-in directly', async () => {
      const result = await checkInAt('08:50');

      expect(result.success).toBe(true);
      if (!result.success || result.data.status !== 'recorded') return;
      expect(result.data.session).toMatchObject({
        employeeId: 'U1',
        date: DAY,
        isLate: false,
        lateReason: null,
        status: 'open',
        scheduledStart: '09:00',
        scheduledEnd: '17:00',
      });
      expect(await engine.store.findConversation('U1')).toBeNull();
    });

    it('should hold a late check-in until a reason arrives', async () => {
      const result = await checkInAt('09:01');

      expect(result.success && result.data.status).toBe('justification-required');
      expect(await engine.store.findOpenSession('U1', DAY)).toBeNull();

      const state = await engine.store.findConversation('U1');
      expect(state?.mode).toBe(ConversationMode.AwaitingLateReason);
      expect(state?.expiresAt).toEqual(at('09:31'));
    });

    it('should reject a second check-in while a session is open', async () => {
      await checkInAt('08:50');
      const second = await checkInAt('08:55');

      expect(second.success).toBe(false);
      if (second.success) return;
      expect(second.error.code).toBe(ErrorCode.ALREADY_OPEN_SESSION);
    });

    it('should let exactly one of two concurrent check-ins through', async () => {
      engine.clock.set(at('08:50'));
      const results = await Promise.all([
        engine.ledger.checkIn('U1', at('08:50'), OFFICE, 0),
        engine.ledger.checkIn('U1', at('08:50'), OFFICE, 0),
      ]);

      expect(results.filter((result) => result.success)).toHaveLength(1);
      const failure = results.find((result) => !result.success);
      expect(failure && !failure.success && failure.error.code).toBe(
        ErrorCode.ALREADY_OPEN_SESSION,
      );
      expect(await engine.store.listSessionsForDay('U1', DAY)).toHaveLength(1);
    });

    it('should refuse unknown and inactive employees', async () => {
      const stranger = await checkInAt('08:50', 'U-unknown');
      expect(!stranger.success && stranger.error.code).toBe(ErrorCode.NOT_REGISTERED);

      await engine.store.setEmployeeActive('U2', false);
      const inactive = await checkInAt('08:50', 'U2');
      expect(!inactive.success && inactive.error.code).toBe(ErrorCode.NOT_REGISTERED);
    });

    it('should classify against an exceptional schedule', async () => {
      await engine.resolver.setExceptionalSchedule(
        { employeeId: 'U1', date: DAY, start: '10:00', end: '14:00' },
        'A1',
      );
      const result = await checkInAt('09:30');

      expect(result.success && result.data.status).toBe('recorded');
      if (!result.success || result.data.status !== 'recorded') return;
      expect(result.data.session.scheduledStart).toBe('10:00');
    });

    it('should report STORE_UNAVAILABLE when the store fails', async () => {
      jest.spyOn(engine.store, 'findEmployee').mockRejectedValueOnce(new Error('socket closed'));

      const result = await checkInAt('08:50');
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe(ErrorCode.STORE_UNAVAILABLE);
      expect(result.error.message).toBe('socket closed');
    });
  });

  describe('checkOut', () => {
    it('should require an open session', async () => {
      const result = await checkOutAt('17:10');
      expect(!result.success && result.error.code).toBe(ErrorCode.NO_OPEN_SESSION);
    });

    it('should reject a check-out that is not after the check-in', async () => {
      await checkInAt('08:50');
      const result = await checkOutAt('08:50');
      expect(!result.success && result.error.code).toBe(ErrorCode.INVALID_EVENT_TIME);
    });

    it('should close on time without asking for a reason', async () => {
      await checkInAt('08:50');
      const result = await checkOutAt('17:00');

      expect(result.success).toBe(true);
      if (!result.success || result.data.status !== 'recorded') return;
      expect(result.data.session.status).toBe('closed');
      expect(result.data.session.isEarly).toBe(false);
      expect(workDurationMinutes(result.data.session)).toBe(490);
    });

    it('should not find a session opened on the previous local day', async () => {
      await checkInAt('08:50');
      engine.clock.set(at('00:30', '2024-01-16'));
      const result = await engine.ledger.checkOut('U1', at('00:30', '2024-01-16'), OFFICE, 0);
      expect(!result.success && result.error.code).toBe(ErrorCode.NO_OPEN_SESSION);
    });
  });

  describe('finalize', () => {
    it('should record a late arrival and an early departure with their reasons', async () => {
      const lateIn = pendingOf(await checkInAt('09:15'));
      const opened = await engine.ledger.finalizeCheckIn('U1', lateIn, 'traffic');
      expect(opened.success).toBe(true);
      if (!opened.success) return;
      expect(opened.data).toMatchObject({ isLate: true, lateReason: 'traffic', status: 'open' });
      expect(opened.data.checkIn.time).toEqual(at('09:15'));

      const earlyOut = pendingOf(await checkOutAt('16:40'));
      expect(earlyOut.sessionId).toBe(opened.data.id);
      const closed = await engine.ledger.finalizeCheckOut('U1', earlyOut, 'doctor');

      expect(closed.success).toBe(true);
      if (!closed.success) return;
      expect(closed.data).toMatchObject({
        isLate: true,
        lateReason: 'traffic',
        isEarly: true,
        earlyReason: 'doctor',
        status: 'closed',
      });
      expect(workDurationMinutes(closed.data)).toBe(445);
      expect(formatDuration(445)).toBe('7h 25m');
      expect(await engine.store.findConversation('U1')).toBeNull();
    });

    it('should trim the reason and reject a blank one', async () => {
      const pending = pendingOf(await checkInAt('09:15'));

      const blank = await engine.ledger.finalizeCheckIn('U1', pending, '   ');
      expect(!blank.success && blank.error.code).toBe(ErrorCode.INVALID_REASON);

      const written = await engine.ledger.finalizeCheckIn('U1', pending, '  bus strike ');
      expect(written.success && written.data.lateReason).toBe('bus strike');
    });

    it('should report nothing pending before looking at a blank reason', async () => {
      const stale = pendingOf(await checkInAt('09:15'));
      await engine.ledger.abort('U1');

      const result = await engine.ledger.finalizeCheckIn('U1', stale, '  ');
      expect(!result.success && result.error.code).toBe(ErrorCode.NO_PENDING_ACTION);
    });

    it('should consume the pending entry once', async () => {
      const pending = pendingOf(await checkInAt('09:15'));
      await engine.ledger.finalizeCheckIn('U1', pending, 'traffic');

      const again = await engine.ledger.finalizeCheckIn('U1', pending, 'traffic');
      expect(!again.success && again.error.code).toBe(ErrorCode.NO_PENDING_ACTION);
    });

    it('should refuse an expired pending entry', async () => {
      const pending = pendingOf(await checkInAt('09:15'));
      engine.clock.set(at('09:45'));

      const result = await engine.ledger.finalizeCheckIn('U1', pending, 'traffic');
      expect(!result.success && result.error.code).toBe(ErrorCode.NO_PENDING_ACTION);
      expect(await engine.store.findOpenSession('U1', DAY)).toBeNull();
    });

    it('should refuse a payload of the other kind', async () => {
      const pending = pendingOf(await checkInAt('09:15'));
      const result = await engine.ledger.finalizeCheckOut('U1', pending, 'traffic');
      expect(!result.success && result.error.code).toBe(ErrorCode.NO_PENDING_ACTION);
    });

    it('should keep only the most recent pending request', async () => {
      const first = pendingOf(await checkInAt('09:15'));
      const second = pendingOf(await checkInAt('09:20'));

      const stale = await engine.ledger.finalizeCheckIn('U1', first, 'traffic');
      expect(!stale.success && stale.error.code).toBe(ErrorCode.NO_PENDING_ACTION);

      const fresh = await engine.ledger.finalizeCheckIn('U1', second, 'traffic');
      expect(fresh.success && fresh.data.checkIn.time).toEqual(at('09:20'));
    });

    it('should drop the pending entry when the write loses a race', async () => {
      const pending = pendingOf(await checkInAt('09:15'));
      await engine.store.insertOpenSession({
        employeeId: 'U1',
        date: DAY,
        checkIn: { time: at('09:16'), location: OFFICE, distance: 0 },
        isLate: false,
        lateReason: null,
        scheduledStart: '09:00',
        scheduledEnd: '17:00',
      });

      const result = await engine.ledger.finalizeCheckIn('U1', pending, 'traffic');
      expect(!result.success && result.error.code).toBe(ErrorCode.ALREADY_OPEN_SESSION);
      expect(await engine.store.findConversation('U1')).toBeNull();
    });
  });

  describe('superseded pending entries', () => {
    it('should clear a pending late check-in once an on-time one is recorded', async () => {
      const stale = pendingOf(await checkInAt('09:15'));
      await engine.resolver.setExceptionalSchedule(
        { employeeId: 'U1', date: DAY, start: '10:00', end: '17:00', reason: 'clinic' },
        'A1',
      );

      const recorded = await checkInAt('09:20');
      expect(recorded.success && recorded.data.status).toBe('recorded');
      expect(await engine.ledger.pending('U1')).toEqual({ success: true, data: null });

      const late = await engine.ledger.finalizeCheckIn('U1', stale, 'traffic');
      expect(!late.success && late.error.code).toBe(ErrorCode.NO_PENDING_ACTION);
    });

    it('should clear a pending early check-out once a regular one is recorded', async () => {
      await checkInAt('08:50');
      const stale = pendingOf(await checkOutAt('16:40'));

      const recorded = await checkOutAt('17:05');
      expect(recorded.success && recorded.data.status).toBe('recorded');
      expect(await engine.ledger.pending('U1')).toEqual({ success: true, data: null });

      const early = await engine.ledger.finalizeCheckOut('U1', stale, 'doctor');
      expect(!early.success && early.error.code).toBe(ErrorCode.NO_PENDING_ACTION);

      const status = await engine.ledger.status('U1', DAY);
      expect(status.success && status.data).toMatchObject({
        status: 'closed',
        isEarly: false,
        earlyReason: null,
      });
      expect(status.success && status.data?.checkOut?.time).toEqual(at('17:05'));
    });
  });

  describe('pending and abort', () => {
    it('should read an expired entry as nothing pending', async () => {
      await checkInAt('09:15');
      const live = await engine.ledger.pending('U1', at('09:44'));
      expect(live.success && live.data?.payload.kind).toBe('check-in');

      const expired = await engine.ledger.pending('U1', at('09:45'));
      expect(expired).toEqual({ success: true, data: null });
    });

    it('should remove the pending entry on abort', async () => {
      await checkInAt('09:15');
      expect(await engine.ledger.abort('U1')).toEqual({ success: true, data: true });
      expect(await engine.ledger.abort('U1')).toEqual({ success: true, data: false });
    });
  });

  describe('status and history', () => {
    it('should return the open session, then the last closed one', async () => {
      expect(await engine.ledger.status('U1', DAY)).toEqual({ success: true, data: null });

      await checkInAt('08:50');
      const open = await engine.ledger.status('U1', DAY);
      expect(open.success && open.data?.status).toBe('open');

      await checkOutAt('17:05');
      const closed = await engine.ledger.status('U1', DAY);
      expect(closed.success && closed.data?.status).toBe('closed');
    });

    it('should reject a malformed date', async () => {
      const result = await engine.ledger.status('U1', '2024-1-5');
      expect(!result.success && result.error.code).toBe(ErrorCode.INVALID_SCHEDULE);
    });

    it('should list history newest first and clamp the limit', async () => {
      for (const date of ['2024-01-13', '2024-01-14', DAY]) {
        engine.clock.set(at('08:45', date));
        await engine.ledger.checkIn('U1', at('08:45', date), OFFICE, 0);
      }

      const all = await engine.ledger.history('U1', 10);
      expect(all.success && all.data.map((session) => session.date)).toEqual([
        DAY,
        '2024-01-14',
        '2024-01-13',
      ]);

      const one = await engine.ledger.history('U1', 0);
      expect(one.success && one.data.map((session) => session.date)).toEqual([DAY]);
    });
  });

  describe('dailySummary', () => {
    it('should count presence, lateness and absence', async () => {
      const lateIn = pendingOf(await checkInAt('09:15', 'U1'));
      await engine.ledger.finalizeCheckIn('U1', lateIn, 'traffic');
      await checkInAt('08:55', 'U2');
      const earlyOut = pendingOf(await checkOutAt('16:40', 'U1'));
      await engine.ledger.finalizeCheckOut('U1', earlyOut, 'doctor');

      const result = await engine.ledger.dailySummary(DAY);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data).toEqual({
        date: DAY,
        totalEmployees: 3,
        checkedIn: 2,
        checkedOut: 1,
        stillWorking: 1,
        lateCount: 1,
        earlyCount: 1,
        late: [{ employeeId: 'U1', name: 'Mona', time: at('09:15'), reason: 'traffic' }],
        early: [{ employeeId: 'U1', name: 'Mona', time: at('16:40'), reason: 'doctor' }],
        absent: [{ employeeId: 'U3', name: 'Salma' }],
        attendanceRate: 66.7,
      });
    });

    it('should leave sessions of deactivated employees out of every count', async () => {
      await checkInAt('08:50', 'U2');
      await engine.store.setEmployeeActive('U2', false);

      const result = await engine.ledger.dailySummary(DAY);

      expect(result).toEqual({
        success: true,
        data: {
          date: DAY,
          totalEmployees: 2,
          checkedIn: 0,
          checkedOut: 0,
          stillWorking: 0,
          lateCount: 0,
          earlyCount: 0,
          late: [],
          early: [],
          absent: [
            { employeeId: 'U1', name: 'Mona' },
            { employeeId: 'U3', name: 'Salma' },
          ],
          attendanceRate: 0,
        },
      });
    });

    it('should leave inactive employees out of the rate', () => {
      const inactive = { ...employee('U9', 'Omar'), active: false };
      const summary = buildDailySummary(DAY, [employee('U1', 'Mona'), inactive], []);

      expect(summary.totalEmployees).toBe(1);
      expect(summary.absent).toEqual([{ employeeId: 'U1', name: 'Mona' }]);
      expect(summary.attendanceRate).toBe(0);
    });

    it('should report a zero rate with no active employees', () => {
      expect(buildDailySummary(DAY, [], []).attendanceRate).toBe(0);
    });
  });
});
