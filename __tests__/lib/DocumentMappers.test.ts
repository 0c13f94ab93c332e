// __tests__/lib/DocumentMappers.test.ts
import { DocumentMappers } from '@/lib/store/DocumentMappers';
import { isDuplicateKeyError } from '@/lib/store/MongoAttendanceStore';
import { ConversationMode, ConversationState } from '@/types/attendance';
import { DAY, OFFICE, at } from '../helpers/engine';

describe('DocumentMappers', () => {
  it('should drop null optional fields on employees', () => {
    const employee = DocumentMappers.toEmployee({
      employeeId: 'U1',
      name: 'Mona',
      phone: null,
      standardStart: '09:00',
      standardEnd: '17:00',
      active: true,
      registeredAt: at('08:00'),
    });

    expect(employee.phone).toBeUndefined();
    expect(employee.registeredAt).toEqual(at('08:00'));
  });

  it('should map a session document with its string id', () => {
    const session = DocumentMappers.toSession({
      _id: { toString: () => '65a4f0c2e4b0a1b2c3d4e5f6' },
      employeeId: 'U1',
      date: DAY,
      checkIn: { time: at('09:15'), latitude: OFFICE.latitude, longitude: OFFICE.longitude, distance: 12.5 },
      checkOut: null,
      isLate: true,
      isEarly: false,
      lateReason: 'traffic',
      earlyReason: null,
      status: 'open',
      scheduledStart: '09:00',
      scheduledEnd: '17:00',
    });

    expect(session).toEqual({
      id: '65a4f0c2e4b0a1b2c3d4e5f6',
      employeeId: 'U1',
      date: DAY,
      checkIn: { time: at('09:15'), location: OFFICE, distance: 12.5 },
      checkOut: null,
      isLate: true,
      isEarly: false,
      lateReason: 'traffic',
      earlyReason: null,
      status: 'open',
      scheduledStart: '09:00',
      scheduledEnd: '17:00',
    });
  });

  it('should flatten a pending check-out and restore it', () => {
    const state: ConversationState = {
      employeeId: 'U1',
      mode: ConversationMode.AwaitingEarlyReason,
      payload: {
        kind: 'check-out',
        employeeId: 'U1',
        date: DAY,
        event: { time: at('16:40'), location: OFFICE, distance: 3 },
        hours: { start: '09:00', end: '17:00', source: 'standard' },
        sessionId: 'session-1',
      },
      expiresAt: at('17:10'),
      createdAt: at('16:40'),
    };

    const doc = DocumentMappers.fromConversation(state);
    expect(doc.mode).toBe('AwaitingEarlyReason');
    expect(doc.payload).toEqual({
      kind: 'check-out',
      date: DAY,
      event: { time: at('16:40'), latitude: OFFICE.latitude, longitude: OFFICE.longitude, distance: 3 },
      hoursStart: '09:00',
      hoursEnd: '17:00',
      hoursSource: 'standard',
      sessionId: 'session-1',
    });

    expect(DocumentMappers.toConversation(doc)).toEqual(state);
  });

  it('should leave sessionId out of a pending check-in', () => {
    const doc = DocumentMappers.fromConversation({
      employeeId: 'U1',
      mode: ConversationMode.AwaitingLateReason,
      payload: {
        kind: 'check-in',
        employeeId: 'U1',
        date: DAY,
        event: { time: at('09:15'), location: OFFICE, distance: 0 },
        hours: { start: '09:00', end: '17:00', source: 'default' },
      },
      expiresAt: at('09:45'),
      createdAt: at('09:15'),
    });

    expect('sessionId' in doc.payload).toBe(false);
    expect(DocumentMappers.toConversation(doc).mode).toBe(ConversationMode.AwaitingLateReason);
  });
});

describe('isDuplicateKeyError', () => {
  it('should recognise the duplicate key code only', () => {
    expect(isDuplicateKeyError({ code: 11000 })).toBe(true);
    expect(isDuplicateKeyError({ code: 121 })).toBe(false);
    expect(isDuplicateKeyError(new Error('E11000'))).toBe(false);
    expect(isDuplicateKeyError(null)).toBe(false);
  });
});
