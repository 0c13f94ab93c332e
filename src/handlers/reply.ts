// handlers/reply.ts
import { AppError } from '../types/attendance/error';
import { errorReply } from '../utils/messages';

/** A text the transport should push back. */
export interface Reply {
  to: string;
  text: string;
}

export const reply = (to: string, text: string): Reply[] => [{ to, text }];

export const replyError = (to: string, error: AppError): Reply[] =>
  reply(to, errorReply(error.code));
