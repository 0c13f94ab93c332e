// handlers/lineEvents.ts
import { WebhookEvent } from '@line/bot-sdk';
import { InboundEvent } from '../schemas/attendance';

const ADMIN_PREFIX = '/';
const REGISTER_PREFIX = 'register ';

export type LineMessage =
  | { kind: 'text'; text: string }
  | { kind: 'location'; latitude: number; longitude: number };

/**
 * Text starting with "/" is an admin command, "register <phone> <name>"
 * shares a contact, a location is a check-in or check-out.
 */
export function toInboundEvent(
  userId: string,
  timestamp: number,
  message: LineMessage,
): InboundEvent {
  if (message.kind === 'location') {
    return {
      type: 'LocationShared',
      employeeId: userId,
      lat: message.latitude,
      lon: message.longitude,
      time: new Date(timestamp),
    };
  }

  const text = message.text.trim();
  if (text.startsWith(ADMIN_PREFIX)) {
    const [name = '', ...args] = text.slice(ADMIN_PREFIX.length).split(/\s+/);
    return { type: 'AdminCommand', adminId: userId, name: name.toLowerCase(), args };
  }

  if (text.toLowerCase().startsWith(REGISTER_PREFIX)) {
    const [phone = '', ...name] = text.slice(REGISTER_PREFIX.length).trim().split(/\s+/);
    return { type: 'ContactShared', employeeId: userId, phone, name: name.join(' ') };
  }

  return { type: 'TextReceived', employeeId: userId, text };
}

/** Maps a LINE webhook event onto an engine event; null for anything else. */
export function fromLineEvent(event: WebhookEvent): InboundEvent | null {
  if (event.type !== 'message') return null;
  const userId = event.source.userId;
  if (!userId) return null;

  const { message } = event;
  switch (message.type) {
    case 'location':
      return toInboundEvent(userId, event.timestamp, {
        kind: 'location',
        latitude: message.latitude,
        longitude: message.longitude,
      });
    case 'text':
      return toInboundEvent(userId, event.timestamp, { kind: 'text', text: message.text });
    default:
      return null;
  }
}
