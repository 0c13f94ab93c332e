import { z } from 'zod';
import { format, isValid, parseISO } from 'date-fns';

// ===================================
// Base Schemas
// ===================================
export const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;
const LOCAL_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const timeOfDaySchema = z
  .string()
  .regex(TIME_OF_DAY_PATTERN, 'Time must be HH:mm (24h)');

export const localDateSchema = z
  .string()
  .regex(LOCAL_DATE_PATTERN, 'Date must be yyyy-MM-dd')
  .refine((value) => {
    const parsed = parseISO(value);
    // parseISO rolls 2024-02-30 over, so compare the round trip
    return isValid(parsed) && format(parsed, 'yyyy-MM-dd') === value;
  }, 'Date does not exist');

const DateStringOrDate = z
  .union([z.string(), z.date(), z.number()])
  .transform((val) => (val instanceof Date ? val : new Date(val)))
  .refine((val) => isValid(val), 'Invalid timestamp');

const identifier = z.string().trim().min(1, 'Identifier is required');

// ===================================
// Inbound events
// ===================================
export const LocationSharedSchema = z.object({
  type: z.literal('LocationShared'),
  employeeId: identifier,
  lat: z.number(),
  lon: z.number(),
  time: DateStringOrDate,
});

export const TextReceivedSchema = z.object({
  type: z.literal('TextReceived'),
  employeeId: identifier,
  text: z.string(),
});

export const ContactSharedSchema = z.object({
  type: z.literal('ContactShared'),
  employeeId: identifier,
  name: z.string().trim().min(1, 'Name is required'),
  phone: z.string().trim().min(1, 'Phone is required'),
});

export const AdminCommandSchema = z.object({
  type: z.literal('AdminCommand'),
  adminId: identifier,
  name: z.string().trim().min(1).toLowerCase(),
  args: z.array(z.string()).default([]),
});

export const InboundEventSchema = z.discriminatedUnion('type', [
  LocationSharedSchema,
  TextReceivedSchema,
  ContactSharedSchema,
  AdminCommandSchema,
]);

export type LocationShared = z.infer<typeof LocationSharedSchema>;
export type TextReceived = z.infer<typeof TextReceivedSchema>;
export type ContactShared = z.infer<typeof ContactSharedSchema>;
export type AdminCommand = z.infer<typeof AdminCommandSchema>;
export type InboundEvent = z.infer<typeof InboundEventSchema>;
