import { z } from 'zod';
import { isCalendarDate } from '../calendar/gridCell.js';

export const USER_STATUSES = ['inactive', 'work', 'active', 'graduated'] as const;
export const DRIVER_LICENSE_OPTIONS = ['no', 'yes', 'yes_and_car'] as const;
export const PRINTER_OPTIONS = ['no', 'black', 'color', 'black_and_color'] as const;

export type UserStatus = (typeof USER_STATUSES)[number];
export type DriverLicense = (typeof DRIVER_LICENSE_OPTIONS)[number];
export type Printer = (typeof PRINTER_OPTIONS)[number];

export interface UserProfile {
  telegramId: number;
  telegramNickname: string;
  vkNickname: string;
  status: UserStatus;
  fullName: string;
  phoneNumber: string;
  liveMetroStation: string[];
  studyMetroStation: string[];
  yearOfAdmission: number;
  hasDriverLicense: DriverLicense;
  /** `YYYY-MM-DD` */
  dateOfBirth: string;
  hasPrinter: Printer;
  canHostNight: boolean;
}

export type UserProfileChanges = Partial<Omit<UserProfile, 'telegramId'>>;

const trimmed = z.string().trim();

const wireFields = {
  telegram_nickname: trimmed,
  vk_nickname: trimmed,
  status: z.enum(USER_STATUSES),
  full_name: trimmed.min(1),
  phone_number: trimmed,
  live_metro_station: z.array(trimmed),
  study_metro_station: z.array(trimmed),
  year_of_admission: z.number().int().min(1900).max(2100),
  has_driver_license: z.enum(DRIVER_LICENSE_OPTIONS),
  date_of_birth: z.string().refine(isCalendarDate, 'expected a YYYY-MM-DD date'),
  has_printer: z.enum(PRINTER_OPTIONS),
  can_host_night: z.boolean(),
};

/** JSON shape used by the HTTP API (snake_case, as the Mini App sends it). */
export const userProfileWireSchema = z.object({
  telegram_id: z.number().int().positive(),
  ...wireFields,
});

export const userProfileUpdateSchema = z.object({
  telegram_id: z.number().int().positive(),
  fields: z.object(wireFields).partial(),
});

export type UserProfileWire = z.infer<typeof userProfileWireSchema>;
export type UserProfileUpdateRequest = z.infer<typeof userProfileUpdateSchema>;

export function fromWire(wire: UserProfileWire): UserProfile {
  return {
    telegramId: wire.telegram_id,
    telegramNickname: wire.telegram_nickname,
    vkNickname: wire.vk_nickname,
    status: wire.status,
    fullName: wire.full_name,
    phoneNumber: wire.phone_number,
    liveMetroStation: wire.live_metro_station,
    studyMetroStation: wire.study_metro_station,
    yearOfAdmission: wire.year_of_admission,
    hasDriverLicense: wire.has_driver_license,
    dateOfBirth: wire.date_of_birth,
    hasPrinter: wire.has_printer,
    canHostNight: wire.can_host_night,
  };
}

export function toWire(profile: UserProfile): UserProfileWire {
  return {
    telegram_id: profile.telegramId,
    telegram_nickname: profile.telegramNickname,
    vk_nickname: profile.vkNickname,
    status: profile.status,
    full_name: profile.fullName,
    phone_number: profile.phoneNumber,
    live_metro_station: profile.liveMetroStation,
    study_metro_station: profile.studyMetroStation,
    year_of_admission: profile.yearOfAdmission,
    has_driver_license: profile.hasDriverLicense,
    date_of_birth: profile.dateOfBirth,
    has_printer: profile.hasPrinter,
    can_host_night: profile.canHostNight,
  };
}

export function changesFromWire(fields: UserProfileUpdateRequest['fields']): UserProfileChanges {
  const changes: UserProfileChanges = {};
  if (fields.telegram_nickname !== undefined) changes.telegramNickname = fields.telegram_nickname;
  if (fields.vk_nickname !== undefined) changes.vkNickname = fields.vk_nickname;
  if (fields.status !== undefined) changes.status = fields.status;
  if (fields.full_name !== undefined) changes.fullName = fields.full_name;
  if (fields.phone_number !== undefined) changes.phoneNumber = fields.phone_number;
  if (fields.live_metro_station !== undefined) changes.liveMetroStation = fields.live_metro_station;
  if (fields.study_metro_station !== undefined) changes.studyMetroStation = fields.study_metro_station;
  if (fields.year_of_admission !== undefined) changes.yearOfAdmission = fields.year_of_admission;
  if (fields.has_driver_license !== undefined) changes.hasDriverLicense = fields.has_driver_license;
  if (fields.date_of_birth !== undefined) changes.dateOfBirth = fields.date_of_birth;
  if (fields.has_printer !== undefined) changes.hasPrinter = fields.has_printer;
  if (fields.can_host_night !== undefined) changes.canHostNight = fields.can_host_night;
  return changes;
}
