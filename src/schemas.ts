import { z } from 'zod';
import { InvalidDataError } from './errors.js';

export const MeetingSettingsSchema = z.object({
  host_video: z.boolean(),
  participant_video: z.boolean(),
  cn_meeting: z.boolean(),
  in_meeting: z.boolean(),
  join_before_host: z.boolean(),
  mute_upon_entry: z.boolean(),
  watermark: z.boolean(),
  use_pmi: z.boolean(),
  approval_type: z.union([z.literal(0), z.literal(1), z.literal(2)]),
  registration_type: z.union([z.literal(1), z.literal(2), z.literal(3)]).nullish(),
  audio: z.enum(['voip', 'telephony', 'both']),
  auto_recording: z.enum(['local', 'cloud', 'none']),
  enforce_login: z.boolean(),
  enforce_login_domains: z.string().nullish(),
  alternative_hosts: z.string().nullish(),
  close_registration: z.boolean().nullish(),
  waiting_room: z.boolean(),
  global_dial_in_countries: z.array(z.string()).nullish(),
  contact_name: z.string().nullish(),
  contact_email: z.string().nullish(),
  registrants_email_notification: z.boolean(),
  meeting_authentication: z.boolean(),
  authentication_option: z.string().nullish(),
  authentication_domains: z.string().nullish(),
});

export const MeetingSummarySchema = z.object({
  uuid: z.string(),
  id: z.number(),
  host_id: z.string(),
  topic: z.string(),
  type: z.number(),
  start_time: z.string(),
  duration: z.number(),
  timezone: z.string(),
  created_at: z.string(),
  join_url: z.string(),
});

export const MeetingSchema = MeetingSummarySchema.extend({
  status: z.string(),
  agenda: z.string().nullish(),
  start_url: z.string(),
  registration_url: z.string().nullish(),
  password: z.string(),
  h323_password: z.string(),
  pstn_password: z.string(),
  encrypted_password: z.string(),
  settings: MeetingSettingsSchema,
});

const pageFields = {
  page_count: z.number(),
  page_number: z.number(),
  page_size: z.number(),
  total_records: z.number(),
};

export const MeetingListSchema = z.object({
  ...pageFields,
  meetings: z.array(MeetingSummarySchema),
});

export const RegistrantRefSchema = z.object({
  id: z.string().nullish(),
  email: z.string().nullish(),
});

export const RegistrantSchema = RegistrantRefSchema.extend({
  email: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  address: z.string().nullish(),
  city: z.string().nullish(),
  country: z.string().nullish(),
  zip: z.string().nullish(),
  state: z.string().nullish(),
  phone: z.string().nullish(),
  industry: z.string().nullish(),
  org: z.string().nullish(),
  job_title: z.string().nullish(),
  comment: z.string().nullish(),
});

export const RegistrantListSchema = z.object({
  ...pageFields,
  registrants: z.array(RegistrantSchema),
});

export const RegistrantConfirmationSchema = z.object({
  registrant_id: z.string(),
  id: z.number(),
  topic: z.string(),
  start_time: z.string(),
  join_url: z.string(),
});

export const ParticipantSchema = z.object({
  id: z.string(),
  name: z.string(),
  user_email: z.string(),
});

export const ParticipantListSchema = z.object({
  page_count: z.number(),
  page_size: z.number(),
  total_records: z.number(),
  participants: z.array(ParticipantSchema).nullish(),
});

export const UserSchema = z.object({
  id: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  type: z.number(),
  pmi: z.number(),
  timezone: z.string().nullish(),
  verified: z.number(),
  dept: z.string().nullish(),
  created_at: z.string(),
  pic_url: z.string().nullish(),
  group_ids: z.array(z.string()).nullish(),
  language: z.string().nullish(),
  phone_number: z.string().nullish(),
  status: z.string(),
  role_id: z.string(),
});

export const UserListSchema = z.object({
  ...pageFields,
  users: z.array(UserSchema),
});

export type MeetingSettings = z.infer<typeof MeetingSettingsSchema>;
export type MeetingSummary = z.infer<typeof MeetingSummarySchema>;
export type Meeting = z.infer<typeof MeetingSchema>;
export type MeetingList = z.infer<typeof MeetingListSchema>;
export type RegistrantRef = z.infer<typeof RegistrantRefSchema>;
export type Registrant = z.infer<typeof RegistrantSchema>;
export type RegistrantList = z.infer<typeof RegistrantListSchema>;
export type RegistrantConfirmation = z.infer<typeof RegistrantConfirmationSchema>;
export type Participant = z.infer<typeof ParticipantSchema>;
export type ParticipantList = z.infer<typeof ParticipantListSchema>;
export type User = z.infer<typeof UserSchema>;
export type UserList = z.infer<typeof UserListSchema>;

/**
 * Decode `data` into the record described by `schema`.
 *
 * @param label - record name used in the error message
 * @throws InvalidDataError when the payload does not match
 */
export function parseRecord<T extends z.ZodTypeAny>(schema: T, data: unknown, label: string): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join(', ');
    throw new InvalidDataError(`Invalid ${label}: ${summary}`, issues);
  }
  return result.data;
}

export function defaultMeetingSettings(): MeetingSettings {
  return {
    host_video: true,
    participant_video: true,
    join_before_host: true,
    mute_upon_entry: true,
    approval_type: 0,
    cn_meeting: false,
    in_meeting: false,
    watermark: false,
    use_pmi: false,
    registration_type: 1,
    audio: 'voip',
    auto_recording: 'none',
    enforce_login: true,
    waiting_room: false,
    registrants_email_notification: false,
    meeting_authentication: true,
  };
}

export function filterMeetingsByTopic(list: MeetingList, text: string): MeetingSummary[] {
  const needle = text.toLowerCase();
  return list.meetings.filter((meeting) => meeting.topic.toLowerCase().includes(needle));
}

export function filterMeetingsById(list: MeetingList, meetingId: number): MeetingSummary[] {
  return list.meetings.filter((meeting) => meeting.id === meetingId);
}

export function findParticipantsById(list: ParticipantList, id: string): Participant[] {
  return (list.participants ?? []).filter((participant) => participant.id === id);
}

export function findParticipantsByEmail(list: ParticipantList, email: string): Participant[] {
  return (list.participants ?? []).filter((participant) => participant.user_email === email);
}

export function findParticipantsByName(list: ParticipantList, name: string): Participant[] {
  return (list.participants ?? []).filter((participant) => participant.name === name);
}
