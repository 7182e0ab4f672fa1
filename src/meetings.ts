import { ApiClient } from './api-client.js';
import { generateMeetingPassword } from './password.js';
import {
  defaultMeetingSettings,
  Meeting,
  MeetingList,
  MeetingListSchema,
  MeetingSchema,
  MeetingSettings,
  ParticipantList,
  ParticipantListSchema,
  parseRecord,
  Registrant,
  RegistrantConfirmation,
  RegistrantConfirmationSchema,
  RegistrantList,
  RegistrantListSchema,
  RegistrantRef,
  RegistrantSchema,
} from './schemas.js';
import type { ApiResponse, MeetingListType, RegistrantAction } from './types.js';

export interface CreateMeetingParams {
  /** ISO 8601 start time, e.g. 2026-03-01T10:00:00Z */
  startTime: string;
  durationMin: number;
  timezone?: string;
  /** 1 instant, 2 scheduled, 3 recurring without fixed time, 8 recurring with fixed time */
  type?: number;
  password?: string;
  settings?: MeetingSettings;
}

export interface RegistrantStatusUpdate {
  action: RegistrantAction;
  registrants: RegistrantRef[];
}

export interface RegistrationRef {
  registrantId: string;
  email: string;
}

export class MeetingsComponent {
  constructor(
    private client: ApiClient,
    readonly timezone: string = 'UTC',
    readonly userId: string = 'me',
  ) {}

  async listMeetings(type?: MeetingListType): Promise<MeetingList> {
    const endpoint = `/users/${this.userId}/meetings`;
    const body = await this.client.getAllPages(endpoint, type ? { type } : undefined);
    return parseRecord(MeetingListSchema, body, 'meeting list');
  }

  async getMeeting(meetingId: number): Promise<Meeting> {
    const response = await this.client.get(`/meetings/${meetingId}`);
    return parseRecord(MeetingSchema, response.body, 'meeting');
  }

  async createMeeting(topic: string, params: CreateMeetingParams): Promise<Meeting> {
    const endpoint = `/users/${this.userId}/meetings`;
    const body = {
      topic,
      type: params.type ?? 2,
      start_time: params.startTime,
      duration: params.durationMin,
      timezone: params.timezone || this.timezone,
      password: params.password || generateMeetingPassword(),
      settings: params.settings ?? defaultMeetingSettings(),
    };
    const response = await this.client.post(endpoint, body);
    return parseRecord(MeetingSchema, response.body, 'meeting');
  }

  async deleteMeeting(meetingId: number): Promise<boolean> {
    const response = await this.client.delete(`/meetings/${meetingId}`);
    return response.status === 204;
  }

  async listMeetingRegistrants(meetingId: number): Promise<RegistrantList> {
    const body = await this.client.getAllPages(`/meetings/${meetingId}/registrants`);
    return parseRecord(RegistrantListSchema, body, 'registrant list');
  }

  async updateMeetingRegistrantStatus(meetingId: number, update: RegistrantStatusUpdate): Promise<ApiResponse> {
    const body = {
      action: update.action,
      registrants: update.registrants.map((registrant) => ({ id: registrant.id, email: registrant.email })),
    };
    return this.client.put(`/meetings/${meetingId}/registrants/status`, body);
  }

  async addMeetingRegistrant(meetingId: number, registrant: Registrant): Promise<RegistrantConfirmation> {
    const validated = parseRecord(RegistrantSchema, registrant, 'registrant');
    const response = await this.client.post(`/meetings/${meetingId}/registrants`, validated);
    return parseRecord(RegistrantConfirmationSchema, response.body, 'registrant confirmation');
  }

  /**
   * Register someone and approve the registration straight away.
   */
  async addAndConfirmRegistrant(meetingId: number, registrant: Registrant): Promise<RegistrantConfirmation> {
    const confirmation = await this.addMeetingRegistrant(meetingId, registrant);
    await this.approveRegistration(meetingId, {
      registrantId: confirmation.registrant_id,
      email: registrant.email,
    });
    return confirmation;
  }

  async cancelRegistration(meetingId: number, registration: RegistrationRef): Promise<void> {
    await this.updateMeetingRegistrantStatus(meetingId, {
      action: 'cancel',
      registrants: [{ id: registration.registrantId, email: registration.email }],
    });
  }

  async approveRegistration(meetingId: number, registration: RegistrationRef): Promise<void> {
    await this.updateMeetingRegistrantStatus(meetingId, {
      action: 'approve',
      registrants: [{ id: registration.registrantId, email: registration.email }],
    });
  }

  async pastMeetingParticipants(meetingId: number): Promise<ParticipantList> {
    const body = await this.client.getAllPages(`/past_meetings/${meetingId}/participants`);
    return parseRecord(ParticipantListSchema, body, 'participant list');
  }
}
