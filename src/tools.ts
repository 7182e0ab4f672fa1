import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ApiError } from './errors.js';
import { findParticipantsByEmail } from './schemas.js';
import { isRecord } from './type-guards.js';
import type { ZoomClient } from './zoom-client.js';

const ListMeetingsSchema = z.object({
  type: z.enum(['scheduled', 'live', 'upcoming']).optional().describe("Which meetings to list (default: scheduled)")
});

const MeetingIdSchema = z.object({
  meeting_id: z.number().int().describe("The numeric meeting ID")
});

const CreateMeetingSchema = z.object({
  topic: z.string().describe("Meeting topic"),
  start_time: z.string().describe("Start time (ISO 8601, e.g. 2026-03-01T10:00:00Z)"),
  duration: z.number().int().positive().describe("Duration in minutes"),
  timezone: z.string().optional().describe("Timezone, e.g. Europe/London (defaults to the configured timezone)"),
  password: z.string().max(10).optional().describe("Meeting password (generated when omitted)")
});

const AddRegistrantSchema = z.object({
  meeting_id: z.number().int().describe("The numeric meeting ID"),
  first_name: z.string().describe("Registrant first name"),
  last_name: z.string().describe("Registrant last name"),
  email: z.string().email().describe("Registrant email address"),
  approve: z.boolean().optional().default(false).describe("Approve the registration immediately")
});

const UpdateRegistrantStatusSchema = z.object({
  meeting_id: z.number().int().describe("The numeric meeting ID"),
  action: z.enum(['approve', 'cancel', 'deny']).describe("Status change to apply"),
  registrant_id: z.string().describe("The registrant ID"),
  email: z.string().email().describe("The registrant's email address")
});

const PastParticipantsSchema = z.object({
  meeting_id: z.number().int().describe("The numeric meeting ID"),
  email: z.string().optional().describe("Only return participants with this email address")
});

const ListUsersSchema = z.object({
  status: z.enum(['active', 'inactive', 'pending']).optional().describe("Filter users by status")
});

const GetUserSchema = z.object({
  user_id: z.string().optional().default('me').describe("User ID or email address (default: the authenticated user)")
});

const DeleteUserSchema = z.object({
  user_id: z.string().describe("User ID or email address"),
  action: z.enum(['disassociate', 'delete']).optional().default('disassociate').describe("Disassociate from the account or delete permanently")
});

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function toInputSchema(schema: z.ZodTypeAny): Tool['inputSchema'] {
  const json: unknown = zodToJsonSchema(schema, { $refStrategy: 'none' });
  const properties: Record<string, object> = {};
  let required: string[] | undefined;

  if (isRecord(json)) {
    if (isRecord(json.properties)) {
      for (const [key, value] of Object.entries(json.properties)) {
        if (isRecord(value)) properties[key] = value;
      }
    }
    if (Array.isArray(json.required)) {
      required = json.required.filter((entry): entry is string => typeof entry === 'string');
    }
  }

  return required && required.length > 0
    ? { type: 'object', properties, required }
    : { type: 'object', properties };
}

export const TOOLS: Tool[] = [
  {
    name: "list_meetings",
    description: "List the configured user's Zoom meetings across all pages. Returns topic, start time, duration and join URL.",
    inputSchema: toInputSchema(ListMeetingsSchema)
  },
  {
    name: "get_meeting",
    description: "Get the full details of a meeting, including its settings and passwords.",
    inputSchema: toInputSchema(MeetingIdSchema)
  },
  {
    name: "create_meeting",
    description: "Schedule a new meeting for the configured user. A password is generated when none is given.",
    inputSchema: toInputSchema(CreateMeetingSchema)
  },
  {
    name: "delete_meeting",
    description: "Delete a meeting by its ID.",
    inputSchema: toInputSchema(MeetingIdSchema)
  },
  {
    name: "list_meeting_registrants",
    description: "List everyone registered for a meeting.",
    inputSchema: toInputSchema(MeetingIdSchema)
  },
  {
    name: "add_meeting_registrant",
    description: "Register someone for a meeting, optionally approving the registration straight away. Returns their join URL.",
    inputSchema: toInputSchema(AddRegistrantSchema)
  },
  {
    name: "update_registrant_status",
    description: "Approve, cancel or deny a meeting registration.",
    inputSchema: toInputSchema(UpdateRegistrantStatusSchema)
  },
  {
    name: "list_past_meeting_participants",
    description: "List who attended a meeting that has ended.",
    inputSchema: toInputSchema(PastParticipantsSchema)
  },
  {
    name: "list_users",
    description: "List the users on the account.",
    inputSchema: toInputSchema(ListUsersSchema)
  },
  {
    name: "get_user",
    description: "Get a user's profile.",
    inputSchema: toInputSchema(GetUserSchema)
  },
  {
    name: "delete_user",
    description: "Remove a user from the account, or delete them permanently.",
    inputSchema: toInputSchema(DeleteUserSchema)
  }
];

function jsonResult(value: unknown): ToolResult {
  return {
    content: [{
      type: "text",
      text: JSON.stringify(value, null, 2)
    }]
  };
}

export async function handleToolCall(client: ZoomClient, name: string, args: unknown): Promise<ToolResult> {
  try {
    if (name === "list_meetings") {
      const params = ListMeetingsSchema.parse(args ?? {});

      console.error(`[list_meetings] Fetching ${params.type ?? 'scheduled'} meetings`);
      const list = await client.meetings.listMeetings(params.type);
      console.error(`[list_meetings] Got ${list.meetings.length} meetings`);

      return jsonResult({
        total_records: list.total_records,
        meetings: list.meetings.map(meeting => ({
          id: meeting.id,
          topic: meeting.topic,
          start_time: meeting.start_time,
          duration: meeting.duration,
          timezone: meeting.timezone,
          join_url: meeting.join_url
        }))
      });
    }

    if (name === "get_meeting") {
      const params = MeetingIdSchema.parse(args);

      console.error(`[get_meeting] Fetching meeting ${params.meeting_id}`);
      return jsonResult(await client.meetings.getMeeting(params.meeting_id));
    }

    if (name === "create_meeting") {
      const params = CreateMeetingSchema.parse(args);

      console.error(`[create_meeting] Creating meeting "${params.topic}" at ${params.start_time}`);
      const meeting = await client.meetings.createMeeting(params.topic, {
        startTime: params.start_time,
        durationMin: params.duration,
        timezone: params.timezone,
        password: params.password
      });
      console.error(`[create_meeting] Created meeting ${meeting.id}`);

      return jsonResult({
        id: meeting.id,
        topic: meeting.topic,
        start_time: meeting.start_time,
        timezone: meeting.timezone,
        join_url: meeting.join_url,
        password: meeting.password
      });
    }

    if (name === "delete_meeting") {
      const params = MeetingIdSchema.parse(args);

      console.error(`[delete_meeting] Deleting meeting ${params.meeting_id}`);
      const deleted = await client.meetings.deleteMeeting(params.meeting_id);

      return jsonResult({ success: deleted, meeting_id: params.meeting_id });
    }

    if (name === "list_meeting_registrants") {
      const params = MeetingIdSchema.parse(args);

      console.error(`[list_meeting_registrants] Fetching registrants for meeting ${params.meeting_id}`);
      const list = await client.meetings.listMeetingRegistrants(params.meeting_id);
      console.error(`[list_meeting_registrants] Got ${list.registrants.length} registrants`);

      return jsonResult({
        meeting_id: params.meeting_id,
        total_records: list.total_records,
        registrants: list.registrants
      });
    }

    if (name === "add_meeting_registrant") {
      const params = AddRegistrantSchema.parse(args);
      const registrant = {
        first_name: params.first_name,
        last_name: params.last_name,
        email: params.email
      };

      console.error(`[add_meeting_registrant] Registering ${params.email} for meeting ${params.meeting_id}`);
      const confirmation = params.approve
        ? await client.meetings.addAndConfirmRegistrant(params.meeting_id, registrant)
        : await client.meetings.addMeetingRegistrant(params.meeting_id, registrant);

      return jsonResult({ ...confirmation, approved: params.approve });
    }

    if (name === "update_registrant_status") {
      const params = UpdateRegistrantStatusSchema.parse(args);

      console.error(`[update_registrant_status] ${params.action} ${params.registrant_id} on meeting ${params.meeting_id}`);
      const response = await client.meetings.updateMeetingRegistrantStatus(params.meeting_id, {
        action: params.action,
        registrants: [{ id: params.registrant_id, email: params.email }]
      });

      return jsonResult({ success: true, status: response.status, action: params.action });
    }

    if (name === "list_past_meeting_participants") {
      const params = PastParticipantsSchema.parse(args);

      console.error(`[list_past_meeting_participants] Fetching participants for meeting ${params.meeting_id}`);
      const list = await client.meetings.pastMeetingParticipants(params.meeting_id);
      const participants = params.email
        ? findParticipantsByEmail(list, params.email)
        : list.participants ?? [];

      return jsonResult({
        meeting_id: params.meeting_id,
        total_records: list.total_records,
        participants
      });
    }

    if (name === "list_users") {
      const params = ListUsersSchema.parse(args ?? {});

      console.error(`[list_users] Fetching users`);
      const list = await client.users.listUsers(params.status);
      console.error(`[list_users] Got ${list.users.length} users`);

      return jsonResult({
        total_records: list.total_records,
        users: list.users.map(user => ({
          id: user.id,
          name: `${user.first_name} ${user.last_name}`,
          email: user.email,
          status: user.status
        }))
      });
    }

    if (name === "get_user") {
      const params = GetUserSchema.parse(args ?? {});

      console.error(`[get_user] Fetching user ${params.user_id}`);
      return jsonResult(await client.users.getUser(params.user_id));
    }

    if (name === "delete_user") {
      const params = DeleteUserSchema.parse(args);

      console.error(`[delete_user] ${params.action} user ${params.user_id}`);
      const deleted = await client.users.deleteUser(params.user_id, params.action);

      return jsonResult({ success: deleted, user_id: params.user_id, action: params.action });
    }

    throw new Error(`Unknown tool: ${name}`);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : "Unknown error occurred";
    console.error(`Error in ${name}:`, errorMessage);

    const details = error instanceof ApiError
      ? { error: errorMessage, kind: error.kind, status: error.status }
      : { error: errorMessage };

    return { ...jsonResult(details), isError: true };
  }
}
