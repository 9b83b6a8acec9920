// Shapes of the Zoom REST API v2 responses this project reads.
// https://developers.zoom.us/docs/api/

import { z } from "zod";

const optionalText = z.string().nullish();

export const zoomTokenSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
});

export const zoomMeetingSchema = z.object({
  uuid: optionalText,
  id: z.union([z.number(), z.string()]).nullish(),
  topic: optionalText,
  start_time: optionalText,
});

export const zoomParticipantSchema = z.object({
  id: optionalText,
  name: optionalText,
  user_email: optionalText,
  join_time: optionalText,
  leave_time: optionalText,
  // Usually seconds as a number; anything else is treated as zero.
  duration: z.unknown().optional(),
  status: optionalText,
});

export const zoomMeetingPageSchema = z.object({
  meetings: z.array(z.unknown()).nullish(),
  next_page_token: optionalText,
});

export const zoomParticipantPageSchema = z.object({
  participants: z.array(z.unknown()).nullish(),
  next_page_token: optionalText,
});

export type ZoomToken = z.infer<typeof zoomTokenSchema>;
export type ZoomMeeting = z.infer<typeof zoomMeetingSchema>;
export type ZoomParticipant = z.infer<typeof zoomParticipantSchema>;
