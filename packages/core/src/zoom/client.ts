import type { Duration } from "luxon";
import type { z } from "zod";
import { mapZoomMeeting, mapZoomParticipant } from "../ingestion/mapping";
import {
  zoomMeetingPageSchema,
  zoomMeetingSchema,
  zoomParticipantPageSchema,
  zoomParticipantSchema,
  zoomTokenSchema,
} from "../ingestion/zoomPayload";
import { describeLookback } from "../time/timeHelper";
import type { MeetingOccurrence, RawSession } from "../types/attendance";
import type { MeetingSource } from "../types/meetingSource";

const ZOOM_API = "https://api.zoom.us/v2";
const ZOOM_OAUTH_URL = "https://zoom.us/oauth/token";
const PAGE_SIZE = "300";

export interface ZoomCredentials {
  accountId: string;
  clientId: string;
  clientSecret: string;
}

export class ZoomAuthError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null
  ) {
    super(message);
    this.name = "ZoomAuthError";
  }
}

/**
 * Zoom wants a uuid that starts with "/" or contains "//" encoded twice.
 */
export function encodeMeetingUuid(uuid: string): string {
  const once = encodeURIComponent(uuid);
  if (uuid.startsWith("/") || uuid.includes("//")) return encodeURIComponent(once);
  return once;
}

export class ZoomClient implements MeetingSource {
  private accessToken: string | null = null;

  constructor(private readonly credentials: ZoomCredentials) {}

  async authenticate(): Promise<string> {
    const { accountId, clientId, clientSecret } = this.credentials;
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString("base64");

    const res = await fetch(ZOOM_OAUTH_URL, {
      method: "POST",
      headers: {
        Authorization: `Basic ${basic}`,
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: new URLSearchParams({ grant_type: "account_credentials", account_id: accountId }).toString(),
    });

    if (!res.ok) {
      throw new ZoomAuthError(`Zoom authentication failed: ${res.status} ${await res.text()}`, res.status);
    }

    const token = zoomTokenSchema.safeParse(await res.json());
    if (!token.success) {
      throw new ZoomAuthError("Zoom authentication succeeded but access_token is missing", res.status);
    }

    this.accessToken = token.data.access_token;
    return this.accessToken;
  }

  async listRecentMeetings(window: Duration): Promise<MeetingOccurrence[]> {
    console.log(`Getting meetings from last ${describeLookback(window)} hours...`);

    const items = await this.fetchAllPages(
      "/users/me/meetings",
      { type: "previous_meetings", page_size: PAGE_SIZE },
      zoomMeetingPageSchema,
      (page) => page.meetings
    );
    if (items === null) return [];

    const meetings = this.mapItems(items, zoomMeetingSchema, "meeting", (m) => mapZoomMeeting(m));
    console.log(`Found ${meetings.length} previous meetings`);
    return meetings;
  }

  /** Every past instance of `meetingId`. Windowing is left to the caller. */
  async listMeetingInstances(meetingId: string): Promise<MeetingOccurrence[]> {
    const items = await this.fetchAllPages(
      `/past_meetings/${encodeURIComponent(meetingId)}/instances`,
      {},
      zoomMeetingPageSchema,
      (page) => page.meetings
    );
    if (items === null) return [];

    return this.mapItems(items, zoomMeetingSchema, "meeting instance", (m) => mapZoomMeeting(m, meetingId));
  }

  async listParticipantSessions(occurrenceId: string): Promise<RawSession[]> {
    const items = await this.fetchAllPages(
      `/report/meetings/${encodeMeetingUuid(occurrenceId)}/participants`,
      { page_size: PAGE_SIZE },
      zoomParticipantPageSchema,
      (page) => page.participants
    );
    if (items === null) return [];

    return this.mapItems(items, zoomParticipantSchema, "participant", mapZoomParticipant);
  }

  private async headers(): Promise<Record<string, string>> {
    const token = this.accessToken ?? (await this.authenticate());
    return {
      Authorization: `Bearer ${token}`,
      "Content-Type": "application/json",
    };
  }

  private async get(url: string): Promise<Response> {
    const res = await fetch(url, { headers: await this.headers() });
    if (res.status !== 401) return res;

    // Expired token: exchange once more and retry.
    await res.body?.cancel();
    this.accessToken = null;
    return fetch(url, { headers: await this.headers() });
  }

  /**
   * Follows next_page_token until exhausted. Returns null when any page fails,
   * so callers can report "nothing found" instead of a partial listing.
   * A failed token exchange still throws ZoomAuthError.
   */
  private async fetchAllPages<P extends { next_page_token?: string | null }>(
    path: string,
    params: Record<string, string>,
    pageSchema: z.ZodType<P, z.ZodTypeDef, unknown>,
    itemsOf: (page: P) => unknown[] | null | undefined
  ): Promise<unknown[] | null> {
    const all: unknown[] = [];
    let nextPageToken = "";

    do {
      const url = new URL(`${ZOOM_API}${path}`);
      for (const [key, value] of Object.entries(params)) url.searchParams.set(key, value);
      if (nextPageToken) url.searchParams.set("next_page_token", nextPageToken);

      let body: unknown;
      try {
        const res = await this.get(url.toString());
        if (!res.ok) {
          console.error(`Zoom API ${res.status} for ${path}: ${await res.text()}`);
          return null;
        }
        body = await res.json();
      } catch (err) {
        if (err instanceof ZoomAuthError) throw err;
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Zoom request failed for ${path}: ${message}`);
        return null;
      }

      const page = pageSchema.safeParse(body);
      if (!page.success) {
        console.error(`Unexpected Zoom response for ${path}: ${page.error.message}`);
        return null;
      }

      all.push(...(itemsOf(page.data) ?? []));
      nextPageToken = page.data.next_page_token ?? "";
    } while (nextPageToken);

    return all;
  }

  private mapItems<I, O>(
    items: unknown[],
    schema: z.ZodType<I, z.ZodTypeDef, unknown>,
    label: string,
    map: (item: I) => O | null
  ): O[] {
    const mapped: O[] = [];
    for (const item of items) {
      const parsed = schema.safeParse(item);
      if (!parsed.success) {
        console.warn(`  Skipping malformed ${label}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
        continue;
      }
      const value = map(parsed.data);
      if (value !== null) mapped.push(value);
    }
    return mapped;
  }
}
