import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import WebSocket from "ws";

export interface SupabaseSettings {
  url: string;
  serviceRoleKey: string;
}

export interface ServiceClientOptions {
  fetch?: typeof fetch;
}

/**
 * Service-role client for scripts and the worker. Node 20 has no global
 * WebSocket, so realtime gets the `ws` implementation.
 */
export function getServiceClient(settings: SupabaseSettings, options: ServiceClientOptions = {}): SupabaseClient {
  return createClient(settings.url, settings.serviceRoleKey, {
    auth: { autoRefreshToken: false, persistSession: false },
    realtime: { transport: WebSocket },
    ...(options.fetch ? { global: { fetch: options.fetch } } : {}),
  });
}
