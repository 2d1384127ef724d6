/**
 * Supabase Client Module
 *
 * Lazy-initialized singleton used as an optional log sink. Returns null
 * when credentials are missing so the relay runs without a database.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";

let client: SupabaseClient | null = null;

export function isPlaceholder(value: string | undefined): boolean {
  return !value || value.includes("your_");
}

export function getSupabase(): SupabaseClient | null {
  if (client) return client;

  const url = process.env.SUPABASE_URL;
  const key = process.env.SUPABASE_ANON_KEY;

  if (!url || !key || isPlaceholder(url) || isPlaceholder(key)) {
    return null;
  }

  client = createClient(url, key, { auth: { persistSession: false } });
  return client;
}
