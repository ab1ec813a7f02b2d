import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { config as loadEnv } from "dotenv";

loadEnv({ path: ".env.local" });

let client: SupabaseClient | null = null;

type SupabaseEnvName = "SUPABASE_URL" | "SUPABASE_SERVICE_ROLE_KEY";

function requireEnv(name: SupabaseEnvName): string {
  const value = process.env[name];
  if (!value || value.trim() === "") {
    throw new Error(`Missing ${name}. Put it in .env.local`);
  }
  return value;
}

/** Lazily created service-role client for reading the retail dataset tables. */
export function getSupabaseClient(): SupabaseClient {
  if (client) return client;

  client = createClient(requireEnv("SUPABASE_URL"), requireEnv("SUPABASE_SERVICE_ROLE_KEY"), {
    auth: { persistSession: false },
  });
  return client;
}
