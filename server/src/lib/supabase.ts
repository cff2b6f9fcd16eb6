import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export class MissingSupabaseConfigError extends Error {
  constructor() {
    super('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY environment variables are required');
    this.name = 'MissingSupabaseConfigError';
  }
}

let adminClient: SupabaseClient | undefined;

/**
 * Service-role client for progress persistence.
 * Created on first use so importing the gateway never requires credentials.
 */
export function getSupabaseAdmin(env: NodeJS.ProcessEnv = process.env): SupabaseClient {
  if (adminClient) return adminClient;

  const supabaseUrl = env.SUPABASE_URL;
  const supabaseServiceKey = env.SUPABASE_SERVICE_ROLE_KEY;
  if (!supabaseUrl || !supabaseServiceKey) {
    throw new MissingSupabaseConfigError();
  }

  adminClient = createClient(supabaseUrl, supabaseServiceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return adminClient;
}
