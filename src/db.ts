/**
 * Storage handle lifecycle.
 * One Supabase client is opened at startup and closed at shutdown; callers
 * receive it explicitly rather than through a module-level singleton.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from './config.js';

export interface Closeable {
  close(): Promise<void>;
}

export interface Database extends Closeable {
  readonly client: SupabaseClient;
}

export function openDatabase(config: Pick<AppConfig, 'supabaseUrl' | 'supabaseKey'>): Database {
  const client = createClient(config.supabaseUrl, config.supabaseKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });

  return {
    client,
    async close() {
      await client.removeAllChannels();
    },
  };
}

/**
 * Acquire a resource, hand it to `use`, and release it however `use` ends.
 */
export async function withResource<R extends Closeable, T>(
  acquire: () => R | Promise<R>,
  use: (resource: R) => Promise<T>
): Promise<T> {
  const resource = await acquire();
  try {
    return await use(resource);
  } finally {
    await resource.close();
  }
}

export function withDatabase<T>(
  config: Pick<AppConfig, 'supabaseUrl' | 'supabaseKey'>,
  use: (db: Database) => Promise<T>
): Promise<T> {
  return withResource(() => openDatabase(config), use);
}
