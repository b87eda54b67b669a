/**
 * {@link RemoteDataApi} over Supabase PostgREST tables.
 *
 * Every failed request is rethrown as a {@link RemoteError} carrying the
 * PostgREST code and HTTP status so the sync pass can classify it.
 */

import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { RemoteError } from '../errors';
import type { RemoteDataApi, RowPayload } from '../types';

function toRemoteError(error: PostgrestError, status: number, action: string): RemoteError {
  return new RemoteError(`${action} failed: ${error.message}`, {
    code: error.code || undefined,
    status: status > 0 ? status : undefined,
    details: error.details || undefined,
    hint: error.hint || undefined
  });
}

export class SupabaseRemoteApi implements RemoteDataApi {
  constructor(
    private readonly client: SupabaseClient,
    private readonly idColumn = 'id'
  ) {}

  async create(table: string, record: RowPayload): Promise<void> {
    const { error, status } = await this.client.from(table).insert(record);
    if (error) throw toRemoteError(error, status, `Insert into ${table}`);
  }

  async update(table: string, recordId: string, patch: RowPayload): Promise<void> {
    const { error, status } = await this.client.from(table).update(patch).eq(this.idColumn, recordId);
    if (error) throw toRemoteError(error, status, `Update of ${table}/${recordId}`);
  }

  async delete(table: string, recordId: string): Promise<void> {
    const { error, status } = await this.client.from(table).delete().eq(this.idColumn, recordId);
    if (error) throw toRemoteError(error, status, `Delete of ${table}/${recordId}`);
  }
}
