/** Envelope every persisted record carries. */
export interface StoredRecord {
  id: string;
  created_at: Date;
  updated_at: Date;
}

/** Drops the store identifier from a record for public output. */
export function withoutId<T extends StoredRecord>(record: T): Omit<T, 'id'> {
  const { id: _id, ...rest } = record;
  return rest;
}
