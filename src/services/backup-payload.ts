import { isBackupCategory, type BackupCategory } from '../types/backup.js';

export const PAYLOAD_VERSION = 1;

/** Envelope stored under each category key. `data` is the source's opaque bytes. */
export interface BackupPayload {
  version: number;
  category: BackupCategory;
  createdAt: number;
  data: Uint8Array;
}

interface SerializedPayload {
  version: number;
  category: BackupCategory;
  createdAt: number;
  data: string;
}

export class BackupPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BackupPayloadError';
  }
}

export function encodeBackupPayload(category: BackupCategory, createdAt: number, data: Uint8Array): Uint8Array {
  const serialized: SerializedPayload = {
    version: PAYLOAD_VERSION,
    category,
    createdAt,
    data: Buffer.from(data).toString('base64'),
  };
  return new Uint8Array(Buffer.from(JSON.stringify(serialized), 'utf8'));
}

/** Parse an envelope. Throws `BackupPayloadError` on malformed or mismatching input. */
export function decodeBackupPayload(bytes: Uint8Array, expectedCategory: BackupCategory): BackupPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(bytes).toString('utf8'));
  } catch (err) {
    throw new BackupPayloadError(`Payload for '${expectedCategory}' is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (typeof parsed !== 'object' || parsed === null) {
    throw new BackupPayloadError(`Payload for '${expectedCategory}' is not an object.`);
  }

  const version = 'version' in parsed ? parsed.version : undefined;
  const category = 'category' in parsed ? parsed.category : undefined;
  const createdAt = 'createdAt' in parsed ? parsed.createdAt : undefined;
  const data = 'data' in parsed ? parsed.data : undefined;

  if (version !== PAYLOAD_VERSION) {
    throw new BackupPayloadError(`Unsupported payload version for '${expectedCategory}': ${String(version)}`);
  }
  if (!isBackupCategory(category) || category !== expectedCategory) {
    throw new BackupPayloadError(`Payload category mismatch: expected '${expectedCategory}', got '${String(category)}'`);
  }
  if (typeof createdAt !== 'number' || !Number.isFinite(createdAt) || createdAt < 0) {
    throw new BackupPayloadError(`Payload for '${expectedCategory}' has an invalid createdAt.`);
  }
  if (typeof data !== 'string') {
    throw new BackupPayloadError(`Payload for '${expectedCategory}' has no data.`);
  }

  return {
    version: PAYLOAD_VERSION,
    category,
    createdAt,
    data: new Uint8Array(Buffer.from(data, 'base64')),
  };
}
