import { randomUUID } from 'node:crypto';
import type { ApiKeyStatus, ApiKeySummary, ApiKeyType } from '@socialdraft/shared';
import { API_KEY_TYPES, MIN_API_KEY_LENGTH, toIsoString } from '@socialdraft/shared';
import type { SqlExecutor } from '../../db';
import { getParamPlaceholders, parseJsonObject, toBoolean } from '../../utils/db';
import { ConflictError, NotFoundError, ValidationError } from '../../utils/errors';
import { EncryptionError, type KeyEncryption } from './encryption';

interface ApiKeyRow {
  id: string;
  user_id: string;
  key_type: string;
  encrypted_key: string;
  encrypted_credentials: string | null;
  key_name: string | null;
  is_valid: unknown;
  last_used: unknown;
  created_at: unknown;
  updated_at: unknown;
}

export interface CreateApiKeyInput {
  keyType: string;
  apiKey: string;
  keyName?: string | null;
  // Platform extras such as page_id or business_account_id.
  credentials?: Record<string, unknown> | null;
}

export interface UpdateApiKeyInput {
  apiKey?: string;
  keyName?: string | null;
  credentials?: Record<string, unknown> | null;
}

export interface DecryptedApiKey {
  keyType: ApiKeyType;
  apiKey: string;
  credentials: Record<string, unknown>;
}

const INVALID_MASK = '••••••••[error]';

export function parseApiKeyType(value: unknown): ApiKeyType {
  const keyType = API_KEY_TYPES.find((candidate) => candidate === value);
  if (!keyType) {
    throw new ValidationError(`Invalid key type. Valid options: ${API_KEY_TYPES.join(', ')}`);
  }
  return keyType;
}

function validateApiKey(apiKey: string): string {
  const trimmed = apiKey.trim();
  if (trimmed.length < MIN_API_KEY_LENGTH) {
    throw new ValidationError(`API key must be at least ${MIN_API_KEY_LENGTH} characters`);
  }
  return trimmed;
}

function defaultKeyName(keyType: ApiKeyType): string {
  return `My ${keyType.charAt(0).toUpperCase()}${keyType.slice(1)} Key`;
}

function encryptCredentials(
  encryption: KeyEncryption,
  credentials: Record<string, unknown> | null | undefined,
): string | null {
  if (!credentials || !Object.keys(credentials).length) return null;
  return encryption.encrypt(JSON.stringify(credentials));
}

function toSummary(row: ApiKeyRow, encryption: KeyEncryption): ApiKeySummary {
  let maskedKey: string;
  try {
    maskedKey = encryption.maskKey(encryption.decrypt(row.encrypted_key));
  } catch (error) {
    if (!(error instanceof EncryptionError)) throw error;
    maskedKey = INVALID_MASK;
  }

  return {
    id: row.id,
    keyType: parseApiKeyType(row.key_type),
    keyName: row.key_name ?? null,
    maskedKey,
    isValid: toBoolean(row.is_valid),
    lastUsed: toIsoString(row.last_used),
    createdAt: toIsoString(row.created_at) ?? '',
    updatedAt: toIsoString(row.updated_at) ?? '',
  };
}

async function findKeyRow(db: SqlExecutor, userId: string, keyId: string): Promise<ApiKeyRow> {
  const [idPlaceholder, userPlaceholder] = getParamPlaceholders(db.dialect, 2);
  const rows = await db.query<ApiKeyRow>(
    `SELECT * FROM user_api_keys WHERE id = ${idPlaceholder} AND user_id = ${userPlaceholder} LIMIT 1`,
    [keyId, userId],
  );
  if (!rows.length) {
    throw new NotFoundError('api key', keyId);
  }
  return rows[0];
}

export async function listApiKeys(
  db: SqlExecutor,
  encryption: KeyEncryption,
  userId: string,
): Promise<ApiKeySummary[]> {
  const [userPlaceholder] = getParamPlaceholders(db.dialect, 1);
  const rows = await db.query<ApiKeyRow>(
    `SELECT * FROM user_api_keys WHERE user_id = ${userPlaceholder} ORDER BY created_at DESC`,
    [userId],
  );
  return rows.map((row) => toSummary(row, encryption));
}

export async function createApiKey(
  db: SqlExecutor,
  encryption: KeyEncryption,
  userId: string,
  input: CreateApiKeyInput,
): Promise<ApiKeySummary> {
  const keyType = parseApiKeyType(input.keyType);
  const apiKey = validateApiKey(input.apiKey);

  const [userPlaceholder, typePlaceholder] = getParamPlaceholders(db.dialect, 2);
  const existing = await db.query<{ id: string }>(
    `SELECT id FROM user_api_keys WHERE user_id = ${userPlaceholder} AND key_type = ${typePlaceholder} LIMIT 1`,
    [userId, keyType],
  );
  if (existing.length) {
    throw new ConflictError(`API key for ${keyType} already exists. Use update instead.`);
  }

  const id = randomUUID();
  const nowIso = new Date().toISOString();
  const placeholders = getParamPlaceholders(db.dialect, 9);
  await db.execute(
    `INSERT INTO user_api_keys (
      id, user_id, key_type, encrypted_key, encrypted_credentials, key_name, is_valid, created_at, updated_at
    ) VALUES (${placeholders.join(', ')})`,
    [
      id,
      userId,
      keyType,
      encryption.encrypt(apiKey),
      encryptCredentials(encryption, input.credentials),
      input.keyName?.trim() || defaultKeyName(keyType),
      true,
      nowIso,
      nowIso,
    ],
  );

  return toSummary(await findKeyRow(db, userId, id), encryption);
}

export async function updateApiKey(
  db: SqlExecutor,
  encryption: KeyEncryption,
  userId: string,
  keyId: string,
  input: UpdateApiKeyInput,
): Promise<ApiKeySummary> {
  await findKeyRow(db, userId, keyId);

  const assignments: string[] = [];
  const params: unknown[] = [];
  const assign = (column: string, value: unknown) => {
    params.push(value);
    const [placeholder] = getParamPlaceholders(db.dialect, 1, params.length);
    assignments.push(`${column} = ${placeholder}`);
  };

  if (input.apiKey !== undefined) {
    assign('encrypted_key', encryption.encrypt(validateApiKey(input.apiKey)));
    // A replaced key is presumed good until a publisher says otherwise.
    assign('is_valid', true);
  }
  if (input.keyName !== undefined) {
    assign('key_name', input.keyName?.trim() || null);
  }
  if (input.credentials !== undefined) {
    assign('encrypted_credentials', encryptCredentials(encryption, input.credentials));
  }
  assign('updated_at', new Date().toISOString());

  params.push(keyId);
  const [idPlaceholder] = getParamPlaceholders(db.dialect, 1, params.length);
  await db.execute(`UPDATE user_api_keys SET ${assignments.join(', ')} WHERE id = ${idPlaceholder}`, params);

  return toSummary(await findKeyRow(db, userId, keyId), encryption);
}

export async function deleteApiKey(db: SqlExecutor, userId: string, keyId: string): Promise<void> {
  await findKeyRow(db, userId, keyId);
  const [idPlaceholder] = getParamPlaceholders(db.dialect, 1);
  await db.execute(`DELETE FROM user_api_keys WHERE id = ${idPlaceholder}`, [keyId]);
}

export async function getApiKeyStatus(db: SqlExecutor, userId: string): Promise<ApiKeyStatus> {
  const [userPlaceholder] = getParamPlaceholders(db.dialect, 1);
  const rows = await db.query<{ key_type: string; is_valid: unknown }>(
    `SELECT key_type, is_valid FROM user_api_keys WHERE user_id = ${userPlaceholder}`,
    [userId],
  );

  const status: ApiKeyStatus = {
    openai: false,
    gemini: false,
    anthropic: false,
    linkedin: false,
    instagram: false,
    facebook: false,
  };
  for (const row of rows) {
    const keyType = API_KEY_TYPES.find((candidate) => candidate === row.key_type);
    if (keyType && toBoolean(row.is_valid)) status[keyType] = true;
  }
  return status;
}

/**
 * Returns the user's valid key of `keyType` in plain text and stamps `last_used`.
 * Resolves to null when no valid key is stored; throws `EncryptionError` when the
 * stored value cannot be decrypted with the current key.
 */
export async function getDecryptedApiKey(
  db: SqlExecutor,
  encryption: KeyEncryption,
  userId: string,
  keyType: ApiKeyType,
): Promise<DecryptedApiKey | null> {
  const [userPlaceholder, typePlaceholder] = getParamPlaceholders(db.dialect, 2);
  const rows = await db.query<ApiKeyRow>(
    `SELECT * FROM user_api_keys WHERE user_id = ${userPlaceholder} AND key_type = ${typePlaceholder} LIMIT 1`,
    [userId, keyType],
  );
  const row = rows[0];
  if (!row || !toBoolean(row.is_valid)) return null;

  const apiKey = encryption.decrypt(row.encrypted_key);
  const credentials = row.encrypted_credentials
    ? parseJsonObject(encryption.decrypt(row.encrypted_credentials))
    : {};

  const [usedPlaceholder, idPlaceholder] = getParamPlaceholders(db.dialect, 2);
  await db.execute(`UPDATE user_api_keys SET last_used = ${usedPlaceholder} WHERE id = ${idPlaceholder}`, [
    new Date().toISOString(),
    row.id,
  ]);

  return { keyType, apiKey, credentials };
}
