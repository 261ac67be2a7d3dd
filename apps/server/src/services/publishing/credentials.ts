import type { Logger, Platform } from '@socialdraft/shared';
import { PLATFORM_KEY_TYPES, createLogger } from '@socialdraft/shared';
import type { SqlExecutor } from '../../db';
import { asString } from '../../utils/db';
import { toErrorMessage } from '../../utils/errors';
import { EncryptionError, type KeyEncryption } from '../keys/encryption';
import { getDecryptedApiKey } from '../keys/store';
import { EMPTY_CREDENTIALS, type PlatformCredentials } from './publisher';

export type CredentialResolver = (userId: string, platform: Platform) => Promise<PlatformCredentials>;

const ACCOUNT_ID_FIELDS: Record<Platform, string | null> = {
  linkedin: null,
  instagram: 'business_account_id',
  facebook: 'page_id',
};

/**
 * Looks up the user's stored platform token. A missing key, or one that no longer
 * decrypts, yields empty credentials so the publisher treats the account as not connected.
 */
export function createCredentialResolver(
  db: SqlExecutor,
  encryption: KeyEncryption,
  logger: Logger = createLogger('credentials'),
): CredentialResolver {
  return async (userId, platform) => {
    const stored = await getDecryptedApiKey(db, encryption, userId, PLATFORM_KEY_TYPES[platform]).catch(
      (error: unknown) => {
        if (!(error instanceof EncryptionError)) throw error;
        logger.warn(`${platform} key for user ${userId} could not be decrypted: ${toErrorMessage(error)}`);
        return null;
      },
    );
    if (!stored) return EMPTY_CREDENTIALS;

    const accountField = ACCOUNT_ID_FIELDS[platform];
    return {
      accessToken: stored.apiKey,
      accountId: accountField ? asString(stored.credentials[accountField]) ?? '' : '',
    };
  };
}
