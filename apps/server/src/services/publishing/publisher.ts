import type { Platform } from '@socialdraft/shared';
import { PLATFORM_LABELS } from '@socialdraft/shared';

export interface PublishResult {
  success: boolean;
  postId?: string;
  message?: string;
  // No real platform call was made.
  mock?: boolean;
}

export interface Publisher {
  readonly platform: Platform;
  // Resolves `success: false` for expected problems; throws only for unexpected ones.
  postContent: (content: string, hashtags?: string[]) => Promise<PublishResult>;
}

export interface PlatformCredentials {
  accessToken: string;
  // Facebook page_id / Instagram business_account_id; empty for LinkedIn.
  accountId: string;
}

export type PublisherFactory = (credentials: PlatformCredentials) => Publisher;

export type PublisherRegistry = Record<Platform, PublisherFactory>;

export const EMPTY_CREDENTIALS: PlatformCredentials = { accessToken: '', accountId: '' };

// Platform API payloads are not wired yet; connected accounts get a simulated post id.
export function simulatePublish(platform: Platform, credentials: PlatformCredentials): PublishResult {
  const timestamp = Date.now();
  if (!credentials.accessToken) {
    return {
      success: true,
      postId: `mock_${platform}_${timestamp}`,
      message: `Mock post (${PLATFORM_LABELS[platform]} not connected)`,
      mock: true,
    };
  }
  return {
    success: true,
    postId: `${platform}_${timestamp}`,
    message: 'Post simulation successful',
    mock: true,
  };
}
