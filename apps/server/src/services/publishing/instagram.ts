import type { PlatformCredentials, PublishResult, Publisher } from './publisher';
import { simulatePublish } from './publisher';

export const INSTAGRAM_CAPTION_LIMIT = 2200;

export function buildCaption(content: string, hashtags: string[] = []): string {
  return hashtags.length ? `${content}\n\n${hashtags.join(' ')}` : content;
}

export class InstagramPublisher implements Publisher {
  readonly platform = 'instagram';

  constructor(private readonly credentials: PlatformCredentials) {}

  async postContent(content: string, hashtags?: string[]): Promise<PublishResult> {
    const caption = buildCaption(content, hashtags);
    if (caption.length > INSTAGRAM_CAPTION_LIMIT) {
      return {
        success: false,
        message: `Instagram caption exceeds ${INSTAGRAM_CAPTION_LIMIT} characters (${caption.length})`,
      };
    }
    if (this.credentials.accessToken && !this.credentials.accountId) {
      return { success: false, message: 'Instagram business_account_id is not configured' };
    }
    return simulatePublish(this.platform, this.credentials);
  }
}
