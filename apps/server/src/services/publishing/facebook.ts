import type { PlatformCredentials, PublishResult, Publisher } from './publisher';
import { simulatePublish } from './publisher';

export class FacebookPublisher implements Publisher {
  readonly platform = 'facebook';

  constructor(private readonly credentials: PlatformCredentials) {}

  async postContent(content: string): Promise<PublishResult> {
    if (!content.trim()) {
      return { success: false, message: 'Facebook post content is empty' };
    }
    // A connected token without a page has nowhere to post.
    if (this.credentials.accessToken && !this.credentials.accountId) {
      return { success: false, message: 'Facebook page_id is not configured' };
    }
    return simulatePublish(this.platform, this.credentials);
  }
}
