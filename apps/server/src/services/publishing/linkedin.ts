import type { PlatformCredentials, PublishResult, Publisher } from './publisher';
import { simulatePublish } from './publisher';

export const LINKEDIN_TEXT_LIMIT = 3000;

export class LinkedInPublisher implements Publisher {
  readonly platform = 'linkedin';

  constructor(private readonly credentials: PlatformCredentials) {}

  async postContent(content: string): Promise<PublishResult> {
    if (content.length > LINKEDIN_TEXT_LIMIT) {
      return {
        success: false,
        message: `LinkedIn post exceeds ${LINKEDIN_TEXT_LIMIT} characters (${content.length})`,
      };
    }
    return simulatePublish(this.platform, this.credentials);
  }
}
