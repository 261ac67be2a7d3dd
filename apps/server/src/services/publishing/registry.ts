import { FacebookPublisher } from './facebook';
import { InstagramPublisher } from './instagram';
import { LinkedInPublisher } from './linkedin';
import type { PublisherRegistry } from './publisher';

export function createDefaultPublisherRegistry(): PublisherRegistry {
  return {
    linkedin: (credentials) => new LinkedInPublisher(credentials),
    instagram: (credentials) => new InstagramPublisher(credentials),
    facebook: (credentials) => new FacebookPublisher(credentials),
  };
}
