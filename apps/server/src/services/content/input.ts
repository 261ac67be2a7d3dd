import type { Platform, ToneStyle } from '@socialdraft/shared';
import { ALL_PLATFORMS, ALL_TONES } from '@socialdraft/shared';
import { ValidationError } from '../../utils/errors';

// Lower-cased, de-duplicated, first-seen order.
export function parsePlatforms(values: readonly string[]): Platform[] {
  const platforms: Platform[] = [];
  const invalid: string[] = [];

  for (const raw of values) {
    const value = raw.trim().toLowerCase();
    if (!value) continue;
    const platform = ALL_PLATFORMS.find((candidate) => candidate === value);
    if (!platform) {
      invalid.push(value);
    } else if (!platforms.includes(platform)) {
      platforms.push(platform);
    }
  }

  if (invalid.length) {
    throw new ValidationError(`Invalid platforms: ${invalid.join(', ')}. Valid options: ${ALL_PLATFORMS.join(', ')}`);
  }
  if (!platforms.length) {
    throw new ValidationError('At least one platform must be selected');
  }
  return platforms;
}

export function parseTone(value: string | undefined): ToneStyle {
  if (value === undefined) return 'professional';
  const tone = ALL_TONES.find((candidate) => candidate === value.trim().toLowerCase());
  if (!tone) {
    throw new ValidationError(`Invalid tone. Valid options: ${ALL_TONES.join(', ')}`);
  }
  return tone;
}
