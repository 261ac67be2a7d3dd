import type { ApiKeyType, LlmProvider } from '../types/api-key';
import type { Platform, PostStatus, ToneStyle } from '../types/post';

// ── 플랫폼 관련 ──

export const ALL_PLATFORMS: Platform[] = ['linkedin', 'instagram', 'facebook'];

export const PLATFORM_LABELS: Record<Platform, string> = {
  linkedin: 'LinkedIn',
  instagram: 'Instagram',
  facebook: 'Facebook',
};

// 플랫폼 발행 토큰이 저장되는 키 종류
export const PLATFORM_KEY_TYPES: Record<Platform, ApiKeyType> = {
  linkedin: 'linkedin',
  instagram: 'instagram',
  facebook: 'facebook',
};

// ── 포스트 상태 관련 ──

export const ALL_STATUSES: PostStatus[] = ['draft', 'pending', 'posted', 'failed'];

export const ALL_TONES: ToneStyle[] = ['professional', 'casual', 'educational', 'inspirational'];

// ── API 키 관련 ──

export const API_KEY_TYPES: ApiKeyType[] = [
  'openai',
  'gemini',
  'anthropic',
  'linkedin',
  'instagram',
  'facebook',
];

// 콘텐츠 생성 시 사용할 LLM 키 우선순위
export const LLM_KEY_PRIORITY: LlmProvider[] = ['openai', 'gemini', 'anthropic'];

export const MIN_API_KEY_LENGTH = 10;

// ── 스케줄러 관련 ──

export const DEFAULT_CHECK_INTERVAL_SECONDS = 60;   // tick 주기: 60초
export const DEFAULT_MAX_RETRY_ATTEMPTS = 3;        // 발행 실패 시 최대 시도 횟수
export const UPCOMING_POSTS_LIMIT = 20;
