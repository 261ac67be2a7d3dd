// 게시 대상 소셜 플랫폼
export type Platform = 'linkedin' | 'instagram' | 'facebook';

// 포스트 상태 — 스케줄러가 이 값을 기준으로 발행 여부를 판단한다
export type PostStatus =
  | 'draft'      // LLM 생성 직후 / 취소된 예약
  | 'pending'    // 승인됨, 스케줄러 발행 대기
  | 'posted'     // 발행 완료 (변경 불가)
  | 'failed';    // 재시도 한도 초과

export type ToneStyle = 'professional' | 'casual' | 'educational' | 'inspirational';

export interface Post {
  id: string;
  userId: string;
  topicId: string;
  platform: Platform;
  content: string;
  hashtags: string[];
  tone: ToneStyle;
  status: PostStatus;

  scheduledTime: string | null;   // null이면 다음 tick에서 바로 발행
  postedAt: string | null;
  platformPostId: string | null;

  retryCount: number;
  lastError: string | null;

  createdAt: string;
  updatedAt: string;
}

// 발행 실패 1회당 1건
export interface ErrorLog {
  id: string;
  postId: string;
  errorMessage: string;
  errorType: string | null;
  attemptNumber: number;
  createdAt: string;
}

export interface PostStats {
  draft: number;
  pending: number;
  posted: number;
  failed: number;
  total: number;
}
