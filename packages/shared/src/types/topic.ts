import type { Post, ToneStyle } from './post';

// 콘텐츠 생성 요청 단위. 플랫폼별 포스트의 부모
export interface Topic {
  id: string;
  userId: string;
  name: string;
  description: string | null;
  tone: ToneStyle;
  createdAt: string;
}

export interface TopicSummary extends Topic {
  postCount: number;
}

export interface TopicWithPosts extends Topic {
  posts: Post[];
}
