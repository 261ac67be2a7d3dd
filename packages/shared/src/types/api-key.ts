// 사용자가 등록하는 키 종류 (LLM 3종 + 플랫폼 3종)
export type ApiKeyType = 'openai' | 'gemini' | 'anthropic' | 'linkedin' | 'instagram' | 'facebook';

export type LlmProvider = Extract<ApiKeyType, 'openai' | 'gemini' | 'anthropic'>;

// 목록 조회용. 원문 키는 절대 포함하지 않는다
export interface ApiKeySummary {
  id: string;
  keyType: ApiKeyType;
  keyName: string | null;
  maskedKey: string;
  isValid: boolean;
  lastUsed: string | null;
  createdAt: string;
  updatedAt: string;
}

export type ApiKeyStatus = Record<ApiKeyType, boolean>;
