const MINUTE_MS = 60_000;

// Date를 N분 뒤로 민 새 Date 반환 (원본은 건드리지 않음)
export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MINUTE_MS);
}

// DB에서 읽은 시각 값(문자열 또는 pg Date)을 ISO 8601 UTC 문자열로 통일
export function toIsoString(value: unknown): string | null {
  if (value === null || value === undefined || value === '') return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
  }
  return null;
}

// Date 객체를 "2026-02-19" 형식으로 변환 (UTC 기준)
export function formatDate(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

// Date 객체를 "14:30" 형식으로 변환 (UTC 기준)
export function formatTime(date: Date): string {
  const hours = String(date.getUTCHours()).padStart(2, '0');
  const minutes = String(date.getUTCMinutes()).padStart(2, '0');
  return `${hours}:${minutes}`;
}

// "14:30:05" 형식. 로그 타임스탬프용
export function formatTimeWithSeconds(date: Date): string {
  const seconds = String(date.getUTCSeconds()).padStart(2, '0');
  return `${formatTime(date)}:${seconds}`;
}
