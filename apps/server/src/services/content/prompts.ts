import type { Platform, ToneStyle } from '@socialdraft/shared';

export const SYSTEM_PROMPT = 'You are an expert social media content creator specializing in AI education.';

export const TONE_INSTRUCTIONS: Record<ToneStyle, string> = {
  professional: 'Write in a professional, authoritative tone suitable for business audiences.',
  casual: 'Write in a friendly, conversational tone that feels approachable.',
  educational: 'Write in an informative, teaching style that explains concepts clearly.',
  inspirational: 'Write in an uplifting, motivational tone that inspires action.',
};

// ── Platform prompt templates ({topic} / {tone_instruction} are substituted) ──

export const PLATFORM_PROMPTS: Record<Platform, string> = {
  linkedin: [
    'Create a professional LinkedIn post about: {topic}',
    '',
    'Requirements:',
    '- Start with a compelling hook',
    '- Include 3-5 key insights or takeaways',
    '- Use appropriate spacing for readability',
    '- End with a thought-provoking question',
    '- Keep it 200-300 words',
    "- Don't include hashtags (added separately)",
    '',
    '{tone_instruction}',
  ].join('\n'),
  instagram: [
    'Create an Instagram caption about: {topic}',
    '',
    'Requirements:',
    '- Start with a POWERFUL hook (emoji + attention-grabbing statement)',
    '- Keep main message short and punchy (max 150 words)',
    '- Use line breaks for readability',
    '- Include a clear call-to-action',
    '- End with 15-20 relevant hashtags',
    '',
    '{tone_instruction}',
  ].join('\n'),
  facebook: [
    'Create a Facebook post about: {topic}',
    '',
    'Requirements:',
    '- Use a storytelling approach',
    '- Make complex concepts simple and digestible',
    '- Include a personal touch or real-world example',
    '- Write in a conversational tone',
    '- End with a clear call-to-action',
    '- Keep it 150-250 words',
    '',
    '{tone_instruction}',
  ].join('\n'),
};

export interface PromptInput {
  topic: string;
  platform: Platform;
  tone: ToneStyle;
  additionalContext?: string | null;
}

export function buildUserPrompt(input: PromptInput): string {
  const prompt = PLATFORM_PROMPTS[input.platform]
    .replace('{topic}', input.topic)
    .replace('{tone_instruction}', TONE_INSTRUCTIONS[input.tone]);
  const context = input.additionalContext?.trim();
  return context ? `${prompt}\n\nAdditional context: ${context}` : prompt;
}
