export type ReplyKind = 'confirmed' | 'denied' | 'new_symptom';

// Checked in order; keywords match anywhere in the lowercased reply.
export const REPLY_KEYWORDS: { kind: Exclude<ReplyKind, 'new_symptom'>; keywords: string[] }[] = [
  { kind: 'confirmed', keywords: ['yes', 'y', 'yeah', 'definitely', 'observed'] },
  { kind: 'denied', keywords: ['no', 'n', 'nope', 'not', 'never', 'absent'] }
];

export function classifyReply(text: string): ReplyKind {
  const t = (text || '').trim().toLowerCase();
  for (const { kind, keywords } of REPLY_KEYWORDS) {
    if (keywords.some(k => t.includes(k))) return kind;
  }
  return 'new_symptom';
}
