export const OPEN_PROMPT = 'Please describe any other symptoms you observe.';

interface QuestionTemplate {
  applies: (symptom: string) => boolean;
  render: (symptom: string) => string;
}

const containsAny = (words: string[]) => (s: string) => words.some(w => s.includes(w));

// First matching template wins.
export const QUESTION_TEMPLATES: QuestionTemplate[] = [
  {
    applies: containsAny(['soil', 'ground', 'environment']),
    render: s => `Do you observe ${s} around the plant?`
  },
  {
    applies: containsAny(['stress', 'condition', 'temperature']),
    render: s => `Is the plant showing signs of ${s}?`
  },
  {
    applies: s => s.startsWith('dry') || s.startsWith('wet'),
    render: s => `Are there ${s} conditions affecting the plant?`
  },
  {
    applies: () => true,
    render: s => `Do you observe ${s} on the plant?`
  }
];

export function formatQuestion(symptom: string | null | undefined): string {
  const s = (symptom ?? '').trim().toLowerCase();
  if (!s) return OPEN_PROMPT;
  const template = QUESTION_TEMPLATES.find(t => t.applies(s));
  return template ? template.render(s) : OPEN_PROMPT;
}
