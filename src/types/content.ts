export type ContentKind = 'question' | 'fact' | 'formula' | 'language';

export const CONTENT_KINDS: readonly ContentKind[] = ['question', 'fact', 'formula', 'language'];

export type Difficulty = 'easy' | 'medium' | 'hard';

export const DIFFICULTY_LEVELS: readonly Difficulty[] = ['easy', 'medium', 'hard'];

export type ContentRequest =
  | { readonly kind: 'question'; readonly topic?: string; readonly difficulty?: Difficulty }
  | { readonly kind: 'fact'; readonly topic?: string }
  | { readonly kind: 'formula'; readonly topic?: string }
  | { readonly kind: 'language' };

export interface QuestionContent {
  kind: 'question';
  text: string;
  options: string[];
  correctOptionIndex: number;
  explanation: string;
  topic?: string;
  difficulty?: string;
  source?: string;
  visualHint?: string;
}

export interface FactContent {
  kind: 'fact';
  text: string;
  topic?: string;
  source?: string;
  visualHint?: string;
}

export interface FormulaContent {
  kind: 'formula';
  title: string;
  formula: string;
  explanation: string;
  topic?: string;
  source?: string;
  visualHint?: string;
}

export interface LanguageTipContent {
  kind: 'language';
  language: string;
  word: string;
  phonetic: string;
  meaning: string;
  usage: string;
  tip: string;
}

export type GeneratedContent = QuestionContent | FactContent | FormulaContent | LanguageTipContent;

export type ContentOfKind<K extends ContentKind> = Extract<GeneratedContent, { kind: K }>;

export type CacheStore = { [K in ContentKind]: ContentOfKind<K>[] };

/**
 * Field used to detect duplicates: question text, fact text, formula title or word.
 */
export const naturalKeyOf = (content: GeneratedContent): string => {
  switch (content.kind) {
    case 'question':
    case 'fact':
      return content.text;
    case 'formula':
      return content.title;
    case 'language':
      return content.word;
  }
};

export type ContentResult =
  | { status: 'generated'; content: GeneratedContent; provider: string }
  | { status: 'cached'; content: GeneratedContent }
  | { status: 'unavailable' };
