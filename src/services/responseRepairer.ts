import { z } from 'zod';
import type { ContentKind, ContentOfKind, GeneratedContent } from '../types/content.js';

export class ContentParseError extends Error {
  kind: ContentKind;
  rawSnippet: string;

  constructor(message: string, opts: { kind: ContentKind; raw: string }) {
    super(message);
    this.name = 'ContentParseError';
    this.kind = opts.kind;
    this.rawSnippet = opts.raw.slice(0, 400);
  }
}

export type ParseResult<T> = { ok: true; content: T } | { ok: false; error: ContentParseError };

const text = z.string().trim().min(1);
// Models often send null for fields they leave out.
const optionalText = z
  .string()
  .nullish()
  .transform(v => v ?? undefined);

const questionWire = z.object({
  question: text,
  options: z.array(z.string()).length(4),
  correct_option_id: z.number().int().min(0).max(3),
  explanation: text,
  topic: optionalText,
  difficulty: optionalText,
  source: optionalText,
  visual_hint: optionalText,
});

const factWire = z.object({
  fact: text,
  topic: optionalText,
  source: optionalText,
  visual_hint: optionalText,
});

const formulaWire = z.object({
  title: text,
  formula: text,
  explanation: text,
  topic: optionalText,
  source: optionalText,
  visual_hint: optionalText,
});

const languageWire = z.object({
  language: text,
  word: text,
  phonetic: text,
  meaning: text,
  usage: text,
  tip: text,
});

type Check<T> = { success: true; data: T } | { success: false; issues: z.ZodIssue[] };

const check = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): Check<T> => {
  const result = schema.safeParse(data);
  return result.success ? { success: true, data: result.data } : { success: false, issues: result.error.issues };
};

const validators: { [K in ContentKind]: (data: unknown) => Check<ContentOfKind<K>> } = {
  question: data =>
    check(
      questionWire.transform((q): ContentOfKind<'question'> => ({
        kind: 'question',
        text: q.question,
        options: q.options,
        correctOptionIndex: q.correct_option_id,
        explanation: q.explanation,
        topic: q.topic,
        difficulty: q.difficulty,
        source: q.source,
        visualHint: q.visual_hint,
      })),
      data
    ),
  fact: data =>
    check(
      factWire.transform((f): ContentOfKind<'fact'> => ({
        kind: 'fact',
        text: f.fact,
        topic: f.topic,
        source: f.source,
        visualHint: f.visual_hint,
      })),
      data
    ),
  formula: data =>
    check(
      formulaWire.transform((f): ContentOfKind<'formula'> => ({
        kind: 'formula',
        title: f.title,
        formula: f.formula,
        explanation: f.explanation,
        topic: f.topic,
        source: f.source,
        visualHint: f.visual_hint,
      })),
      data
    ),
  language: data => check(languageWire.transform((l): ContentOfKind<'language'> => ({ kind: 'language', ...l })), data),
};

/**
 * Best-effort cleanup of LLM output into a JSON object literal.
 * Only a single missing closing brace is repaired; deeper truncation still fails to parse.
 */
export const repairJsonText = (raw: string): string => {
  let s = String(raw ?? '').trim();
  if (!s) return s;

  if (s.charCodeAt(0) === 0xfeff) {
    s = s.slice(1).trim();
  }

  // Remove ```json fences if present
  s = s.replace(/^```[a-zA-Z]*\s*/, '');
  s = s.replace(/\s*```\s*$/, '');
  s = s.trim();

  if (s.startsWith('{') && !s.endsWith('}')) {
    s = `${s}}`;
  }

  const start = s.indexOf('{');
  const end = s.lastIndexOf('}');
  if (start >= 0 && end > start) {
    s = s.slice(start, end + 1);
  }

  try {
    JSON.parse(s);
    return s;
  } catch {
    // Remove trailing commas before } or ] (common LLM mistake)
    return s.replace(/,\s*([}\]])/g, '$1');
  }
};

export const parseJsonObject = (raw: string): unknown => JSON.parse(repairJsonText(raw));

export function repairAndParse<K extends ContentKind>(raw: string, kind: K): ParseResult<ContentOfKind<K>>;
export function repairAndParse(raw: string, kind: ContentKind): ParseResult<GeneratedContent> {
  let data: unknown;
  try {
    data = parseJsonObject(raw);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return { ok: false, error: new ContentParseError(`Invalid JSON: ${reason}`, { kind, raw }) };
  }

  const parsed = validators[kind](data);
  if (!parsed.success) {
    const issue = parsed.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
    return {
      ok: false,
      error: new ContentParseError(`Invalid ${kind} structure${where}: ${issue?.message ?? 'unknown'}`, { kind, raw }),
    };
  }
  return { ok: true, content: parsed.data };
}

const storedFields = {
  topic: optionalText,
  source: optionalText,
  visualHint: optionalText,
};

const storedValidators: { [K in ContentKind]: z.ZodTypeAny } = {
  question: z.object({
    kind: z.literal('question'),
    text,
    options: z.array(z.string()).length(4),
    correctOptionIndex: z.number().int().min(0).max(3),
    explanation: text,
    difficulty: optionalText,
    ...storedFields,
  }),
  fact: z.object({ kind: z.literal('fact'), text, ...storedFields }),
  formula: z.object({ kind: z.literal('formula'), title: text, formula: text, explanation: text, ...storedFields }),
  language: z.object({
    kind: z.literal('language'),
    language: text,
    word: text,
    phonetic: text,
    meaning: text,
    usage: text,
    tip: text,
  }),
};

/**
 * Validates an already-decoded domain object, e.g. a cache entry read from disk.
 */
export const validateStoredContent = <K extends ContentKind>(kind: K, value: unknown): value is ContentOfKind<K> =>
  storedValidators[kind].safeParse(value).success;
