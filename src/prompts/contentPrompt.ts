import { getAvailableTopics, getTopicName, isKnownTopic } from "../config/topics.js";
import type { ContentRequest, Difficulty } from "../types/content.js";

export interface ContentPrompt {
  text: string;
  /** The JSON shape the provider must return, as embedded in `text`. */
  schema: string;
}

export const getSystemInstruction = (): string => {
  return `You are a strict GATE Civil Engineering content generator. Output valid JSON only (no markdown/code fences).`;
};

export const QUESTION_SCHEMA = `{
  "question": "The question text here (max 300 chars)",
  "options": ["Option 1", "Option 2", "Option 3", "Option 4"],
  "correct_option_id": 0,
  "explanation": "A clear explanation of the solution (max 200 chars).",
  "topic": "SM",
  "difficulty": "medium",
  "source": "Textbook, IS code or past GATE paper the concept comes from",
  "visual_hint": "One line describing a helpful diagram (optional)"
}`;

export const FACT_SCHEMA = `{
  "fact": "The text of the fact.",
  "topic": "RCC",
  "source": "IS 456:2000 Cl. 26.4",
  "visual_hint": "One line describing a helpful diagram (optional)"
}`;

export const FORMULA_SCHEMA = `{
  "title": "Name of the formula",
  "formula": "The mathematical expression (use plain text representation)",
  "explanation": "Brief explanation of specific terms and context.",
  "topic": "FM",
  "source": "Standard reference book",
  "visual_hint": "One line describing a helpful diagram (optional)"
}`;

export const LANGUAGE_SCHEMA = `{
  "language": "German",
  "word": "Brücke",
  "phonetic": "BRUE-keh",
  "meaning": "Bridge",
  "usage": "Die Brücke ist aus Stahl gebaut.",
  "tip": "A short memory trick or grammar note."
}`;

const LANGUAGES = ['Japanese', 'German', 'French', 'Spanish'];

const difficultyGuidance = (difficulty: Difficulty): string => {
  switch (difficulty) {
    case 'easy':
      return "Direct recall of definitions, units and standard values.";
    case 'medium':
      return "Conceptual understanding or a standard one-step calculation.";
    case 'hard':
      return "Multi-step calculation or tricky conceptual reasoning at GATE level.";
  }
};

const topicLine = (topic?: string): string => {
  if (topic && isKnownTopic(topic)) {
    return `Topic: ${getTopicName(topic)} (code ${topic.toUpperCase()}). Set "topic" to "${topic.toUpperCase()}".`;
  }
  const list = getAvailableTopics().map(t => `${t.name} (${t.code})`).join(', ');
  return `Topics can include: ${list}. Pick one and set "topic" to its code.`;
};

const withFormat = (task: string, schema: string, rules: string): ContentPrompt => ({
  schema,
  text: `
${task}

Rules:
${rules}

Output Format (Strict JSON with this exact structure):
${schema}
`,
});

export const buildContentPrompt = (request: ContentRequest): ContentPrompt => {
  switch (request.kind) {
    case 'question': {
      const difficulty = request.difficulty ?? 'medium';
      return withFormat(
        `Generate a multiple-choice question (MCQ) for the Civil Engineering GATE exam.
${topicLine(request.topic)}
Difficulty: ${difficulty.toUpperCase()} - ${difficultyGuidance(difficulty)}`,
        QUESTION_SCHEMA,
        `1. Exactly 4 options.
2. correct_option_id must be an integer: 0 for 1st option, 1 for 2nd, etc.
3. Set "difficulty" to "${difficulty}".`
      );
    }
    case 'fact':
      return withFormat(
        `Generate a high-value "Key Note" or "One-Liner" for Civil Engineering GATE preparation.
${topicLine(request.topic)}
It should be a key concept, an important IS Code provision (IS 456, IS 800 etc) or a vital property of a material.`,
        FACT_SCHEMA,
        `1. "fact" is one or two sentences.
2. Cite a real "source".`
      );
    case 'formula':
      return withFormat(
        `Generate a key Civil Engineering formula often asked in GATE.
${topicLine(request.topic)}`,
        FORMULA_SCHEMA,
        `1. Use plain text for the expression (no LaTeX).
2. "explanation" defines every symbol.`
      );
    case 'language':
      return withFormat(
        `Generate a micro language lesson: one useful word in one of ${LANGUAGES.join(', ')}.`,
        LANGUAGE_SCHEMA,
        `1. "phonetic" is an English-readable pronunciation.
2. "usage" is one short example sentence in that language.`
      );
  }
};
