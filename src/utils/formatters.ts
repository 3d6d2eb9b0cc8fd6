import { getTopicEmoji, getTopicName } from '../config/topics.js';
import type { GeneratedContent, QuestionContent } from '../types/content.js';

const SEPARATOR = '━'.repeat(20);

export const UNAVAILABLE_MESSAGE =
  '⚠️ Content is unavailable right now. The AI services are busy. Please try again in a few minutes.';

export const toPollSafeText = (value: string, maxLen: number): string => {
  const s = String(value ?? '').replace(/\s+/g, ' ').trim();
  if (s.length <= maxLen) return s;
  return `${s.slice(0, Math.max(0, maxLen - 3)).trimEnd()}...`;
};

export interface QuizPoll {
  question: string;
  options: string[];
  correctOptionIndex: number;
  explanation: string;
}

/**
 * Fits a question into Telegram quiz-poll limits (question 300, option 100, explanation 200 chars).
 */
export const toQuizPoll = (q: QuestionContent): QuizPoll => {
  const topic = q.topic ? `[${getTopicName(q.topic)}] ` : '';
  const explanation = q.source ? `${q.explanation}\n\nSource: ${q.source}` : q.explanation;
  return {
    question: toPollSafeText(`🏗️ ${topic}${q.text}`, 300),
    options: q.options.map(o => toPollSafeText(o, 100)),
    correctOptionIndex: q.correctOptionIndex,
    explanation: toPollSafeText(explanation, 200),
  };
};

const footer = (source?: string, visualHint?: string): string[] => [
  ...(visualHint ? [`🖼️ Visual: ${visualHint}`] : []),
  ...(source ? [`📚 Source: ${source}`] : []),
];

export const formatContent = (content: GeneratedContent): string => {
  const lines: string[] = [SEPARATOR];
  switch (content.kind) {
    case 'question':
      lines.push('🏗️ GATE Civil Question', SEPARATOR, `${getTopicEmoji(content.topic)} Topic: ${getTopicName(content.topic)}`, '', `❓ ${content.text}`, '');
      content.options.forEach((opt, i) => lines.push(`${String.fromCharCode(65 + i)}) ${opt}`));
      lines.push(...footer(content.source, content.visualHint));
      break;
    case 'fact':
      lines.push('📝 GATE Civil Key Note', SEPARATOR, `${getTopicEmoji(content.topic)} Topic: ${getTopicName(content.topic)}`, '', `💡 ${content.text}`, ...footer(content.source, content.visualHint));
      break;
    case 'formula':
      lines.push(
        '📐 GATE Civil Formula',
        SEPARATOR,
        `${getTopicEmoji(content.topic)} Topic: ${getTopicName(content.topic)}`,
        '',
        `📌 ${content.title}`,
        content.formula,
        `📖 ${content.explanation}`,
        ...footer(content.source, content.visualHint)
      );
      break;
    case 'language':
      lines.push(
        `🌐 Daily Language Micro-Learning (${content.language})`,
        SEPARATOR,
        `🔤 Word: ${content.word}`,
        `🗣️ Phonetic: ${content.phonetic}`,
        `📖 Meaning: ${content.meaning}`,
        '',
        `📝 Usage: ${content.usage}`,
        `💡 Tip: ${content.tip}`
      );
      break;
  }
  lines.push(SEPARATOR);
  return lines.join('\n');
};

export interface StatusReport {
  available: string[];
  providers: Record<string, { attempts: number; success: number; fail: number }>;
  lastProvider: string;
  lastError: string;
  cached: Record<string, number>;
}

export const formatStatus = (report: StatusReport): string => {
  const lines = ['🧠 Content pipeline status', ''];
  for (const [name, s] of Object.entries(report.providers)) {
    const mark = report.available.includes(name) ? '✅' : '⏭️';
    lines.push(`${mark} ${name}: attempts=${s.attempts} ok=${s.success} fail=${s.fail}`);
  }
  if (report.available.length === 0) {
    lines.push('', '⚠️ No provider key configured: serving cached content only.');
  }
  if (report.lastProvider) lines.push('', `Last provider: ${report.lastProvider}`);
  if (report.lastError) lines.push(`Last error: ${toPollSafeText(report.lastError, 300)}`);
  lines.push('', `📦 Cache: ${Object.entries(report.cached).map(([k, n]) => `${k}=${n}`).join(', ')}`);
  return lines.join('\n');
};
