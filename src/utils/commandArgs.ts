import { DIFFICULTY_LEVELS, type Difficulty } from '../types/content.js';

export interface CommandArgs {
  topic?: string;
  difficulty?: Difficulty;
}

const isDifficulty = (value: string): value is Difficulty =>
  DIFFICULTY_LEVELS.some(level => level === value);

/**
 * `/question SM hard` → `{ topic: 'SM', difficulty: 'hard' }`. Order does not matter;
 * `random` means no topic. Unknown topic codes pass through.
 */
export const parseCommandArgs = (messageText: string): CommandArgs => {
  const [, ...tokens] = messageText.trim().split(/\s+/);
  const args: CommandArgs = {};
  for (const token of tokens) {
    const lower = token.toLowerCase();
    if (isDifficulty(lower)) {
      args.difficulty ??= lower;
    } else if (lower !== 'random' && lower && !args.topic) {
      args.topic = token.toUpperCase();
    }
  }
  return args;
};
