export const TOPICS: Readonly<Record<string, string>> = {
  SM: 'Soil Mechanics',
  FM: 'Fluid Mechanics',
  SA: 'Structural Analysis',
  RCC: 'Reinforced Concrete Design',
  STEEL: 'Steel Structures',
  GEO: 'Geomatics / Surveying',
  ENV: 'Environmental Engineering',
  TRANS: 'Transportation Engineering',
  HYDRO: 'Hydrology & Irrigation',
  CONST: 'Construction Management',
};

const TOPIC_EMOJIS: Readonly<Record<string, string>> = {
  SM: '🏔️',
  FM: '💧',
  SA: '🏗️',
  RCC: '🧱',
  STEEL: '🔩',
  GEO: '🗺️',
  ENV: '🌿',
  TRANS: '🛣️',
  HYDRO: '🌊',
  CONST: '📋',
};

export const GENERAL_TOPIC = 'General';

export const isKnownTopic = (code?: string): boolean =>
  Boolean(code) && Object.prototype.hasOwnProperty.call(TOPICS, String(code).toUpperCase());

export const getTopicName = (code?: string): string => {
  if (!code || !isKnownTopic(code)) return GENERAL_TOPIC;
  return TOPICS[code.toUpperCase()] ?? GENERAL_TOPIC;
};

export const getTopicEmoji = (code?: string): string => {
  if (!code) return '📚';
  return TOPIC_EMOJIS[code.toUpperCase()] ?? '📚';
};

export const getAvailableTopics = (): Array<{ code: string; name: string }> =>
  Object.entries(TOPICS).map(([code, name]) => ({ code, name }));
