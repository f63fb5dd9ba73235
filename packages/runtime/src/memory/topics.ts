// Topic extraction for conversation turns

const TOPIC_KEYWORDS: ReadonlyArray<readonly [topic: string, keywords: readonly string[]]> = [
  ['predictions', ['predict', 'outcome', 'winner']],
  ['modeling', ['model', 'algorithm', 'regression']],
  ['data_analysis', ['data', 'dataset', 'features']],
  ['learning', ['learn', 'tutorial', 'explain']],
  ['rankings', ['rank', 'rating', 'best']],
];

export const GENERAL_TOPIC = 'general';

/**
 * Topics mentioned in `text`, in a fixed order. Text matching no
 * keyword gets the single topic "general".
 */
export function extractTopics(text: string): string[] {
  const lower = text.toLowerCase();
  const topics = TOPIC_KEYWORDS.filter(([, keywords]) => keywords.some((k) => lower.includes(k))).map(
    ([topic]) => topic
  );
  return topics.length > 0 ? topics : [GENERAL_TOPIC];
}
