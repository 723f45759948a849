/**
 * Sample documents for tests.
 */

/** Five short paragraphs, one topic each */
export const AI_GUIDE = [
  'Artificial Intelligence (AI) is the field of building systems that perform tasks which normally need human intelligence. It covers reasoning, planning and perception.',
  'Machine Learning is a subset of AI. Machine learning systems improve at a task by learning patterns from data instead of following hand-written rules.',
  'Deep learning uses neural networks with many layers. Neural networks power modern image and speech recognition.',
  'Natural language processing lets computers read and write human language. Language models predict the next word in a sentence.',
  'Computer vision teaches machines to interpret images. Vision systems detect objects and faces.',
].join('\n\n');

/** Vocabulary for KeywordEmbeddingProvider over AI_GUIDE */
export const AI_GUIDE_VOCABULARY = ['machine', 'learning', 'neural', 'networks', 'language', 'vision'];
