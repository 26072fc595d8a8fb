export { createSummaryPrompt, createCombiningSummaryPrompt, createChunkSummaryPrompt } from './summary';
export { createLevelPrompt, createKeyConceptsPrompt } from './level';
export { createFlashcardPrompt } from './flashcards';
