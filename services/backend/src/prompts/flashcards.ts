export const createFlashcardPrompt = (text: string, numCards: number): string => `Create ${numCards} flashcards from the following text. Format each flashcard as:
Question: [your question here]
Answer: [your answer here]

Example:
Question: What is semantic communication?
Answer: Semantic communication is a paradigm that focuses on the meaning of information exchanged in communication systems.

Text: ${text}
`;
