export type TaskType = 'summarizer' | 'level_adapter' | 'flashcard_gen';

export type ReadingLevel = 'Beginner' | 'Intermediate' | 'Expert';

/** How much of a level-adapted completion survives extraction. */
export type AdaptationLineMode = 'first-line' | 'all-lines';

export interface TextChunk {
  readonly index: number;
  readonly text: string;
}

export interface CompletionRequest {
  taskType: TaskType;
  prompt: string;
  chunkIndex: number;
  totalChunks: number;
}

/**
 * One capability: turn a prompt into completion text. Implementations reject
 * with the errors in services/errors.ts.
 */
export interface CompletionModel {
  readonly provider: string;
  complete(request: CompletionRequest): Promise<string>;
}

export type ProgressObserver = (message: string, progress?: number) => void;

export interface SummaryResult {
  summary: string;
  highlights: string[];
  text: string;
}

export interface AdaptationResult {
  text: string;
  level: ReadingLevel;
  complexity: number;
  targetComplexity: number;
  withinTolerance: boolean;
}

export interface Flashcard {
  question: string;
  answer: string;
}

export type KeyConcepts = Record<string, string>;

export interface DebugPayload {
  kind: 'debug';
  rawOutputs: string[];
  error?: string;
}

export type SummaryOutcome = ({ kind: 'summary' } & SummaryResult) | DebugPayload;

export type AdaptationOutcome = ({ kind: 'adapted' } & AdaptationResult) | DebugPayload;

export type FlashcardOutcome = { kind: 'cards'; cards: Flashcard[] } | DebugPayload;

export type KeyConceptsOutcome = { kind: 'concepts'; concepts: KeyConcepts } | DebugPayload;
