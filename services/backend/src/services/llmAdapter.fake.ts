import type { CompletionModel, CompletionRequest } from '../types';

export type FakeOutcome = string | Error;

export type FakeResponder = (request: CompletionRequest, callIndex: number) => FakeOutcome | Promise<FakeOutcome>;

/** Canned, task-shaped completions for running the service without network access. */
export const cannedResponder: FakeResponder = (request) => {
  switch (request.taskType) {
    case 'summarizer':
      return [
        'Summary: The text describes its main question, the method used and what was found.',
        'Key Highlights:',
        '- **Findings:** The approach works on the examples given.',
        '- **Implication:** The method can be reused elsewhere.'
      ].join('\n');
    case 'level_adapter':
      return 'This is the text rewritten in simpler words.';
    case 'flashcard_gen':
      return [
        'Question: What is the main topic of the text?',
        'Answer: The method described and what it found.',
        'Question: Why does the result matter?',
        'Answer: It shows the method can be reused elsewhere.'
      ].join('\n');
  }
};

/**
 * Deterministic completion model. Responds from a script (one entry per call)
 * or a responder function, and records every request it receives.
 */
export class FakeCompletionModel implements CompletionModel {
  readonly provider = 'fake';
  readonly calls: CompletionRequest[] = [];
  private readonly responder: FakeResponder;

  constructor(script: FakeResponder | FakeOutcome[] = cannedResponder) {
    this.responder = Array.isArray(script) ? scriptedResponder(script) : script;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const callIndex = this.calls.length;
    this.calls.push(request);
    const outcome = await this.responder(request, callIndex);
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome.trim();
  }
}

function scriptedResponder(script: FakeOutcome[]): FakeResponder {
  return (_request, callIndex) => {
    if (callIndex >= script.length) {
      return new Error(`No scripted completion for call ${callIndex + 1}`);
    }
    return script[callIndex];
  };
}
