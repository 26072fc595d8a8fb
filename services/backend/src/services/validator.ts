import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import pino from 'pino';
import { config } from '../config';
import adaptSchema from '../schemas/AdaptRequest.schema.json';
import flashcardsSchema from '../schemas/FlashcardsRequest.schema.json';
import paperSchema from '../schemas/PaperRequest.schema.json';
import textSchema from '../schemas/TextRequest.schema.json';
import type { ReadingLevel } from '../types';

const log = pino({ name: 'request-validator', level: config.logLevel });

export interface TextRequest {
  text: string;
}

export interface AdaptRequest {
  text: string;
  level?: ReadingLevel;
}

export interface FlashcardsRequest {
  text: string;
  num_cards?: number;
}

export interface PaperRequest {
  source: string;
  callback_url?: string;
}

const ajv = new Ajv({
  allErrors: true,
  strict: false,
  strictSchema: false
});
addFormats(ajv);

export const validators = {
  text: ajv.compile<TextRequest>(textSchema),
  adapt: ajv.compile<AdaptRequest>(adaptSchema),
  flashcards: ajv.compile<FlashcardsRequest>(flashcardsSchema),
  paper: ajv.compile<PaperRequest>(paperSchema)
};

export class RequestValidationError extends Error {
  constructor(public readonly details: string[]) {
    super('Invalid request body');
    this.name = 'RequestValidationError';
  }
}

export function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((err) => `${err.instancePath || '.'} ${err.message ?? ''}`.trim());
}

/** Returns the body typed by its schema, or throws RequestValidationError listing every violation. */
export function parseBody<T>(validate: ValidateFunction<T>, body: unknown): T {
  if (validate(body)) {
    return body;
  }
  const details = formatErrors(validate.errors);
  log.warn({ details }, 'request body failed validation');
  throw new RequestValidationError(details);
}
