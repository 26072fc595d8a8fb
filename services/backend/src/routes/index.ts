import type { ErrorRequestHandler, Express, Request, Response } from 'express';
import pino from 'pino';
import { config } from '../config';
import type { Pipeline } from '../orchestrator';
import { AuthError, describeError } from '../services/errors';
import { fetchPaper, resolvePaperSource } from '../services/paperSource';
import { RequestValidationError, parseBody, validators } from '../services/validator';

const log = pino({ name: 'http', level: config.logLevel });

export interface HttpResult {
  status: number;
  body: unknown;
}

export type Handler = (body: unknown) => Promise<HttpResult>;

const ok = (body: unknown): HttpResult => ({ status: 200, body });

export function toErrorResult(err: unknown): HttpResult {
  if (err instanceof RequestValidationError) {
    return { status: 400, body: { error: err.message, details: err.details } };
  }
  if (err instanceof AuthError) {
    return { status: 401, body: { error: err.message } };
  }
  log.error({ err: describeError(err) }, 'unhandled error in request');
  return { status: 500, body: { error: 'Internal server error' } };
}

export function createHandlers(pipeline: Pipeline) {
  return {
    summarize: async (body: unknown): Promise<HttpResult> => {
      const { text } = parseBody(validators.text, body);
      return ok(await pipeline.summarizer.summarize(text));
    },

    adapt: async (body: unknown): Promise<HttpResult> => {
      const { text, level } = parseBody(validators.adapt, body);
      return ok(await pipeline.levelAdapter.adapt(text, level));
    },

    concepts: async (body: unknown): Promise<HttpResult> => {
      const { text } = parseBody(validators.text, body);
      return ok(await pipeline.levelAdapter.getKeyConcepts(text));
    },

    flashcards: async (body: unknown): Promise<HttpResult> => {
      const { text, num_cards: numCards } = parseBody(validators.flashcards, body);
      return ok(await pipeline.flashcards.generate(text, numCards));
    },

    process: async (body: unknown): Promise<HttpResult> => {
      const { text } = parseBody(validators.text, body);
      return ok(await pipeline.processText(text));
    },

    papers: async (body: unknown): Promise<HttpResult> => {
      const { source } = parseBody(validators.paper, body);
      const reference = resolvePaperSource(source);
      if (!reference) {
        throw new RequestValidationError([`.source is not an arXiv identifier or arxiv.org URL: ${source}`]);
      }
      const result = await fetchPaper(reference);
      return { status: 501, body: { error: 'Paper processing is not implemented yet', reference: result.reference } };
    }
  } satisfies Record<string, Handler>;
}

const isBodyParseError = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';

/** Runs a handler and never lets an exception escape to the framework. */
export async function runHandler(handler: Handler, body: unknown): Promise<HttpResult> {
  try {
    return await handler(body);
  } catch (err) {
    return toErrorResult(err);
  }
}

export function registerRoutes(app: Express, pipeline: Pipeline) {
  const handlers = createHandlers(pipeline);

  const post = (path: string, handler: Handler) => {
    app.post(path, async (req: Request, res: Response) => {
      const result = await runHandler(handler, req.body);
      res.status(result.status).json(result.body);
    });
  };

  app.get('/health', (_req: Request, res: Response) => res.status(200).json({ status: 'ok' }));
  app.get('/api/model-info', (_req: Request, res: Response) => res.json(pipeline.modelInfo()));

  post('/api/summarize', handlers.summarize);
  post('/api/adapt', handlers.adapt);
  post('/api/concepts', handlers.concepts);
  post('/api/flashcards', handlers.flashcards);
  post('/api/process', handlers.process);
  post('/api/papers', handlers.papers);

  const handleError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    const result = isBodyParseError(err)
      ? { status: 400, body: { error: 'Malformed JSON body' } }
      : toErrorResult(err);
    res.status(result.status).json(result.body);
  };
  app.use(handleError);
}
