import { performance } from 'node:perf_hooks';
import pino from 'pino';
import { config } from '../config';

const log = pino({ name: 'paper-source', level: config.logLevel });

const ARXIV_HOSTS = ['arxiv.org'];
const NEW_STYLE_ID = /^(\d{4}\.\d{4,5})(v\d+)?$/;
const OLD_STYLE_ID = /^([a-z-]+(?:\.[A-Z]{2})?\/\d{7})(v\d+)?$/;

export interface PaperReference {
  provider: 'arxiv';
  id: string;
  version?: string;
}

export interface PaperFetchResult {
  reference: PaperReference;
  text: string | null;
  latencyMs: number;
  error?: 'not_implemented';
}

function parseArxivId(raw: string): PaperReference | null {
  const match = NEW_STYLE_ID.exec(raw) ?? OLD_STYLE_ID.exec(raw);
  if (!match) return null;
  return match[2] ? { provider: 'arxiv', id: match[1], version: match[2] } : { provider: 'arxiv', id: match[1] };
}

function isAllowedHost(hostname: string): boolean {
  return ARXIV_HOSTS.some((host) => hostname === host || hostname.endsWith(`.${host}`));
}

/**
 * Accepts a bare arXiv identifier (`2101.00001`, `hep-th/9901001v2`, optionally
 * prefixed with `arXiv:`) or an arxiv.org `/abs/` or `/pdf/` URL.
 */
export function resolvePaperSource(source: string): PaperReference | null {
  const trimmed = source.trim();
  if (!trimmed) return null;

  const bare = trimmed.replace(/^arxiv:/i, '');
  if (!/^https?:\/\//i.test(bare)) {
    return parseArxivId(bare);
  }

  let url: URL;
  try {
    url = new URL(bare);
  } catch {
    return null;
  }
  if (!isAllowedHost(url.hostname)) return null;

  const path = /^\/(?:abs|pdf)\/(.+?)(?:\.pdf)?\/?$/.exec(url.pathname);
  return path ? parseArxivId(path[1]) : null;
}

export async function fetchPaper(reference: PaperReference): Promise<PaperFetchResult> {
  const start = performance.now();
  // Download and PDF text extraction are not implemented yet.
  log.debug({ reference }, 'paper fetch skipped');
  return { reference, text: null, latencyMs: performance.now() - start, error: 'not_implemented' };
}
