import { DocumentReadError } from '../../document/errors/document-read.error';
import { DocumentTerms } from '../../document/interfaces/document.interface';

export interface MapSuccess {
  path: string;
  ok: true;
  document: DocumentTerms;
}

export interface MapFailure {
  path: string;
  ok: false;
  error: DocumentReadError;
}

/**
 * Outcome of mapping one path. The pool emits exactly one per path.
 */
export type MapResult = MapSuccess | MapFailure;
