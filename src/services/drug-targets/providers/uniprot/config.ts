/**
 * @fileoverview UniProt API configuration constants.
 * @module src/services/drug-targets/providers/uniprot/config
 */

/**
 * Entry endpoint, e.g. `uniprotkb/P12345.json`
 */
export const entryEndpoint = (accession: string): string =>
  `uniprotkb/${encodeURIComponent(accession)}.json`;

/**
 * Keyword added when the recommended protein name contains the word (case-insensitive)
 */
export const DESCRIPTION_CLASSES = [
  { term: 'receptor', keyword: 'Receptor' },
  { term: 'enzyme', keyword: 'Enzyme' },
  { term: 'channel', keyword: 'Channel' },
  { term: 'transporter', keyword: 'Transporter' },
] as const;

export const GO_DATABASE = 'GO';
export const GO_TERM_PROPERTY = 'GoTerm';
/** Aspect prefix of molecular-function GO terms */
export const GO_MOLECULAR_FUNCTION_PREFIX = 'F:';

export const SIMILARITY_COMMENT_TYPE = 'SIMILARITY';
export const FAMILY_MARKERS = ['belongs to the', 'protein family'] as const;

export interface UniProtClientOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Pause after each request */
  delayMs: number;
}
