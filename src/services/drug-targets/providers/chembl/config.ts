/**
 * @fileoverview ChEMBL REST API constants.
 * @module src/services/drug-targets/providers/chembl/config
 */

export const MOLECULE_ENDPOINT = 'molecule.json';
export const MECHANISM_ENDPOINT = 'mechanism.json';

/**
 * Target detail endpoint, e.g. `target/CHEMBL203.json`
 */
export const targetEndpoint = (targetChemblId: string): string =>
  `target/${encodeURIComponent(targetChemblId)}.json`;

/**
 * Molecule ordering requested from the API (oldest approvals first, then by name).
 * The id comes last so offset paging has no ties.
 */
export const MOLECULE_ORDER_BY = [
  'first_approval',
  'pref_name',
  'molecule_chembl_id',
] as const;

/**
 * Component accessions with these prefixes are gene identifiers, not proteins
 */
export const EXCLUDED_ACCESSION_PREFIXES = ['ENSG'] as const;

export interface ChemblClientOptions {
  baseUrl: string;
  pageSize: number;
  timeoutMs: number;
}
