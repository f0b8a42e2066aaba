/**
 * @fileoverview Domain types for the approved-drug target pipeline.
 * @module src/services/drug-targets/types
 */

/**
 * A drug as returned by the drug API, reduced to the fields the pipeline uses.
 */
export interface DrugRecord {
  /** Drug identifier (ChEMBL molecule id, e.g. "CHEMBL25") */
  readonly id: string;
  /** Preferred name; null when the source has none */
  readonly name: string | null;
  /** Maximal development phase; 4 means approved */
  readonly maxPhase: number;
  /** Year of first approval; null when unknown */
  readonly firstApprovalYear: number | null;
}

/**
 * One (drug, target) pair.
 */
export interface TargetLink {
  drugId: string;
  drugName: string | null;
  /** UniProt accession of the target protein */
  accession: string;
}

export interface TargetKeywords {
  accession: string;
  /** Sorted, deduplicated; may be empty */
  keywords: string[];
}

export interface FailedDrug {
  drugId: string;
  reason: string;
}

export interface PipelineResult {
  /** Drugs that passed the phase and approval-year filters */
  drugs: DrugRecord[];
  /** Sorted by drug id, then accession */
  links: TargetLink[];
  /** One entry per distinct accession in `links`, sorted by accession */
  keywords: TargetKeywords[];
  /** Drugs whose target lookup failed and was skipped */
  failedDrugs: FailedDrug[];
}

export interface ReportPaths {
  drugTargets: string;
  targetKeywords: string;
}
