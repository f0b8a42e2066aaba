/**
 * @fileoverview Barrel export for the drug-target domain.
 * @module src/services/drug-targets/index
 */

// Core
export type { IDrugProvider } from './core/IDrugProvider.js';
export type { IAnnotationProvider } from './core/IAnnotationProvider.js';
export {
  DrugTargetService,
  compareLinks,
  distinctAccessions,
} from './core/DrugTargetService.js';
export { filterApprovedSince, isApprovedSince } from './core/date-filter.js';

// Providers
export { ChemblDrugProvider } from './providers/chembl/index.js';
export { UniProtAnnotationProvider } from './providers/uniprot/index.js';

// Types
export type * from './types.js';
