/**
 * @fileoverview Response schemas for the ChEMBL REST API.
 * Only the fields the pipeline reads are declared; the rest are stripped.
 * @module src/services/drug-targets/providers/chembl/types
 */
import { z } from 'zod';

/**
 * `max_phase` is a decimal in recent ChEMBL releases and arrives as a string ("4.0").
 */
const PhaseSchema = z.union([
  z.number(),
  z
    .string()
    .regex(/^-?\d+(\.\d+)?$/, 'Expected a numeric phase')
    .transform(Number),
]);

export const PageMetaSchema = z.object({
  limit: z.number().int(),
  offset: z.number().int(),
  total_count: z.number().int(),
  next: z.string().nullable(),
});

export const MoleculeSchema = z.object({
  molecule_chembl_id: z.string().min(1),
  pref_name: z.string().nullable().optional(),
  max_phase: PhaseSchema.nullable(),
  first_approval: z.number().int().nullable().optional(),
});

export const MechanismSchema = z.object({
  molecule_chembl_id: z.string().optional(),
  target_chembl_id: z.string().nullable().optional(),
});

export const TargetComponentSchema = z.object({
  accession: z.string().nullable().optional(),
  component_type: z.string().nullable().optional(),
});

export const TargetSchema = z.object({
  target_chembl_id: z.string(),
  target_type: z.string().nullable().optional(),
  target_components: z.array(TargetComponentSchema).default([]),
});

export type ChemblMolecule = z.infer<typeof MoleculeSchema>;
export type ChemblTarget = z.infer<typeof TargetSchema>;
