/**
 * @fileoverview Schema for UniProtKB entry responses.
 * @module src/services/drug-targets/providers/uniprot/types
 */
import { z } from 'zod';

export const UniProtEntrySchema = z.object({
  primaryAccession: z.string(),
  entryType: z.string().optional(),
  proteinDescription: z
    .object({
      recommendedName: z
        .object({
          fullName: z.object({ value: z.string() }),
        })
        .optional(),
    })
    .optional(),
  keywords: z
    .array(
      z.object({
        id: z.string().optional(),
        category: z.string().optional(),
        name: z.string(),
      }),
    )
    .optional(),
  uniProtKBCrossReferences: z
    .array(
      z.object({
        database: z.string(),
        id: z.string(),
        properties: z
          .array(z.object({ key: z.string(), value: z.string() }))
          .optional(),
      }),
    )
    .optional(),
  comments: z
    .array(
      z.object({
        commentType: z.string(),
        texts: z.array(z.object({ value: z.string() })).optional(),
      }),
    )
    .optional(),
});

export type UniProtEntry = z.infer<typeof UniProtEntrySchema>;
