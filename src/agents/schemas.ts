import { z } from 'zod';

export const CitationMetadataSchema = z.object({
  title: z.string().nullable(),
  authors: z.array(z.string()),
  year: z.number().int().min(1000).max(9999).nullable(),
});

export type CitationMetadataOutput = z.infer<typeof CitationMetadataSchema>;
