import { z } from 'zod';
import { signatureParamsSchema } from '../config';

export const INDEX_VERSION = 1;

export const trackEntrySchema = z.object({
  id: z.string().min(1),
  audioPath: z.string(),
  /** Relative to the signatures root. */
  signaturePath: z.string().min(1)
});

export const indexSchema = z.object({
  version: z.literal(INDEX_VERSION),
  createdAt: z.string(),
  params: signatureParamsSchema,
  tracks: z.array(trackEntrySchema)
});

export type IndexFile = z.infer<typeof indexSchema>;
