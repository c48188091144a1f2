import { z } from 'zod';

export const DictionaryConfigSchema = z.object({
  dictionary: z.string().min(1),
  fillerPath: z.string().min(1),
  addenda: z.array(z.string()).default([]),
  addSilEndingPronunciation: z.boolean().default(false),
  wordReplacement: z.string().min(1).nullable().default(null),
  allowMissingWords: z.boolean().default(false),
  createMissingWords: z.boolean().default(false),
});

export type DictionaryConfig = z.infer<typeof DictionaryConfigSchema>;
