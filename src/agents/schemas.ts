import { z } from 'zod';
import type { Verdict } from './verdict';

export const VerdictSchema: z.ZodType<Verdict> = z.union([z.literal(1), z.literal(0), z.literal(-1)]);

export const PaperRecordSchema = z
  .object({
    title: z.string(),
    abstract: z.string(),
  })
  .passthrough();

export const PaperListSchema = z.array(PaperRecordSchema);

export const ClassificationResultSchema = z.object({
  paper_title: z.string(),
  paper_abstract: z.string(),
  verdict: VerdictSchema.nullable(),
  raw_analysis: z.string(),
});

export const RunHeaderSchema = z.object({
  topic_desc: z.string(),
  venue: z.string(),
  year: z.string(),
});

export const ListingEntrySchema = z.object({
  title: z.string().min(1),
  link: z.string().min(1),
});

export const ListingSchema = z.array(ListingEntrySchema);

export const CollectedPaperSchema = z.object({
  title: z.string(),
  url: z.string(),
  authors: z.string(),
  abstract: z.string(),
});

export const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
});

export type PaperRecord = z.infer<typeof PaperRecordSchema>;
export type ClassificationResult = z.infer<typeof ClassificationResultSchema>;
export type RunHeader = z.infer<typeof RunHeaderSchema>;
export type ListingEntry = z.infer<typeof ListingEntrySchema>;
export type CollectedPaper = z.infer<typeof CollectedPaperSchema>;
export type ChatCompletionResponse = z.infer<typeof ChatCompletionResponseSchema>;
