import { z, type ZodError } from 'zod';

/**
 * Shapes of the MangaBaka v1 API.
 * @see https://mangabaka.dev/api
 *
 * Object schemas strip unknown keys, so new provider fields never fail parsing.
 */

/** Raw provider JSON for one series; opaque outside the normalizer. */
export type RemoteRecord = Record<string, unknown>;

const nullishString = z.string().nullish();
const numberLike = z.union([z.number(), z.string()]).nullish();

export const MangaBakaCoverSchema = z.object({
  raw: nullishString,
  default: nullishString,
  small: nullishString,
});

export const MangaBakaPublisherSchema = z.object({
  name: z.string(),
  type: nullishString,
  note: nullishString,
});

const SecondaryTitleSchema = z.object({
  title: z.string(),
});

const SourceEntrySchema = z.object({
  id: z.union([z.number(), z.string()]).nullish(),
  rating: z.number().nullish(),
});

export const MangaBakaSeriesSchema = z.object({
  id: z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/, 'id must be numeric')]),
  state: nullishString,
  merged_with: numberLike,
  title: z.string().trim().min(1, 'title is required'),
  native_title: nullishString,
  romanized_title: nullishString,
  secondary_titles: z.record(z.array(SecondaryTitleSchema).nullable()).nullish(),
  cover: MangaBakaCoverSchema.nullish(),
  authors: z.array(z.string()).nullish(),
  artists: z.array(z.string()).nullish(),
  description: nullishString,
  year: numberLike,
  status: nullishString,
  content_rating: nullishString,
  type: nullishString,
  rating: z.number().nullish(),
  final_volume: numberLike,
  final_chapter: numberLike,
  total_chapters: numberLike,
  links: z.array(z.string()).nullish(),
  publishers: z.array(MangaBakaPublisherSchema).nullish(),
  genres: z.array(z.string()).nullish(),
  tags: z.array(z.string()).nullish(),
  last_updated_at: nullishString,
  source: z.record(SourceEntrySchema.nullable()).nullish(),
});

export type MangaBakaSeries = z.infer<typeof MangaBakaSeriesSchema>;

export const MangaBakaPaginationSchema = z.object({
  count: z.number().int().nonnegative(),
  page: z.number().int().positive(),
  limit: z.number().int().positive(),
  next: nullishString,
  previous: nullishString,
});

export type MangaBakaPagination = z.infer<typeof MangaBakaPaginationSchema>;

/** Every response is wrapped as `{ status, message?, data, pagination? }`. */
export const MangaBakaEnvelopeSchema = z.object({
  status: z.number().int(),
  message: nullishString,
  data: z.unknown().optional(),
  pagination: MangaBakaPaginationSchema.nullish(),
});

export type MangaBakaEnvelope = z.infer<typeof MangaBakaEnvelopeSchema>;

export const RemoteRecordSchema = z.record(z.unknown());
export const RemoteRecordListSchema = z.array(RemoteRecordSchema);

/** Dotted path of the first issue, e.g. `cover.default` or `publishers.0.name`. */
export function issuePath(error: ZodError, prefix?: string): string {
  const path = error.issues[0]?.path.join('.') ?? '';
  if (prefix) return path ? `${prefix}.${path}` : prefix;
  return path || '(root)';
}
