import { z } from 'zod';

const nonEmptyString = z.string().trim().min(1, 'Value must not be empty');

export const CoordinatesSchema = z
  .object({
    latitude: z
      .number({ required_error: 'latitude is required' })
      .finite()
      .min(-90, { message: 'latitude must be at least -90' })
      .max(90, { message: 'latitude must be at most 90' }),
    longitude: z
      .number({ required_error: 'longitude is required' })
      .finite()
      .min(-180, { message: 'longitude must be at least -180' })
      .max(180, { message: 'longitude must be at most 180' })
  })
  .strict();

export type Coordinates = z.infer<typeof CoordinatesSchema>;

export const LocationNameSchema = nonEmptyString;

export const CandidateSiteSchema = z
  .object({
    name: LocationNameSchema,
    environmentalReport: z.string().default('')
  })
  .strict();

export type CandidateSite = z.infer<typeof CandidateSiteSchema>;

export const VIABILITY_LEVELS = ['high', 'moderate', 'low'] as const;

export const ViabilitySchema = z.enum(VIABILITY_LEVELS);

export type Viability = z.infer<typeof ViabilitySchema>;

export const SENTIMENT_LABELS = ['positive', 'neutral', 'negative'] as const;

export type KnownSentimentLabel = (typeof SENTIMENT_LABELS)[number];

/** Labels outside the known three are kept as the search service sent them. */
export const SentimentLabelSchema = z.string().min(1, 'Value must not be empty');

export type SentimentLabel = z.infer<typeof SentimentLabelSchema>;

export const SocialPostSchema = z
  .object({
    sentiment: SentimentLabelSchema,
    text: z.string()
  })
  .strict();

export type SocialPost = z.infer<typeof SocialPostSchema>;

export const SocialPostListSchema = z.array(SocialPostSchema).readonly();

export const OwnershipSchema = z.enum(['private', 'public', 'mixed', 'unknown']);

export type Ownership = z.infer<typeof OwnershipSchema>;

export const ACQUISITION_DIFFICULTIES = ['low', 'moderate', 'high'] as const;

export const AcquisitionDifficultySchema = z.enum(ACQUISITION_DIFFICULTIES);

export type AcquisitionDifficulty = z.infer<typeof AcquisitionDifficultySchema>;

export const LandRecordSchema = z
  .object({
    ownership: OwnershipSchema,
    acquisitionDifficulty: AcquisitionDifficultySchema
  })
  .strict();

export type LandRecord = z.infer<typeof LandRecordSchema>;

export const GridConnectionSchema = z
  .object({
    distance: z.number().finite().min(0, { message: 'distance cannot be negative' }),
    estimatedCost: z.number().finite().min(0, { message: 'estimatedCost cannot be negative' })
  })
  .strict();

export type GridConnection = z.infer<typeof GridConnectionSchema>;

export const ImageReferenceListSchema = z.array(z.string()).readonly();

export const KeyFindingsSchema = z.array(nonEmptyString).readonly();
