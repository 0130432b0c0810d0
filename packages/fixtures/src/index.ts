import { readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  CoordinatesSchema,
  GridConnectionSchema,
  KeyFindingsSchema,
  LandRecordSchema,
  LocationNameSchema,
  SocialPostListSchema
} from '@siteline/core';
import { z } from 'zod';

export const SITE_SURVEY_FIXTURE_ID = 'wind-farm-shortlist' as const;

const SurveyImageSchema = z
  .object({
    ref: z.string().trim().min(1),
    analysis: z.string().optional(),
    failure: z.string().optional()
  })
  .strict()
  .refine((image) => (image.analysis === undefined) !== (image.failure === undefined), {
    message: 'Survey images need exactly one of analysis or failure'
  });

export const SurveySiteSchema = z
  .object({
    name: LocationNameSchema,
    coordinates: CoordinatesSchema,
    images: z.array(SurveyImageSchema).readonly(),
    posts: SocialPostListSchema,
    lawsuitsFound: z.boolean(),
    land: LandRecordSchema,
    environmentalReport: z.string(),
    keyFindings: KeyFindingsSchema,
    grid: GridConnectionSchema
  })
  .strict();

export const SiteSurveySchema = z
  .object({
    id: z.string().min(1),
    description: z.string().optional(),
    sites: z.array(SurveySiteSchema).min(1, { message: 'A survey needs at least one site' }).readonly()
  })
  .strict();

export type SurveyImage = z.infer<typeof SurveyImageSchema>;
export type SurveySite = z.infer<typeof SurveySiteSchema>;
export type SiteSurvey = z.infer<typeof SiteSurveySchema>;

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURE_ROOT = resolve(__dirname, '../../../fixtures');
const SURVEY_PATH = join(FIXTURE_ROOT, 'site-survey.json');

let cachedSurvey: SiteSurvey | undefined;

export const loadSiteSurvey = (): SiteSurvey => {
  if (!cachedSurvey) {
    const raw: unknown = JSON.parse(readFileSync(SURVEY_PATH, 'utf-8'));
    cachedSurvey = SiteSurveySchema.parse(raw);
  }
  return cachedSurvey;
};

export const getSiteSurveyPath = (): string => SURVEY_PATH;

export const listSurveySiteNames = (survey: SiteSurvey = loadSiteSurvey()): readonly string[] =>
  survey.sites.map((site) => site.name);

const normalizeName = (value: string): string => value.trim().toLowerCase();

export const findSurveySite = (
  name: string,
  survey: SiteSurvey = loadSiteSurvey()
): SurveySite | undefined => {
  const wanted = normalizeName(name);
  return survey.sites.find((site) => normalizeName(site.name) === wanted);
};
