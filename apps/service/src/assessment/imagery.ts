import {
  DEFAULT_VIABILITY_KEYWORDS,
  ImageReferenceListSchema,
  classifyViability,
  describeError,
  type Coordinates,
  type ImageAnalysis,
  type ImageryAssessment,
  type ViabilityKeywords
} from '@siteline/core';
import type { ImageClassificationCollaborator, SiteCollaborators } from '@siteline/collaborators';

import { parseCollaboratorPayload } from './payload.js';
import { DEFAULT_COLLABORATOR_TIMEOUT_MS, withTimeout } from './timeout.js';

export const IMAGERY_PROMPT = [
  'Analyze this satellite image for its suitability for an onshore wind farm.',
  'Consider factors like terrain, vegetation, existing infrastructure, and potential environmental impact.'
].join(' ');

export interface ImageryOptions {
  readonly prompt?: string;
  readonly keywords?: ViabilityKeywords;
  readonly timeoutMs?: number;
}

const formatImageFailure = (imageRef: string, error: unknown): string =>
  `Error analyzing image ${imageRef}: ${describeError(error)}`;

const analyzeImage = async (
  imageRef: string,
  classifier: ImageClassificationCollaborator,
  prompt: string,
  timeoutMs: number
): Promise<ImageAnalysis> => {
  if (imageRef.trim().length === 0) {
    return { imageRef, status: 'failed', text: formatImageFailure(imageRef, 'image reference is empty') };
  }
  try {
    const text = await withTimeout((signal) => classifier.classify(imageRef, prompt, signal), {
      operation: `imageClassifier.classify(${imageRef})`,
      timeoutMs
    });
    return { imageRef, status: 'analyzed', text };
  } catch (error) {
    return { imageRef, status: 'failed', text: formatImageFailure(imageRef, error) };
  }
};

/**
 * Classifies every image reference in order. Failures are recorded inline, so
 * the result always holds one entry per reference and this never rejects.
 * Viability is classified from the merged text, failure annotations included.
 */
export const analyzeImages = async (
  imageRefs: readonly string[],
  classifier: ImageClassificationCollaborator,
  options: ImageryOptions = {}
): Promise<ImageryAssessment> => {
  const prompt = options.prompt ?? IMAGERY_PROMPT;
  const timeoutMs = options.timeoutMs ?? DEFAULT_COLLABORATOR_TIMEOUT_MS;

  const images: ImageAnalysis[] = [];
  for (const imageRef of imageRefs) {
    images.push(await analyzeImage(imageRef, classifier, prompt, timeoutMs));
  }

  const analysis = images.map((image) => image.text).join('\n');

  return {
    viability: classifyViability(analysis, options.keywords ?? DEFAULT_VIABILITY_KEYWORDS),
    analysis,
    images
  };
};

export const assessImagery = async (
  coordinates: Coordinates,
  collaborators: Pick<SiteCollaborators, 'imageSource' | 'imageClassifier'>,
  options: ImageryOptions = {}
): Promise<ImageryAssessment> => {
  const operation = 'imageSource.listImages';
  const listed = await withTimeout(
    () => collaborators.imageSource.listImages(coordinates.latitude, coordinates.longitude),
    { operation, timeoutMs: options.timeoutMs ?? DEFAULT_COLLABORATOR_TIMEOUT_MS }
  );
  const imageRefs = parseCollaboratorPayload(ImageReferenceListSchema, listed, operation);
  return analyzeImages(imageRefs, collaborators.imageClassifier, options);
};
