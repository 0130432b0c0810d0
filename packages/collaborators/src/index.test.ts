import { beforeEach, describe, expect, it } from 'vitest';

import { ClassificationError, NotFoundError } from '@siteline/core';

import { createSurveyCollaborators, createUsageRecorder } from './index.js';

describe('survey collaborators', () => {
  const collaborators = createSurveyCollaborators({ now: () => 1_700_000_000_000 });

  beforeEach(() => {
    collaborators.resetUsageLog();
  });

  it('resolves surveyed locations case-insensitively', async () => {
    await expect(collaborators.geocoder.resolve('SALT MARSH FLATS')).resolves.toEqual({
      latitude: 36.2101,
      longitude: -117.9032
    });
  });

  it('fails with NotFound for unknown locations', async () => {
    await expect(collaborators.geocoder.resolve('Atlantis')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('lists images by coordinates and returns an empty list elsewhere', async () => {
    const images = await collaborators.imageSource.listImages(35.1322, -118.4489);

    expect(images).toEqual([
      'gs://site-surveys/cedar-ridge/overview.png',
      'gs://site-surveys/cedar-ridge/north-slope.png'
    ]);
    await expect(collaborators.imageSource.listImages(0, 0)).resolves.toEqual([]);
  });

  it('classifies surveyed images and rejects failing ones', async () => {
    await expect(
      collaborators.imageClassifier.classify('gs://site-surveys/cedar-ridge/overview.png', 'prompt')
    ).resolves.toBe('Open ridgeline with suitable terrain and sparse vegetation.');

    const failing = collaborators.imageClassifier.classify(
      'gs://site-surveys/salt-marsh-flats/east-parcel.png',
      'prompt'
    );
    await expect(failing).rejects.toBeInstanceOf(ClassificationError);
    await expect(failing).rejects.toThrow('Image could not be retrieved');
  });

  it('returns posts, lawsuits and land records for surveyed sites', async () => {
    const posts = await collaborators.socialSearch.search('Cedar Ridge');
    expect(posts.map((post) => post.sentiment)).toEqual(['negative', 'positive', 'positive']);
    await expect(collaborators.legalSearch.hasLawsuits('Salt Marsh Flats')).resolves.toBe(true);
    await expect(collaborators.landRegistry.lookup(36.2101, -117.9032)).resolves.toEqual({
      ownership: 'public',
      acquisitionDifficulty: 'moderate'
    });
    await expect(collaborators.landRegistry.lookup(0, 0)).resolves.toEqual({
      ownership: 'unknown',
      acquisitionDifficulty: 'high'
    });
  });

  it('uses stored findings for surveyed reports and sentences otherwise', async () => {
    const stored = await collaborators.reportAnalysis.extractFindings(
      'Seasonal wetlands border the eastern parcel. Bird migration corridors cross the site.'
    );
    expect(stored).toEqual(['Seasonal wetlands on eastern parcel', 'Migratory bird corridor']);

    const derived = await collaborators.reportAnalysis.extractFindings(
      'Soil is stable. Raptors nest nearby!  '
    );
    expect(derived).toEqual(['Soil is stable', 'Raptors nest nearby']);
  });

  it('rejects grid lookups away from surveyed sites', async () => {
    await expect(collaborators.gridInfrastructure.nearestHub(35.1322, -118.4489)).resolves.toEqual({
      distance: 5,
      estimatedCost: 50000
    });
    await expect(collaborators.gridInfrastructure.nearestHub(1, 2)).rejects.toThrow(
      'No grid hub surveyed near 1.0000, 2.0000'
    );
  });

  it('records usage entries in call order', async () => {
    await collaborators.geocoder.resolve('Cedar Ridge');
    await collaborators.legalSearch.hasLawsuits('Cedar Ridge');

    const usage = collaborators.getUsageLog();
    expect(usage.map((entry) => entry.id)).toEqual(['geocoder.resolve#1', 'legalSearch.hasLawsuits#2']);
    expect(usage[0]).toMatchObject({ input: { location: 'Cedar Ridge' }, timestamp: 1_700_000_000_000 });
  });
});

describe('createUsageRecorder', () => {
  it('copies inputs and restarts numbering after a reset', () => {
    const recorder = createUsageRecorder(() => 42);
    const input = { location: 'Cedar Ridge' };

    recorder.record('geocoder.resolve', input);
    input.location = 'changed';
    expect(recorder.getUsageLog()[0]?.input).toEqual({ location: 'Cedar Ridge' });

    recorder.resetUsageLog();
    recorder.record('geocoder.resolve', {});
    expect(recorder.getUsageLog().map((entry) => entry.id)).toEqual(['geocoder.resolve#1']);
  });
});
