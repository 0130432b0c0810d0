import { beforeEach, describe, expect, it } from 'vitest';

import { RuntimeContext } from '@mastra/core/runtime-context';
import { createSurveyCollaborators } from '@siteline/collaborators';

import { createStubLogger } from '../../assessment/__fixtures__/logger.js';
import { createSiteTools, getSiteToolUsage, resetSiteToolUsage, siteTools } from './site-tools.js';

const collaborators = createSurveyCollaborators({ now: () => 0 });
const tools = createSiteTools({ collaborators, logger: createStubLogger() });

const CEDAR_RIDGE = { latitude: 35.1322, longitude: -118.4489 };

describe('site tool wrappers', () => {
  beforeEach(() => {
    collaborators.resetUsageLog();
    resetSiteToolUsage();
  });

  it('geocodes a surveyed site', async () => {
    const geocodeContext: Parameters<NonNullable<typeof tools.geocode_location.execute>>[0] = {
      context: { location: 'Cedar Ridge' },
      runtimeContext: new RuntimeContext()
    };

    const result = await tools.geocode_location.execute(geocodeContext);

    expect(result).toEqual(CEDAR_RIDGE);
    expect(collaborators.getUsageLog()).toEqual([
      { id: 'geocoder.resolve#1', tool: 'geocoder.resolve', input: { location: 'Cedar Ridge' }, timestamp: 0 }
    ]);
  });

  it('rejects unknown locations', async () => {
    const geocodeContext: Parameters<NonNullable<typeof tools.geocode_location.execute>>[0] = {
      context: { location: 'Atlantis' },
      runtimeContext: new RuntimeContext()
    };

    await expect(tools.geocode_location.execute(geocodeContext)).rejects.toThrow(
      'Location "Atlantis" could not be resolved.'
    );
  });

  it('rates imagery viability at the given coordinates', async () => {
    const imageryContext: Parameters<NonNullable<typeof tools.assess_site_imagery.execute>>[0] = {
      context: CEDAR_RIDGE,
      runtimeContext: new RuntimeContext()
    };

    const result = await tools.assess_site_imagery.execute(imageryContext);

    expect(result.viability).toBe('high');
    expect(result.images.map((image) => image.imageRef)).toEqual([
      'gs://site-surveys/cedar-ridge/overview.png',
      'gs://site-surveys/cedar-ridge/north-slope.png'
    ]);
  });

  it('tallies sentiment and lawsuits', async () => {
    const sentimentContext: Parameters<NonNullable<typeof tools.assess_site_sentiment.execute>>[0] = {
      context: { location: 'Salt Marsh Flats' },
      runtimeContext: new RuntimeContext()
    };

    const result = await tools.assess_site_sentiment.execute(sentimentContext);

    expect(result.tally).toEqual({ positive: 0, neutral: 1, negative: 1 });
    expect(result.balance).toBe(-1);
    expect(result.lawsuitsFound).toBe(true);
  });

  it('returns land and grid records for surveyed coordinates', async () => {
    const landContext: Parameters<NonNullable<typeof tools.lookup_land_record.execute>>[0] = {
      context: CEDAR_RIDGE,
      runtimeContext: new RuntimeContext()
    };
    const gridContext: Parameters<NonNullable<typeof tools.find_grid_hub.execute>>[0] = {
      context: CEDAR_RIDGE,
      runtimeContext: new RuntimeContext()
    };

    await expect(tools.lookup_land_record.execute(landContext)).resolves.toEqual({
      ownership: 'private',
      acquisitionDifficulty: 'high'
    });
    await expect(tools.find_grid_hub.execute(gridContext)).resolves.toEqual({ distance: 5, estimatedCost: 50000 });
  });

  it('refuses blank environmental reports', async () => {
    const findingsContext: Parameters<NonNullable<typeof tools.extract_report_findings.execute>>[0] = {
      context: { site: 'Cedar Ridge', reportText: ' ' },
      runtimeContext: new RuntimeContext()
    };

    await expect(tools.extract_report_findings.execute(findingsContext)).rejects.toThrow(
      'No environmental report was supplied for Cedar Ridge.'
    );
  });

  it('compares two sites end to end', async () => {
    const compareContext: Parameters<NonNullable<typeof tools.compare_sites.execute>>[0] = {
      context: {
        first: { name: 'Salt Marsh Flats', environmentalReport: 'Seasonal wetlands border the eastern parcel.' },
        second: { name: 'Cedar Ridge', environmentalReport: 'The environmental impact is minimal.' }
      },
      runtimeContext: new RuntimeContext()
    };

    const result = await tools.compare_sites.execute(compareContext);

    expect(result.recommendation).toEqual({
      site: 'Cedar Ridge',
      decidedBy: 'viability',
      rationale: 'Cedar Ridge has high viability versus moderate at Salt Marsh Flats.'
    });
    expect(result.report.startsWith('## Salt Marsh Flats')).toBe(true);
  });

  it('records usage for the default toolset', async () => {
    const geocodeContext: Parameters<NonNullable<typeof siteTools.geocode_location.execute>>[0] = {
      context: { location: 'Salt Marsh Flats' },
      runtimeContext: new RuntimeContext()
    };

    await siteTools.geocode_location.execute(geocodeContext);

    const usage = getSiteToolUsage();
    expect(usage).toHaveLength(1);
    expect(usage[0]).toMatchObject({ tool: 'geocoder.resolve', input: { location: 'Salt Marsh Flats' } });
  });
});
