import { describe, expect, it, vi } from 'vitest';

import { ClassificationError } from '@siteline/core';

import {
  FINDINGS_PROMPT,
  createAgentImageClassifier,
  createAgentReportAnalysis,
  parseFindingsList,
  type AgentResponder
} from './agent-collaborators.js';

describe('createAgentImageClassifier', () => {
  it('sends the image and the prompt in one user message', async () => {
    const respond = vi.fn<AgentResponder>(() => Promise.resolve('  Suitable terrain overall.\n'));
    const classifier = createAgentImageClassifier(respond);

    const controller = new AbortController();

    const text = await classifier.classify(
      'gs://site-surveys/north/overview.jpg',
      'Assess this image.',
      controller.signal
    );

    expect(text).toBe('Suitable terrain overall.');
    expect(respond).toHaveBeenCalledWith(
      [
        {
          role: 'user',
          content: [
            { type: 'image', image: new URL('gs://site-surveys/north/overview.jpg'), mimeType: 'image/jpeg' },
            { type: 'text', text: 'Assess this image.' }
          ]
        }
      ],
      controller.signal
    );
  });

  it('wraps model failures in a ClassificationError', async () => {
    const classifier = createAgentImageClassifier(() => Promise.reject(new Error('quota exceeded')));

    const classification = classifier.classify('https://images.test/site.png', 'Assess this image.');

    await expect(classification).rejects.toBeInstanceOf(ClassificationError);
    await expect(classification).rejects.toThrow('quota exceeded');
  });

  it('rejects references that are not URLs without calling the model', async () => {
    const respond = vi.fn<AgentResponder>(() => Promise.resolve('unused'));
    const classifier = createAgentImageClassifier(respond);

    await expect(classifier.classify('overview.png', 'Assess this image.')).rejects.toThrow(
      'Image reference is not a URL: overview.png'
    );
    expect(respond).not.toHaveBeenCalled();
  });
});

describe('parseFindingsList', () => {
  it('strips bullets and numbering and drops blank lines', () => {
    expect(parseFindingsList('- Low water usage\n\n2. No endangered species\n* Wetlands nearby\r\n3) Noise')).toEqual([
      'Low water usage',
      'No endangered species',
      'Wetlands nearby',
      'Noise'
    ]);
  });

  it('keeps numbers that are part of a finding', () => {
    expect(parseFindingsList('12 turbines fit on the ridge')).toEqual(['12 turbines fit on the ridge']);
  });
});

describe('createAgentReportAnalysis', () => {
  it('asks for one finding per line and parses the reply', async () => {
    const respond = vi.fn<AgentResponder>(() => Promise.resolve('- Minimal impact\n- Low water usage'));
    const analysis = createAgentReportAnalysis(respond);

    const findings = await analysis.extractFindings('The impact is minimal.');

    expect(findings).toEqual(['Minimal impact', 'Low water usage']);
    expect(respond).toHaveBeenCalledWith(
      [{ role: 'user', content: [{ type: 'text', text: `${FINDINGS_PROMPT}\n\nThe impact is minimal.` }] }],
      undefined
    );
  });
});
