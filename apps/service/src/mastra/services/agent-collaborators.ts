import type { Agent } from '@mastra/core/agent';
import type { ImageClassificationCollaborator, ReportAnalysisCollaborator } from '@siteline/collaborators';
import { ClassificationError, describeError } from '@siteline/core';

export interface ImagePromptPart {
  readonly type: 'image';
  readonly image: URL;
  readonly mimeType: string;
}

export interface TextPromptPart {
  readonly type: 'text';
  readonly text: string;
}

export interface UserPrompt {
  readonly role: 'user';
  readonly content: Array<ImagePromptPart | TextPromptPart>;
}

/** Sends a prompt to a model and resolves with the text of its reply. */
export type AgentResponder = (messages: UserPrompt[], signal?: AbortSignal) => Promise<string>;

export const respondWith =
  (agent: Agent): AgentResponder =>
  async (messages, signal) => {
    const response = await agent.generate(messages, { abortSignal: signal });
    return response.text;
  };

const IMAGE_MIME_TYPES: Readonly<Record<string, string>> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  webp: 'image/webp'
};

const mimeTypeFor = (image: URL): string => {
  const extension = image.pathname.split('.').pop()?.toLowerCase() ?? '';
  return IMAGE_MIME_TYPES[extension] ?? 'image/png';
};

const parseImageUrl = (imageRef: string): URL => {
  try {
    return new URL(imageRef);
  } catch (error) {
    throw new ClassificationError(imageRef, `Image reference is not a URL: ${imageRef}`, { cause: error });
  }
};

export const createAgentImageClassifier = (respond: AgentResponder): ImageClassificationCollaborator => ({
  async classify(imageRef, prompt, signal) {
    const image = parseImageUrl(imageRef);
    try {
      const text = await respond(
        [
          {
            role: 'user',
            content: [
              { type: 'image', image, mimeType: mimeTypeFor(image) },
              { type: 'text', text: prompt }
            ]
          }
        ],
        signal
      );
      return text.trim();
    } catch (error) {
      throw new ClassificationError(imageRef, describeError(error), { cause: error });
    }
  }
});

const LIST_MARKER = /^(?:[-*•]|\d+[.)])\s+/;

/** One finding per non-empty line, with bullet or numbering prefixes removed. */
export const parseFindingsList = (text: string): string[] =>
  text
    .split(/\r?\n/)
    .map((line) => line.trim().replace(LIST_MARKER, '').trim())
    .filter((line) => line.length > 0);

export const FINDINGS_PROMPT =
  'List the key findings of the environmental report below. Reply with one short finding per line and nothing else.';

export const createAgentReportAnalysis = (respond: AgentResponder): ReportAnalysisCollaborator => ({
  async extractFindings(reportText, signal) {
    const reply = await respond(
      [{ role: 'user', content: [{ type: 'text', text: `${FINDINGS_PROMPT}\n\n${reportText}` }] }],
      signal
    );
    return parseFindingsList(reply);
  }
});
