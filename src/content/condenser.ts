/**
 * Model-backed condenser: rewrites each chunk tighter, then integrates
 * the rewritten sections into one article.
 */

import { ContentCondenser } from './preprocessor.js';
import { IModel } from '../models/base.js';
import { ModelInvocationError } from '../utils/errors.js';

export function buildChunkPrompt(text: string): string {
  return `You are a content editor. Rewrite the following web page excerpt into precise, concise prose while keeping every important fact.

Requirements:
- Keep all key information, figures and details
- Improve sentence structure so the content reads clearly
- Remove redundancy but never drop facts
- Keep a neutral, objective tone
- Aim for 60-80% of the original length

Web page excerpt:
'''
${text}
'''`;
}

export function buildSynthesisPrompt(sections: readonly string[], maxChars: number): string {
  const body = sections.map((section, i) => `Section ${i + 1}:\n${section}`).join('\n\n');
  return `You are a content editor. Integrate the following rewritten sections of a web page into one coherent, accurate article.

Requirements:
- Merge the sections seamlessly and keep the logical flow
- Avoid repetition while keeping the content complete
- Write a full article, not a bullet summary
- Stay under ${maxChars} characters

Rewritten sections:
${body}`;
}

export class ModelCondenser implements ContentCondenser {
  constructor(private readonly model: IModel) {}

  async condense(text: string, signal?: AbortSignal): Promise<string> {
    return this.complete(buildChunkPrompt(text), signal);
  }

  async synthesize(sections: readonly string[], maxChars: number, signal?: AbortSignal): Promise<string> {
    return this.complete(buildSynthesisPrompt(sections, maxChars), signal);
  }

  private async complete(prompt: string, signal?: AbortSignal): Promise<string> {
    const response = await this.model.chat({
      messages: [{ role: 'user', content: prompt }],
      temperature: 0,
      signal,
    });
    const content = response.content.trim();
    if (!content) {
      throw new ModelInvocationError('Condensation returned empty content', false, 1, this.model.modelName);
    }
    return content;
  }
}
