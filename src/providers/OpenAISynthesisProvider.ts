/**
 * OpenAI synthesis provider.
 * Sends the query context and retrieved candidates to a chat model in JSON
 * mode and validates the structured answer.
 */

import OpenAI from 'openai';
import { SynthesisFailedError, describeError } from '../errors.js';
import { isRecord } from '../stores/codecs.js';
import type {
  ISynthesisProvider,
  SynthesisInput,
  SynthesisOutput,
} from './ISynthesisProvider.js';

export const DEFAULT_SYNTHESIS_MODEL = 'gpt-4o';

const SYSTEM_PROMPT = `You are an audio engineer who recommends plugin chains for mixing and mastering.
You are given a listener's request and plugin chains retrieved from a curated catalog,
plus reference notes from an audio engineering knowledge base.

Explain why the retrieved chains fit the request: the signal flow, what each plugin
contributes, and how genre and instrument shape the choice. Mention the plugins the
user already owns when relevant and suggest alternatives for the ones they lack.
Only discuss chains that appear in the candidates.

Answer with a JSON object:
{"explanation": string, "tips": string | null, "confidence": number between 0 and 1}`;

export class OpenAISynthesisProvider implements ISynthesisProvider {
  private client: OpenAI;
  readonly model: string;

  constructor(opts?: { apiKey?: string; model?: string; client?: OpenAI }) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
      });
    this.model = opts?.model ?? DEFAULT_SYNTHESIS_MODEL;
  }

  async synthesize(input: SynthesisInput): Promise<SynthesisOutput> {
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        temperature: 0.2,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: JSON.stringify(buildPromptPayload(input)) },
        ],
      });
      content = completion.choices[0]?.message?.content;
    } catch (err) {
      throw new SynthesisFailedError(
        `Synthesis request failed: ${describeError(err)}`,
        { cause: err }
      );
    }

    if (!content) {
      throw new SynthesisFailedError('Synthesis model returned no content');
    }

    return parseSynthesisOutput(content);
  }
}

/** Candidate summaries sent to the model. Embeddings are left out. */
export function buildPromptPayload(input: SynthesisInput): Record<string, unknown> {
  return {
    request: input.context,
    ownedPlugins: input.query.ownedPlugins ?? [],
    chains: input.chains.map(({ item, score }) => ({
      name: item.name,
      description: item.description,
      genre: item.genre ?? null,
      instrument: item.instrument ?? null,
      tags: item.tags,
      rating: item.rating ?? null,
      similarityScore: score,
      plugins: item.plugins.map((p) => ({
        position: p.position,
        name: p.name,
        manufacturer: p.manufacturer,
        category: p.category,
        settings: p.settings ?? null,
      })),
    })),
    knowledge: input.knowledge.map(({ item, score }) => ({
      content: item.content,
      source: item.source,
      similarityScore: score,
    })),
  };
}

export function parseSynthesisOutput(content: string): SynthesisOutput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new SynthesisFailedError('Synthesis output is not valid JSON', {
      cause: err,
    });
  }

  if (!isRecord(parsed)) {
    throw new SynthesisFailedError('Synthesis output must be a JSON object');
  }

  const { explanation, tips, confidence } = parsed;
  if (typeof explanation !== 'string' || explanation.trim() === '') {
    throw new SynthesisFailedError('Synthesis output is missing an explanation');
  }
  if (typeof confidence !== 'number' || !Number.isFinite(confidence)) {
    throw new SynthesisFailedError('Synthesis output is missing a numeric confidence');
  }
  if (tips !== undefined && tips !== null && typeof tips !== 'string') {
    throw new SynthesisFailedError('Synthesis output tips must be a string');
  }

  return {
    explanation,
    tips: typeof tips === 'string' && tips.trim() !== '' ? tips : null,
    confidence: Math.min(1, Math.max(0, confidence)),
  };
}
