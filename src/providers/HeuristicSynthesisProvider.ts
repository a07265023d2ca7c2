/**
 * Deterministic synthesis.
 * Confidence is the top hit's similarity score. The explanation is templated
 * from the top chain: its score, genre/instrument agreement with the query,
 * tags that appear in the query text, and owned plugins already in the chain.
 */

import type {
  ISynthesisProvider,
  SynthesisInput,
  SynthesisOutput,
} from './ISynthesisProvider.js';
import type { PluginChain, RecommendationQuery } from '../types/models.js';

export class HeuristicSynthesisProvider implements ISynthesisProvider {
  async synthesize(input: SynthesisInput): Promise<SynthesisOutput> {
    const tips = input.knowledge[0]?.item.content ?? null;
    const top = input.chains[0];

    if (!top) {
      return {
        explanation: `No plugin chains matched "${input.query.text}".`,
        tips,
        confidence: 0,
      };
    }

    const chain = top.item;
    const sentences = [
      `"${chain.name}" is the closest match for "${input.query.text}" ` +
        `(similarity ${top.score.toFixed(2)}).`,
    ];

    const fit = describeFit(chain, input.query);
    if (fit) sentences.push(fit);

    const sharedTags = matchingTags(chain.tags, input.query.text);
    if (sharedTags.length > 0) {
      sentences.push(`Shared tags: ${sharedTags.join(', ')}.`);
    }

    const owned = ownedPluginsInChain(chain, input.query.ownedPlugins ?? []);
    if (owned.length > 0) {
      sentences.push(`You already own ${owned.join(', ')}.`);
    }

    if (input.chains.length > 1) {
      sentences.push(`${input.chains.length - 1} further chain(s) ranked below it.`);
    }

    return {
      explanation: sentences.join(' '),
      tips,
      confidence: Math.min(1, Math.max(0, top.score)),
    };
  }
}

function describeFit(chain: PluginChain, query: RecommendationQuery): string | null {
  const parts: string[] = [];
  if (query.genre && chain.genre) {
    parts.push(`built for ${chain.genre}`);
  }
  if (query.instrument && chain.instrument) {
    parts.push(`targets ${chain.instrument}`);
  }
  if (parts.length === 0) return null;
  return `It is ${parts.join(' and ')}.`;
}

/** Chain tags that occur as words in the query text, in tag order. */
export function matchingTags(tags: string[], text: string): string[] {
  const words = new Set(text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean));
  return tags.filter((tag) => words.has(tag.toLowerCase()));
}

function ownedPluginsInChain(chain: PluginChain, owned: string[]): string[] {
  const ownedNames = new Set(owned.map((name) => name.toLowerCase()));
  return [...chain.plugins]
    .sort((a, b) => a.position - b.position)
    .map((plugin) => plugin.name)
    .filter((name) => ownedNames.has(name.toLowerCase()));
}
