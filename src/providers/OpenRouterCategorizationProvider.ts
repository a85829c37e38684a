/**
 * Categorization through an OpenAI-compatible chat API (OpenRouter by default).
 * Asks for a single JSON object and normalises whatever comes back onto the
 * closed enumerations.
 */

import OpenAI from 'openai';
import type { CategorizationInput, ICategorizationProvider } from './ICategorizationProvider.js';
import type { Categorization, Priority, Sentiment } from '../types/models.js';
import { IDEA_CATEGORIES, resolveCategory } from '../catalog/categories.js';
import { ProviderError } from '../errors.js';

const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1';
const DEFAULT_MODEL = 'qwen/qwen3-32b';
const PROVIDER = 'openrouter';

const MAX_TAGS = 5;
const TAG_PATTERN = /^[a-zåäö\s-]{2,20}$/;

const SYSTEM_PROMPT = `You analyse ideas and proposals submitted inside a Swedish municipality.
You are an expert in public-sector innovation.

Place the idea in exactly one of these categories:
${IDEA_CATEGORIES.map((c) => `${c.id}. ${c.name} - ${c.description}`).join('\n')}

Judge priority from impact on residents or operations, feasibility and cost,
strategic relevance and urgency.

Answer with one JSON object and nothing else:
{"category": <1-5>, "priority": "low" | "medium" | "high",
 "sentiment": "positive" | "neutral" | "negative",
 "tags": [3-5 short lower-case keywords], "confidence": <0..1>,
 "notes": "<one sentence>"}`;

export class OpenRouterCategorizationProvider implements ICategorizationProvider {
  private client: OpenAI;
  private model: string;

  constructor(opts: { apiKey: string; baseUrl?: string; model?: string }) {
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.baseUrl ?? DEFAULT_BASE_URL,
      defaultHeaders: {
        'HTTP-Referer': 'https://innovation-hub.local',
        'X-Title': 'Innovation Hub AI Analysis',
      },
    });
    this.model = opts.model ?? DEFAULT_MODEL;
  }

  async analyze(input: CategorizationInput): Promise<Categorization> {
    let content: string | null | undefined;

    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        temperature: 0.2,
        max_tokens: 1000,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: formatIdea(input) },
        ],
      });
      content = completion.choices[0]?.message.content;
    } catch (err) {
      if (err instanceof OpenAI.APIError) {
        throw new ProviderError(
          PROVIDER,
          ProviderError.kindForStatus(err.status ?? 0),
          `Categorization request failed (${err.status ?? 'network'}): ${err.message}`
        );
      }
      throw err;
    }

    if (!content || !content.trim()) {
      throw new ProviderError(PROVIDER, 'unavailable', 'Empty response from categorization model');
    }

    const parsed = extractJsonObject(content);
    if (!parsed) {
      throw new ProviderError(PROVIDER, 'unavailable', 'Categorization model did not return JSON');
    }

    return normalizeCategorization(parsed);
  }
}

function formatIdea(input: CategorizationInput): string {
  return [
    `Title: ${input.title}`,
    '',
    `Description: ${input.description}`,
    '',
    `Type: ${input.type}`,
    `Target group: ${input.targetGroup}`,
  ].join('\n');
}

/** Pull the first {...} block out of a model answer (models like to wrap JSON in prose or fences). */
export function extractJsonObject(content: string): Record<string, unknown> | null {
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  try {
    const value: unknown = JSON.parse(content.slice(start, end + 1));
    return isRecord(value) ? value : null;
  } catch {
    return null;
  }
}

export function normalizeCategorization(raw: Record<string, unknown>): Categorization {
  const category = resolveCategory(
    typeof raw.category === 'number' || typeof raw.category === 'string' ? raw.category : null
  );

  return {
    category: category.name,
    priority: normalizePriority(raw.priority),
    sentiment: normalizeSentiment(raw.sentiment),
    tags: normalizeTags(raw.tags),
    confidence: clamp01(typeof raw.confidence === 'number' ? raw.confidence : Number(raw.confidence)),
    notes: typeof raw.notes === 'string' && raw.notes.trim() ? raw.notes.trim() : null,
  };
}

export function normalizePriority(value: unknown): Priority {
  const text = String(value ?? '').toLowerCase();
  if (text.includes('high') || text.includes('hög')) return 'high';
  if (text.includes('low') || text.includes('låg')) return 'low';
  return 'medium';
}

export function normalizeSentiment(value: unknown): Sentiment {
  const text = String(value ?? '').toLowerCase();
  if (text.includes('positiv')) return 'positive';
  if (text.includes('negativ')) return 'negative';
  return 'neutral';
}

/**
 * Lower-case, 2-20 letters (spaces and hyphens allowed), spaces collapsed to
 * hyphens, de-duplicated, at most five.
 */
export function normalizeTags(value: unknown): string[] {
  const candidates = Array.isArray(value)
    ? value.filter((v): v is string => typeof v === 'string')
    : typeof value === 'string'
      ? value.split(',')
      : [];

  const tags: string[] = [];
  for (const candidate of candidates) {
    const tag = candidate.trim().toLowerCase();
    if (!TAG_PATTERN.test(tag)) continue;
    const clean = tag.replace(/\s+/g, '-');
    if (!tags.includes(clean)) tags.push(clean);
    if (tags.length === MAX_TAGS) break;
  }
  return tags;
}

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
