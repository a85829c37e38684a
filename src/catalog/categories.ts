/**
 * The fixed idea categories. The categorization provider maps every model
 * answer onto one of these.
 */

export interface IdeaCategory {
  id: number;
  name: string;
  description: string;
  /** Lower-case stems used when the model answers in free text. */
  keywords: readonly string[];
}

export const IDEA_CATEGORIES: readonly IdeaCategory[] = [
  {
    id: 1,
    name: 'Digital transformation',
    description: 'Digitalisation of services and processes',
    keywords: ['digital', 'technolog', 'teknologi', 'artificial', 'automation', 'system'],
  },
  {
    id: 2,
    name: 'Citizen services',
    description: 'Better service to residents',
    keywords: ['citizen', 'medborgar', 'service', 'tjänst', 'customer'],
  },
  {
    id: 3,
    name: 'Environment and climate',
    description: 'Sustainability and environmental initiatives',
    keywords: ['environment', 'miljö', 'climate', 'klimat', 'sustainab', 'hållbar', 'energy', 'energi'],
  },
  {
    id: 4,
    name: 'Processes and efficiency',
    description: 'Improvement of internal processes',
    keywords: ['process', 'efficien', 'effektiv', 'optimi', 'cost', 'kostnad'],
  },
  {
    id: 5,
    name: 'Innovation and development',
    description: 'New ideas and solutions',
    keywords: ['innovation', 'development', 'utveckling', 'research', 'forskning', 'creative'],
  },
];

export const DEFAULT_CATEGORY: IdeaCategory = IDEA_CATEGORIES[IDEA_CATEGORIES.length - 1];

/**
 * Resolve a model answer to a category: by number (1-5), then by exact name,
 * then by keyword, falling back to "Innovation and development".
 */
export function resolveCategory(answer: string | number | null | undefined): IdeaCategory {
  if (answer === null || answer === undefined) return DEFAULT_CATEGORY;

  const text = String(answer).trim().toLowerCase();

  const numbered = /^(\d+)/.exec(text);
  if (numbered) {
    const byId = IDEA_CATEGORIES.find((c) => c.id === Number(numbered[1]));
    if (byId) return byId;
  }

  const byName = IDEA_CATEGORIES.find((c) => text.includes(c.name.toLowerCase()));
  if (byName) return byName;

  const byKeyword = IDEA_CATEGORIES.find((c) => c.keywords.some((k) => text.includes(k)));
  return byKeyword ?? DEFAULT_CATEGORY;
}
