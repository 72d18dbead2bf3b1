import type { CrisisResources } from '../config/policy.js';

const CATEGORIES: ReadonlyArray<{ key: keyof CrisisResources; title: string }> = [
  { key: 'crisisHotlines', title: 'Crisis Hotlines' },
  { key: 'emergencyServices', title: 'Emergency Services' },
  { key: 'professionalHelp', title: 'Professional Help' },
];

/**
 * Markdown block listing every crisis resource, grouped by category.
 */
export function formatCrisisResources(resources: CrisisResources): string {
  const sections = CATEGORIES.map(({ key, title }) => {
    const lines = resources[key].map((resource) => `• ${resource}`);
    return `**${title}:**\n${lines.join('\n')}`;
  });

  return `**Immediate Help Resources:**\n\n${sections.join('\n\n')}`;
}

/**
 * True when the text already carries a hotline or emergency resource.
 */
export function containsCrisisResources(content: string, resources: CrisisResources): boolean {
  const lower = content.toLowerCase();
  if (lower.includes('988')) {
    return true;
  }
  return [...resources.crisisHotlines, ...resources.emergencyServices].some((resource) =>
    lower.includes(resource.toLowerCase())
  );
}
