import library from '@/data/direct_response.json';

/**
 * Direct-response marketing reference material used when composing
 * generation and enhancement prompts.
 */

export interface AidaFramework {
  attention: string;
  interest: string;
  desire: string;
  action: string;
}

export function getPrinciples(): Record<string, string> {
  return { ...library.principles };
}

export function getCtrTechniques(): Record<string, string[]> {
  return Object.fromEntries(
    Object.entries(library.ctr_techniques).map(([category, items]) => [category, [...items]])
  );
}

export function getAidaFramework(): AidaFramework {
  return { ...library.aida };
}

export function getHeadlineFormulas(): string[] {
  return [...library.headline_formulas];
}

export function getCtaFormulas(): string[] {
  return [...library.cta_formulas];
}

function formatKey(key: string): string {
  return key
    .split('_')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

/**
 * Markdown section listing principles, AIDA stages and CTR techniques.
 */
export function renderDirectResponseGuide(): string {
  const principles = Object.entries(getPrinciples())
    .map(([name, description]) => `- ${formatKey(name)}: ${description}`)
    .join('\n');

  const aida = Object.entries(getAidaFramework())
    .map(([stage, description]) => `- ${formatKey(stage)}: ${description}`)
    .join('\n');

  const techniques = Object.entries(getCtrTechniques())
    .map(([category, items]) => `#### ${formatKey(category)}\n${items.map((item) => `- ${item}`).join('\n')}`)
    .join('\n\n');

  return `## Direct Response Marketing Principles:
Incorporate these principles to maximize engagement and click-through rates.

### Core Principles:
${principles}

### AIDA Framework Implementation:
${aida}

### CTR Boosting Techniques:
${techniques}`;
}
