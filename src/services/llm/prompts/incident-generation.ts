import { allowedTopCategories, type CategoryTaxonomy } from '../../../domain/entities/CategoryTaxonomy.js';
import type { FieldSpec } from '../../../domain/entities/IncidentRecord.js';
import type { GenerationPrompt } from '../../../types/generation.types.js';

export const INCIDENT_GENERATION_SYSTEM_PROMPT = `You are an expert in IT Service Management and generate realistic incident test data.

IMPORTANT: You MUST respond in English. ALL field names and values must be in ENGLISH.

Generate incidents with the following characteristics:
- Realistic IT problems (Hardware, Software, Network, Access issues, etc.)
- Variety in categories, priorities, and assignment groups
- Realistic timestamps (Created <= Opened <= Closed)
- Closed incidents carry a Resolution code and detailed Resolution notes

Critical: Respond ONLY with a valid JSON array. No additional explanations or formatting. Use ONLY the English field names as specified.`;

export interface IncidentPromptOptions {
  fields: readonly FieldSpec[];
  count: number;
  taxonomy?: CategoryTaxonomy;
  closedOnly?: boolean;
}

const quoteList = (values: string[]): string => values.map(value => `"${value}"`).join(', ');

const describeTaxonomy = (taxonomy: CategoryTaxonomy): string => {
  const lines: string[] = [];

  const tops = allowedTopCategories(taxonomy);
  if (tops.length > 0) {
    lines.push(`IMPORTANT - Use ONLY these Top-Categories: ${quoteList(tops)}`);
  }

  const subEntries = Object.entries(taxonomy.subCategories);
  if (subEntries.length > 0) {
    lines.push('IMPORTANT - Use ONLY these Sub-Categories per Top-Category:');
    for (const [top, subs] of subEntries) {
      lines.push(`  - ${top}: ${quoteList(subs)}`);
    }
  }

  const specificEntries = Object.entries(taxonomy.specificCategories);
  if (specificEntries.length > 0) {
    lines.push('IMPORTANT - Use ONLY these Categories per Top-Category:');
    for (const [top, specifics] of specificEntries) {
      lines.push(`  - ${top}: ${quoteList(specifics)}`);
    }
  }

  return lines.join('\n');
};

export function buildIncidentPrompt({ fields, count, taxonomy, closedOnly = true }: IncidentPromptOptions): GenerationPrompt {
  const fieldLines = fields.map(field => {
    const description = closedOnly && field.column === 'State' ? 'MUST be "Closed"' : field.description;
    return `- "${field.column}" (${field.type}, ${description})`;
  });

  const sections = [
    `Generate exactly ${count} incident records as a JSON array.`,
    'CRITICAL: Use ENGLISH field names EXACTLY as shown below. ALL descriptions and text content must be in ENGLISH.',
  ];

  if (closedOnly) {
    sections.push(
      'CRITICAL: ALL incidents MUST have State="Closed", a "Closed" timestamp, a "Resolution code" and detailed "Resolution notes".'
    );
  } else {
    sections.push(
      'Mix open and closed incidents. Only incidents in State "Resolved", "Closed" or "Canceled" have a "Closed" timestamp; for all others "Closed" is null.'
    );
  }

  if (taxonomy) {
    sections.push(describeTaxonomy(taxonomy));
  }

  sections.push(`Each object in the array must contain EXACTLY these fields with EXACT spelling:\n${fieldLines.join('\n')}`);
  sections.push('Do not include "Number" or any duration fields; they are computed afterwards.');
  sections.push('Respond ONLY with the JSON array, without additional text, markdown formatting, or code blocks.');

  return {
    system: INCIDENT_GENERATION_SYSTEM_PROMPT,
    user: sections.join('\n\n'),
  };
}
