import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { config } from '../../config/index.js';
import { ConfigurationError, errorMessage } from '../../utils/errors.js';
import type { DocumentSection } from '../../types/orchestration.types.js';

export const sectionPatternsSchema = z.object({
  sectionPatterns: z.record(z.array(z.string().min(1))),
  sectionToAgents: z.record(z.array(z.string().min(1))),
  supplierKeywords: z.array(z.string().min(1)),
  tableKeywords: z.array(z.object({ keywords: z.array(z.string().min(1)), agent: z.string().min(1) })),
  criticalMappings: z.record(z.array(z.string().min(1))),
});

export type SectionPatterns = z.infer<typeof sectionPatternsSchema>;

const SUPPLIERS_AGENT = 'suppliers_vendors_agent';

export const DEFAULT_SECTION_PATTERNS_PATH = fileURLToPath(
  new URL('../../config/section-patterns.json', import.meta.url)
);

export function loadSectionPatterns(path: string = config.orchestrator.sectionPatternsPath ?? DEFAULT_SECTION_PATTERNS_PATH): SectionPatterns {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read section patterns from ${path}: ${errorMessage(error)}`);
  }

  const result = sectionPatternsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid section patterns in ${path}`, result.error.issues);
  }
  return result.data;
}

const containsAny = (text: string, keywords: string[]): boolean => keywords.some(keyword => text.includes(keyword));

/**
 * Maps sectionizer output to the agents that should read each section.
 * Matching is substring-based on the lower-cased section name.
 */
export class SectionMapper {
  constructor(private patterns: SectionPatterns = loadSectionPatterns()) {}

  mapSections(sections: DocumentSection[]): Record<string, DocumentSection[]> {
    const assignments: Record<string, DocumentSection[]> = {};

    for (const section of sections) {
      for (const agent of this.matchAgents(section)) {
        (assignments[agent] ??= []).push(section);
      }
    }

    this.ensureCriticalCoverage(assignments, sections);
    return assignments;
  }

  /** Distinct agents for one section, in first-match order. */
  matchAgents(section: DocumentSection): string[] {
    const name = section.name.toLowerCase();
    const matched = new Set<string>();

    for (const [key, keywords] of Object.entries(this.patterns.sectionPatterns)) {
      if (containsAny(name, keywords)) {
        for (const agent of this.patterns.sectionToAgents[key] ?? []) {
          matched.add(agent);
        }
      }
    }

    // Supplier lists hide under many headings.
    if (containsAny(name, this.patterns.supplierKeywords)) {
      matched.add(SUPPLIERS_AGENT);
    }

    if (section.type === 'table') {
      const tableMatch = this.patterns.tableKeywords.find(entry => containsAny(name, entry.keywords));
      if (tableMatch) {
        matched.add(tableMatch.agent);
      }
    }

    return [...matched];
  }

  /** Critical agents without sections get the first section whose name hints at them. */
  private ensureCriticalCoverage(assignments: Record<string, DocumentSection[]>, sections: DocumentSection[]): void {
    for (const [agent, keywords] of Object.entries(this.patterns.criticalMappings)) {
      if (assignments[agent]?.length) continue;

      const candidate = sections.find(section => containsAny(section.name.toLowerCase(), keywords));
      if (candidate) {
        assignments[agent] = [candidate];
      }
    }
  }
}
