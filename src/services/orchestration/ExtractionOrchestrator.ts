import { isDeepStrictEqual } from 'util';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { ReinforcedCoach } from '../coaching/ReinforcedCoach.js';
import { getAgentPriority, getExpectedFields } from './AgentCatalog.js';
import { CrossValidationService } from './CrossValidationService.js';
import { LearningHintRegistry } from './LearningHintRegistry.js';
import { SectionMapper } from './SectionMapper.js';
import { generateExecutionPlan } from './ExecutionPlanner.js';
import type { ExtractionRecord, GroundTruth, ReextractFn } from '../../types/coaching.types.js';
import type {
  AgentAssignment,
  AgentAssignments,
  AgentResults,
  CrossCheckMismatch,
  DocumentSection,
  LearningEntry,
  ValidationResult,
} from '../../types/orchestration.types.js';

export interface ExtractionOrchestratorDeps {
  coach?: ReinforcedCoach | null;
  validator?: CrossValidationService;
  hints?: LearningHintRegistry;
  sectionMapper?: SectionMapper;
  maxParallel?: number;
}

export interface CoachingOptions {
  basePrompt?: string;
  reextract?: ReextractFn;
}

export interface AgentReview {
  validation: ValidationResult;
  learning: LearningEntry | null;
}

/** Longest page list one section contributes; the extraction zone is not capped. */
export const MAX_SECTION_PAGES = 10_000;

const boundsOf = (section: DocumentSection): { start: number; end: number } => {
  const start = section.startPage ?? section.page ?? 1;
  return { start, end: Math.max(section.endPage ?? start, start) };
};

const pagesOf = (section: DocumentSection): number[] => {
  const { start, end } = boundsOf(section);
  const last = Math.min(end, start + MAX_SECTION_PAGES - 1);
  const pages: number[] = [];
  for (let page = start; page <= last; page++) {
    pages.push(page);
  }
  return pages;
};

const zoneOf = (sections: DocumentSection[]): { start: number; end: number } => {
  const [first, ...rest] = sections.map(boundsOf);
  if (!first) {
    return { start: 1, end: 1 };
  }
  return rest.reduce(
    (zone, bounds) => ({ start: Math.min(zone.start, bounds.start), end: Math.max(zone.end, bounds.end) }),
    first
  );
};

/**
 * Pipeline-facing entry point: plans agent runs over a sectioned document,
 * validates what the agents return, remembers failures as hints and hands
 * extractions to the coach when one is configured.
 */
export class ExtractionOrchestrator {
  private coach: ReinforcedCoach | null;
  private validator: CrossValidationService;
  private hints: LearningHintRegistry;
  private sectionMapper: SectionMapper;
  private maxParallel: number;

  constructor(deps: ExtractionOrchestratorDeps = {}) {
    this.coach = deps.coach ?? null;
    this.validator = deps.validator ?? new CrossValidationService();
    this.hints = deps.hints ?? new LearningHintRegistry();
    this.sectionMapper = deps.sectionMapper ?? new SectionMapper();
    this.maxParallel = deps.maxParallel ?? config.orchestrator.maxParallel;
  }

  mapSectionsToAgents(sections: DocumentSection[]): AgentAssignments {
    const assignments: AgentAssignments = {};

    for (const [agent, assigned] of Object.entries(this.sectionMapper.mapSections(sections))) {
      const pages = [...new Set(assigned.flatMap(pagesOf))].sort((a, b) => a - b);
      const assignment: AgentAssignment = {
        sections: assigned,
        pages,
        extractionZone: zoneOf(assigned),
        priority: getAgentPriority(agent),
        expectedOutput: getExpectedFields(agent),
      };

      const hints = this.hints.getHints(agent);
      if (hints.length > 0) {
        assignment.learningHints = hints;
      }
      assignments[agent] = assignment;
    }

    return assignments;
  }

  generateExecutionPlan(assignments: AgentAssignments): string[][] {
    return generateExecutionPlan(assignments, this.maxParallel);
  }

  validateAgentOutput(agent: string, output: unknown, expectedFields: string[] = getExpectedFields(agent)): ValidationResult {
    return this.validator.validate(agent, output, expectedFields);
  }

  crossValidateAgents(results: AgentResults): CrossCheckMismatch[] {
    const mismatches = this.validator.crossValidate(results);
    if (mismatches.length > 0) {
      logger.warn({ mismatches: mismatches.map(m => ({ field: m.field, agents: m.agents })) }, 'Cross-validation mismatches');
    }
    return mismatches;
  }

  /** Validates one agent's output and records a learning entry when it fails. */
  reviewAgentOutput(agent: string, output: unknown, sectionContent = ''): AgentReview {
    const validation = this.validateAgentOutput(agent, output);
    const learning = validation.isValid ? null : this.learnFromFailure(agent, validation.issues, sectionContent);
    return { validation, learning };
  }

  learnFromFailure(agent: string, issues: string[], sectionContent = ''): LearningEntry {
    return this.hints.learnFromFailure(agent, issues, sectionContent);
  }

  generateCoachingFeedback(agent: string, issues: string[]): string {
    return this.hints.generateCoachingFeedback(agent, issues);
  }

  /** Coaching never breaks the pipeline: on failure the original extraction comes back. */
  async processWithCoaching(
    documentId: string,
    agent: string,
    extraction: ExtractionRecord,
    groundTruth?: GroundTruth,
    options: CoachingOptions = {}
  ): Promise<ExtractionRecord> {
    if (!this.coach) {
      return extraction;
    }

    try {
      const result = await this.coach.coach({
        documentId,
        agentId: agent,
        extraction,
        groundTruth,
        basePrompt: options.basePrompt,
        reextract: options.reextract,
        hints: this.hints.getHints(agent),
      });

      if (!isDeepStrictEqual(result.extraction, extraction)) {
        logger.info({ documentId, agent, strategy: result.decision.strategy, improvement: result.improvement }, 'Coaching improved extraction');
      }
      return result.extraction;
    } catch (error) {
      logger.warn({ documentId, agent, error: errorMessage(error) }, 'Coaching failed, keeping original extraction');
      return extraction;
    }
  }
}
