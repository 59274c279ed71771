import type { ExtractionRecord } from './coaching.types.js';

export interface DocumentSection {
  name: string;
  type?: string;
  page?: number;
  startPage?: number;
  endPage?: number;
}

export interface AgentAssignment {
  sections: DocumentSection[];
  pages: number[];
  extractionZone: { start: number; end: number };
  priority: number;
  expectedOutput: string[];
  learningHints?: string[];
}

export type AgentAssignments = Record<string, AgentAssignment>;

export interface ValidationResult {
  isValid: boolean;
  issues: string[];
}

export interface CrossCheckMismatch {
  type: 'mismatch';
  agents: [string, string];
  field: string;
  values: [unknown, unknown];
  severity: 'warning';
  difference?: number;
}

export type AgentResults = Record<string, ExtractionRecord | null | undefined>;

export type ImprovementType =
  | 'prompt_enhancement'
  | 'table_detection'
  | 'field_mapping'
  | 'calculation_check';

export interface Improvement {
  type: ImprovementType;
  suggestion: string;
  hint: string;
}

export interface LearningEntry {
  id: string;
  timestamp: string;
  agent: string;
  issues: string[];
  improvements: Improvement[];
}
