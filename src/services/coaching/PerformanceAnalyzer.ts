import { isDeepStrictEqual } from 'util';
import { config } from '../../config/index.js';
import { hasField, isBlank, isRecord } from '../../utils/values.js';
import type { ExtractionPerformance, ExtractionRecord, GroundTruth } from '../../types/coaching.types.js';

const MAX_ERRORS = 10;
const LOW_COVERAGE_THRESHOLD = 0.5;

export interface PerformanceAnalyzerOptions {
  /**
   * Accuracy discount applied when no ground truth exists. A tunable
   * heuristic, not a derived constant.
   */
  selfEvaluationDiscount?: number;
}

const ratio = (numerator: number, denominator: number): number =>
  denominator > 0 ? numerator / denominator : 0;

const f1 = (precision: number, recall: number): number =>
  precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;

const formatPercent = (value: number): string => `${(value * 100).toFixed(2)}%`;

export class PerformanceAnalyzer {
  private selfEvaluationDiscount: number;

  constructor(options: PerformanceAnalyzerOptions = {}) {
    this.selfEvaluationDiscount = options.selfEvaluationDiscount ?? config.coaching.selfEvaluationDiscount;
  }

  analyze(extraction: ExtractionRecord | null | undefined, groundTruth?: GroundTruth | null): ExtractionPerformance {
    const extracted: ExtractionRecord = isRecord(extraction) ? extraction : {};

    if (!isRecord(groundTruth) || Object.keys(groundTruth).length === 0) {
      return this.selfEvaluate(extracted);
    }

    const truth: GroundTruth = groundTruth;
    const truthKeys = Object.keys(truth);
    const extractedKeys = Object.keys(extracted);

    const isCorrect = (key: string): boolean =>
      hasField(extracted, key) && isDeepStrictEqual(extracted[key], truth[key]);

    const correct = truthKeys.filter(isCorrect).length;
    const present = truthKeys.filter(key => hasField(extracted, key)).length;
    const correctExtracted = extractedKeys.filter(key => hasField(truth, key) && isCorrect(key)).length;

    const precision = ratio(correctExtracted, extractedKeys.length);
    const recall = ratio(correct, truthKeys.length);

    return {
      accuracy: ratio(correct, truthKeys.length),
      coverage: ratio(present, truthKeys.length),
      precision,
      recall,
      f1Score: f1(precision, recall),
      errors: this.identifyErrors(extracted, truth),
      missingFields: truthKeys.filter(key => !hasField(extracted, key)),
    };
  }

  private selfEvaluate(extraction: ExtractionRecord): ExtractionPerformance {
    const values = Object.values(extraction);
    const coverage = ratio(values.filter(value => !isBlank(value)).length, values.length);
    const accuracy = coverage * this.selfEvaluationDiscount;

    const errors: string[] = [];
    if (values.length === 0) {
      errors.push('Empty extraction');
    } else if (coverage < LOW_COVERAGE_THRESHOLD) {
      errors.push(`Low coverage: ${formatPercent(coverage)}`);
    }

    return {
      accuracy,
      coverage,
      precision: accuracy,
      recall: coverage,
      f1Score: accuracy,
      errors,
      missingFields: [],
    };
  }

  private identifyErrors(extraction: ExtractionRecord, groundTruth: GroundTruth): string[] {
    if (Object.keys(extraction).length === 0) {
      return ['Empty extraction'];
    }

    const errors: string[] = [];
    for (const key of Object.keys(groundTruth)) {
      if (!hasField(extraction, key)) {
        errors.push(`Missing field: ${key}`);
      } else if (!isDeepStrictEqual(extraction[key], groundTruth[key])) {
        errors.push(`Incorrect value for ${key}`);
      }
    }

    return errors.slice(0, MAX_ERRORS);
  }
}
