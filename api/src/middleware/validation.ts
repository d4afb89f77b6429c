import { DEFAULT_WEIGHTS, WEIGHT_SUM_TOLERANCE } from '../config';
import { ValidationError, WeightSumError } from '../errors';
import { logger } from '../logger';
import { GradebookInput, SourceFile, WeightConfig } from '../types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSourceFile(value: unknown): value is SourceFile {
  return isRecord(value) && typeof value.file_name === 'string' && value.file_name.trim() !== '' && typeof value.content === 'string';
}

function requireSource(value: unknown, field: string): SourceFile {
  if (!isSourceFile(value)) {
    throw new ValidationError(`${field} must be an object with file_name and content strings`);
  }
  return value;
}

/**
 * Weights are checked here, on the caller side: the scorer computes with
 * whatever it is given.
 */
export function validateWeights(value: unknown): WeightConfig {
  if (value === undefined) return { ...DEFAULT_WEIGHTS };
  if (!isRecord(value)) throw new ValidationError('weights must be an object of category -> number');

  const weights: WeightConfig = {};
  for (const [category, weight] of Object.entries(value)) {
    if (typeof weight !== 'number' || !Number.isFinite(weight) || weight < 0 || weight > 1) {
      throw new ValidationError(`Weight for "${category}" must be a number between 0 and 1`);
    }
    weights[category] = weight;
  }

  const total = Object.values(weights).reduce((sum, w) => sum + w, 0);
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new WeightSumError(total);
  }
  return weights;
}

export function parseGradebookRequest(body: unknown): GradebookInput {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }

  const quizzes = body.quizzes ?? [];
  if (!Array.isArray(quizzes)) {
    throw new ValidationError('quizzes must be an array');
  }

  const input: GradebookInput = {
    roster: requireSource(body.roster, 'roster'),
    grades: requireSource(body.grades, 'grades'),
    quizzes: quizzes.map((q: unknown, i) => requireSource(q, `quizzes[${i}]`)),
    weights: validateWeights(body.weights),
  };

  logger.debug({
    module: 'middleware.validation',
    roster_file: input.roster.file_name,
    grades_file: input.grades.file_name,
    quiz_count: input.quizzes?.length ?? 0,
  }, 'Gradebook request validated');
  return input;
}
