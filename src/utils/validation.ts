import Joi from 'joi';
import {
  REGIONS,
  type BatchRequest,
  type Region,
  type SearchType,
} from '../types/index.js';

/**
 * Validation schemas and normalizers for search input
 */

export type ValidationOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; message: string };

export const regionSchema = Joi.string()
  .trim()
  .lowercase()
  .valid(...REGIONS)
  .required();

export const MIN_NAME_LENGTH = 3;
export const MIN_NAME_LENGTH_KR = 2;
export const MAX_NAME_LENGTH = 16;

function adventurerNameSchema(minLength: number): Joi.StringSchema {
  return Joi.string()
    .trim()
    .min(minLength)
    .max(MAX_NAME_LENGTH)
    .pattern(/^[\p{L}\p{N}_]+$/u)
    .required();
}

const nameSchemas: Record<'default' | 'kr', Joi.StringSchema> = {
  default: adventurerNameSchema(MIN_NAME_LENGTH),
  kr: adventurerNameSchema(MIN_NAME_LENGTH_KR),
};

// null decodes to the field's zero value
export const batchRequestSchema = Joi.object<BatchRequest>({
  region: Joi.string().allow('').empty(null).default(''),
  searchType: Joi.string().allow('').empty(null).default(''),
  queries: Joi.array().items(Joi.string().allow('')).empty(null).default([]),
  bypassCache: Joi.boolean().empty(null).default(false),
});

/**
 * Region codes are matched case-insensitively; only the first candidate counts.
 */
export function validateRegion(candidates: readonly string[]): ValidationOutcome<Region> {
  const raw = candidates[0] ?? '';
  const { error, value } = regionSchema.validate(raw);
  const region = REGIONS.find(candidate => candidate === value);

  if (!error && region) {
    return { ok: true, value: region };
  }

  if (raw.trim() === '') {
    return { ok: false, message: 'Region is required.' };
  }
  return { ok: false, message: `Region ${raw.trim()} is not supported.` };
}

/**
 * Never fails: anything that is not a character-name search is a family-name search.
 */
export function validateSearchType(candidates: readonly string[]): SearchType {
  const raw = (candidates[0] ?? '').trim();
  return raw === '1' || raw.toLowerCase() === 'charactername' ? '1' : '2';
}

export function validateAdventurerName(
  candidates: readonly string[],
  region: Region,
  searchType: SearchType
): ValidationOutcome<string> {
  const raw = candidates[0] ?? '';
  const minLength = region === 'kr' ? MIN_NAME_LENGTH_KR : MIN_NAME_LENGTH;
  const { error, value } = nameSchemas[region === 'kr' ? 'kr' : 'default'].validate(raw);

  if (!error) {
    return { ok: true, value };
  }

  const subject = searchType === '1' ? 'Character name' : 'Adventurer name';
  switch (error.details[0]?.type) {
    case 'string.min':
      return { ok: false, message: `${subject} should be at least ${minLength} symbols long.` };
    case 'string.max':
      return { ok: false, message: `${subject} should not be longer than ${MAX_NAME_LENGTH} symbols.` };
    case 'string.pattern.base':
      return { ok: false, message: `${subject} contains illegal characters.` };
    default:
      return { ok: false, message: `${subject} is missing from request.` };
  }
}

export class RequestValidationError extends Error {
  constructor(message: string, public readonly details: string[]) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

/**
 * Validate data against a schema
 */
export function validate<T>(schema: Joi.ObjectSchema<T>, data: unknown): T {
  const { error, value } = schema.validate(data, {
    abortEarly: false,
    convert: false,
    allowUnknown: true,
    stripUnknown: true,
  });

  if (error) {
    const details = error.details.map(detail => `${detail.path.join('.')}: ${detail.message}`);
    throw new RequestValidationError(`Validation failed: ${details.join(', ')}`, details);
  }

  return value;
}

export function isValidationError(error: unknown): error is RequestValidationError {
  return error instanceof RequestValidationError;
}
