import Ajv, { type ErrorObject } from 'ajv';
import { InvalidResumeError } from './errors';
import { RESUME_SCHEMA } from './schema/resumeSchema';
import type { Resume } from './types';

const ajv = new Ajv({ allErrors: true, useDefaults: true });
const validate = ajv.compile<Resume>(RESUME_SCHEMA);

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/** Checks a payload without modifying it. */
export function validateResume(resume: unknown): ValidationResult {
  const isValid = validate(structuredClone(resume));
  if (isValid) {
    return { valid: true, errors: [] };
  }

  return {
    valid: false,
    errors: formatErrors(validate.errors),
  };
}

/**
 * Returns a copy of the payload with missing collections and defaulted fields
 * filled in, or throws `InvalidResumeError` listing every schema violation.
 */
export function coerceResume(resume: unknown): Resume {
  const copy = structuredClone(resume);
  if (validate(copy)) {
    return copy;
  }
  throw new InvalidResumeError(formatErrors(validate.errors));
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return ['Resume payload must be a JSON object.'];
  }

  return errors.map((error) => {
    const { params } = error;
    if (error.keyword === 'type' && params.type === 'object' && !error.instancePath) {
      return 'Resume payload must be a JSON object.';
    }
    if (error.keyword === 'required' && typeof params.missingProperty === 'string') {
      const path = error.instancePath ? `${error.instancePath}/` : '/';
      return `${path}${params.missingProperty} is required.`;
    }
    if (error.keyword === 'additionalProperties' && typeof params.additionalProperty === 'string') {
      const path = error.instancePath ? `${error.instancePath}/` : '/';
      return `${path}${params.additionalProperty} is not a known field.`;
    }
    const path = error.instancePath && error.instancePath.length > 0 ? error.instancePath : '/';
    return `${path}: ${error.message ?? 'Invalid value.'}`;
  });
}
