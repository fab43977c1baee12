/**
 * Input Validator
 *
 * Turns raw text typed by a user into a canonical value for one field,
 * or a rejection that explains what is wrong. Pure: no I/O, no schema
 * mutation.
 */

import { err, ok, type Result } from 'neverthrow';

import { REJECTIONS, type Rejection } from './errors.js';
import {
  NO_CHANGE,
  booleanValue,
  dateValue,
  numberValue,
  optionListValue,
  optionValue,
  textValue,
  type CanonicalValue,
  type FieldKind,
  type NoChange,
} from './types.js';

export type ValidationResult = Result<CanonicalValue | NoChange, Rejection>;

const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const TRUE_FORMS: ReadonlySet<string> = new Set(['yes', 'y', 'true', '1']);
const FALSE_FORMS: ReadonlySet<string> = new Set(['no', 'n', 'false', '0']);

const validateNumber = (input: string): ValidationResult => {
  if (!NUMBER_PATTERN.test(input)) {
    return err(REJECTIONS.notANumber(input));
  }

  // Digit runs past the double range parse to Infinity
  const value = Number(input);
  return Number.isFinite(value) ? ok(numberValue(value)) : err(REJECTIONS.notANumber(input));
};

const validateCheckbox = (input: string): ValidationResult => {
  const normalized = input.toLowerCase();
  if (TRUE_FORMS.has(normalized)) {
    return ok(booleanValue(true));
  }
  if (FALSE_FORMS.has(normalized)) {
    return ok(booleanValue(false));
  }
  return err(REJECTIONS.notABoolean(input));
};

/**
 * A null option list means the constraint is unknown; the service resolves
 * the label itself. An empty list means no label is allowed yet.
 */
const checkOption = (
  label: string,
  options: readonly string[] | null | undefined
): Result<string, Rejection> => {
  if (options === null || options === undefined || options.includes(label)) {
    return ok(label);
  }
  return err(REJECTIONS.notInAllowedOptions(label, options));
};

const validateMultiSelect = (
  input: string,
  options: readonly string[] | null | undefined
): ValidationResult => {
  const labels: string[] = [];

  for (const segment of input.split(',')) {
    const label = segment.trim();
    if (label.length === 0) {
      return err(REJECTIONS.emptyOptionLabel(input));
    }

    const checked = checkOption(label, options);
    if (checked.isErr()) {
      return err(checked.error);
    }
    labels.push(checked.value);
  }

  return ok(optionListValue(labels));
};

const validateEmail = (input: string): boolean => {
  const parts = input.split('@');
  if (parts.length !== 2) {
    return false;
  }
  const domain = parts[1] ?? '';
  return domain.includes('.');
};

/**
 * Validates raw input for a field of the given kind.
 *
 * Blank input always yields NO_CHANGE, whatever the kind, so a caller can
 * skip a field without clearing it.
 */
export const validateInput = (
  rawInput: string,
  kind: FieldKind,
  options?: readonly string[] | null
): ValidationResult => {
  const input = rawInput.trim();
  if (input.length === 0) {
    return ok(NO_CHANGE);
  }

  switch (kind) {
    case 'title':
    case 'text':
    case 'phone':
      return ok(textValue(rawInput));
    case 'number':
      return validateNumber(input);
    case 'checkbox':
      return validateCheckbox(input);
    case 'select':
      return checkOption(input, options).map(optionValue);
    case 'multiSelect':
      return validateMultiSelect(input, options);
    case 'date':
      // Calendar validity (e.g. 2024-02-30) is left to the service
      return DATE_PATTERN.test(input) ? ok(dateValue(input)) : err(REJECTIONS.invalidDate(input));
    case 'url':
      return input.startsWith('http://') || input.startsWith('https://')
        ? ok(textValue(input))
        : err(REJECTIONS.invalidUrl(input));
    case 'email':
      return validateEmail(input) ? ok(textValue(input)) : err(REJECTIONS.invalidEmail(input));
    case 'people':
    case 'files':
    case 'relation':
    case 'rollup':
    case 'formula':
    case 'unsupported':
      return err(REJECTIONS.readOnlyField());
  }
};
