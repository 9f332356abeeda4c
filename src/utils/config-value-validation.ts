import Ajv, { ValidateFunction } from 'ajv';
import { ValidationError } from '../common/errors/domain.errors';
import {
  ConfigValueType,
  ValidationSchema,
} from '../entities/config-entry.entity';


/**
 * Checks a raw value against its declared type and the entry's optional
 * validation schema. Throws ValidationError on the first violation.
 */
export function validateConfigValue(
  value: unknown,
  type: ConfigValueType,
  schema?: ValidationSchema | null,
): void {
  switch (type) {
    case ConfigValueType.STRING:
      validateString(value, schema);
      return;
    case ConfigValueType.NUMBER:
      validateNumber(value, schema);
      return;
    case ConfigValueType.SELECT:
      validateSelect(value, schema);
      return;
    case ConfigValueType.JSON:
      validateJson(value, schema);
      return;
    default:
      throw new ValidationError(`Unsupported value type: ${String(type)}`);
  }
}

function validateString(value: unknown, schema?: ValidationSchema | null): void {
  if (typeof value !== 'string') {
    throw new ValidationError('Value must be a string');
  }
  if (schema?.min_length !== undefined && value.length < schema.min_length) {
    throw new ValidationError(
      `Value must be at least ${schema.min_length} characters`,
    );
  }
  if (schema?.max_length !== undefined && value.length > schema.max_length) {
    throw new ValidationError(
      `Value must be at most ${schema.max_length} characters`,
    );
  }
  if (schema?.pattern !== undefined) {
    let pattern: RegExp;
    try {
      pattern = new RegExp(schema.pattern);
    } catch {
      throw new ValidationError(`Invalid pattern: ${schema.pattern}`);
    }
    if (!pattern.test(value)) {
      throw new ValidationError(`Value does not match pattern ${schema.pattern}`);
    }
  }
}

function validateNumber(value: unknown, schema?: ValidationSchema | null): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError('Value must be a number');
  }
  if (schema?.min_value !== undefined && value < schema.min_value) {
    throw new ValidationError(`Value must be >= ${schema.min_value}`);
  }
  if (schema?.max_value !== undefined && value > schema.max_value) {
    throw new ValidationError(`Value must be <= ${schema.max_value}`);
  }
}

function validateSelect(value: unknown, schema?: ValidationSchema | null): void {
  if (typeof value !== 'string') {
    throw new ValidationError('Value must be a string for select type');
  }
  const options = schema?.options;
  if (options && options.length > 0 && !options.includes(value)) {
    throw new ValidationError(`Value must be one of: ${options.join(', ')}`, {
      options,
    });
  }
}

function validateJson(value: unknown, schema?: ValidationSchema | null): void {
  let document: unknown = value;
  if (typeof value === 'string') {
    try {
      document = JSON.parse(value);
    } catch {
      throw new ValidationError('Value must be valid JSON');
    }
  } else if (value === null || typeof value !== 'object') {
    throw new ValidationError('Value must be a JSON object or array');
  }

  if (!schema?.json_schema) return;

  // One instance per call: no `$id` or compiled schema outlives the request.
  const ajv = new Ajv({ allErrors: true, strict: false, addUsedSchema: false });
  let check: ValidateFunction;
  try {
    check = ajv.compile(schema.json_schema);
  } catch (e) {
    throw new ValidationError(
      `Invalid json_schema: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
  if (!check(document)) {
    throw new ValidationError('Value does not satisfy json_schema', {
      errors: ajv.errorsText(check.errors),
    });
  }
}
