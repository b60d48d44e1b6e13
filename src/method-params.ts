/**
 * Params validation for known MCP methods
 *
 * The envelope decoders only guarantee that `params` is an object. This
 * checks its contents against per-method JSON Schemas so a gateway can
 * reject malformed calls before routing them. Unknown methods pass.
 */

import Ajv from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import fs from 'fs/promises';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { JsonRpcRequest } from './types/jsonrpc.js';

export const DEFAULT_METHOD_SCHEMAS_PATH = fileURLToPath(
  new URL('../schemas/method-params.json', import.meta.url)
);

export interface ParamsValidationError {
  path: string;
  message: string;
}

export interface ParamsValidationResult {
  valid: boolean;
  errors?: ParamsValidationError[];
}

const schemaFileSchema = z.record(
  z.custom<SchemaObject>(value => typeof value === 'object' && value !== null && !Array.isArray(value))
);

export class MethodParamsValidator {
  private validators = new Map<string, ValidateFunction>();

  constructor(schemas: Record<string, SchemaObject>) {
    const ajv = new Ajv.default({ strict: true, allErrors: true });
    for (const [method, schema] of Object.entries(schemas)) {
      try {
        this.validators.set(method, ajv.compile(schema));
      } catch (error) {
        throw new ConfigurationError(`Invalid params schema for method '${method}'`, {
          method,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  /**
   * Load schemas keyed by method name from a JSON file
   */
  static async load(schemaPath: string = DEFAULT_METHOD_SCHEMAS_PATH): Promise<MethodParamsValidator> {
    const content = await fs.readFile(schemaPath, 'utf-8');
    const parsed = schemaFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new ConfigurationError(`Method schema file must map method names to schema objects: ${schemaPath}`, {
        schemaPath,
      });
    }
    return new MethodParamsValidator(parsed.data);
  }

  hasSchema(method: string): boolean {
    return this.validators.has(method);
  }

  /**
   * Validate request params; absent params are checked as an empty object
   */
  validate(request: JsonRpcRequest): ParamsValidationResult {
    const validate = this.validators.get(request.method);
    if (!validate) {
      return { valid: true };
    }

    if (validate(request.params ?? {})) {
      return { valid: true };
    }

    return {
      valid: false,
      errors: (validate.errors ?? []).map(toValidationError),
    };
  }
}

function toValidationError(error: ErrorObject): ParamsValidationError {
  return {
    path: error.instancePath || '(root)',
    message: error.message ?? 'is invalid',
  };
}
