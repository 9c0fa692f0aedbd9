import { readFile } from 'node:fs/promises';
import path from 'node:path';
import AjvModule, { type ErrorObject, type ValidateFunction } from 'ajv';

import { ConfigurationError, FileAccessError } from '../types/errors.js';
import type { LiteralSchema } from '../types/literal.js';
import type { RepairOptions } from '../types/options.js';
import { REGISTRY_CONFIG_SCHEMA } from './config-schema.js';
import { DEFAULT_SCHEMAS } from './defaults.js';

// ajv ships CommonJS typings; under NodeNext the default import is the module object
const Ajv = AjvModule.default;

export interface RegistryConfig {
  schemas: LiteralSchema[];
  declarationKeywords?: string[];
  extensions?: string[];
  indentUnit?: string;
}

export interface LoadedRegistryConfig {
  registry: SchemaRegistry;
  /** Options carried by the file, to be layered under CLI flags */
  options: RepairOptions;
}

/**
 * Tag → schema lookup consumed by the engine. One schema per tag.
 */
export class SchemaRegistry {
  readonly #schemas: Map<string, LiteralSchema>;

  constructor(schemas: readonly LiteralSchema[]) {
    this.#schemas = new Map();
    for (const schema of schemas) {
      if (this.#schemas.has(schema.tag)) {
        throw new ConfigurationError(
          `Duplicate schema for tag "${schema.tag}"`,
          { tag: schema.tag }
        );
      }
      const names = schema.requiredFields.map((field) => field.name);
      const repeated = names.find((name, i) => names.indexOf(name) !== i);
      if (repeated !== undefined) {
        throw new ConfigurationError(
          `Schema "${schema.tag}" lists required field "${repeated}" twice`,
          { tag: schema.tag }
        );
      }
      this.#schemas.set(schema.tag, schema);
    }
  }

  static defaults(): SchemaRegistry {
    return new SchemaRegistry(DEFAULT_SCHEMAS);
  }

  get tags(): string[] {
    return Array.from(this.#schemas.keys());
  }

  get size(): number {
    return this.#schemas.size;
  }

  get(tag: string): LiteralSchema | undefined {
    return this.#schemas.get(tag);
  }

  /** Like get(), for tags that came out of a scan over this registry */
  require(tag: string): LiteralSchema {
    const schema = this.#schemas.get(tag);
    if (!schema) {
      throw new ConfigurationError(`No schema registered for tag "${tag}"`, {
        tag,
      });
    }
    return schema;
  }
}

let validator: ValidateFunction<RegistryConfig> | undefined;

function getValidator(): ValidateFunction<RegistryConfig> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true, strict: true });
    validator = ajv.compile<RegistryConfig>(REGISTRY_CONFIG_SCHEMA);
  }
  return validator;
}

function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(
    (error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`
  );
}

/**
 * Validate an already-parsed configuration object
 *
 * @throws ConfigurationError listing every schema violation
 */
export function parseRegistryConfig(
  input: unknown,
  source = '<inline>'
): LoadedRegistryConfig {
  const validate = getValidator();
  if (!validate(input)) {
    const errors = formatAjvErrors(validate.errors);
    throw new ConfigurationError(
      `Invalid registry configuration ${source}: ${errors.join('; ')}`,
      { filePath: source, errors }
    );
  }

  const options: RepairOptions = {};
  if (input.declarationKeywords) {
    options.declarationKeywords = input.declarationKeywords;
  }
  if (input.extensions) options.extensions = input.extensions;
  if (input.indentUnit) options.indentUnit = input.indentUnit;

  return { registry: new SchemaRegistry(input.schemas), options };
}

/**
 * Read and validate a registry configuration file
 */
export async function loadRegistryConfig(
  filePath: string
): Promise<LoadedRegistryConfig> {
  const absolute = path.resolve(filePath);
  let raw: string;
  try {
    raw = await readFile(absolute, 'utf8');
  } catch (error) {
    throw new FileAccessError({
      filePath: absolute,
      operation: 'read',
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid JSON in ${absolute}: ${error instanceof Error ? error.message : String(error)}`,
      { filePath: absolute },
      error instanceof Error ? error : undefined
    );
  }
  return parseRegistryConfig(parsed, absolute);
}
