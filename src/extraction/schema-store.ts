/**
 * Parameter schemas for extraction
 *
 * Built-in TypeBox schemas describe the parameter sets the agents understand.
 * A configured schema directory may override them with plain JSON Schema
 * files named `{service}_{operation}_schema.json`.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Type, type TSchema, type TProperties, type TLiteral } from '@sinclair/typebox';
import { Check } from '@sinclair/typebox/value';
import { Errors } from '@sinclair/typebox/errors';

import { formatErrorMessage } from '../errors.js';
import type { AgentLogger } from '../logging/index.js';
import type { OperationType, ServiceName } from '../types.js';

// Tags arrive either as a mapping (before resolution) or as Key/Value pairs.
const TagsSchema = Type.Union([
  Type.Array(Type.Object({ Key: Type.String(), Value: Type.String() })),
  Type.Record(Type.String(), Type.String()),
]);

export const Ec2CreateSchema = Type.Object({
  InstanceType: Type.Optional(Type.String({ description: 'EC2 instance type, e.g. t3.micro' })),
  InstanceTypeDescription: Type.Optional(Type.String({ description: 'Free-text sizing hint such as "small compute"' })),
  ImageId: Type.Optional(Type.String({ description: 'AMI id, e.g. ami-0abc1234' })),
  ImageDescription: Type.Optional(Type.String({ description: 'Operating system description, e.g. "ubuntu"' })),
  MinCount: Type.Optional(Type.Integer({ minimum: 1 })),
  MaxCount: Type.Optional(Type.Integer({ minimum: 1 })),
  KeyName: Type.Optional(Type.String()),
  SecurityGroupIds: Type.Optional(Type.Array(Type.String())),
  SubnetId: Type.Optional(Type.String()),
  UserData: Type.Optional(Type.String()),
  EbsOptimized: Type.Optional(Type.Boolean()),
  Tags: Type.Optional(TagsSchema),
});

export const Ec2LifecycleSchema = Type.Object({
  Action: Type.String({ description: 'One of start, stop, reboot, terminate' }),
  InstanceId: Type.Optional(Type.String({ description: 'Instance id, e.g. i-0123456789abcdef0' })),
  InstanceDescription: Type.Optional(Type.String({ description: 'Free-text description of the target instance' })),
  InstanceName: Type.Optional(Type.String({ description: 'Value of the Name tag' })),
  Force: Type.Optional(Type.Boolean()),
});

export const S3CreateSchema = Type.Object({
  BucketName: Type.String(),
  Region: Type.Optional(Type.String()),
  ACL: Type.Optional(Type.String()),
  Versioning: Type.Optional(Type.Boolean()),
  BucketEncryption: Type.Optional(Type.Unknown()),
  Tags: Type.Optional(TagsSchema),
});

const BUILTIN_SCHEMAS = new Map<string, TSchema>([
  ['ec2_create_schema', Ec2CreateSchema],
  ['ec2_lifecycle_schema', Ec2LifecycleSchema],
  ['s3_create_schema', S3CreateSchema],
]);

// =============================================================================
// JSON Schema conversion
// =============================================================================

type JsonNode = Record<string, unknown>;

function isJsonNode(value: unknown): value is JsonNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickNumbers(node: JsonNode, keys: string[]): Record<string, number> {
  const picked: Record<string, number> = {};
  for (const key of keys) {
    const value = node[key];
    if (typeof value === 'number') picked[key] = value;
  }
  return picked;
}

function convertType(node: JsonNode, type: unknown, description: { description?: string }): TSchema {
  switch (type) {
    case 'object': {
      const properties = isJsonNode(node.properties) ? node.properties : {};
      const required = new Set(Array.isArray(node.required) ? node.required.filter((r): r is string => typeof r === 'string') : []);
      const shape: TProperties = {};
      for (const [key, child] of Object.entries(properties)) {
        const converted = fromJsonSchema(child);
        shape[key] = required.has(key) ? converted : Type.Optional(converted);
      }
      return Type.Object(shape, description);
    }
    case 'string': {
      const pattern = typeof node.pattern === 'string' ? { pattern: node.pattern } : {};
      return Type.String({ ...description, ...pattern, ...pickNumbers(node, ['minLength', 'maxLength']) });
    }
    case 'integer':
      return Type.Integer({ ...description, ...pickNumbers(node, ['minimum', 'maximum']) });
    case 'number':
      return Type.Number({ ...description, ...pickNumbers(node, ['minimum', 'maximum']) });
    case 'boolean':
      return Type.Boolean(description);
    case 'array':
      return Type.Array(fromJsonSchema(node.items), description);
    case 'null':
      return Type.Null(description);
    default:
      return Type.Unknown(description);
  }
}

/**
 * Convert a plain JSON Schema document into a TypeBox schema.
 *
 * Covers the subset parameter schemas use: object/properties/required,
 * scalar types, arrays, enum and `nullable`. Anything else is `Unknown`.
 */
export function fromJsonSchema(node: unknown): TSchema {
  if (!isJsonNode(node)) return Type.Unknown();

  const description = typeof node.description === 'string' ? { description: node.description } : {};
  let schema: TSchema;

  if (Array.isArray(node.enum)) {
    const literals: TLiteral[] = [];
    for (const value of node.enum) {
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        literals.push(Type.Literal(value));
      }
    }
    schema = literals.length === 1 ? literals[0] : Type.Union(literals, description);
  } else if (Array.isArray(node.type)) {
    schema = Type.Union(node.type.map((t) => convertType(node, t, {})), description);
  } else {
    schema = convertType(node, node.type, description);
  }

  return node.nullable === true ? Type.Union([schema, Type.Null()]) : schema;
}

// =============================================================================
// Store
// =============================================================================

export interface SchemaStoreOptions {
  schemaDir?: string;
  logger?: AgentLogger;
}

export function schemaKey(service: ServiceName, operationType: OperationType): string {
  return `${service}_${operationType}_schema`;
}

export class SchemaStore {
  private cache = new Map<string, TSchema | undefined>();

  constructor(private options: SchemaStoreOptions = {}) {}

  /**
   * Schema for a service/operation pair, or undefined when none exists
   */
  async load(service: ServiceName, operationType: OperationType): Promise<TSchema | undefined> {
    const key = schemaKey(service, operationType);
    if (this.cache.has(key)) {
      return this.cache.get(key);
    }

    const schema = (await this.loadOverride(key)) ?? BUILTIN_SCHEMAS.get(key);
    this.cache.set(key, schema);
    return schema;
  }

  private async loadOverride(key: string): Promise<TSchema | undefined> {
    const { schemaDir, logger } = this.options;
    if (!schemaDir) return undefined;

    const file = join(schemaDir, `${key}.json`);
    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        logger?.debug(`No schema override at ${file}`);
      } else {
        logger?.warn(`Could not read schema file ${file}`, { error: formatErrorMessage(err) });
      }
      return undefined;
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (err) {
      logger?.warn(`Ignoring invalid schema file ${file}`, { error: formatErrorMessage(err) });
      return undefined;
    }
    if (!isJsonNode(document)) {
      logger?.warn(`Ignoring invalid schema file ${file}`, { error: 'schema must be a JSON object' });
      return undefined;
    }

    return fromJsonSchema(document);
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Check a value against a schema; `path: message` per failure
 */
export function checkAgainstSchema(schema: TSchema, value: unknown): string[] {
  if (Check(schema, value)) return [];

  const errors: string[] = [];
  for (const error of Errors(schema, value)) {
    const path = error.path || '(root)';
    errors.push(`${path}: ${error.message}`);
  }
  return errors;
}
