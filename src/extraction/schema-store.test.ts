import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Check } from '@sinclair/typebox/value';

import {
  SchemaStore,
  fromJsonSchema,
  checkAgainstSchema,
  schemaKey,
  Ec2CreateSchema,
  Ec2LifecycleSchema,
} from './schema-store.js';
import { createAgentLogger, MemoryTransport } from '../logging/index.js';

describe('fromJsonSchema', () => {
  it('converts objects with required and optional properties', () => {
    const schema = fromJsonSchema({
      type: 'object',
      properties: { BucketName: { type: 'string' }, Versioning: { type: 'boolean' } },
      required: ['BucketName'],
    });

    expect(Check(schema, { BucketName: 'logs' })).toBe(true);
    expect(Check(schema, { BucketName: 'logs', Versioning: true })).toBe(true);
    expect(Check(schema, {})).toBe(false);
    expect(Check(schema, { BucketName: 3 })).toBe(false);
  });

  it('converts enums into literal unions', () => {
    const schema = fromJsonSchema({ enum: ['start', 'stop'] });
    expect(Check(schema, 'stop')).toBe(true);
    expect(Check(schema, 'pause')).toBe(false);
  });

  it('honours nullable', () => {
    const schema = fromJsonSchema({ type: 'string', nullable: true });
    expect(Check(schema, null)).toBe(true);
    expect(Check(schema, 'x')).toBe(true);
    expect(Check(schema, 1)).toBe(false);
  });

  it('converts arrays and integer bounds', () => {
    const schema = fromJsonSchema({ type: 'array', items: { type: 'integer', minimum: 1 } });
    expect(Check(schema, [1, 2])).toBe(true);
    expect(Check(schema, [0])).toBe(false);
    expect(Check(schema, [1.5])).toBe(false);
  });

  it('treats unknown shapes as unconstrained', () => {
    expect(Check(fromJsonSchema('not a schema'), { anything: true })).toBe(true);
  });
});

describe('checkAgainstSchema', () => {
  it('returns no errors for a conforming value', () => {
    expect(checkAgainstSchema(Ec2CreateSchema, { InstanceType: 't3.micro', MinCount: 1 })).toEqual([]);
  });

  it('reports the failing path', () => {
    const errors = checkAgainstSchema(Ec2CreateSchema, { MinCount: 'one' });
    expect(errors.length).toBeGreaterThan(0);
    expect(errors[0]).toMatch(/^\/MinCount: /);
  });

  it('reports missing required properties', () => {
    const errors = checkAgainstSchema(Ec2LifecycleSchema, { InstanceId: 'i-0123456789abcdef0' });
    expect(errors.some((e) => e.startsWith('/Action: '))).toBe(true);
  });
});

describe('SchemaStore', () => {
  let dir: string;
  let memory: MemoryTransport;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'schema-store-'));
    memory = new MemoryTransport();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const logger = () => createAgentLogger('schemas', { level: 'debug', transports: [memory] });

  it('builds keys from service and operation', () => {
    expect(schemaKey('ec2', 'lifecycle')).toBe('ec2_lifecycle_schema');
  });

  it('returns built-in schemas without a directory', async () => {
    const store = new SchemaStore();
    await expect(store.load('ec2', 'create')).resolves.toBe(Ec2CreateSchema);
  });

  it('returns undefined when no schema exists', async () => {
    const store = new SchemaStore({ schemaDir: dir, logger: logger() });
    await expect(store.load('rds', 'delete')).resolves.toBeUndefined();
  });

  it('prefers an override file from the schema directory', async () => {
    await writeFile(
      join(dir, 's3_create_schema.json'),
      JSON.stringify({ type: 'object', properties: { BucketName: { type: 'string', minLength: 3 } }, required: ['BucketName'] }),
    );
    const store = new SchemaStore({ schemaDir: dir, logger: logger() });

    const schema = await store.load('s3', 'create');

    expect(schema).toBeDefined();
    expect(schema && Check(schema, { BucketName: 'ab' })).toBe(false);
    expect(schema && Check(schema, { BucketName: 'abc' })).toBe(true);
  });

  it('logs and ignores an invalid override file', async () => {
    await writeFile(join(dir, 'ec2_create_schema.json'), '{ not json');
    const store = new SchemaStore({ schemaDir: dir, logger: logger() });

    await expect(store.load('ec2', 'create')).resolves.toBe(Ec2CreateSchema);
    expect(memory.messages('warn')).toEqual([`Ignoring invalid schema file ${join(dir, 'ec2_create_schema.json')}`]);
  });

  it('caches lookups', async () => {
    const store = new SchemaStore({ schemaDir: dir, logger: logger() });
    await store.load('ec2', 'lifecycle');
    await writeFile(join(dir, 'ec2_lifecycle_schema.json'), JSON.stringify({ type: 'object' }));

    await expect(store.load('ec2', 'lifecycle')).resolves.toBe(Ec2LifecycleSchema);
  });
});
