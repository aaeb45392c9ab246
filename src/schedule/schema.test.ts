import { readFileSync } from 'fs';
import ajvModule from 'ajv/dist/2020.js';
import type { SchemaObject } from 'ajv';
import addFormatsModule from 'ajv-formats';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { parse, serialize } from './codec.js';
import { isScheduleError, type ScheduleErrorCode } from './errors.js';
import { schedulesEqual } from './model.js';
import { recordingScheduleDocumentSchema } from './schema.js';
import { COMPARISON_OPERATORS, DAYS_OF_WEEK, PATTERN_TYPES, TRIGGER_TYPES, WINDOW_TYPES } from './types.js';

const validFixtureSchema = z.array(z.object({ name: z.string(), document: z.unknown() }));
const invalidFixtureSchema = z.array(
  z.object({
    name: z.string(),
    expected_code: z.string(),
    expected_field: z.string(),
    /** Rules the JSON Schema cannot express; only parse and the zod mirror reject these */
    json_schema_accepts: z.boolean().default(false),
    document: z.unknown(),
  })
);

function readJson(relativePath: string): unknown {
  return JSON.parse(readFileSync(new URL(relativePath, import.meta.url), 'utf-8'));
}

const jsonSchemaDocument = z
  .custom<SchemaObject>((value) => typeof value === 'object' && value !== null && !Array.isArray(value))
  .parse(readJson('../../schema/recording-schedule.schema.json'));

const Ajv2020 = ajvModule.default;
const addFormats = addFormatsModule.default;
const ajv = new Ajv2020({ allErrors: true, strictTypes: false });
addFormats(ajv);
const validateWithJsonSchema = ajv.compile(jsonSchemaDocument);

const validCases = validFixtureSchema.parse(readJson('./__fixtures__/valid.json'));
const invalidCases = invalidFixtureSchema.parse(readJson('./__fixtures__/invalid.json'));

function rejection(text: string): { code: ScheduleErrorCode; field: string | undefined } {
  try {
    parse(text);
  } catch (error) {
    if (isScheduleError(error)) return { code: error.code, field: error.field };
    throw error;
  }
  throw new Error('Expected the document to be rejected');
}

describe('valid documents', () => {
  it.each(validCases.map((fixture): [string, unknown] => [fixture.name, fixture.document]))('%s', (_, document) => {
    const text = JSON.stringify(document);

    expect(validateWithJsonSchema(document)).toBe(true);
    expect(recordingScheduleDocumentSchema.safeParse(document).success).toBe(true);

    const schedule = parse(text);
    const canonical = serialize(schedule);
    expect(schedulesEqual(parse(canonical), schedule)).toBe(true);
    const canonicalDocument: unknown = JSON.parse(canonical);
    expect(validateWithJsonSchema(canonicalDocument)).toBe(true);
    expect(recordingScheduleDocumentSchema.safeParse(canonicalDocument).success).toBe(true);
  });
});

describe('invalid documents', () => {
  it.each(
    invalidCases.map((fixture): [string, unknown, string, string, boolean] => [
      fixture.name,
      fixture.document,
      fixture.expected_code,
      fixture.expected_field,
      fixture.json_schema_accepts,
    ])
  )('%s', (_, document, expectedCode, expectedField, jsonSchemaAccepts) => {
    expect(validateWithJsonSchema(document)).toBe(jsonSchemaAccepts);
    expect(recordingScheduleDocumentSchema.safeParse(document).success).toBe(false);
    expect(rejection(JSON.stringify(document))).toEqual({ code: expectedCode, field: expectedField });
  });

  it('leaves only the rules named in the schema description to the parser', () => {
    const beyondJsonSchema = invalidCases
      .filter((fixture) => fixture.json_schema_accepts)
      .map((fixture) => fixture.expected_field);

    expect(beyondJsonSchema).toEqual(['continuous.end_at', 'scheduled.timezone']);
    expect(z.object({ description: z.string() }).parse(jsonSchemaDocument).description).toContain(
      'continuous.start_at must be strictly before continuous.end_at; scheduled.timezone must name a zone known to the IANA time zone database'
    );
  });
});

describe('JSON Schema file', () => {
  const enumSchema = z.object({ enum: z.array(z.string()) });
  const jsonSchema = z
    .object({
      properties: z.object({ pattern_type: enumSchema }),
      $defs: z.object({
        Window: z.object({
          properties: z.object({
            window_type: enumSchema,
            days_of_week: z.object({ items: enumSchema }),
          }),
        }),
        SensorTrigger: z.object({ properties: z.object({ op: enumSchema }) }),
        Trigger: z.object({ properties: z.object({ trigger_type: enumSchema }) }),
      }),
    })
    .parse(jsonSchemaDocument);

  it('lists the same tags as the model', () => {
    expect(jsonSchema.properties.pattern_type.enum).toEqual([...PATTERN_TYPES]);
    expect(jsonSchema.$defs.Trigger.properties.trigger_type.enum).toEqual([...TRIGGER_TYPES]);
    expect(jsonSchema.$defs.Window.properties.window_type.enum).toEqual([...WINDOW_TYPES]);
    expect(jsonSchema.$defs.Window.properties.days_of_week.items.enum).toEqual([...DAYS_OF_WEEK]);
    expect(jsonSchema.$defs.SensorTrigger.properties.op.enum).toEqual([...COMPARISON_OPERATORS]);
  });
});
