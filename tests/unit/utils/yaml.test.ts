/**
 * Tests for YAML utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { z } from 'zod';
import {
  parseYaml,
  parseYamlWithSchema,
  loadYamlWithSchema,
  formatZodError,
} from '../../../src/utils/yaml.js';
import { SonarError, ErrorCodes } from '../../../src/utils/errors.js';

const ThemeSchema = z.object({
  theme: z.string(),
  weight: z.number().default(0),
});

describe('parseYaml', () => {
  it('should parse mappings and lists', () => {
    expect(parseYaml('theme: bartik\nfragments:\n  - a\n  - b\n')).toEqual({
      theme: 'bartik',
      fragments: ['a', 'b'],
    });
  });

  it('should parse an empty document as null', () => {
    expect(parseYaml('')).toBeNull();
  });

  it('should throw PARSE_ERROR on invalid YAML', () => {
    expect(() => parseYaml('theme: [open')).toThrow(SonarError);
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('theme: seven', ThemeSchema)).toEqual({ theme: 'seven', weight: 0 });
  });

  it('should list every issue with its path', () => {
    let caught: unknown;
    try {
      parseYamlWithSchema('theme: 3\nweight: heavy', ThemeSchema);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SonarError);
    expect(caught).toMatchObject({ code: ErrorCodes.PARSE_ERROR });
    expect(caught instanceof Error && caught.message.startsWith('YAML validation failed: theme: ')).toBe(true);
    expect(caught instanceof Error && caught.message.includes('; weight: ')).toBe(true);
  });
});

describe('loadYamlWithSchema', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `sonar-yaml-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should load and validate a file', async () => {
    writeFileSync(join(testDir, 'm.yaml'), 'theme: bartik\nweight: 2\n');

    expect(await loadYamlWithSchema(join(testDir, 'm.yaml'), ThemeSchema)).toEqual({ theme: 'bartik', weight: 2 });
  });

  it('should add the file path to validation errors', async () => {
    const filePath = join(testDir, 'm.yaml');
    writeFileSync(filePath, 'weight: 2\n');

    const error = await loadYamlWithSchema(filePath, ThemeSchema).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SonarError);
    expect(error).toMatchObject({ code: ErrorCodes.PARSE_ERROR, details: { filePath } });
    expect(error instanceof Error && error.message.endsWith(`(file: ${filePath})`)).toBe(true);
  });

  it('should report unreadable files', async () => {
    const filePath = join(testDir, 'absent.yaml');

    await expect(loadYamlWithSchema(filePath, ThemeSchema)).rejects.toThrow(`Failed to load YAML file: ${filePath}`);
  });
});

describe('formatZodError', () => {
  it('should join path and message, omitting empty paths', () => {
    const result = z.object({ a: z.object({ b: z.string() }) }).safeParse({ a: { b: 1 } });
    const root = z.string().safeParse(1);

    expect(result.success).toBe(false);
    if (result.success || root.success) return;
    expect(formatZodError(result.error).startsWith('a.b: ')).toBe(true);
    expect(formatZodError(root.error)).toBe(root.error.issues[0]?.message);
  });
});
