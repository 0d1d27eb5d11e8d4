/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, loadYamlWithSchema, formatZodError } from '../../../src/utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../../src/utils/errors.js';
import { readFile } from '../../../src/utils/file-system.js';

vi.mock('../../../src/utils/file-system.js', () => ({
  readFile: vi.fn(),
}));

const mockReadFile = vi.mocked(readFile);

const Schema = z.object({
  name: z.string(),
  retries: z.number().default(3),
});

describe('parseYaml', () => {
  it('should parse nested YAML', () => {
    expect(parseYaml('files:\n  include:\n    - "**/*.tf"\n')).toEqual({ files: { include: ['**/*.tf'] } });
  });

  it('should throw ConfigError for invalid YAML', () => {
    expect(() => parseYaml('key: [unclosed')).toThrow(ConfigError);
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('name: demo\n', Schema)).toEqual({ name: 'demo', retries: 3 });
  });

  it('should report the failing path', () => {
    try {
      parseYamlWithSchema('name: 42\n', Schema);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe(ErrorCodes.INVALID_CONFIG);
        expect(error.message).toMatch(/^YAML validation failed: name: /);
      }
    }
  });
});

describe('loadYamlWithSchema', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should load and validate a file', async () => {
    mockReadFile.mockResolvedValue('name: demo\nretries: 1\n');

    await expect(loadYamlWithSchema('/project/.tfmigrate.yaml', Schema)).resolves.toEqual({
      name: 'demo',
      retries: 1,
    });
    expect(mockReadFile).toHaveBeenCalledWith('/project/.tfmigrate.yaml');
  });

  it('should add the file path to validation errors', async () => {
    mockReadFile.mockResolvedValue('retries: 1\n');

    await expect(loadYamlWithSchema('/project/.tfmigrate.yaml', Schema)).rejects.toThrow(
      /\(file: \/project\/\.tfmigrate\.yaml\)$/
    );
  });

  it('should map read failures to FILE_NOT_FOUND', async () => {
    mockReadFile.mockRejectedValue(new Error('ENOENT'));

    await expect(loadYamlWithSchema('/missing.yaml', Schema)).rejects.toMatchObject({
      code: ErrorCodes.FILE_NOT_FOUND,
      message: 'Failed to load YAML file: /missing.yaml',
    });
  });
});

describe('formatZodError', () => {
  it('should join issues with their paths', () => {
    const result = z.object({ a: z.string(), b: z.object({ c: z.number() }) }).safeParse({ a: 1, b: { c: 'x' } });

    expect(result.success).toBe(false);
    if (!result.success) {
      const formatted = formatZodError(result.error);
      expect(formatted.split('; ').map((part) => part.split(':')[0])).toEqual(['a', 'b.c']);
    }
  });
});
