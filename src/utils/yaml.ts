/**
 * YAML parsing with zod validation.
 */
import { parse } from 'yaml';
import { z } from 'zod';
import { SystemError, ErrorCodes, errorMessage } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse YAML content into an untyped value.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${errorMessage(error)}`,
      { error: errorMessage(error) }
    );
  }
}

/**
 * Parse and validate YAML content with a zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodTypeAny>(
  content: string,
  schema: T
): z.infer<T> {
  const parsed = parseYaml(content);
  const result = schema.safeParse(parsed ?? {});

  if (!result.success) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { issues: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Load and validate a YAML file with a zod schema.
 */
export async function loadYamlWithSchema<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.READ_ERROR,
      `Failed to read YAML file: ${filePath}`,
      { filePath, error: errorMessage(error) }
    );
  }

  try {
    return parseYamlWithSchema(content, schema);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new SystemError(
        error.code,
        `${error.message} (file: ${filePath})`,
        { ...error.details, filePath }
      );
    }
    throw error;
  }
}

/**
 * Format zod issues into a single readable line.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.join('.');
      return where ? `${where}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
