/**
 * Requirements File Parsing
 * 
 * Extracts the requirement specifiers from a pip requirements file.
 * pip itself still reads the file during install; this only reports
 * which packages the layer will carry.
 */

import { ValidationError } from '@pylayer/core';
import { safeReadFile } from '@pylayer/utils';

export function parseRequirements(content: string): string[] {
  const requirements: string[] = [];

  // Backslash at end of line continues the requirement
  const lines = content.replace(/\\\r?\n/g, ' ').split(/\r?\n/);

  for (const rawLine of lines) {
    // '#' starts a comment at line start or after whitespace
    const line = rawLine.replace(/(^|\s)#.*$/, '').trim();

    if (!line || line.startsWith('-')) {
      continue;
    }

    requirements.push(line.replace(/\s+/g, ' '));
  }

  return requirements;
}

/**
 * Read and parse a requirements file
 */
export async function readRequirementsFile(filePath: string): Promise<string[]> {
  const content = await safeReadFile(filePath);
  if (content === null) {
    throw new ValidationError('requirementsFile', `File not found: ${filePath}`);
  }
  return parseRequirements(content);
}
