/**
 * Context assembly - file map + file contents + optional user instructions.
 */

import { extname } from 'path';
import { logger } from '../lib/logger.js';
import type { FileContext } from './reader.js';

export interface ContextOutput {
  fileMap: string;
  fileContents: string;
  userInstructions: string;
  tokenCount: number;
}

const CHARS_PER_TOKEN = 4;

/**
 * Rough token estimate: a quarter of the character count, plus 10% for text
 * that looks like code.
 */
export function estimateTokens(text: string): number {
  const chars = [...text].length;
  const estimate = Math.ceil(chars / CHARS_PER_TOKEN);
  const looksLikeCode = text.includes('```') || text.includes('    ') || text.includes('\t');
  return looksLikeCode ? Math.floor(estimate * 1.1) : estimate;
}

export function formatFileSection(file: FileContext): string {
  const ext = extname(file.path).replace(/^\./, '');
  return `\nFile: ${file.path}\n\`\`\`${ext}\n${file.content}\n\`\`\`\n`;
}

export function buildContextOutput(
  files: readonly FileContext[],
  fileMap: string,
  userPrompt?: string,
): ContextOutput {
  logger.debug(`Building context output from ${files.length} files`);

  let fileContents = '';
  let tokenCount = 0;

  for (const file of files) {
    const tokens = estimateTokens(file.content);
    tokenCount += tokens;
    logger.debug(`Adding file ${file.path} with ${tokens} tokens`);
    fileContents += formatFileSection(file);
  }

  tokenCount += estimateTokens(fileMap);

  const userInstructions = userPrompt ?? '';
  if (userInstructions) {
    logger.info('Including user prompt in context');
    tokenCount += estimateTokens(userInstructions);
  }

  return { fileMap, fileContents, userInstructions, tokenCount };
}

export function formatOutput(output: ContextOutput): string {
  let result = `<file_map>\n${output.fileMap}</file_map>\n\n\n`;
  result += `<file_contents>${output.fileContents}</file_contents>`;

  if (output.userInstructions) {
    result += `\n\n<user_instructions>\n${output.userInstructions}\n</user_instructions>`;
  }

  return result;
}
