/**
 * Document Loader
 *
 * Decodes a configuration document from JSON or YAML text. Anything that goes
 * wrong here is a structural failure: no field-level validation can run.
 */

import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import yaml from 'js-yaml';
import { config } from '@/config/index';
import { Failure, Success, type Result } from '@/types/core';
import { ErrorCodes, StructuralError, extractErrorMessage } from './errors';

export const DOCUMENT_FORMATS = ['json', 'yaml'] as const;

export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number];

export interface DocumentOptions {
  /** Maximum accepted size in bytes */
  maxBytes?: number;
}

/**
 * Format implied by a file name; YAML for anything that is not `.json`
 */
export function detectFormat(path: string): DocumentFormat {
  return extname(path).toLowerCase() === '.json' ? 'json' : 'yaml';
}

/**
 * Decode document text into an untyped value
 */
export function parseClusterDocument(
  text: string,
  format: DocumentFormat,
  options: DocumentOptions = {},
): Result<unknown, StructuralError> {
  const maxBytes = options.maxBytes ?? config.document.maxBytes;
  const size = Buffer.byteLength(text, 'utf8');
  if (size > maxBytes) {
    return Failure(
      new StructuralError(
        `Document is ${size} bytes, larger than the ${maxBytes} byte limit`,
        ErrorCodes.DOCUMENT_TOO_LARGE,
        { size, maxBytes },
      ),
    );
  }

  try {
    // Core schema keeps dates and timestamps as plain strings
    const value: unknown =
      format === 'json' ? JSON.parse(text) : yaml.load(text, { schema: yaml.CORE_SCHEMA });
    return Success(value);
  } catch (error) {
    return Failure(
      new StructuralError(
        `Document is not valid ${format.toUpperCase()}: ${extractErrorMessage(error)}`,
        ErrorCodes.DOCUMENT_UNPARSEABLE,
        { format },
      ),
    );
  }
}

/**
 * Read and decode a document file
 */
export function readClusterDocument(
  path: string,
  format: DocumentFormat = detectFormat(path),
  options: DocumentOptions = {},
): Result<unknown, StructuralError> {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    return Failure(
      new StructuralError(
        `Cannot read ${path}: ${extractErrorMessage(error)}`,
        ErrorCodes.DOCUMENT_UNREADABLE,
        { path },
      ),
    );
  }
  return parseClusterDocument(text, format, options);
}
