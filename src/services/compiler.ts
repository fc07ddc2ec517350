import { readFile } from 'fs/promises';
import { FIRMWARE } from '../constants/index.js';
import { extractHeader, type ExtractOptions } from './firmware/header-extractor.js';
import { parseFilterBandArray } from './firmware/array-parser.js';
import { EmptyFilterTableError } from './firmware/errors.js';
import { buildFilterBandModel, type BuildResult } from './filterbands/model-builder.js';

export interface CompileOptions extends ExtractOptions {
  /** Array literal to read, defaults to rxFilterBands */
  arrayName?: string;
  /** Accept a table with no elements instead of failing */
  allowEmpty?: boolean;
}

/**
 * Run the whole pipeline over one snapshot of the firmware sources:
 * header facts + array elements -> model.
 */
export function compileFilterBands(headerText: string, sourceText: string, options: CompileOptions = {}): BuildResult {
  const arrayName = options.arrayName ?? FIRMWARE.ARRAY_NAME;

  const facts = extractHeader(headerText, options);
  const elements = parseFilterBandArray(sourceText, arrayName);
  if (elements.length === 0 && !options.allowEmpty) {
    throw new EmptyFilterTableError(arrayName);
  }

  const { model, warnings } = buildFilterBandModel(facts, elements);
  return { model, warnings: [...facts.warnings, ...warnings] };
}

export async function compileFilterBandFiles(
  headerPath: string,
  sourcePath: string,
  options: CompileOptions = {}
): Promise<BuildResult> {
  const [headerText, sourceText] = await Promise.all([
    readFile(headerPath, 'utf8'),
    readFile(sourcePath, 'utf8'),
  ]);
  return compileFilterBands(headerText, sourceText, options);
}
