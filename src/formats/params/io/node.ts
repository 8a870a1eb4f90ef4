/**
 * node.ts - Node.js I/O for parameter documents
 *
 * @module formats/params/io/node
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { log } from '../../../debug/index.js';
import type { ModelOptions, ParameterModel } from '../../../registers/model.js';
import { parseParamsDocument, serializeParamsDocument } from '../parsing.js';
import type { SerializeOptions } from '../types.js';

export async function readParamsFile(path: string, options: ModelOptions = {}): Promise<ParameterModel> {
  const text = await readFile(path, 'utf8');
  const model = parseParamsDocument(text, options);
  log.verbose('Params', `Read ${model.schema.toString()} from ${path}`);
  return model;
}

/**
 * Write a model as a parameter document, creating parent directories.
 */
export async function writeParamsFile(
  path: string,
  model: ParameterModel,
  options: SerializeOptions = {}
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, serializeParamsDocument(model, options), 'utf8');
  log.verbose('Params', `Wrote ${model.schema.toString()} to ${path}`);
}
