// Directory discovery and lazy JSON loading. Anything that cannot become a JSON
// value is a LoadError for that document only.

import * as fs from 'fs-extra';
import * as path from 'path';
import { DocumentInput } from './types';
import { LoadError, errorMessage } from './errors';
import { SPDX_EXTENSION } from './constants';

export interface DiscoveryOptions {
  extension?: string;
  verbose?: boolean;
}

export async function loadJsonDocument(file: string, documentId = path.basename(file)): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (e) {
    throw new LoadError(documentId, `Cannot read ${file}: ${errorMessage(e)}`);
  }
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new LoadError(documentId, `${documentId} is not valid JSON: ${errorMessage(e)}`);
  }
}

function unrecognized(documentId: string, extension: string): DocumentInput {
  const message = `File ${documentId} not recognized. Please ensure your files are SPDX JSON format and end with '${extension}'.`;
  return { documentId, load: () => Promise.reject(new LoadError(documentId, message)) };
}

export function fileDocument(file: string, documentId = path.basename(file), extension = SPDX_EXTENSION): DocumentInput {
  if (!documentId.toLowerCase().endsWith(extension.toLowerCase())) return unrecognized(documentId, extension);
  return { documentId, load: () => loadJsonDocument(file, documentId) };
}

// Every entry of `dir` (not recursive), sorted by name. Subdirectories are not
// descended into; they are reported as unrecognized inputs.
export async function loadDocumentsFromDirectory(dir: string, options: DiscoveryOptions = {}): Promise<DocumentInput[]> {
  const extension = options.extension || SPDX_EXTENSION;
  const names = (await fs.readdir(dir)).sort();
  const inputs: DocumentInput[] = [];
  for (const name of names) {
    const file = path.join(dir, name);
    const stat = await fs.stat(file);
    if (options.verbose) console.log(`${stat.isFile() ? '📄' : '📁'} Found ${name}`);
    inputs.push(stat.isFile() ? fileDocument(file, name, extension) : unrecognized(name, extension));
  }
  return inputs;
}

// A single file or a directory of documents.
export async function discoverDocuments(target: string, options: DiscoveryOptions = {}): Promise<DocumentInput[]> {
  if (!(await fs.pathExists(target))) throw new Error(`Path not found: ${target}`);
  const stat = await fs.stat(target);
  if (stat.isDirectory()) return loadDocumentsFromDirectory(target, options);
  return [fileDocument(target, path.basename(target), options.extension || SPDX_EXTENSION)];
}
