import { isAbsolute } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { ValidationError } from './errors.js';

export function pathToUri(filePath: string): string {
  return pathToFileURL(filePath).toString();
}

export function uriToPath(uri: string): string {
  if (!uri.startsWith('file://')) return uri;
  return fileURLToPath(uri);
}

/** Rejects relative paths before any filesystem or process call is made. */
export function requireAbsolutePath(filePath: string, param = 'file_path'): string {
  if (!isAbsolute(filePath)) {
    throw new ValidationError(
      'relative_path',
      `${param} must be an absolute path, got "${filePath}"`
    );
  }
  return filePath;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
