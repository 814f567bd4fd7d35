import { readFile } from 'fs/promises';
import { basename } from 'path';
import { UnsupportedFileError, ValidationError } from '../../packages/shared/errors';
import { loadPdfSource } from './pdfSource';
import type { DocumentSource } from './types';

export type DocumentRequest = {
  filePath?: string;
  filename?: string;
};

export type LoaderDeps = {
  readBytes: (path: string) => Promise<Uint8Array>;
  parsePdf: (filename: string, data: Uint8Array) => Promise<DocumentSource>;
};

export const defaultLoaderDeps: LoaderDeps = {
  readBytes: async (path) => new Uint8Array(await readFile(path)),
  parsePdf: loadPdfSource,
};

export function resolveFilename(request: DocumentRequest): string {
  const raw = request.filename ?? request.filePath;
  if (!raw || !raw.trim()) {
    throw new ValidationError('filePath or filename is required.');
  }
  return basename(raw.trim());
}

/**
 * Opens a document either from a blob uploaded earlier in the session (keyed
 * by filename, base64 encoded) or from disk.
 */
export async function loadDocument(
  request: DocumentRequest,
  uploadedFiles: Record<string, string>,
  deps: LoaderDeps = defaultLoaderDeps,
): Promise<DocumentSource> {
  const filename = resolveFilename(request);
  if (!filename.toLowerCase().endsWith('.pdf')) {
    throw new UnsupportedFileError(filename);
  }

  const uploaded = uploadedFiles[filename];
  if (uploaded !== undefined) {
    return deps.parsePdf(filename, new Uint8Array(Buffer.from(uploaded, 'base64')));
  }

  if (!request.filePath) {
    throw new ValidationError(`No uploaded file named ${filename}. Upload it or pass filePath.`);
  }
  return deps.parsePdf(filename, await deps.readBytes(request.filePath));
}
