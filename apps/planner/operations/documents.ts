import { z } from 'zod';
import { ValidationError } from '../../../packages/shared/errors';
import { listTopics, recordSegmentation, resetTopics, segmentDocument, summarizeSegmentation } from '../../segmenter/index';
import { loadDocument } from '../../segmenter/loader';
import { type OperationMap, parseArgs } from './types';

const segmentArgsSchema = z
  .object({
    filePath: z.string().trim().min(1).optional(),
    filename: z.string().trim().min(1).optional(),
    subject: z.string().trim().min(1),
  })
  .refine((value) => value.filePath !== undefined || value.filename !== undefined, {
    message: 'filePath or filename is required',
  });

const uploadArgsSchema = z.object({
  filename: z.string().trim().min(1),
  contentBase64: z.string().min(1),
});

const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;

const documentHandlers: OperationMap = {
  async segment_and_weight(args, { state }, deps) {
    const { filePath, filename, subject } = parseArgs(segmentArgsSchema, args);
    const source = await loadDocument({ filePath, filename }, state.uploadedFiles, deps.loader);
    const result = segmentDocument(source, subject);
    recordSegmentation(state, result);
    return summarizeSegmentation(result);
  },

  async upload_document(args, { state }) {
    const { filename, contentBase64 } = parseArgs(uploadArgsSchema, args);
    const compact = contentBase64.replace(/\s+/g, '');
    if (!BASE64_RE.test(compact)) {
      throw new ValidationError('contentBase64 must be base64 encoded.');
    }
    state.uploadedFiles[filename] = compact;
    return {
      filename,
      bytes: Buffer.byteLength(compact, 'base64'),
      message: `Stored ${filename}. Run segment_and_weight with this filename.`,
    };
  },

  async reset_topics(_args, { state }) {
    resetTopics(state);
    return { message: 'All topics cleared' };
  },

  async list_topics(_args, { state }) {
    return listTopics(state);
  },
};

export default documentHandlers;
