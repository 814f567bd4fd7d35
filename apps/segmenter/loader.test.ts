import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { UnsupportedFileError, ValidationError } from '../../packages/shared/errors';
import { loadDocument, resolveFilename, type LoaderDeps } from './loader';
import { createTextDocument } from './testUtils';

function createDeps(files: Record<string, string> = {}) {
  const calls: Array<{ filename: string; text: string }> = [];
  const deps: LoaderDeps = {
    async readBytes(path) {
      const text = files[path];
      if (text === undefined) throw new Error(`ENOENT: ${path}`);
      return new TextEncoder().encode(text);
    },
    async parsePdf(filename, data) {
      const text = new TextDecoder().decode(data);
      calls.push({ filename, text });
      return createTextDocument({ filename, pages: [text] });
    },
  };
  return { deps, calls };
}

describe('resolveFilename', () => {
  it('uses the base name of the path', () => {
    assert.equal(resolveFilename({ filePath: '/books/physics/notes.pdf' }), 'notes.pdf');
    assert.equal(resolveFilename({ filename: 'upload.pdf', filePath: '/tmp/x.pdf' }), 'upload.pdf');
  });

  it('requires a path or filename', () => {
    assert.throws(() => resolveFilename({}), ValidationError);
  });
});

describe('loadDocument', () => {
  it('rejects files that are not PDFs', async () => {
    const { deps } = createDeps();
    await assert.rejects(loadDocument({ filePath: '/tmp/notes.txt' }, {}, deps), UnsupportedFileError);
    await assert.rejects(loadDocument({ filePath: '/tmp/notes.txt' }, {}, deps), {
      message: 'Not a PDF: notes.txt',
    });
  });

  it('prefers a blob uploaded under the same filename', async () => {
    const { deps, calls } = createDeps({ '/tmp/notes.pdf': 'from disk' });
    const uploaded = { 'notes.pdf': Buffer.from('from upload').toString('base64') };
    const source = await loadDocument({ filePath: '/tmp/notes.pdf' }, uploaded, deps);
    assert.equal(source.getPageText(0), 'from upload');
    assert.deepEqual(calls, [{ filename: 'notes.pdf', text: 'from upload' }]);
  });

  it('reads from disk when nothing was uploaded', async () => {
    const { deps } = createDeps({ '/tmp/Notes.PDF': 'from disk' });
    const source = await loadDocument({ filePath: '/tmp/Notes.PDF' }, {}, deps);
    assert.equal(source.filename, 'Notes.PDF');
    assert.equal(source.getPageText(0), 'from disk');
  });

  it('needs a path when the named upload is missing', async () => {
    const { deps } = createDeps();
    await assert.rejects(loadDocument({ filename: 'missing.pdf' }, {}, deps), ValidationError);
  });
});
