import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MAX_FILE_SIZE } from '../services/document-service.js';
import { createTestContext, type TestContext } from '../testing/test-context.js';

const pdf = (text: string = '%PDF-1.4 test') => ({
  filename: 'report.PDF',
  contentType: 'application/pdf',
  bytes: new TextEncoder().encode(text),
});

describe('DocumentService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('upload', () => {
    it('stores the bytes under the owner prefix and records metadata', async () => {
      const result = await ctx.documents.upload(7, pdf());

      expect(result).toEqual({
        success: true,
        data: {
          id: 1,
          userId: 7,
          originalFilename: 'report.PDF',
          blobName: '7/blob-1.pdf',
          blobUrl: 'memory://blobs/7/blob-1.pdf',
          fileSize: 13,
          contentType: 'application/pdf',
          createdAt: expect.any(Date),
        },
      });
      expect(await ctx.blobs.list('7/')).toEqual(['7/blob-1.pdf']);
    });

    it('omits the extension when the filename has none', async () => {
      const result = await ctx.documents.upload(7, { ...pdf(), filename: 'README' });
      expect(result.success ? result.data.blobName : null).toBe('7/blob-1');
    });

    it('rejects unsupported content types', async () => {
      const result = await ctx.documents.upload(7, { ...pdf(), contentType: 'text/html' });

      expect(result).toEqual({
        success: false,
        error: { code: 'ValidationFailed', message: 'File type text/html is not supported.' },
      });
      expect(await ctx.blobs.list()).toEqual([]);
    });

    it('rejects empty and oversized files', async () => {
      const empty = await ctx.documents.upload(7, { ...pdf(), bytes: new Uint8Array(0) });
      const huge = await ctx.documents.upload(7, { ...pdf(), bytes: new Uint8Array(MAX_FILE_SIZE + 1) });

      expect(empty.success ? null : empty.error.message).toBe('File is empty');
      expect(huge.success ? null : huge.error.message).toBe('File is too large (Max 10MB)');
    });

    it('accepts a file of exactly the maximum size', async () => {
      const result = await ctx.documents.upload(7, { ...pdf(), bytes: new Uint8Array(MAX_FILE_SIZE) });
      expect(result.success).toBe(true);
    });

    it('removes the blob again when the metadata insert fails', async () => {
      ctx.documentRows.failNextCreate = true;

      await expect(ctx.documents.upload(7, pdf())).rejects.toThrow('insert failed');
      expect(await ctx.blobs.list()).toEqual([]);
      expect(ctx.documentRows.count()).toBe(0);
    });
  });

  describe('list', () => {
    it('returns only the owner documents, newest first', async () => {
      await ctx.documents.upload(7, { ...pdf(), filename: 'a.pdf' });
      await ctx.documents.upload(8, { ...pdf(), filename: 'b.pdf' });
      await ctx.documents.upload(7, { ...pdf(), filename: 'c.pdf' });

      const docs = await ctx.documents.list(7);
      expect(docs.map((doc) => doc.originalFilename)).toEqual(['c.pdf', 'a.pdf']);
    });

    it('clamps paging arguments', async () => {
      for (const name of ['a.pdf', 'b.pdf', 'c.pdf']) {
        await ctx.documents.upload(7, { ...pdf(), filename: name });
      }

      expect((await ctx.documents.list(7, 1, 1)).map((doc) => doc.originalFilename)).toEqual(['b.pdf']);
      expect(await ctx.documents.list(7, -5, 0)).toHaveLength(1);
      expect(await ctx.documents.list(7, 0, 1000)).toHaveLength(3);
    });
  });

  describe('get and download', () => {
    it('returns the stored bytes to the owner', async () => {
      await ctx.documents.upload(7, pdf('hello'));

      const result = await ctx.documents.download(7, 1);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.document.originalFilename).toBe('report.PDF');
      expect(new TextDecoder().decode(result.data.bytes)).toBe('hello');
    });

    it('hides documents owned by someone else', async () => {
      await ctx.documents.upload(7, pdf());
      const notFound = { success: false, error: { code: 'NotFound', message: 'Document not found' } };

      expect(await ctx.documents.get(8, 1)).toEqual(notFound);
      expect(await ctx.documents.download(8, 1)).toEqual(notFound);
      expect(await ctx.documents.delete(8, 1)).toEqual(notFound);
      expect(ctx.documentRows.count()).toBe(1);
    });
  });

  describe('delete', () => {
    it('removes the blob and the record', async () => {
      await ctx.documents.upload(7, pdf());

      expect(await ctx.documents.delete(7, 1)).toEqual({ success: true, data: { id: 1 } });
      expect(await ctx.blobs.exists('7/blob-1.pdf')).toBe(false);
      expect(ctx.documentRows.count()).toBe(0);
      expect(await ctx.documents.get(7, 1)).toEqual({
        success: false,
        error: { code: 'NotFound', message: 'Document not found' },
      });
    });

    it('keeps the record when the blob cannot be deleted', async () => {
      await ctx.documents.upload(7, pdf());
      ctx.blobs.failDeletes = true;

      expect(await ctx.documents.delete(7, 1)).toEqual({
        success: false,
        error: {
          code: 'UpstreamFailure',
          message: 'Could not delete the stored file. Please try again later.',
        },
      });
      expect(ctx.documentRows.count()).toBe(1);
      expect(await ctx.blobs.exists('7/blob-1.pdf')).toBe(true);
    });
  });
});
