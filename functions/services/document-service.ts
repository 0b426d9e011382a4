/**
 * Per-user documents: metadata rows in Postgres, bytes in the blob store.
 *
 * Every operation is scoped to the authenticated owner; a document owned by
 * someone else is reported as not found.
 */

import crypto from 'crypto';
import type { DocumentRecord, DocumentRepository } from '../db/documents.js';
import type { BlobStore } from '../storage/blob-store.js';
import { fail, ok, type ServiceResult } from './result.js';

export const ALLOWED_CONTENT_TYPES: readonly string[] = [
  'image/jpeg',
  'image/png',
  'image/gif',
  'application/pdf',
  'application/msword',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
];

export const MAX_FILE_SIZE = 10 * 1024 * 1024;

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export interface UploadInput {
  filename: string;
  contentType: string;
  bytes: Uint8Array;
}

export interface DownloadedDocument {
  document: DocumentRecord;
  bytes: Uint8Array;
}

export interface DocumentServiceDeps {
  documents: DocumentRepository;
  blobs: BlobStore;
  generateId?: () => string;
}

function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf('.');
  if (dot <= 0 || dot === filename.length - 1) return '';
  return filename.slice(dot + 1).toLowerCase();
}

export class DocumentService {
  private readonly documents: DocumentRepository;
  private readonly blobs: BlobStore;
  private readonly generateId: () => string;

  constructor(deps: DocumentServiceDeps) {
    this.documents = deps.documents;
    this.blobs = deps.blobs;
    this.generateId = deps.generateId ?? (() => crypto.randomUUID());
  }

  async upload(ownerId: number, input: UploadInput): Promise<ServiceResult<DocumentRecord>> {
    if (!ALLOWED_CONTENT_TYPES.includes(input.contentType)) {
      return fail('ValidationFailed', `File type ${input.contentType || 'unknown'} is not supported.`);
    }
    if (input.bytes.byteLength === 0) {
      return fail('ValidationFailed', 'File is empty');
    }
    if (input.bytes.byteLength > MAX_FILE_SIZE) {
      return fail('ValidationFailed', 'File is too large (Max 10MB)');
    }

    const extension = fileExtension(input.filename);
    const blobName = `${ownerId}/${this.generateId()}${extension ? `.${extension}` : ''}`;
    const blobUrl = await this.blobs.put(input.bytes, blobName, input.contentType);

    try {
      const document = await this.documents.create({
        userId: ownerId,
        originalFilename: input.filename,
        blobName,
        blobUrl,
        fileSize: input.bytes.byteLength,
        contentType: input.contentType,
      });
      return ok(document);
    } catch (error) {
      // Don't leave an unreferenced blob behind
      if (!(await this.blobs.delete(blobName))) {
        console.error('document-service: Orphaned blob after failed insert:', blobName);
      }
      throw error;
    }
  }

  async list(ownerId: number, skip: number = 0, limit: number = DEFAULT_PAGE_SIZE): Promise<DocumentRecord[]> {
    const safeSkip = Math.max(0, Math.floor(skip));
    const safeLimit = Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(limit)));
    return this.documents.listByOwner(ownerId, safeSkip, safeLimit);
  }

  async get(ownerId: number, documentId: number): Promise<ServiceResult<DocumentRecord>> {
    const document = await this.documents.findForOwner(documentId, ownerId);
    return document ? ok(document) : fail('NotFound', 'Document not found');
  }

  async download(ownerId: number, documentId: number): Promise<ServiceResult<DownloadedDocument>> {
    const found = await this.get(ownerId, documentId);
    if (!found.success) return found;

    const bytes = await this.blobs.get(found.data.blobName);
    return ok({ document: found.data, bytes });
  }

  /**
   * Blob first, then the record. If the blob store refuses the delete the
   * record stays and the caller gets UpstreamFailure.
   */
  async delete(ownerId: number, documentId: number): Promise<ServiceResult<{ id: number }>> {
    const found = await this.get(ownerId, documentId);
    if (!found.success) return found;

    const blobDeleted = await this.blobs.delete(found.data.blobName);
    if (!blobDeleted) {
      return fail('UpstreamFailure', 'Could not delete the stored file. Please try again later.');
    }

    const removed = await this.documents.delete(documentId, ownerId);
    if (!removed) {
      return fail('NotFound', 'Document not found');
    }

    console.log('document-service: Document deleted:', documentId);
    return ok({ id: documentId });
  }
}
