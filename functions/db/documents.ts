import type { NeonQueryFunction } from '@neondatabase/serverless';

export interface DocumentRecord {
  id: number;
  userId: number;
  originalFilename: string;
  blobName: string;
  blobUrl: string;
  fileSize: number;
  contentType: string;
  createdAt: Date;
}

export type NewDocument = Omit<DocumentRecord, 'id' | 'createdAt'>;

export interface DocumentRepository {
  create(document: NewDocument): Promise<DocumentRecord>;
  listByOwner(userId: number, skip: number, limit: number): Promise<DocumentRecord[]>;
  findForOwner(id: number, userId: number): Promise<DocumentRecord | null>;
  delete(id: number, userId: number): Promise<boolean>;
}

type Row = Record<string, unknown>;

export function toDocumentRecord(row: Row): DocumentRecord {
  return {
    id: Number(row.id),
    userId: Number(row.user_id),
    originalFilename: String(row.original_filename),
    blobName: String(row.blob_name),
    blobUrl: String(row.blob_url),
    fileSize: Number(row.file_size ?? 0),
    contentType: typeof row.content_type === 'string' ? row.content_type : 'application/octet-stream',
    createdAt: row.created_at instanceof Date ? row.created_at : new Date(String(row.created_at)),
  };
}

export function createDocumentRepository(sql: NeonQueryFunction<false, false>): DocumentRepository {
  return {
    async create(document) {
      const [row] = await sql`
        INSERT INTO documents (
          user_id,
          original_filename,
          blob_name,
          blob_url,
          file_size,
          content_type
        ) VALUES (
          ${document.userId},
          ${document.originalFilename},
          ${document.blobName},
          ${document.blobUrl},
          ${document.fileSize},
          ${document.contentType}
        )
        RETURNING *
      `;
      if (!row) {
        throw new Error('Document insert returned no row');
      }
      return toDocumentRecord(row);
    },

    async listByOwner(userId, skip, limit) {
      const rows = await sql`
        SELECT * FROM documents
        WHERE user_id = ${userId}
        ORDER BY created_at DESC, id DESC
        OFFSET ${skip}
        LIMIT ${limit}
      `;
      return rows.map(toDocumentRecord);
    },

    async findForOwner(id, userId) {
      const [row] = await sql`
        SELECT * FROM documents WHERE id = ${id} AND user_id = ${userId}
      `;
      return row ? toDocumentRecord(row) : null;
    },

    async delete(id, userId) {
      const rows = await sql`
        DELETE FROM documents WHERE id = ${id} AND user_id = ${userId}
        RETURNING id
      `;
      return rows.length > 0;
    },
  };
}
