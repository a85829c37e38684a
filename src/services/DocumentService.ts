/**
 * Document index management: uploads, the service catalog, search, listing
 * and deletion. Re-uploading a filename replaces its chunks.
 */

import type { IDocumentIndex, IndexedChunk } from '../repositories/IDocumentIndex.js';
import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ChunkMetadata } from '../types/models.js';
import type {
  CatalogUploadResponse,
  ClearDocumentsResponse,
  DeleteDocumentResponse,
  DocumentFileResponse,
  DocumentSearchResult,
  DocumentStatsResponse,
  DocumentUploadResponse,
} from '../types/api.js';
import { chunkText } from '../documents/TextChunker.js';
import {
  htmlToText,
  isServiceCatalog,
  parseServiceCatalog,
  serviceDocumentText,
} from '../documents/ServiceCatalogParser.js';
import { NotFoundError, ValidationError } from '../errors.js';

export const SUPPORTED_EXTENSIONS = ['txt', 'md', 'html', 'htm', 'xls'] as const;
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

const HTML_EXTENSIONS: readonly SupportedExtension[] = ['html', 'htm', 'xls'];
const CATALOG_FILE_TYPE = 'service';
const DEFAULT_SEARCH_RESULTS = 5;
const MAX_SEARCH_RESULTS = 20;

interface PendingDocument {
  filename: string;
  text: string;
  metadata: Omit<ChunkMetadata, 'filename' | 'chunkIndex' | 'totalChunks' | 'timestamp'>;
}

export class DocumentService {
  constructor(
    private readonly index: IDocumentIndex,
    private readonly embeddingProvider: IEmbeddingProvider,
    private readonly logProvider: ILogProvider
  ) {}

  /**
   * Index an uploaded file. HTML tables whose header names services are
   * loaded as a service catalog; everything else as a plain document.
   */
  async uploadFile(
    filename: string,
    content: string
  ): Promise<DocumentUploadResponse | CatalogUploadResponse> {
    const extension = fileExtension(filename);
    if (!isSupported(extension)) {
      throw new ValidationError(
        `Unsupported file type ".${extension}". Supported: ${SUPPORTED_EXTENSIONS.map((e) => `.${e}`).join(', ')}`
      );
    }

    if (HTML_EXTENSIONS.includes(extension)) {
      if (isServiceCatalog(content)) {
        return this.uploadServiceCatalog(filename, content);
      }
      if (extension === 'xls' && !/<table/i.test(content)) {
        throw new ValidationError('Only HTML-exported .xls files are supported');
      }
      return this.uploadText(filename, htmlToText(content), extension);
    }

    return this.uploadText(filename, content, extension);
  }

  async uploadText(
    filename: string,
    text: string,
    fileType = fileExtension(filename) || 'txt'
  ): Promise<DocumentUploadResponse> {
    const name = requireFilename(filename);
    const chunks = await this.indexDocuments([
      { filename: name, text, metadata: { fileType, sourceType: 'document' } },
    ]);

    if (chunks === 0) {
      throw new ValidationError(`Document "${name}" contains no text`);
    }

    this.logProvider.info('Document indexed', { filename: name, chunks });
    return { filename: name, sourceType: 'document', chunks };
  }

  /** Each catalog row becomes its own document, named after the service. */
  async uploadServiceCatalog(filename: string, html: string): Promise<CatalogUploadResponse> {
    const services = parseServiceCatalog(html);
    if (services.length === 0) {
      throw new ValidationError('No services found in the service catalog');
    }

    const chunks = await this.indexDocuments(
      services.map((service): PendingDocument => ({
        filename: service.name,
        text: serviceDocumentText(service),
        metadata: {
          fileType: CATALOG_FILE_TYPE,
          sourceType: 'service_catalog',
          serviceName: service.name,
          serviceType: 'municipal_service',
          startDate: service.startDate,
        },
      }))
    );

    this.logProvider.info('Service catalog loaded', {
      filename,
      services: services.length,
      chunks,
    });

    return { filename, servicesIndexed: services.length, chunks };
  }

  async search(query: string, maxResults = DEFAULT_SEARCH_RESULTS): Promise<DocumentSearchResult[]> {
    if (!query.trim()) {
      throw new ValidationError('query must not be empty');
    }

    const k = Math.min(Math.max(1, Math.floor(maxResults)), MAX_SEARCH_RESULTS);
    const embedding = await this.embeddingProvider.generate(query);
    const hits = await this.index.query(embedding, { k });

    return hits.map((hit) => ({
      content: hit.content,
      metadata: hit.metadata,
      score: Math.min(1, Math.max(0, hit.score)),
    }));
  }

  /** One entry per filename, in the order files were first indexed. */
  async listFiles(): Promise<DocumentFileResponse[]> {
    const chunks = await this.index.listChunks();
    const files = new Map<string, DocumentFileResponse>();

    for (const chunk of chunks) {
      const { filename } = chunk.metadata;
      const file = files.get(filename);
      if (file) {
        file.chunkCount++;
        continue;
      }
      files.set(filename, {
        filename,
        fileType: chunk.metadata.fileType,
        sourceType: chunk.metadata.sourceType,
        serviceName: chunk.metadata.serviceName ?? null,
        chunkCount: 1,
        firstSeen: chunk.created_at,
      });
    }

    return [...files.values()];
  }

  async stats(): Promise<DocumentStatsResponse> {
    const [totalChunks, files] = await Promise.all([this.index.count(), this.listFiles()]);

    const byFileType: Record<string, number> = {};
    for (const file of files) {
      byFileType[file.fileType] = (byFileType[file.fileType] ?? 0) + 1;
    }

    return { totalChunks, uniqueDocuments: files.length, byFileType };
  }

  async delete(filename: string): Promise<DeleteDocumentResponse> {
    const deletedChunks = await this.index.deleteBySource(filename);
    if (deletedChunks === 0) {
      throw new NotFoundError(`Document "${filename}" not found`);
    }

    this.logProvider.info('Document deleted', { filename, deletedChunks });
    return { filename, deletedChunks };
  }

  async clear(): Promise<ClearDocumentsResponse> {
    const deletedChunks = await this.index.clear();
    this.logProvider.warn('Document index cleared', { deletedChunks });
    return { deletedChunks };
  }

  // ── Private ──

  /** Replace each document's chunks; all texts are embedded in one batch. */
  private async indexDocuments(documents: PendingDocument[]): Promise<number> {
    const timestamp = new Date().toISOString();
    const pending: Array<Omit<IndexedChunk, 'embedding'>> = [];
    const chunkCounts = new Map<string, number>();

    for (const doc of documents) {
      const pieces = chunkText(doc.text);
      chunkCounts.set(doc.filename, pieces.length);
      pieces.forEach((content, chunkIndex) => {
        pending.push({
          id: chunkId(doc.filename, chunkIndex),
          content,
          metadata: {
            ...doc.metadata,
            filename: doc.filename,
            chunkIndex,
            totalChunks: pieces.length,
            timestamp,
          },
        });
      });
    }

    if (pending.length === 0) return 0;

    const embeddings = await this.embeddingProvider.generateBatch(pending.map((c) => c.content));

    // Upsert before pruning: a failed write leaves the previous version in place
    await this.index.upsert(pending.map((chunk, i) => ({ ...chunk, embedding: embeddings[i] })));
    for (const doc of documents) {
      await this.index.deleteChunksFrom(doc.filename, chunkCounts.get(doc.filename) ?? 0);
    }

    return pending.length;
  }
}

export function chunkId(filename: string, chunkIndex: number): string {
  return `${filename}#${chunkIndex}`;
}

function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot === -1 ? '' : filename.slice(dot + 1).toLowerCase();
}

function isSupported(extension: string): extension is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((e) => e === extension);
}

function requireFilename(filename: string): string {
  const name = filename.trim();
  if (!name) {
    throw new ValidationError('filename is required');
  }
  return name;
}
