/**
 * Document endpoints.
 * GET    /api/v1/documents                          — Indexed files
 * GET    /api/v1/documents/stats                    — Chunk and file counts
 * POST   /api/v1/documents/upload                   — Multipart file upload (admin)
 * POST   /api/v1/documents/upload-text              — Raw text upload (admin)
 * POST   /api/v1/documents/upload-service-catalog   — Multipart service catalog (admin)
 * POST   /api/v1/documents/search                   — Similarity search
 * DELETE /api/v1/documents/:name                    — Remove one file's chunks (admin)
 * POST   /api/v1/documents/clear                    — Remove everything (admin)
 */

import { pipeline, requireAdmin } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { ValidationError } from '../errors.js';
import { json, num, pathParam, readJson, requireStr } from './body.js';

const uploadTextSchema: BodySchema = {
  filename: { type: 'string', required: true, minLength: 1, maxLength: 255 },
  text: { type: 'string', required: true, minLength: 1 },
};

const searchSchema: BodySchema = {
  query: { type: 'string', required: true, minLength: 1, maxLength: 1000 },
  maxResults: { type: 'number', required: false, min: 1, max: 20 },
};

interface UploadedFile {
  filename: string;
  content: string;
}

/** Read the multipart field `file` as text. */
async function readUpload(req: Request): Promise<UploadedFile> {
  let form: FormData;
  try {
    form = await req.formData();
  } catch {
    throw new ValidationError('Request body must be multipart/form-data');
  }

  const entry = form.get('file');
  if (entry === null || typeof entry === 'string') {
    throw new ValidationError('Multipart field "file" with a file is required');
  }
  if (!entry.name) {
    throw new ValidationError('Uploaded file must have a name');
  }

  return { filename: entry.name, content: await entry.text() };
}

export function createDocumentHandlers(container: Container) {
  const adminUpload = pipeline(
    container.logging,
    container.errorHandler,
    container.uploadLimit,
    container.authenticate,
    requireAdmin,
    container.rateLimit.upload
  );

  const admin = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate,
    requireAdmin
  );

  const list: Handler = pipeline(container.logging, container.errorHandler)(
    async (_req, _ctx) => json(await container.documentService.listFiles())
  );

  const stats: Handler = pipeline(container.logging, container.errorHandler)(
    async (_req, _ctx) => json(await container.documentService.stats())
  );

  const upload: Handler = adminUpload(async (req, _ctx) => {
    const file = await readUpload(req);
    return json(await container.documentService.uploadFile(file.filename, file.content), 201);
  });

  const uploadText: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.uploadLimit,
    container.authenticate,
    requireAdmin,
    container.rateLimit.upload,
    validateBody(uploadTextSchema)
  )(async (req, _ctx) => {
    const body = await readJson(req);

    const result = await container.documentService.uploadText(
      requireStr(body, 'filename'),
      requireStr(body, 'text')
    );

    return json(result, 201);
  });

  const uploadServiceCatalog: Handler = adminUpload(async (req, _ctx) => {
    const file = await readUpload(req);
    const result = await container.documentService.uploadServiceCatalog(
      file.filename,
      file.content
    );
    return json(result, 201);
  });

  const search: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.bodyLimit,
    container.rateLimit.search,
    validateBody(searchSchema)
  )(async (req, _ctx) => {
    const body = await readJson(req);
    return json(
      await container.documentService.search(requireStr(body, 'query'), num(body, 'maxResults'))
    );
  });

  const remove: Handler = admin(async (req, _ctx) =>
    json(await container.documentService.delete(pathParam(req)))
  );

  const clear: Handler = admin(async (_req, _ctx) => json(await container.documentService.clear()));

  return {
    list,
    stats,
    upload,
    uploadText,
    uploadServiceCatalog,
    search,
    delete: remove,
    clear,
  };
}
